import { z } from 'zod';
import type { PostgresOptions } from '../types/index.js';
import { BaseTaskStore } from './base.store.js';
import { StoreCorruptError, StoreReadError, StoreWriteError } from '../util/errors.js';
import { SNAPSHOT_VERSION, formatIssues, type TaskSnapshot } from '../util/task.schema.js';
import type { TaskStore } from './store.interface.js';

// The subset of a pg Pool / PoolClient the store talks to.
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}
export interface PgSnapshotPool extends PgQueryable {
  connect(): Promise<PgQueryable & { release(): void }>;
}

const RowSchema = z.object({
  id: z.string(),
  data: z.unknown(),
});

/**
 * One row per task, keyed by (instance, id). A save replaces every row of the instance inside one transaction.
 */
export class PostgresTaskStore extends BaseTaskStore implements TaskStore {
  readonly schema: string;
  readonly tableName: string;
  readonly instance: string;

  constructor(private readonly pg: PgSnapshotPool, private readonly options: PostgresOptions = {}) {
    super();
    this.schema = options.schema || 'public';
    this.tableName = options.tableName || 'upload_tasks';
    this.instance = options.instance || 'default';
  }

  private get table(): string {
    return `"${this.schema}"."${this.tableName}"`;
  }

  protected get source(): string {
    return `postgres:${this.schema}.${this.tableName}[${this.instance}]`;
  }

  async init(): Promise<void> {
    if (this.options.useMigrate) {
      await migrateTasksTable(this.pg, this.options);
    }
  }

  protected async readSnapshot(): Promise<unknown> {
    let rows: unknown[];
    try {
      const res = await this.pg.query(`SELECT id, data FROM ${this.table} WHERE instance = $1 ORDER BY position ASC`, [this.instance]);
      rows = res.rows;
    } catch (err) {
      throw new StoreReadError(this.source, err instanceof Error ? err.message : String(err));
    }
    if (rows.length === 0) return undefined;

    const parsed = z.array(RowSchema).safeParse(rows);
    if (!parsed.success) {
      throw new StoreCorruptError(this.source, formatIssues(parsed.error));
    }

    const tasks: Record<string, unknown> = {};
    for (const row of parsed.data) {
      tasks[row.id] = typeof row.data === 'string' ? this.parseJson(row.data) : row.data;
    }
    return { version: SNAPSHOT_VERSION, savedAt: new Date().toISOString(), tasks };
  }

  protected async writeSnapshot(snapshot: TaskSnapshot): Promise<void> {
    const client = await this.pg.connect();
    try {
      await client.query('BEGIN');
      await client.query(`DELETE FROM ${this.table} WHERE instance = $1`, [this.instance]);

      let position = 0;
      for (const task of Object.values(snapshot.tasks)) {
        await client.query(
          `INSERT INTO ${this.table} (instance, id, position, status, data, saved_at)
         VALUES ($1,$2,$3,$4,$5,$6)`,
          [this.instance, task.id, position++, task.status, JSON.stringify(task), snapshot.savedAt]
        );
      }

      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw new StoreWriteError(this.source, err instanceof Error ? err.message : String(err));
    } finally {
      client.release(); // Return the client to the pool
    }
  }
}

// postgres migration:

const defaultColumns: Record<string, string> = {
  instance: 'VARCHAR NOT NULL',
  id: 'VARCHAR NOT NULL',
  position: 'INT NOT NULL',
  status: 'VARCHAR NOT NULL',
  data: 'JSONB NOT NULL',
  saved_at: 'TIMESTAMPTZ NOT NULL',
};

export async function migrateTasksTable(pg: PgQueryable, options: PostgresOptions = {}): Promise<void> {
  const schema = options.schema || 'public';
  const tableName = options.tableName || 'upload_tasks';

  const columns = Object.entries(defaultColumns).map(([key, type]) => `"${key}" ${type}`);
  const constraints = ['PRIMARY KEY ("instance", "id")'];

  const createTableSQL = `
    CREATE TABLE IF NOT EXISTS "${schema}"."${tableName}" (
      ${[...columns, ...constraints].join(',\n      ')}
    );
  `;

  const indexes = [`CREATE INDEX IF NOT EXISTS idx_${tableName}_instance_status ON "${schema}"."${tableName}" (instance, status);`];

  await pg.query(`CREATE SCHEMA IF NOT EXISTS "${schema}";`);
  await pg.query(createTableSQL);
  for (const idxSQL of indexes) {
    await pg.query(idxSQL);
  }
}
