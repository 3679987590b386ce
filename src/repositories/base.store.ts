import { randomUUID } from 'crypto';
import type { LoggerLike, UploadTask } from '../types/index.js';
import { StoreCorruptError, StoreWriteError } from '../util/errors.js';
import { SnapshotSchema, formatIssues, parseSnapshot, toSnapshot, type TaskSnapshot } from '../util/task.schema.js';
import type { TaskStore } from './store.interface.js';

export abstract class BaseTaskStore implements TaskStore {
  logger?: LoggerLike;
  readonly id: string;

  constructor() {
    this.id = randomUUID();
  }

  // human readable location used in error messages
  protected abstract get source(): string;

  // undefined when no snapshot was ever written
  protected abstract readSnapshot(): Promise<unknown>;
  protected abstract writeSnapshot(snapshot: TaskSnapshot): Promise<void>;

  async load(): Promise<UploadTask[]> {
    const raw = await this.readSnapshot();
    if (raw === undefined) {
      this.logger?.debug?.(`No snapshot found at ${this.source}, starting empty`);
      return [];
    }
    const parsed = parseSnapshot(raw);
    if (!parsed.ok) {
      throw new StoreCorruptError(this.source, parsed.details);
    }
    this.logger?.info(`Loaded ${parsed.tasks.length} tasks from ${this.source}`);
    return parsed.tasks;
  }

  /**
   * Writes the snapshot of `tasks`. A snapshot that {@link load} would refuse is rejected before anything is written.
   */
  async save(tasks: UploadTask[]): Promise<void> {
    const snapshot = toSnapshot(tasks);
    const checked = SnapshotSchema.safeParse(snapshot);
    if (!checked.success) {
      throw new StoreWriteError(this.source, formatIssues(checked.error));
    }
    await this.writeSnapshot(snapshot);
  }

  protected parseJson(data: string): unknown {
    try {
      return JSON.parse(data);
    } catch (err) {
      throw new StoreCorruptError(this.source, err instanceof Error ? err.message : String(err));
    }
  }
}
