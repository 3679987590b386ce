import type { RedisStoreOptions } from '../types/index.js';
import { BaseTaskStore } from './base.store.js';
import { StoreReadError, StoreWriteError } from '../util/errors.js';
import type { TaskSnapshot } from '../util/task.schema.js';
import type { TaskStore } from './store.interface.js';

// The subset of an ioredis client the store talks to.
export interface RedisSnapshotClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

/**
 * One string key per scheduler instance; SET replaces the whole snapshot in a single command.
 */
export class RedisTaskStore extends BaseTaskStore implements TaskStore {
  private readonly redis: RedisSnapshotClient;
  readonly storageName: string;
  readonly instance: string;

  constructor(redisClient: RedisSnapshotClient, options?: RedisStoreOptions) {
    super();
    this.redis = redisClient;
    this.storageName = options?.storageName || 'upload-scheduler';
    this.instance = options?.instance || 'default';
  }

  get snapshotKey(): string {
    return `${this.storageName}:${this.instance}:snapshot`;
  }

  protected get source(): string {
    return `redis:${this.snapshotKey}`;
  }

  protected async readSnapshot(): Promise<unknown> {
    let data: string | null;
    try {
      data = await this.redis.get(this.snapshotKey);
    } catch (err) {
      throw new StoreReadError(this.source, err instanceof Error ? err.message : String(err));
    }
    if (data === null) return undefined;
    return this.parseJson(data);
  }

  protected async writeSnapshot(snapshot: TaskSnapshot): Promise<void> {
    try {
      await this.redis.set(this.snapshotKey, JSON.stringify(snapshot));
    } catch (err) {
      throw new StoreWriteError(this.source, err instanceof Error ? err.message : String(err));
    }
  }
}
