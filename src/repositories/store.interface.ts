import type { LoggerLike, UploadTask } from '../types/index.js';

/**
 * Durable snapshot of every task a scheduler knows about.
 * `save` replaces the whole snapshot atomically; `load` returns [] when nothing was saved yet
 * and rejects when a snapshot exists but cannot be read back completely.
 */
export interface TaskStore {
  readonly id: string;
  logger?: LoggerLike;
  init?(): Promise<void>;
  load(): Promise<UploadTask[]>;
  save(tasks: UploadTask[]): Promise<void>;
}
