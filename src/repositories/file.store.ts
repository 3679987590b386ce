import path from 'path';
import { BaseTaskStore } from './base.store.js';
import { StoreFileTypeMismatchError, StoreReadError, StoreWriteError } from '../util/errors.js';
import { readFileIfExists, writeFileAtomic } from '../util/helpers.js';
import type { TaskSnapshot } from '../util/task.schema.js';
import type { TaskStore } from './store.interface.js';

export class FileTaskStore extends BaseTaskStore implements TaskStore {
  constructor(private readonly filePath: string) {
    super();
    if (path.extname(this.filePath) !== '.json') {
      throw new StoreFileTypeMismatchError(this.filePath);
    }
  }

  protected get source(): string {
    return this.filePath;
  }

  protected async readSnapshot(): Promise<unknown> {
    let data: string | undefined;
    try {
      data = await readFileIfExists(this.filePath);
    } catch (err) {
      throw new StoreReadError(this.filePath, err instanceof Error ? err.message : String(err));
    }
    if (data === undefined) return undefined;
    return this.parseJson(data);
  }

  protected async writeSnapshot(snapshot: TaskSnapshot): Promise<void> {
    try {
      await writeFileAtomic(this.filePath, JSON.stringify(snapshot, null, 2));
    } catch (err) {
      this.logger?.error('Error saving tasks to file:', err);
      throw new StoreWriteError(this.filePath, err instanceof Error ? err.message : String(err));
    }
  }
}
