import { BaseTaskStore } from './base.store.js';
import type { TaskSnapshot } from '../util/task.schema.js';
import type { TaskStore } from './store.interface.js';

// Keeps the serialized snapshot text, so a reload goes through the same codec as the durable stores.
export class MemoryTaskStore extends BaseTaskStore implements TaskStore {
  private snapshot: string | undefined;

  protected get source(): string {
    return `memory:${this.id}`;
  }

  protected async readSnapshot(): Promise<unknown> {
    return this.snapshot === undefined ? undefined : this.parseJson(this.snapshot);
  }

  protected async writeSnapshot(snapshot: TaskSnapshot): Promise<void> {
    this.snapshot = JSON.stringify(snapshot);
  }
}
