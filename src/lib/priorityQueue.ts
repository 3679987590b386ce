import { TaskPriority, type UploadTask } from '../types/index.js';

type QueueEntry = {
  id: string;
  rank: number;
  due: number;
  seq: number;
};

type Waiter = {
  notify(): void;
  release(): void;
};

export type QueueableTask = Pick<UploadTask, 'id' | 'priority' | 'dueAt' | 'status'>;

// priority rank first, then earlier due-time ("run now" tasks count as due at 0), then insertion order
export const compareEntries = (a: QueueEntry, b: QueueEntry): number => a.rank - b.rank || a.due - b.due || a.seq - b.seq;

/**
 * Ready-to-run ordering of task ids. Holds only lightweight handles: the scheduler's task table stays the source of truth.
 */
export class TaskPriorityQueue {
  private readonly heap: QueueEntry[] = [];
  private readonly members = new Set<string>();
  private readonly waiters: Waiter[] = [];
  private seq = 0;

  get size(): number {
    return this.heap.length;
  }

  has(id: string): boolean {
    return this.members.has(id);
  }

  /**
   * Returns false when the task is already queued or is not PENDING.
   */
  push(task: QueueableTask): boolean {
    if (task.status !== 'PENDING' || this.members.has(task.id)) {
      return false;
    }
    this.members.add(task.id);
    this.heap.push({ id: task.id, rank: TaskPriority[task.priority], due: task.dueAt?.getTime() ?? 0, seq: this.seq++ });
    this.siftUp(this.heap.length - 1);
    this.waiters.shift()?.notify();
    return true;
  }

  pop(): string | undefined {
    const top = this.heap[0];
    if (!top) return undefined;
    this.removeAt(0);
    return top.id;
  }

  remove(id: string): boolean {
    if (!this.members.has(id)) return false;
    const index = this.heap.findIndex(entry => entry.id === id);
    this.removeAt(index);
    return true;
  }

  /**
   * Waits up to `timeoutMs` for an entry. Resolves null on timeout or when released.
   */
  take(timeoutMs: number): Promise<string | null> {
    const id = this.pop();
    if (id !== undefined) return Promise.resolve(id);

    return new Promise(resolve => {
      const waiter: Waiter = {
        notify: () => {
          clearTimeout(timer);
          resolve(this.pop() ?? null);
        },
        release: () => {
          clearTimeout(timer);
          resolve(null);
        },
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        resolve(null);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  releaseWaiters(): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter.release();
    }
  }

  clear(): void {
    this.heap.length = 0;
    this.members.clear();
  }

  private removeAt(index: number) {
    const removed = this.heap[index];
    const last = this.heap.pop();
    if (!removed || !last) return;
    this.members.delete(removed.id);
    if (index < this.heap.length) {
      this.heap[index] = last;
      this.siftDown(index);
      this.siftUp(index);
    }
  }

  private siftUp(index: number) {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.less(child, parent)) break;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number) {
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < this.heap.length && this.less(left, smallest)) smallest = left;
      if (right < this.heap.length && this.less(right, smallest)) smallest = right;
      if (smallest === parent) return;
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private less(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    return a !== undefined && b !== undefined && compareEntries(a, b) < 0;
  }

  private swap(i: number, j: number) {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) return;
    this.heap[i] = b;
    this.heap[j] = a;
  }
}
