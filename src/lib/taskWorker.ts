import type { LoggerLike } from '../types/index.js';
import type { TaskPriorityQueue } from './priorityQueue.js';

export type RunTask = (taskId: string) => Promise<void>;

/**
 * Fixed-size pool of async worker loops pulling task ids from the queue.
 */
export class TaskWorkerPool {
  private workerActive = false;
  // loops of an earlier start() that outlived stop() must not resume after a restart
  private generation = 0;
  private workerPromise?: Promise<void[]>;
  private readonly logger: LoggerLike | undefined;

  constructor(
    private readonly queue: TaskPriorityQueue,
    private readonly runTask: RunTask,
    private readonly pollInterval: number,
    logger?: LoggerLike
  ) {
    this.logger = logger;
  }

  get active(): boolean {
    return this.workerActive;
  }

  start(concurrency: number) {
    if (this.workerActive) return;
    this.log('info', `Starting ${concurrency} workers`);
    this.workerActive = true;
    this.generation++;
    const workers: Promise<void>[] = [];
    for (let i = 0; i < concurrency; i++) {
      workers.push(this.workerLoop(i + 1, this.generation));
    }
    this.workerPromise = Promise.all(workers);
  }

  /**
   * Resolves true when every worker exited within `timeout`, false when some are still inside an upload.
   */
  async stop(timeout: number): Promise<boolean> {
    if (!this.workerPromise) return true;
    this.log('info', 'Workers stopping...');
    this.workerActive = false;
    this.queue.releaseWaiters();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>(resolve => {
      timer = setTimeout(() => resolve(false), timeout);
    });
    try {
      const joined = await Promise.race([this.workerPromise.then(() => true as const), timedOut]);
      if (joined) {
        this.workerPromise = undefined;
        this.log('info', 'Workers stopped');
      } else {
        this.log('warn', `Workers still busy after ${timeout}ms, leaving in-flight uploads to finish on their own`);
      }
      return joined;
    } finally {
      clearTimeout(timer);
    }
  }

  private async workerLoop(workerNumber: number, generation: number) {
    while (this.workerActive && generation === this.generation) {
      const taskId = await this.queue.take(this.pollInterval);
      if (taskId === null) continue;
      try {
        await this.runTask(taskId);
      } catch (err) {
        this.log('error', `Worker ${workerNumber} failed on task ${taskId}:`, err);
      }
    }
  }

  private log(level: keyof LoggerLike, ...args: unknown[]) {
    this.logger?.[level]?.(...args);
  }
}
