import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  TASK_PRIORITIES,
  TERMINAL_STATUSES,
  type AddTaskInput,
  type CreateSchedulerOptions,
  type EmitMethod,
  type LoggerLike,
  type PrivacySettings,
  type QueueStats,
  type SchedulerEvents,
  type SchedulerHooks,
  type SchedulerOptions,
  type StoreBackendConfig,
  type TaskStatus,
  type UploadExecutor,
  type UploadRequest,
  type UploadResult,
  type UploadTask,
} from '../types/index.js';
import type { TaskStore } from '../repositories/store.interface.js';
import { FileTaskStore } from '../repositories/file.store.js';
import { MemoryTaskStore } from '../repositories/memory.store.js';
import { RedisTaskStore } from '../repositories/redis.store.js';
import { PostgresTaskStore } from '../repositories/postgres.store.js';
import {
  ExecutorTimeoutError,
  InvalidConcurrencyError,
  InvalidMaxAttemptsError,
  InvalidTaskInputError,
  MaxAttemptsLimitError,
  UnknownBackendTypeError,
  UnknownPlatformError,
  toError,
} from '../util/errors.js';
import { EARLIEST_TIMESTAMP, JsonValueSchema, LATEST_TIMESTAMP, PrivacySchema, formatIssues } from '../util/task.schema.js';
import { warnings } from '../util/warnings.js';
import { ExecutorRegistry } from './executorRegistry.js';
import { TaskPriorityQueue } from './priorityQueue.js';
import { DEFAULT_RETRY_POLICY, RetryPolicySchema, nextRetry, resolveRetryPolicy, type RetryPolicy } from './retryPolicy.js';
import { TaskWorkerPool } from './taskWorker.js';

const DEFAULT_CONCURRENCY = 2;
const MAX_CONCURRENCY = 16;
const MAX_ATTEMPTS_LIMIT = 10; // max attempts limit
const DEFAULT_POLL_INTERVAL = 1000; // worker queue-pop timeout in milliseconds
const DEFAULT_PROMOTION_INTERVAL = 30_000; // sweep of SCHEDULED tasks in milliseconds
const DEFAULT_STOP_TIMEOUT = 5000;

const DEFAULT_PRIVACY: PrivacySettings = {
  visibility: 'public',
  allowComments: true,
  allowDuet: true,
  allowStitch: true,
};

export const AddTaskInputSchema = z.object({
  platform: z.string().trim().min(1, 'platform must not be empty'),
  media: z.string().min(1, 'media must not be empty'),
  caption: z.string(),
  description: z.string().optional(),
  tags: z.array(z.string()).optional(),
  dueAt: z.coerce
    .date()
    .min(EARLIEST_TIMESTAMP, 'due time must be between the years 0000 and 9999')
    .max(LATEST_TIMESTAMP, 'due time must be between the years 0000 and 9999')
    .optional(),
  priority: z.enum(TASK_PRIORITIES).optional(),
  metadata: z.record(JsonValueSchema).optional(),
  privacy: PrivacySchema.partial().optional(),
  maxAttempts: z.number().int().min(1).optional(),
  retryPolicy: RetryPolicySchema.partial().optional(),
});

const noop = () => undefined;

const copyTask = (task: UploadTask): UploadTask => structuredClone(task);

export class Scheduler {
  private readonly emitter = new EventEmitter();

  // task table: the only source of truth for task state
  private readonly tasks = new Map<string, UploadTask>();
  private readonly queue = new TaskPriorityQueue();
  private readonly runningTasks = new Set<string>();
  private readonly registry = new ExecutorRegistry();
  private readonly pool: TaskWorkerPool;
  private readonly store: TaskStore;

  private readonly concurrency: number;
  private readonly promotionInterval: number;
  private readonly stopTimeout: number;
  private readonly executorTimeout: number | undefined;
  private readonly maxAttempts: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly random: () => number;
  private readonly clock: () => number;
  private readonly logger: LoggerLike | undefined;
  private hooks: SchedulerHooks;

  // Guards every read-modify-write of the task table. Never held across an executor call.
  private lockChain: Promise<void> = Promise.resolve();
  // Serializes snapshot writes in the order they were requested.
  private saveChain: Promise<void> = Promise.resolve();

  private loaded = false;
  private running = false;
  private promotionTimer?: NodeJS.Timeout;

  public on<K extends keyof SchedulerEvents>(event: K, listener: SchedulerEvents[K]): this {
    this.emitter.on(event, listener);
    return this;
  }

  public off<K extends keyof SchedulerEvents>(event: K, listener: SchedulerEvents[K]): this {
    this.emitter.off(event, listener);
    return this;
  }

  private emit: EmitMethod = (event, ...args) => {
    try {
      return this.emitter.emit(event, ...args);
    } catch (err) {
      this.log('error', `Listener for "${event}" failed:`, err);
      return true;
    }
  };

  constructor({
    store,
    executors = [],
    concurrency = DEFAULT_CONCURRENCY,
    pollInterval = DEFAULT_POLL_INTERVAL,
    promotionInterval = DEFAULT_PROMOTION_INTERVAL,
    stopTimeout = DEFAULT_STOP_TIMEOUT,
    executorTimeout,
    maxAttempts,
    retryPolicy,
    random = Math.random,
    clock = Date.now,
    logger,
    hooks = {},
  }: SchedulerOptions) {
    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
      throw new InvalidConcurrencyError(MAX_CONCURRENCY, concurrency);
    }

    this.retryPolicy = resolveRetryPolicy(retryPolicy);
    this.maxAttempts = maxAttempts ?? this.retryPolicy.maxAttempts;
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new InvalidMaxAttemptsError(MAX_ATTEMPTS_LIMIT, this.maxAttempts);
    }
    if (this.maxAttempts > MAX_ATTEMPTS_LIMIT) {
      throw new MaxAttemptsLimitError(MAX_ATTEMPTS_LIMIT, this.maxAttempts);
    }

    this.store = store;
    this.store.logger ??= logger;
    this.concurrency = concurrency;
    this.promotionInterval = promotionInterval;
    this.stopTimeout = stopTimeout;
    this.executorTimeout = executorTimeout;
    this.random = random;
    this.clock = clock;
    this.logger = logger; // Optional logger, silent when absent
    this.hooks = hooks;
    this.pool = new TaskWorkerPool(this.queue, this.runTask, pollInterval, logger);

    for (const executor of executors) {
      this.registerExecutor(executor);
    }
  }

  /**
   * Builds the task store described by `backend` and a scheduler on top of it.
   */
  public static create({ backend, ...options }: CreateSchedulerOptions): Scheduler {
    const store = Scheduler.getBackendStore(backend, options.logger);
    return new Scheduler({ ...options, store });
  }

  private static getBackendStore(backend: StoreBackendConfig, logger?: LoggerLike): TaskStore {
    switch (backend.type) {
      case 'file':
        return new FileTaskStore(backend.filePath);
      case 'memory':
        return new MemoryTaskStore();
      case 'redis':
        return new RedisTaskStore(backend.redisClient, backend.options);
      case 'postgres':
        return new PostgresTaskStore(backend.pg, backend.options);
      case 'custom':
        logger?.warn(warnings.customStore);
        return backend.store;
      default:
        throw new UnknownBackendTypeError();
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  registerExecutor(executor: UploadExecutor, options?: { replace?: boolean }) {
    if (!executor.validate) {
      this.log('warn', warnings.executorWithoutValidation.replace(/\$1/g, executor.platform));
    }
    this.registry.register(executor, options);
  }

  platforms(): string[] {
    return this.registry.platforms();
  }

  setHooks(hooks: SchedulerHooks) {
    this.hooks = { ...this.hooks, ...hooks };
  }

  /**
   * Validates and records a new upload task, then queues it when it is due now. Resolves with the task id once the
   * task is persisted; never waits on an executor.
   */
  async addTask(input: AddTaskInput): Promise<string> {
    const parsed = AddTaskInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidTaskInputError(formatIssues(parsed.error));
    }
    const data = parsed.data;

    if (!this.registry.has(data.platform)) {
      throw new UnknownPlatformError(data.platform);
    }
    const media = this.registry.validateMedia(data.platform, data.media, data.caption);
    if (!media.isValid) {
      throw new InvalidTaskInputError(media.message ?? undefined);
    }

    const retryPolicy = data.retryPolicy ? resolveRetryPolicy(data.retryPolicy, this.retryPolicy) : null;
    const maxAttempts = data.maxAttempts ?? data.retryPolicy?.maxAttempts ?? this.maxAttempts;
    if (maxAttempts > MAX_ATTEMPTS_LIMIT) {
      throw new MaxAttemptsLimitError(MAX_ATTEMPTS_LIMIT, maxAttempts);
    }

    await this.ensureLoaded();

    const now = this.clock();
    const dueAt = data.dueAt ?? null;
    const task: UploadTask = {
      id: randomUUID(),
      platform: data.platform,
      media: data.media,
      caption: data.caption,
      description: data.description ?? null,
      tags: data.tags ?? [],
      privacy: { ...DEFAULT_PRIVACY, ...data.privacy },
      dueAt,
      priority: data.priority ?? 'NORMAL',
      status: dueAt && dueAt.getTime() > now ? 'SCHEDULED' : 'PENDING',
      attempts: 0,
      maxAttempts,
      lastError: null,
      result: null,
      metadata: data.metadata ?? {},
      retryPolicy,
      createdAt: new Date(now),
      updatedAt: new Date(now),
    };

    // the task only becomes dispatchable once its creation is on disk
    const { write } = await this.withLock(() => {
      this.tasks.set(task.id, task);
      return { write: this.persist() };
    });
    try {
      await write;
    } catch (err) {
      await this.withLock(() => {
        this.tasks.delete(task.id);
      });
      this.log('error', `Task ${task.id} was not created: saving failed`, err);
      throw err;
    }

    const added = await this.withLock(() => {
      if (task.status === 'PENDING') this.queue.push(task);
      return copyTask(task);
    });

    if (added.status === 'SCHEDULED') {
      this.log('info', `Task ${added.id} scheduled for ${added.dueAt?.toISOString()}`);
    } else {
      this.log('info', `Task ${added.id} added to queue immediately`);
    }
    this.emit('taskAdded', added);
    return added.id;
  }

  /**
   * Cancels a task that has not started. Running and finished tasks are left untouched and yield false.
   */
  async cancelTask(id: string): Promise<boolean> {
    await this.ensureLoaded();
    const outcome = await this.withLock(() => {
      const task = this.tasks.get(id);
      if (!task) return undefined;
      if (task.status === 'RUNNING') {
        this.log('warn', `Cannot cancel running task ${id}`);
        return undefined;
      }
      if (TERMINAL_STATUSES.includes(task.status)) return undefined;

      task.status = 'CANCELLED';
      task.updatedAt = new Date(this.clock());
      this.queue.remove(id);
      return { task: copyTask(task), write: this.persist() };
    });
    if (!outcome) return false;

    this.log('info', `Task ${id} cancelled`);
    this.emit('taskCancelled', outcome.task);
    await outcome.write;
    return true;
  }

  getTaskStatus(id: string): TaskStatus | undefined {
    return this.tasks.get(id)?.status;
  }

  getTask(id: string): UploadTask | undefined {
    const task = this.tasks.get(id);
    return task ? copyTask(task) : undefined;
  }

  getAllTasks(statusFilter?: TaskStatus): UploadTask[] {
    const tasks = [...this.tasks.values()];
    return (statusFilter ? tasks.filter(task => task.status === statusFilter) : tasks).map(copyTask);
  }

  getQueueStats(): QueueStats {
    const stats: QueueStats = {
      total: this.tasks.size,
      scheduled: 0,
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
      queueSize: this.queue.size,
      runningWorkers: this.runningTasks.size,
    };
    for (const task of this.tasks.values()) {
      switch (task.status) {
        case 'SCHEDULED':
          stats.scheduled++;
          break;
        case 'PENDING':
          stats.pending++;
          break;
        case 'RUNNING':
          stats.running++;
          break;
        case 'COMPLETED':
          stats.completed++;
          break;
        case 'FAILED':
          stats.failed++;
          break;
        case 'CANCELLED':
          stats.cancelled++;
          break;
      }
    }
    return stats;
  }

  /**
   * Reads the persisted snapshot into memory without starting workers. Queries return nothing until this or
   * {@link start} ran.
   */
  async load(): Promise<void> {
    await this.ensureLoaded();
  }

  /**
   * Loads persisted state, puts tasks left RUNNING by a crash back to PENDING, queues every PENDING task and starts the
   * workers and the promotion sweep. Load and save errors reject.
   */
  async start(): Promise<void> {
    if (this.running) {
      this.log('warn', 'Scheduler already running');
      return;
    }
    this.log('info', 'Starting task scheduler...');

    await this.ensureLoaded();

    const { recovered, write } = await this.withLock(() => {
      const recovered: UploadTask[] = [];
      const now = this.clock();
      for (const task of this.tasks.values()) {
        if (task.status === 'RUNNING' && !this.runningTasks.has(task.id)) {
          task.status = 'PENDING';
          task.updatedAt = new Date(now);
          recovered.push(copyTask(task));
        }
        if (task.status === 'PENDING') {
          this.queue.push(task);
        }
      }
      return { recovered, write: this.persist() };
    });
    await write;

    for (const task of recovered) {
      this.log('warn', `Task ${task.id} was interrupted while running, queued again`);
      this.emit('taskRecovered', task);
    }

    // nothing runs until the first sweep is saved
    await this.promoteDueTasks();

    this.running = true;
    this.pool.start(this.concurrency);
    this.promotionTimer = setInterval(() => {
      this.promoteDueTasks().catch(err => this.reportPersistError(err));
    }, this.promotionInterval);

    this.log('info', `Scheduler started with ${this.concurrency} workers`);
  }

  /**
   * Stops the sweep, lets workers leave their poll loop (waiting at most `stopTimeout` for in-flight uploads) and
   * writes a final snapshot.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.log('info', 'Stopping task scheduler...');
    this.running = false;

    clearInterval(this.promotionTimer);
    this.promotionTimer = undefined;

    await this.pool.stop(this.stopTimeout);
    await this.flush();

    this.log('info', 'Scheduler stopped');
  }

  /**
   * Writes the current snapshot, after any write already requested.
   */
  async flush(): Promise<void> {
    const write = await this.withLock(() => ({ write: this.persist() }));
    await write.write;
  }

  /**
   * Moves every SCHEDULED task whose due-time has passed to PENDING and queues it. Resolves with the number promoted.
   */
  async promoteDueTasks(): Promise<number> {
    const { promoted, write } = await this.withLock(() => {
      const now = this.clock();
      const promoted: UploadTask[] = [];
      for (const task of this.tasks.values()) {
        if (task.status !== 'SCHEDULED') continue;
        if (task.dueAt && task.dueAt.getTime() > now) continue;
        task.status = 'PENDING';
        task.updatedAt = new Date(now);
        this.queue.push(task);
        promoted.push(copyTask(task));
      }
      return { promoted, write: promoted.length > 0 ? this.persist() : undefined };
    });

    for (const task of promoted) {
      this.log('info', `Task ${task.id} moved to pending queue`);
      this.emit('taskPromoted', task);
    }
    if (write) await write;
    return promoted.length;
  }

  private readonly runTask = async (taskId: string): Promise<void> => {
    const claimed = await this.withLock(() => {
      const task = this.tasks.get(taskId);
      // cancelled (or otherwise moved on) while it sat in the queue
      if (!task || task.status !== 'PENDING') return undefined;

      task.status = 'RUNNING';
      task.attempts += 1;
      task.updatedAt = new Date(this.clock());
      this.runningTasks.add(taskId);
      return { task: copyTask(task), write: this.persist() };
    });
    if (!claimed) {
      this.log('debug', `Skipping task ${taskId}: no longer pending`);
      return;
    }

    const { task } = claimed;
    try {
      this.watchPersist(claimed.write);
      this.log('info', `Starting task ${task.id}: ${task.platform} - ${task.caption.slice(0, 50)}...`);
      await this.runHook('onTaskStart', hooks => hooks.onTaskStart?.(task));
      this.emit('taskStarted', task);

      const result = await this.runExecutor(task);
      await this.applyOutcome(taskId, result);
    } finally {
      this.runningTasks.delete(taskId);
    }
  };

  private async runExecutor(task: UploadTask): Promise<UploadResult> {
    const executor = this.registry.get(task.platform);
    if (!executor) {
      return { success: false, message: `No upload executor registered for platform "${task.platform}"`, errorKind: 'permanent' };
    }

    const request: UploadRequest = {
      taskId: task.id,
      platform: task.platform,
      media: task.media,
      caption: task.caption,
      description: task.description,
      tags: task.tags,
      privacy: task.privacy,
      metadata: task.metadata,
      attempt: task.attempts,
    };
    const controller = new AbortController();
    const limit = this.executorTimeout;
    let timer: NodeJS.Timeout | undefined;

    try {
      const upload = executor.upload(request, controller.signal);
      if (limit === undefined) {
        return await upload;
      }
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          const error = new ExecutorTimeoutError(task.id, limit);
          // settle the race before the executor reacts to the abort
          reject(error);
          controller.abort(error);
        }, limit);
      });
      return await Promise.race([upload, timeout]);
    } catch (err) {
      const error = toError(err);
      this.log('error', `Task ${task.id} failed with exception:`, error);
      return { success: false, message: error.message };
    } finally {
      clearTimeout(timer);
    }
  }

  private async applyOutcome(taskId: string, result: UploadResult) {
    const outcome = await this.withLock(() => {
      const task = this.tasks.get(taskId);
      if (!task) return undefined;

      const now = this.clock();
      task.updatedAt = new Date(now);
      this.runningTasks.delete(taskId);

      if (result.success) {
        task.status = 'COMPLETED';
        task.lastError = null;
        task.result = { message: result.message, resultId: result.resultId ?? null, url: result.url ?? null };
        return { kind: 'completed' as const, task: copyTask(task), write: this.persist() };
      }

      task.lastError = result.message || 'Upload failed';
      const decision = nextRetry(task.attempts, task.maxAttempts, task.retryPolicy ?? this.retryPolicy, result.errorKind, this.random);
      if (decision.disposition === 'retry') {
        task.status = 'SCHEDULED';
        task.dueAt = new Date(now + decision.delay);
        return { kind: 'retry' as const, delay: decision.delay, task: copyTask(task), write: this.persist() };
      }

      task.status = 'FAILED';
      return { kind: 'failed' as const, task: copyTask(task), write: this.persist() };
    });

    if (!outcome) {
      this.log('warn', `Task ${taskId} disappeared while running, outcome dropped`);
      return;
    }
    this.watchPersist(outcome.write);

    const { task } = outcome;
    switch (outcome.kind) {
      case 'completed':
        this.log('info', `Task ${task.id} completed successfully`);
        await this.runHook('onTaskComplete', hooks => hooks.onTaskComplete?.(task, true));
        this.emit('taskCompleted', task);
        break;
      case 'retry':
        this.log('warn', `Task ${task.id} will retry in ${Math.round(outcome.delay)}ms (attempt ${task.attempts}/${task.maxAttempts})`);
        this.emit('taskRetried', task, outcome.delay);
        break;
      case 'failed':
        this.log('error', `Task ${task.id} failed permanently after ${task.attempts} attempts: ${task.lastError}`);
        await this.runHook('onTaskComplete', hooks => hooks.onTaskComplete?.(task, false));
        await this.runHook('onTaskFail', hooks => hooks.onTaskFail?.(task));
        this.emit('taskFailed', task, new Error(task.lastError ?? 'Upload failed'));
        break;
    }
  }

  private async ensureLoaded(): Promise<void> {
    if (this.loaded) return;
    await this.withLock(async () => {
      if (this.loaded) return;
      await this.store.init?.();
      const tasks = await this.store.load();
      for (const task of tasks) {
        if (!this.tasks.has(task.id)) this.tasks.set(task.id, task);
      }
      this.loaded = true;
    });
  }

  private withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const next = this.lockChain.then(fn);
    this.lockChain = next.then(noop, noop);
    return next;
  }

  // Must be called inside withLock: the snapshot is taken synchronously, the write is queued behind earlier ones.
  private persist(): Promise<void> {
    const snapshot = [...this.tasks.values()].map(copyTask);
    const write = this.saveChain.then(() => this.store.save(snapshot));
    // the caller gets the rejection; the chain keeps going
    this.saveChain = write.then(noop, noop);
    return write;
  }

  private watchPersist(write: Promise<void>) {
    write.catch(err => this.reportPersistError(err));
  }

  private reportPersistError(err: unknown) {
    const error = toError(err);
    this.log('error', 'Failed to save scheduler state:', error);
    this.emit('persistFailed', error);
  }

  private async runHook(name: keyof SchedulerHooks, call: (hooks: SchedulerHooks) => void | Promise<void>) {
    try {
      await call(this.hooks);
    } catch (err) {
      this.log('error', `Hook ${name} failed:`, err);
    }
  }

  private log(level: keyof LoggerLike, ...args: unknown[]) {
    this.logger?.[level]?.(...args);
  }
}

export default Scheduler;
