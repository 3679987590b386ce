export { Scheduler } from './lib/Scheduler.js';
export { TaskPriorityQueue } from './lib/priorityQueue.js';
export { TaskWorkerPool } from './lib/taskWorker.js';
export { ExecutorRegistry, SUPPORTED_VIDEO_FORMATS, checkMediaLocator, mediaExtension } from './lib/executorRegistry.js';
export {
  BACKOFF_STRATEGIES,
  DEFAULT_RETRY_POLICY,
  RetryPolicies,
  computeDelay,
  createSeededRandom,
  nextRetry,
  resolveRetryPolicy,
  type BackoffStrategy,
  type RetryDecision,
  type RetryPolicy,
} from './lib/retryPolicy.js';
export { UploadPlanner, PLAN_KINDS, type PlanInput, type PlanPatch, type PlanKind, type PlannerStats, type UploadPlan } from './lib/uploadPlanner.js';

export { type TaskStore } from './repositories/store.interface.js';
export { BaseTaskStore } from './repositories/base.store.js';
export { FileTaskStore } from './repositories/file.store.js';
export { MemoryTaskStore } from './repositories/memory.store.js';
export { RedisTaskStore, type RedisSnapshotClient } from './repositories/redis.store.js';
export { PostgresTaskStore, migrateTasksTable, type PgQueryable, type PgSnapshotPool } from './repositories/postgres.store.js';

export { PlatformExecutor, type UploadLimits } from './platforms/platform.executor.js';
export { TikTokExecutor, formatCaption, type UploadDriver } from './platforms/tiktok.executor.js';
export { InstagramExecutor } from './platforms/instagram.executor.js';

export { loadSchedulerConfig, createBackendFromConfig, createLoggerFromConfig, schedulerOptionsFromConfig, type SchedulerConfig } from './config.js';
export { createSchedulerApp, runServer } from './server.js';
export { DefaultLogger, type LogLevel } from './util/logger.js';
export * from './util/errors.js';

export {
  TaskPriority,
  TASK_STATUSES,
  type AddTaskInput,
  type CreateSchedulerOptions,
  type ErrorKind,
  type LoggerLike,
  type PostgresOptions,
  type PrivacySettings,
  type QueueStats,
  type RedisStoreOptions,
  type SchedulerEvents,
  type SchedulerHooks,
  type SchedulerOptions,
  type StoreBackendConfig,
  type TaskPriorityName,
  type TaskStatus,
  type UploadExecutor,
  type UploadRequest,
  type UploadResult,
  type UploadTask,
  type ValidationResult,
} from './types/index.js';
