import type { Redis } from 'ioredis';
import type { Pool } from 'pg';
import type { TaskStore } from '../repositories/store.interface.js';
import type { RetryPolicy } from '../lib/retryPolicy.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const TASK_STATUSES = ['SCHEDULED', 'PENDING', 'RUNNING', 'COMPLETED', 'FAILED', 'CANCELLED'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['COMPLETED', 'FAILED', 'CANCELLED'];

// lower rank is served first
export const TaskPriority = {
  URGENT: 0,
  HIGH: 1,
  NORMAL: 2,
  LOW: 3,
} as const;
export type TaskPriorityName = keyof typeof TaskPriority;
export const TASK_PRIORITIES = ['URGENT', 'HIGH', 'NORMAL', 'LOW'] as const satisfies readonly TaskPriorityName[];

export type Visibility = 'public' | 'friends' | 'private';

export interface PrivacySettings {
  visibility: Visibility;
  allowComments: boolean;
  allowDuet: boolean;
  allowStitch: boolean;
}

export interface UploadOutcome {
  message: string;
  resultId: string | null;
  url: string | null;
}

export interface UploadTask {
  id: string;
  platform: string;
  media: string;
  caption: string;
  description: string | null;
  tags: string[];
  privacy: PrivacySettings;
  dueAt: Date | null;
  priority: TaskPriorityName;
  status: TaskStatus;
  attempts: number;
  maxAttempts: number;
  lastError: string | null;
  result: UploadOutcome | null;
  metadata: Record<string, JsonValue>;
  retryPolicy: RetryPolicy | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface AddTaskInput {
  platform: string;
  media: string;
  caption: string;
  description?: string;
  tags?: string[];
  dueAt?: Date | string | number;
  priority?: TaskPriorityName;
  metadata?: Record<string, JsonValue>;
  privacy?: Partial<PrivacySettings>;
  maxAttempts?: number;
  retryPolicy?: Partial<RetryPolicy>;
}

export interface QueueStats {
  total: number;
  scheduled: number;
  pending: number;
  running: number;
  completed: number;
  failed: number;
  cancelled: number;
  queueSize: number;
  runningWorkers: number;
}

// executor contract

export type ErrorKind = 'transient' | 'permanent';

export interface UploadRequest {
  taskId: string;
  platform: string;
  media: string;
  caption: string;
  description: string | null;
  tags: string[];
  privacy: PrivacySettings;
  metadata: Record<string, JsonValue>;
  attempt: number;
}

export interface UploadResult {
  success: boolean;
  message: string;
  resultId?: string;
  url?: string;
  errorKind?: ErrorKind;
}

export type ValidationResult = { isValid: boolean; message: string | null };

export interface UploadExecutor {
  readonly platform: string;
  upload(request: UploadRequest, signal: AbortSignal): Promise<UploadResult>;
  validate?(media: string, caption: string): ValidationResult;
}

// events and hooks

export type SchedulerEvents = {
  taskAdded: (task: UploadTask) => void;
  taskPromoted: (task: UploadTask) => void;
  taskStarted: (task: UploadTask) => void;
  taskCompleted: (task: UploadTask) => void;
  taskRetried: (task: UploadTask, delay: number) => void;
  taskFailed: (task: UploadTask, error: Error) => void;
  taskCancelled: (task: UploadTask) => void;
  taskRecovered: (task: UploadTask) => void;
  persistFailed: (error: Error) => void;
};

export type EmitMethod = <K extends keyof SchedulerEvents>(event: K, ...args: Parameters<SchedulerEvents[K]>) => boolean;

/**
 * Awaited around each attempt. A failing hook is logged and never changes the task.
 * `onTaskComplete` runs whenever a task reaches a final outcome: with `true` after a successful upload, and with
 * `false` when the task is marked FAILED, right before `onTaskFail`. A failed attempt that is retried runs neither.
 */
export interface SchedulerHooks {
  onTaskStart?(task: UploadTask): void | Promise<void>;
  onTaskComplete?(task: UploadTask, success: boolean): void | Promise<void>;
  onTaskFail?(task: UploadTask): void | Promise<void>;
}

// store backends

export type StoreBackendConfig =
  | { type: 'file'; filePath: string }
  | { type: 'memory' }
  | { type: 'redis'; redisClient: Redis; options?: RedisStoreOptions }
  | { type: 'postgres'; pg: Pool; options?: PostgresOptions }
  | { type: 'custom'; store: TaskStore };

export type RedisStoreOptions = {
  storageName?: string;
  instance?: string;
};

export type PostgresOptions = {
  tableName?: string;
  schema?: string;
  instance?: string;
  useMigrate?: boolean;
};

// util
export interface LoggerLike {
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug?(...args: unknown[]): void; // Optional, not all loggers implement debug
}

export interface SchedulerOptions {
  store: TaskStore;
  executors?: UploadExecutor[];
  concurrency?: number;
  pollInterval?: number;
  promotionInterval?: number;
  stopTimeout?: number;
  executorTimeout?: number;
  maxAttempts?: number;
  retryPolicy?: Partial<RetryPolicy>;
  random?: () => number;
  clock?: () => number;
  logger?: LoggerLike;
  hooks?: SchedulerHooks;
}

export type CreateSchedulerOptions = Omit<SchedulerOptions, 'store'> & { backend: StoreBackendConfig };
