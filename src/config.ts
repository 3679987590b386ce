import path from 'path';
import dotenv from 'dotenv';
import { Redis } from 'ioredis';
import PG from 'pg';
import { z } from 'zod';
import { BACKOFF_STRATEGIES, type RetryPolicy } from './lib/retryPolicy.js';
import type { SchedulerOptions, StoreBackendConfig } from './types/index.js';
import { ConfigValidationError } from './util/errors.js';
import { DefaultLogger, LOG_LEVELS } from './util/logger.js';
import { formatIssues } from './util/task.schema.js';

type Env = Record<string, string | undefined>;

// unset and blank variables both fall back to the default
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(value => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);

const millis = (fallback: number) => optional(z.coerce.number().int().min(0).default(fallback));

const flag = (fallback: boolean) =>
  optional(
    z
      .enum(['true', 'false', '1', '0', 'yes', 'no'])
      .default(fallback ? 'true' : 'false')
      .transform(value => value === 'true' || value === '1' || value === 'yes')
  );

const EnvSchema = z.object({
  SCHEDULER_STATE_FILE: optional(z.string().default('./data/scheduler_state.json')),
  MAX_CONCURRENT_UPLOADS: optional(z.coerce.number().int().min(1).max(16).default(2)),
  SCHEDULER_POLL_INTERVAL_MS: optional(z.coerce.number().int().min(1).default(1000)),
  SCHEDULER_PROMOTION_INTERVAL_MS: optional(z.coerce.number().int().min(1).default(30_000)),
  SCHEDULER_STOP_TIMEOUT_MS: millis(5000),
  UPLOAD_TIMEOUT_MS: optional(z.coerce.number().int().min(1).optional()),
  RETRY_MAX_ATTEMPTS: optional(z.coerce.number().int().min(1).max(10).default(3)),
  RETRY_BASE_DELAY_MS: millis(60_000),
  RETRY_MAX_DELAY_MS: millis(300_000),
  RETRY_STRATEGY: optional(z.enum(BACKOFF_STRATEGIES).default('exponential')),
  RETRY_MULTIPLIER: optional(z.coerce.number().min(0).default(2)),
  RETRY_JITTER: flag(false),
  LOG_LEVEL: optional(z.enum(LOG_LEVELS).default('info')),
  LOG_FILE: optional(z.string().optional()),
  REDIS_URL: optional(z.string().url().optional()),
  DATABASE_URL: optional(z.string().url().optional()),
  SERVER_HOST: optional(z.string().default('127.0.0.1')),
  SERVER_PORT: optional(z.coerce.number().int().min(0).max(65535).default(8080)),
});

export interface SchedulerConfig {
  stateFile: string;
  concurrency: number;
  pollInterval: number;
  promotionInterval: number;
  stopTimeout: number;
  executorTimeout: number | undefined;
  retryPolicy: RetryPolicy;
  log: { level: (typeof LOG_LEVELS)[number]; file: string | undefined };
  redisUrl: string | undefined;
  databaseUrl: string | undefined;
  server: { host: string; port: number };
}

/**
 * Reads scheduler settings from `env`, or from `process.env` after loading the `.env` file at `envPath`.
 * Every invalid variable is reported in one {@link ConfigValidationError}.
 */
export function loadSchedulerConfig(options: { envPath?: string; env?: Env } = {}): SchedulerConfig {
  let env = options.env;
  if (!env) {
    dotenv.config({ path: options.envPath ?? path.join(process.cwd(), '.env') });
    env = process.env;
  }

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigValidationError(formatIssues(parsed.error));
  }
  const vars = parsed.data;
  if (vars.RETRY_MAX_DELAY_MS < vars.RETRY_BASE_DELAY_MS) {
    throw new ConfigValidationError('RETRY_MAX_DELAY_MS: must not be lower than RETRY_BASE_DELAY_MS');
  }

  return {
    stateFile: vars.SCHEDULER_STATE_FILE,
    concurrency: vars.MAX_CONCURRENT_UPLOADS,
    pollInterval: vars.SCHEDULER_POLL_INTERVAL_MS,
    promotionInterval: vars.SCHEDULER_PROMOTION_INTERVAL_MS,
    stopTimeout: vars.SCHEDULER_STOP_TIMEOUT_MS,
    executorTimeout: vars.UPLOAD_TIMEOUT_MS,
    retryPolicy: {
      maxAttempts: vars.RETRY_MAX_ATTEMPTS,
      baseDelay: vars.RETRY_BASE_DELAY_MS,
      maxDelay: vars.RETRY_MAX_DELAY_MS,
      strategy: vars.RETRY_STRATEGY,
      multiplier: vars.RETRY_MULTIPLIER,
      jitter: vars.RETRY_JITTER,
    },
    log: { level: vars.LOG_LEVEL, file: vars.LOG_FILE },
    redisUrl: vars.REDIS_URL,
    databaseUrl: vars.DATABASE_URL,
    server: { host: vars.SERVER_HOST, port: vars.SERVER_PORT },
  };
}

/**
 * Redis when `REDIS_URL` is set, else Postgres when `DATABASE_URL` is set, else the JSON state file.
 */
export function createBackendFromConfig(config: SchedulerConfig): StoreBackendConfig {
  if (config.redisUrl) {
    return { type: 'redis', redisClient: new Redis(config.redisUrl) };
  }
  if (config.databaseUrl) {
    return { type: 'postgres', pg: new PG.Pool({ connectionString: config.databaseUrl }), options: { useMigrate: true } };
  }
  return { type: 'file', filePath: config.stateFile };
}

export function createLoggerFromConfig(config: SchedulerConfig): DefaultLogger {
  return new DefaultLogger({ level: config.log.level, path: config.log.file });
}

export function schedulerOptionsFromConfig(config: SchedulerConfig): Omit<SchedulerOptions, 'store'> {
  return {
    concurrency: config.concurrency,
    pollInterval: config.pollInterval,
    promotionInterval: config.promotionInterval,
    stopTimeout: config.stopTimeout,
    executorTimeout: config.executorTimeout,
    retryPolicy: config.retryPolicy,
    maxAttempts: config.retryPolicy.maxAttempts,
  };
}
