import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { createBackendFromConfig, loadSchedulerConfig, schedulerOptionsFromConfig } from '../../../config.js';
import { ConfigValidationError } from '../../../util/errors.js';
import { makeTempDir, removeDir } from './constants.helpers.js';

const ENV_KEYS = [
  'SCHEDULER_STATE_FILE',
  'MAX_CONCURRENT_UPLOADS',
  'SCHEDULER_POLL_INTERVAL_MS',
  'SCHEDULER_PROMOTION_INTERVAL_MS',
  'SCHEDULER_STOP_TIMEOUT_MS',
  'UPLOAD_TIMEOUT_MS',
  'RETRY_MAX_ATTEMPTS',
  'RETRY_BASE_DELAY_MS',
  'RETRY_MAX_DELAY_MS',
  'RETRY_STRATEGY',
  'RETRY_MULTIPLIER',
  'RETRY_JITTER',
  'LOG_LEVEL',
  'LOG_FILE',
  'REDIS_URL',
  'DATABASE_URL',
  'SERVER_HOST',
  'SERVER_PORT',
];

const errorMessage = (fn: () => unknown): string => {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(ConfigValidationError);
    return err instanceof Error ? err.message : String(err);
  }
  throw new Error('expected the call to throw');
};

describe('loadSchedulerConfig', () => {
  test('falls back to defaults for an empty environment', () => {
    expect(loadSchedulerConfig({ env: {} })).toEqual({
      stateFile: './data/scheduler_state.json',
      concurrency: 2,
      pollInterval: 1000,
      promotionInterval: 30_000,
      stopTimeout: 5000,
      executorTimeout: undefined,
      retryPolicy: { maxAttempts: 3, baseDelay: 60_000, maxDelay: 300_000, strategy: 'exponential', multiplier: 2, jitter: false },
      log: { level: 'info', file: undefined },
      redisUrl: undefined,
      databaseUrl: undefined,
      server: { host: '127.0.0.1', port: 8080 },
    });
  });

  test('reads and coerces overrides', () => {
    const config = loadSchedulerConfig({
      env: {
        SCHEDULER_STATE_FILE: '/var/lib/uploads/state.json',
        MAX_CONCURRENT_UPLOADS: '4',
        UPLOAD_TIMEOUT_MS: '90000',
        RETRY_STRATEGY: 'linear',
        RETRY_BASE_DELAY_MS: '500',
        RETRY_MAX_DELAY_MS: '2000',
        RETRY_JITTER: 'yes',
        LOG_LEVEL: 'debug',
        SERVER_PORT: '0',
      },
    });

    expect(config.stateFile).toBe('/var/lib/uploads/state.json');
    expect(config.concurrency).toBe(4);
    expect(config.executorTimeout).toBe(90_000);
    expect(config.retryPolicy).toEqual({ maxAttempts: 3, baseDelay: 500, maxDelay: 2000, strategy: 'linear', multiplier: 2, jitter: true });
    expect(config.log.level).toBe('debug');
    expect(config.server.port).toBe(0);
  });

  test('treats blank variables as unset', () => {
    const config = loadSchedulerConfig({ env: { MAX_CONCURRENT_UPLOADS: '  ', RETRY_JITTER: '', REDIS_URL: '' } });
    expect(config.concurrency).toBe(2);
    expect(config.retryPolicy.jitter).toBe(false);
    expect(config.redisUrl).toBeUndefined();
  });

  test('reports every invalid variable at once', () => {
    const message = errorMessage(() =>
      loadSchedulerConfig({ env: { MAX_CONCURRENT_UPLOADS: '64', RETRY_STRATEGY: 'sometimes', RETRY_JITTER: 'maybe' } })
    );
    expect(message.startsWith('Invalid configuration. ')).toBe(true);
    expect(message).toContain('MAX_CONCURRENT_UPLOADS: ');
    expect(message).toContain('RETRY_STRATEGY: ');
    expect(message).toContain('RETRY_JITTER: ');
  });

  test('rejects a maximum delay below the base delay', () => {
    expect(errorMessage(() => loadSchedulerConfig({ env: { RETRY_BASE_DELAY_MS: '5000', RETRY_MAX_DELAY_MS: '1000' } }))).toBe(
      'Invalid configuration. RETRY_MAX_DELAY_MS: must not be lower than RETRY_BASE_DELAY_MS'
    );
  });

  describe('with a .env file', () => {
    let dir: string;
    let saved: Record<string, string | undefined>;

    beforeEach(async () => {
      dir = await makeTempDir();
      saved = Object.fromEntries(ENV_KEYS.map(key => [key, process.env[key]]));
      for (const key of ENV_KEYS) delete process.env[key];
    });

    afterEach(async () => {
      for (const key of ENV_KEYS) {
        const value = saved[key];
        if (value === undefined) delete process.env[key];
        else process.env[key] = value;
      }
      await removeDir(dir);
    });

    test('loads variables from the given path into process.env', async () => {
      const envPath = path.join(dir, '.env');
      await fs.writeFile(envPath, 'MAX_CONCURRENT_UPLOADS=3\nSERVER_HOST=0.0.0.0\n');

      const config = loadSchedulerConfig({ envPath });
      expect(config.concurrency).toBe(3);
      expect(config.server.host).toBe('0.0.0.0');
      expect(process.env.MAX_CONCURRENT_UPLOADS).toBe('3');
    });
  });
});

describe('config helpers', () => {
  test('uses the state file when no server backend is configured', () => {
    const config = loadSchedulerConfig({ env: { SCHEDULER_STATE_FILE: 'state/tasks.json' } });
    expect(createBackendFromConfig(config)).toEqual({ type: 'file', filePath: 'state/tasks.json' });
  });

  test('maps settings onto scheduler options', () => {
    const config = loadSchedulerConfig({ env: { RETRY_MAX_ATTEMPTS: '5', UPLOAD_TIMEOUT_MS: '1000' } });
    expect(schedulerOptionsFromConfig(config)).toEqual({
      concurrency: 2,
      pollInterval: 1000,
      promotionInterval: 30_000,
      stopTimeout: 5000,
      executorTimeout: 1000,
      retryPolicy: { maxAttempts: 5, baseDelay: 60_000, maxDelay: 300_000, strategy: 'exponential', multiplier: 2, jitter: false },
      maxAttempts: 5,
    });
  });
});
