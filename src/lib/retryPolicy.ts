import { z } from 'zod';
import type { ErrorKind } from '../types/index.js';

export const BACKOFF_STRATEGIES = ['fixed', 'linear', 'exponential', 'random'] as const;
export type BackoffStrategy = (typeof BACKOFF_STRATEGIES)[number];

/**
 * Immutable retry descriptor. Delays are in milliseconds.
 */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
  strategy: BackoffStrategy;
  multiplier: number;
  jitter: boolean;
}

export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1),
  baseDelay: z.number().min(0),
  maxDelay: z.number().min(0),
  strategy: z.enum(BACKOFF_STRATEGIES),
  multiplier: z.number().min(0),
  jitter: z.boolean(),
});

const JITTER_RATIO = 0.1;

// min(300s, 60s * 2^(attempt - 1))
export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze<RetryPolicy>({
  maxAttempts: 3,
  baseDelay: 60_000,
  maxDelay: 300_000,
  strategy: 'exponential',
  multiplier: 2,
  jitter: false,
});

export const RetryPolicies = {
  NETWORK: Object.freeze<RetryPolicy>({ maxAttempts: 3, baseDelay: 1_000, maxDelay: 60_000, strategy: 'exponential', multiplier: 2, jitter: true }),
  FILE_UPLOAD: Object.freeze<RetryPolicy>({ maxAttempts: 5, baseDelay: 2_000, maxDelay: 30_000, strategy: 'exponential', multiplier: 2, jitter: true }),
  BROWSER: Object.freeze<RetryPolicy>({ maxAttempts: 3, baseDelay: 3_000, maxDelay: 60_000, strategy: 'fixed', multiplier: 2, jitter: true }),
  API_CALL: Object.freeze<RetryPolicy>({ maxAttempts: 4, baseDelay: 1_000, maxDelay: 60_000, strategy: 'exponential', multiplier: 2, jitter: true }),
  QUICK: Object.freeze<RetryPolicy>({ maxAttempts: 2, baseDelay: 500, maxDelay: 60_000, strategy: 'fixed', multiplier: 2, jitter: false }),
};

export const resolveRetryPolicy = (overrides?: Partial<RetryPolicy>, base: RetryPolicy = DEFAULT_RETRY_POLICY): RetryPolicy => {
  const defined = Object.fromEntries(Object.entries(overrides ?? {}).filter(([, value]) => value !== undefined));
  return RetryPolicySchema.parse({ ...base, ...defined });
};

/**
 * Backoff before retry number `attempt` (1-based: the delay after the first failed attempt is attempt 1).
 * `random` must return values in [0, 1); inject a seeded source for reproducible RANDOM/jitter results.
 */
export const computeDelay = (attempt: number, policy: RetryPolicy, random: () => number = Math.random): number => {
  const n = Math.max(1, Math.floor(attempt));
  let delay: number;

  switch (policy.strategy) {
    case 'fixed':
      delay = policy.baseDelay;
      break;
    case 'linear':
      delay = policy.baseDelay * n;
      break;
    case 'exponential':
      delay = policy.baseDelay * policy.multiplier ** (n - 1);
      break;
    case 'random':
      delay = policy.baseDelay + random() * Math.max(0, policy.maxDelay - policy.baseDelay);
      break;
    default:
      delay = policy.baseDelay;
  }

  delay = Math.min(delay, policy.maxDelay);

  if (policy.jitter) {
    const range = delay * JITTER_RATIO;
    delay += (random() * 2 - 1) * range;
    delay = Math.max(0, delay);
  }

  return delay;
};

export type RetryDecision = { disposition: 'retry'; delay: number } | { disposition: 'fail' };

/**
 * Disposition after a failed attempt. `attempts` counts attempts already made, including the one that just failed.
 */
export const nextRetry = (
  attempts: number,
  maxAttempts: number,
  policy: RetryPolicy,
  errorKind: ErrorKind = 'transient',
  random?: () => number
): RetryDecision => {
  if (errorKind === 'permanent' || attempts >= maxAttempts) {
    return { disposition: 'fail' };
  }
  return { disposition: 'retry', delay: computeDelay(attempts, policy, random) };
};

// mulberry32
export const createSeededRandom = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};
