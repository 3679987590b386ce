const errors = {
  INVALID_TASK_INPUT: { path: ['Scheduler', 'addTask'], message: 'Invalid task input. {details}' },
  UNKNOWN_PLATFORM: {
    path: ['Scheduler', 'addTask'],
    message: 'No upload executor is registered for platform "{platform}". Register the executor before adding tasks.',
  },
  EXECUTOR_ALREADY_REGISTERED: {
    path: ['ExecutorRegistry', 'register'],
    message: 'An upload executor for platform "{platform}" is already registered.',
  },
  MAX_ATTEMPTS_LIMIT: { path: ['Scheduler', 'addTask'], message: 'Maximum attempts cannot be greater than {limit}, got {maxAttempts}.' },
  INVALID_MAX_ATTEMPTS: {
    path: ['Scheduler', 'constructor'],
    message: 'Maximum attempts must be an integer between 1 and {limit}, got {maxAttempts}.',
  },
  INVALID_CONCURRENCY: { path: ['Scheduler', 'constructor'], message: 'Worker pool size must be an integer between 1 and {limit}, got {concurrency}.' },
  EXECUTOR_TIMEOUT: {
    path: ['Scheduler', 'runExecutor'],
    message: 'Upload attempt for task {taskId} exceeded the {timeout}ms limit.',
  },

  UNKNOWN_BACKEND_TYPE: {
    path: ['Scheduler', 'getBackendStore'],
    message: 'Unknown backend type. Supported types are: file, memory, redis, postgres, custom.',
  },

  STORE_FILE_TYPE_MISMATCH: {
    path: ['FileTaskStore'],
    message: `File path must end with .json format, got {filePath}.`,
  },
  STORE_READ: {
    path: ['TaskStore', 'load'],
    message: `Error reading tasks from {source}.\nDetails: {details}`,
  },
  STORE_CORRUPT: {
    path: ['TaskStore', 'load'],
    message: `Stored snapshot at {source} is corrupt and was not loaded.\nDetails: {details}`,
  },
  STORE_WRITE: {
    path: ['TaskStore', 'save'],
    message: `Error writing tasks to {source}.\nDetails: {details}`,
  },

  CONFIG_INVALID: { path: ['config', 'loadSchedulerConfig'], message: 'Invalid configuration. {details}' },

  PLAN_NOT_FOUND: { path: ['UploadPlanner'], message: 'Upload plan {planId} does not exist.' },
  PLAN_INVALID: { path: ['UploadPlanner'], message: 'Invalid upload plan. {details}' },
};

export type ErrorCode = keyof typeof errors;

export class SchedulerError extends Error {
  code: ErrorCode;
  path: string[];
  constructor(code: ErrorCode, ...args: string[]) {
    super(SchedulerError.formatMessage(errors[code].message, args));
    this.code = code;
    this.path = errors[code].path;
    this.name = 'SchedulerError';
  }

  private static formatMessage(message: string, args: string[]): string {
    let argIndex = 0;
    return message.replace(/\{[^}]+\}/g, placeholder => args[argIndex++] ?? placeholder);
  }
}

export const toError = (err: unknown): Error => (err instanceof Error ? err : new Error(String(err)));

export class InvalidTaskInputError extends SchedulerError {
  constructor(details?: string) {
    super('INVALID_TASK_INPUT', details || 'No details provided');
  }
}

export class UnknownPlatformError extends SchedulerError {
  constructor(platform: string) {
    super('UNKNOWN_PLATFORM', platform);
  }
}

export class ExecutorAlreadyRegisteredError extends SchedulerError {
  constructor(platform: string) {
    super('EXECUTOR_ALREADY_REGISTERED', platform);
  }
}

export class MaxAttemptsLimitError extends SchedulerError {
  constructor(limit: number, maxAttempts: number) {
    super('MAX_ATTEMPTS_LIMIT', limit.toString(), maxAttempts.toString());
  }
}

export class InvalidMaxAttemptsError extends SchedulerError {
  constructor(limit: number, maxAttempts: number) {
    super('INVALID_MAX_ATTEMPTS', limit.toString(), maxAttempts.toString());
  }
}

export class InvalidConcurrencyError extends SchedulerError {
  constructor(limit: number, concurrency: number) {
    super('INVALID_CONCURRENCY', limit.toString(), concurrency.toString());
  }
}

export class ExecutorTimeoutError extends SchedulerError {
  constructor(taskId: string, timeout: number) {
    super('EXECUTOR_TIMEOUT', taskId, timeout.toString());
  }
}

export class UnknownBackendTypeError extends SchedulerError {
  constructor() {
    super('UNKNOWN_BACKEND_TYPE');
  }
}

// STORE ERRORS
export class StoreFileTypeMismatchError extends SchedulerError {
  constructor(filePath: string) {
    super('STORE_FILE_TYPE_MISMATCH', filePath);
  }
}

export class StoreReadError extends SchedulerError {
  constructor(source: string, details: string) {
    super('STORE_READ', source, details);
  }
}

export class StoreCorruptError extends SchedulerError {
  constructor(source: string, details: string) {
    super('STORE_CORRUPT', source, details);
  }
}

export class StoreWriteError extends SchedulerError {
  constructor(source: string, details: string) {
    super('STORE_WRITE', source, details);
  }
}

export class ConfigValidationError extends SchedulerError {
  constructor(details: string) {
    super('CONFIG_INVALID', details);
  }
}

export class PlanNotFoundError extends SchedulerError {
  constructor(planId: string) {
    super('PLAN_NOT_FOUND', planId);
  }
}

export class InvalidPlanError extends SchedulerError {
  constructor(details: string) {
    super('PLAN_INVALID', details);
  }
}
