import express, { type Request, type Response } from 'express';
import type { Server } from 'http';
import { TASK_STATUSES, type LoggerLike, type TaskStatus } from './types/index.js';
import { AddTaskInputSchema, type Scheduler } from './lib/Scheduler.js';
import { InvalidTaskInputError, MaxAttemptsLimitError, SchedulerError, UnknownPlatformError } from './util/errors.js';
import { formatIssues } from './util/task.schema.js';

export interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

const isTaskStatus = (value: unknown): value is TaskStatus =>
  typeof value === 'string' && (TASK_STATUSES as readonly string[]).includes(value);

// errors the caller can fix by changing the request
const isClientError = (err: unknown): err is SchedulerError =>
  err instanceof InvalidTaskInputError || err instanceof UnknownPlatformError || err instanceof MaxAttemptsLimitError;

export async function handleAddTask(scheduler: Scheduler, body: unknown): Promise<ApiResponse> {
  const parsed = AddTaskInputSchema.safeParse(body);
  if (!parsed.success) {
    const error = new InvalidTaskInputError(formatIssues(parsed.error));
    return { status: 400, body: { message: error.message, code: error.code } };
  }
  try {
    const id = await scheduler.addTask(parsed.data);
    return { status: 201, body: { message: 'Task added', task: scheduler.getTask(id) } };
  } catch (err) {
    if (isClientError(err)) {
      return { status: 400, body: { message: err.message, code: err.code } };
    }
    throw err;
  }
}

export function handleListTasks(scheduler: Scheduler, status: unknown): ApiResponse {
  if (status !== undefined && !isTaskStatus(status)) {
    return { status: 400, body: { message: `Invalid status filter. Expected one of: ${TASK_STATUSES.join(', ')}` } };
  }
  const tasks = scheduler.getAllTasks(status);
  return { status: 200, body: { message: 'Tasks retrieved', total: tasks.length, tasks } };
}

export function handleGetTask(scheduler: Scheduler, id: string): ApiResponse {
  const task = scheduler.getTask(id);
  if (!task) {
    return { status: 404, body: { message: 'Task not found' } };
  }
  return { status: 200, body: { message: 'Task found', task } };
}

export async function handleCancelTask(scheduler: Scheduler, id: string): Promise<ApiResponse> {
  const status = scheduler.getTaskStatus(id);
  if (!status) {
    return { status: 404, body: { message: 'Task not found' } };
  }
  const cancelled = await scheduler.cancelTask(id);
  if (!cancelled) {
    return {
      status: 409,
      body: { message: `Task cannot be cancelled in status ${scheduler.getTaskStatus(id) ?? status}`, task: scheduler.getTask(id) },
    };
  }
  return { status: 200, body: { message: 'Task cancelled', task: scheduler.getTask(id) } };
}

export function handleStats(scheduler: Scheduler): ApiResponse {
  return { status: 200, body: { message: 'Queue stats', stats: scheduler.getQueueStats(), running: scheduler.isRunning } };
}

export async function handleSchedulerAction(scheduler: Scheduler, body: unknown): Promise<ApiResponse> {
  const action = typeof body === 'object' && body !== null && 'action' in body ? body.action : undefined;
  if (action === 'start') {
    await scheduler.start();
    return { status: 200, body: { message: 'Scheduler started' } };
  }
  if (action === 'stop') {
    await scheduler.stop();
    return { status: 200, body: { message: 'Scheduler stopped' } };
  }
  return { status: 400, body: { message: 'Invalid action' } };
}

const send = (res: Response, { status, body }: ApiResponse) => {
  res.status(status).json(body);
};

/**
 * JSON API over a scheduler. Handler errors that are not the caller's fault answer 500.
 */
export function createSchedulerApp(scheduler: Scheduler, logger?: LoggerLike) {
  const app = express();
  app.use(express.json());

  const route =
    (handler: (req: Request) => ApiResponse | Promise<ApiResponse>) =>
    (req: Request, res: Response) => {
      Promise.resolve()
        .then(() => handler(req))
        .then(result => send(res, result))
        .catch(err => {
          logger?.error('Request failed:', err);
          const message = err instanceof Error ? err.message : String(err);
          send(res, { status: 500, body: { message } });
        });
    };

  app.post('/tasks', route(req => handleAddTask(scheduler, req.body)));
  app.get('/tasks', route(req => handleListTasks(scheduler, req.query.status)));
  app.get('/tasks/:id', route(req => handleGetTask(scheduler, req.params.id)));
  app.delete('/tasks/:id', route(req => handleCancelTask(scheduler, req.params.id)));
  app.get('/stats', route(() => handleStats(scheduler)));
  app.post('/scheduler', route(req => handleSchedulerAction(scheduler, req.body)));

  return app;
}

export function runServer(scheduler: Scheduler, { host, port }: { host: string; port: number }, logger?: LoggerLike): Promise<Server> {
  const app = createSchedulerApp(scheduler, logger);
  return new Promise(resolve => {
    const server = app.listen(port, host, () => {
      logger?.info(`Upload scheduler API running on http://${host}:${port}`);
      resolve(server);
    });
  });
}
