import { z } from 'zod';
import { RetryPolicySchema } from '../lib/retryPolicy.js';
import { TASK_PRIORITIES, TASK_STATUSES, type JsonValue, type UploadTask } from '../types/index.js';

export const SNAPSHOT_VERSION = 1;

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  // JSON has no Infinity or NaN
  z.union([z.string(), z.number().finite(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

const timestamp = z.string().datetime({ offset: true });

// toISOString switches to a six-digit year outside this range, which `timestamp` does not accept
export const EARLIEST_TIMESTAMP = new Date('0000-01-01T00:00:00.000Z');
export const LATEST_TIMESTAMP = new Date('9999-12-31T23:59:59.999Z');

export const PrivacySchema = z.object({
  visibility: z.enum(['public', 'friends', 'private']),
  allowComments: z.boolean(),
  allowDuet: z.boolean(),
  allowStitch: z.boolean(),
});

export const SerializedTaskSchema = z.object({
  id: z.string().min(1),
  platform: z.string().min(1),
  media: z.string().min(1),
  caption: z.string(),
  description: z.string().nullable(),
  tags: z.array(z.string()),
  privacy: PrivacySchema,
  dueAt: timestamp.nullable(),
  priority: z.enum(TASK_PRIORITIES),
  status: z.enum(TASK_STATUSES),
  attempts: z.number().int().min(0),
  maxAttempts: z.number().int().min(1),
  lastError: z.string().nullable(),
  result: z
    .object({
      message: z.string(),
      resultId: z.string().nullable(),
      url: z.string().nullable(),
    })
    .nullable(),
  metadata: z.record(JsonValueSchema),
  retryPolicy: RetryPolicySchema.nullable(),
  createdAt: timestamp,
  updatedAt: timestamp,
});

export type SerializedTask = z.infer<typeof SerializedTaskSchema>;

export const SnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    savedAt: timestamp,
    tasks: z.record(SerializedTaskSchema),
  })
  .superRefine((snapshot, ctx) => {
    for (const [key, task] of Object.entries(snapshot.tasks)) {
      if (key !== task.id) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['tasks', key, 'id'], message: `task keyed "${key}" carries id "${task.id}"` });
      }
    }
  });

export type TaskSnapshot = z.infer<typeof SnapshotSchema>;

export const serializeTask = (task: UploadTask): SerializedTask => ({
  ...task,
  tags: [...task.tags],
  privacy: { ...task.privacy },
  result: task.result ? { ...task.result } : null,
  metadata: structuredClone(task.metadata),
  retryPolicy: task.retryPolicy ? { ...task.retryPolicy } : null,
  dueAt: task.dueAt ? task.dueAt.toISOString() : null,
  createdAt: task.createdAt.toISOString(),
  updatedAt: task.updatedAt.toISOString(),
});

export const deserializeTask = (data: SerializedTask): UploadTask => ({
  ...data,
  dueAt: data.dueAt ? new Date(data.dueAt) : null,
  createdAt: new Date(data.createdAt),
  updatedAt: new Date(data.updatedAt),
});

export const toSnapshot = (tasks: UploadTask[], savedAt = new Date()): TaskSnapshot => ({
  version: SNAPSHOT_VERSION,
  savedAt: savedAt.toISOString(),
  tasks: Object.fromEntries(tasks.map(task => [task.id, serializeTask(task)])),
});

export const formatIssues = (error: z.ZodError): string =>
  error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

/**
 * Returns the tasks of a snapshot, or the zod issues describing why it is not one.
 */
export const parseSnapshot = (raw: unknown): { ok: true; tasks: UploadTask[] } | { ok: false; details: string } => {
  const result = SnapshotSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, details: formatIssues(result.error) };
  }
  return { ok: true, tasks: Object.values(result.data.tasks).map(deserializeTask) };
};
