import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { TASK_PRIORITIES, type LoggerLike, type TaskPriorityName, type TaskStatus } from '../types/index.js';
import { InvalidPlanError, PlanNotFoundError, StoreCorruptError, StoreReadError, toError } from '../util/errors.js';
import { pad2, readFileIfExists, writeFileAtomic } from '../util/helpers.js';
import { formatIssues } from '../util/task.schema.js';
import { SUPPORTED_VIDEO_FORMATS } from './executorRegistry.js';
import type { Scheduler } from './Scheduler.js';

export const PLAN_KINDS = ['once', 'daily', 'weekly'] as const;
export type PlanKind = (typeof PLAN_KINDS)[number];

const DEFAULT_TICK_INTERVAL = 60_000;
const ALL_DAYS = [0, 1, 2, 3, 4, 5, 6];
// statuses that count against a daily plan's quota
const COUNTED_STATUSES: readonly TaskStatus[] = ['COMPLETED', 'RUNNING', 'PENDING'];

export interface UploadPlan {
  id: string;
  name: string;
  platform: string;
  kind: PlanKind;
  uploadTimes: string[]; // local "HH:MM"
  daysOfWeek: number[]; // 0 = Monday
  videoDirectory: string;
  titlesFile: string | null;
  maxVideosPerDay: number;
  tags: string[];
  priority: TaskPriorityName;
  enabled: boolean;
  createdAt: Date;
  lastRun: Date | null;
}

export interface PlannerStats {
  totalPlans: number;
  enabledPlans: number;
  disabledPlans: number;
  usedVideos: number;
  usedTitles: number;
  isRunning: boolean;
}

export interface UploadPlannerOptions {
  filePath: string;
  random?: () => number;
  clock?: () => number;
  logger?: LoggerLike;
}

type PlannerScheduler = Pick<Scheduler, 'addTask' | 'getAllTasks'>;

const PlanInputSchema = z.object({
  name: z.string().trim().min(1, 'name must not be empty'),
  platform: z.string().trim().min(1, 'platform must not be empty'),
  kind: z.enum(PLAN_KINDS),
  uploadTimes: z.array(z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'upload time must be HH:MM')).min(1),
  daysOfWeek: z.array(z.number().int().min(0).max(6)).min(1).default(() => [...ALL_DAYS]),
  videoDirectory: z.string().min(1, 'videoDirectory must not be empty'),
  titlesFile: z.string().min(1).nullable().default(null),
  maxVideosPerDay: z.number().int().min(1).default(5),
  tags: z.array(z.string()).default(() => []),
  priority: z.enum(TASK_PRIORITIES).default('NORMAL'),
  enabled: z.boolean().default(true),
});

export type PlanInput = z.input<typeof PlanInputSchema>;
export type PlanPatch = Partial<PlanInput>;

const timestamp = z.string().datetime({ offset: true });

const StoredPlanSchema = PlanInputSchema.extend({
  id: z.string().min(1),
  createdAt: timestamp,
  lastRun: timestamp.nullable(),
});

const PlannerStateSchema = z.object({
  version: z.literal(1),
  plans: z.array(StoredPlanSchema),
  usedVideos: z.array(z.string()),
  usedTitles: z.array(z.string()),
});

type PlannerState = z.infer<typeof PlannerStateSchema>;

const noop = () => undefined;

const copyPlan = (plan: UploadPlan): UploadPlan => structuredClone(plan);

// Monday-based weekday of a local date
export const weekdayOf = (date: Date) => (date.getDay() + 6) % 7;

export const formatClock = (date: Date) => `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;

const sameLocalDay = (a: Date, b: Date) =>
  a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth() && a.getDate() === b.getDate();

export const fallbackTitle = (date: Date) =>
  `Auto upload ${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ${formatClock(date)}`;

/**
 * Recurring upload plans on top of a {@link Scheduler}. Every tick, each enabled plan whose weekday and `HH:MM` match
 * the current local time becomes one upload task with a randomly picked, not yet used video and title.
 */
export class UploadPlanner {
  private readonly plans = new Map<string, UploadPlan>();
  private readonly usedVideos = new Set<string>();
  private readonly usedTitles = new Set<string>();
  private readonly filePath: string;
  private readonly random: () => number;
  private readonly clock: () => number;
  private readonly logger: LoggerLike | undefined;

  private lockChain: Promise<void> = Promise.resolve();
  private loaded = false;
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly scheduler: PlannerScheduler,
    { filePath, random = Math.random, clock = Date.now, logger }: UploadPlannerOptions
  ) {
    this.filePath = filePath;
    this.random = random;
    this.clock = clock;
    this.logger = logger;
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Reads plans and used videos/titles from disk. Missing file means no plans yet; an unreadable one rejects.
   */
  async load(): Promise<void> {
    await this.withLock(() => this.loadState());
  }

  async createPlan(input: PlanInput): Promise<string> {
    const data = this.parseInput(input);
    return this.withLock(async () => {
      await this.loadState();
      const plan: UploadPlan = { ...data, id: randomUUID(), createdAt: new Date(this.clock()), lastRun: null };
      this.plans.set(plan.id, plan);
      await this.save();
      this.log('info', `Created plan '${plan.name}' with ID ${plan.id}`);
      return plan.id;
    });
  }

  async updatePlan(id: string, patch: PlanPatch): Promise<UploadPlan> {
    return this.withLock(async () => {
      await this.loadState();
      const plan = this.plans.get(id);
      if (!plan) throw new PlanNotFoundError(id);

      const updated: UploadPlan = { ...this.parseInput({ ...plan, ...patch }), id, createdAt: plan.createdAt, lastRun: plan.lastRun };
      this.plans.set(id, updated);
      await this.save();
      this.log('info', `Updated plan ${id}`);
      return copyPlan(updated);
    });
  }

  async deletePlan(id: string): Promise<boolean> {
    return this.withLock(async () => {
      await this.loadState();
      if (!this.plans.delete(id)) return false;
      await this.save();
      this.log('info', `Deleted plan ${id}`);
      return true;
    });
  }

  getPlan(id: string): UploadPlan | undefined {
    const plan = this.plans.get(id);
    return plan ? copyPlan(plan) : undefined;
  }

  getAllPlans(): UploadPlan[] {
    return [...this.plans.values()].map(copyPlan);
  }

  getStats(): PlannerStats {
    const enabled = [...this.plans.values()].filter(plan => plan.enabled).length;
    return {
      totalPlans: this.plans.size,
      enabledPlans: enabled,
      disabledPlans: this.plans.size - enabled,
      usedVideos: this.usedVideos.size,
      usedTitles: this.usedTitles.size,
      isRunning: this.isRunning,
    };
  }

  /**
   * Fires every plan due at `now`. Resolves with the ids of the tasks it created; a plan that fails is logged and
   * skipped.
   */
  async tick(now: Date = new Date(this.clock())): Promise<string[]> {
    return this.withLock(async () => {
      await this.loadState();
      const created: string[] = [];
      for (const plan of this.plans.values()) {
        if (!this.shouldRun(plan, now)) continue;
        try {
          const taskId = await this.fire(plan, now);
          if (taskId) created.push(taskId);
        } catch (err) {
          this.log('error', `Plan '${plan.name}' failed to create an upload:`, toError(err));
        }
      }
      return created;
    });
  }

  async start(interval: number = DEFAULT_TICK_INTERVAL): Promise<void> {
    if (this.timer) {
      this.log('warn', 'Upload planner already running');
      return;
    }
    await this.load();
    this.log('info', 'Starting upload planner...');
    this.timer = setInterval(() => {
      this.tick().catch(err => this.log('error', 'Upload planner tick failed:', err));
    }, interval);
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    this.log('info', 'Upload planner stopped');
  }

  private shouldRun(plan: UploadPlan, now: Date): boolean {
    if (!plan.enabled) return false;
    if (!plan.daysOfWeek.includes(weekdayOf(now))) return false;

    const clock = formatClock(now);
    if (!plan.uploadTimes.includes(clock)) return false;
    // already fired in this minute
    if (plan.lastRun && sameLocalDay(plan.lastRun, now) && formatClock(plan.lastRun) === clock) return false;

    if (plan.kind === 'daily' && this.countTodayUploads(plan.platform, now) >= plan.maxVideosPerDay) {
      this.log('info', `Plan '${plan.name}' reached its limit of ${plan.maxVideosPerDay} uploads today`);
      return false;
    }
    return true;
  }

  private async fire(plan: UploadPlan, now: Date): Promise<string | undefined> {
    this.log('info', `Executing upload plan: ${plan.name}`);

    const media = await this.pickVideo(plan.videoDirectory);
    if (!media) {
      this.log('warn', `No video found for plan ${plan.name}`);
      return undefined;
    }
    const title = (plan.titlesFile && (await this.pickTitle(plan.titlesFile))) || fallbackTitle(now);

    const taskId = await this.scheduler.addTask({
      platform: plan.platform,
      media,
      caption: title,
      tags: plan.tags,
      priority: plan.priority,
      dueAt: now,
      metadata: { planId: plan.id, planName: plan.name, autoSelected: true },
    });

    plan.lastRun = new Date(now);
    if (plan.kind === 'once') plan.enabled = false;
    await this.save();

    this.log('info', `Plan '${plan.name}' queued task ${taskId} for ${path.basename(media)} with title '${title}'`);
    return taskId;
  }

  private async pickVideo(directory: string): Promise<string | undefined> {
    let entries: string[];
    try {
      entries = await fs.readdir(directory);
    } catch (err) {
      this.log('error', `Video directory not readable: ${directory}`, toError(err));
      return undefined;
    }
    const videos = entries
      .filter(name => (SUPPORTED_VIDEO_FORMATS as readonly string[]).includes(path.extname(name).toLowerCase()))
      .sort()
      .map(name => path.join(directory, name));
    return this.pickUnused(videos, this.usedVideos, 'videos');
  }

  private async pickTitle(titlesFile: string): Promise<string | undefined> {
    let content: string | undefined;
    try {
      content = await readFileIfExists(titlesFile);
    } catch (err) {
      this.log('error', `Titles file not readable: ${titlesFile}`, toError(err));
      return undefined;
    }
    if (content === undefined) {
      this.log('error', `Titles file not found: ${titlesFile}`);
      return undefined;
    }
    const titles = content
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(Boolean);
    return this.pickUnused(titles, this.usedTitles, 'titles');
  }

  // once every candidate was used, they become available again
  private pickUnused(candidates: string[], used: Set<string>, label: string): string | undefined {
    if (candidates.length === 0) return undefined;
    let available = candidates.filter(candidate => !used.has(candidate));
    if (available.length === 0) {
      this.log('info', `All ${label} used, resetting used ${label} list`);
      for (const candidate of candidates) used.delete(candidate);
      available = candidates;
    }
    const picked = available[Math.min(available.length - 1, Math.floor(this.random() * available.length))];
    if (picked !== undefined) used.add(picked);
    return picked;
  }

  private countTodayUploads(platform: string, now: Date): number {
    return this.scheduler
      .getAllTasks()
      .filter(task => task.platform === platform && sameLocalDay(task.createdAt, now) && COUNTED_STATUSES.includes(task.status))
      .length;
  }

  private parseInput(input: PlanInput) {
    const parsed = PlanInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidPlanError(formatIssues(parsed.error));
    }
    return parsed.data;
  }

  private async loadState(): Promise<void> {
    if (this.loaded) return;
    let data: string | undefined;
    try {
      data = await readFileIfExists(this.filePath);
    } catch (err) {
      throw new StoreReadError(this.filePath, toError(err).message);
    }
    if (data !== undefined) {
      let raw: unknown;
      try {
        raw = JSON.parse(data);
      } catch (err) {
        throw new StoreCorruptError(this.filePath, toError(err).message);
      }
      const parsed = PlannerStateSchema.safeParse(raw);
      if (!parsed.success) {
        throw new StoreCorruptError(this.filePath, formatIssues(parsed.error));
      }
      for (const stored of parsed.data.plans) {
        this.plans.set(stored.id, {
          ...stored,
          createdAt: new Date(stored.createdAt),
          lastRun: stored.lastRun ? new Date(stored.lastRun) : null,
        });
      }
      for (const video of parsed.data.usedVideos) this.usedVideos.add(video);
      for (const title of parsed.data.usedTitles) this.usedTitles.add(title);
      this.log('info', `Loaded ${this.plans.size} plans, ${this.usedVideos.size} used videos and ${this.usedTitles.size} used titles`);
    }
    this.loaded = true;
  }

  private async save(): Promise<void> {
    const state: PlannerState = {
      version: 1,
      plans: [...this.plans.values()].map(plan => ({
        ...plan,
        createdAt: plan.createdAt.toISOString(),
        lastRun: plan.lastRun ? plan.lastRun.toISOString() : null,
      })),
      usedVideos: [...this.usedVideos],
      usedTitles: [...this.usedTitles],
    };
    await writeFileAtomic(this.filePath, JSON.stringify(state, null, 2));
  }

  private withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const next = this.lockChain.then(fn);
    this.lockChain = next.then(noop, noop);
    return next;
  }

  private log(level: keyof LoggerLike, ...args: unknown[]) {
    this.logger?.[level]?.(...args);
  }
}
