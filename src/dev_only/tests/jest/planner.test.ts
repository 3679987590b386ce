import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { UploadPlanner, type PlanInput } from '../../../lib/uploadPlanner.js';
import type { AddTaskInput, UploadTask } from '../../../types/index.js';
import { InvalidPlanError, PlanNotFoundError, StoreCorruptError } from '../../../util/errors.js';
import { createMockLogger, makeTask, makeTempDir, removeDir, waitFor } from './constants.helpers.js';

// Monday, local time
const MONDAY_0930 = new Date(2026, 0, 5, 9, 30);
const at = (day: number, hours: number, minutes: number, seconds = 0) => new Date(2026, 0, day, hours, minutes, seconds);

class RecordingScheduler {
  readonly inputs: AddTaskInput[] = [];
  readonly tasks: UploadTask[] = [];

  async addTask(input: AddTaskInput): Promise<string> {
    this.inputs.push(input);
    const id = `task-${this.inputs.length}`;
    this.tasks.push(makeTask({ id, platform: input.platform, media: input.media, createdAt: new Date(input.dueAt ?? 0) }));
    return id;
  }

  getAllTasks(): UploadTask[] {
    return this.tasks;
  }
}

describe('UploadPlanner', () => {
  let dir: string;
  let videoDir: string;
  let titlesFile: string;
  let statePath: string;
  let scheduler: RecordingScheduler;
  let logger: ReturnType<typeof createMockLogger>;

  const makePlanner = (clock: () => number = () => MONDAY_0930.getTime()) =>
    new UploadPlanner(scheduler, { filePath: statePath, random: () => 0, clock, logger });

  const planInput = (overrides: Partial<PlanInput> = {}): PlanInput => ({
    name: 'Morning',
    platform: 'tiktok',
    kind: 'weekly',
    uploadTimes: ['09:30'],
    videoDirectory: videoDir,
    titlesFile,
    tags: ['run'],
    ...overrides,
  });

  beforeEach(async () => {
    dir = await makeTempDir();
    videoDir = path.join(dir, 'videos');
    titlesFile = path.join(dir, 'titles.txt');
    statePath = path.join(dir, 'planner.json');
    await fs.mkdir(videoDir);
    await Promise.all(['b.mov', 'notes.txt', 'a.mp4'].map(name => fs.writeFile(path.join(videoDir, name), '')));
    await fs.writeFile(titlesFile, 'First title\n\n  Second title  \n');
    scheduler = new RecordingScheduler();
    logger = createMockLogger();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('plans', () => {
    test('creates a plan with defaults', async () => {
      const planner = makePlanner();
      const id = await planner.createPlan(planInput({ titlesFile: undefined }));

      expect(planner.getPlan(id)).toEqual({
        id,
        name: 'Morning',
        platform: 'tiktok',
        kind: 'weekly',
        uploadTimes: ['09:30'],
        daysOfWeek: [0, 1, 2, 3, 4, 5, 6],
        videoDirectory: videoDir,
        titlesFile: null,
        maxVideosPerDay: 5,
        tags: ['run'],
        priority: 'NORMAL',
        enabled: true,
        createdAt: MONDAY_0930,
        lastRun: null,
      });
    });

    test('rejects invalid plans', async () => {
      const planner = makePlanner();
      await expect(planner.createPlan(planInput({ name: '  ' }))).rejects.toThrow('Invalid upload plan. name: name must not be empty');
      await expect(planner.createPlan(planInput({ uploadTimes: [] }))).rejects.toThrow(InvalidPlanError);
      expect(planner.getAllPlans()).toEqual([]);
    });

    test('updates a plan and validates the result', async () => {
      const planner = makePlanner();
      const id = await planner.createPlan(planInput());

      const updated = await planner.updatePlan(id, { maxVideosPerDay: 1, enabled: false });
      expect(updated).toMatchObject({ id, maxVideosPerDay: 1, enabled: false, createdAt: MONDAY_0930 });
      expect(planner.getPlan(id)).toEqual(updated);

      await expect(planner.updatePlan(id, { uploadTimes: ['9:30'] })).rejects.toThrow(
        'Invalid upload plan. uploadTimes.0: upload time must be HH:MM'
      );
      await expect(planner.updatePlan('missing', { enabled: true })).rejects.toThrow(PlanNotFoundError);
    });

    test('deletes plans', async () => {
      const planner = makePlanner();
      const id = await planner.createPlan(planInput());
      await expect(planner.deletePlan(id)).resolves.toBe(true);
      await expect(planner.deletePlan(id)).resolves.toBe(false);
      expect(planner.getPlan(id)).toBeUndefined();
    });

    test('returns copies', async () => {
      const planner = makePlanner();
      const id = await planner.createPlan(planInput());
      const plan = planner.getPlan(id);
      plan?.tags.push('mutated');
      expect(planner.getPlan(id)?.tags).toEqual(['run']);
    });
  });

  describe('tick', () => {
    test('queues one task with a picked video and title', async () => {
      const planner = makePlanner();
      const id = await planner.createPlan(planInput());

      await expect(planner.tick(MONDAY_0930)).resolves.toEqual(['task-1']);
      expect(scheduler.inputs).toEqual([
        {
          platform: 'tiktok',
          media: path.join(videoDir, 'a.mp4'),
          caption: 'First title',
          tags: ['run'],
          priority: 'NORMAL',
          dueAt: MONDAY_0930,
          metadata: { planId: id, planName: 'Morning', autoSelected: true },
        },
      ]);
      expect(planner.getPlan(id)?.lastRun).toEqual(MONDAY_0930);
    });

    test('fires once per matching minute', async () => {
      const planner = makePlanner();
      await planner.createPlan(planInput());

      await planner.tick(MONDAY_0930);
      await expect(planner.tick(at(5, 9, 30, 45))).resolves.toEqual([]);
      expect(scheduler.inputs).toHaveLength(1);
    });

    test('skips plans outside their time or weekday', async () => {
      const planner = makePlanner();
      await planner.createPlan(planInput({ daysOfWeek: [2] }));

      await expect(planner.tick(MONDAY_0930)).resolves.toEqual([]);
      await expect(planner.tick(at(7, 9, 31))).resolves.toEqual([]);
      await expect(planner.tick(at(7, 9, 30))).resolves.toEqual(['task-1']);
    });

    test('skips disabled plans', async () => {
      const planner = makePlanner();
      await planner.createPlan(planInput({ enabled: false }));
      await expect(planner.tick(MONDAY_0930)).resolves.toEqual([]);
    });

    test('rotates through videos and titles and starts over once all were used', async () => {
      const planner = makePlanner();
      await planner.createPlan(planInput());

      for (const day of [5, 6, 7]) await planner.tick(at(day, 9, 30));

      expect(scheduler.inputs.map(input => [path.basename(input.media), input.caption])).toEqual([
        ['a.mp4', 'First title'],
        ['b.mov', 'Second title'],
        ['a.mp4', 'First title'],
      ]);
      expect(planner.getStats()).toMatchObject({ usedVideos: 1, usedTitles: 1 });
    });

    test('stops a daily plan at its per-day limit', async () => {
      const planner = makePlanner();
      await planner.createPlan(planInput({ kind: 'daily', maxVideosPerDay: 2, uploadTimes: ['09:30', '09:31', '09:32'] }));

      await expect(planner.tick(at(5, 9, 30))).resolves.toEqual(['task-1']);
      await expect(planner.tick(at(5, 9, 31))).resolves.toEqual(['task-2']);
      await expect(planner.tick(at(5, 9, 32))).resolves.toEqual([]);
      await expect(planner.tick(at(6, 9, 30))).resolves.toEqual(['task-3']);
    });

    test('generates a title when no titles file is set or readable', async () => {
      const planner = makePlanner();
      await planner.createPlan(planInput({ titlesFile: null }));
      await planner.createPlan(planInput({ name: 'Missing titles', titlesFile: path.join(dir, 'absent.txt') }));

      await planner.tick(MONDAY_0930);
      expect(scheduler.inputs.map(input => input.caption)).toEqual(['Auto upload 2026-01-05 09:30', 'Auto upload 2026-01-05 09:30']);
      expect(logger.error).toHaveBeenCalledWith(`Titles file not found: ${path.join(dir, 'absent.txt')}`);
    });

    test('disables a one-off plan after it fired', async () => {
      const planner = makePlanner();
      const id = await planner.createPlan(planInput({ kind: 'once' }));

      await planner.tick(MONDAY_0930);
      expect(planner.getPlan(id)?.enabled).toBe(false);
      await expect(planner.tick(at(6, 9, 30))).resolves.toEqual([]);
      expect(planner.getStats()).toMatchObject({ totalPlans: 1, enabledPlans: 0, disabledPlans: 1 });
    });

    test('creates nothing when the video directory is missing', async () => {
      const planner = makePlanner();
      await planner.createPlan(planInput({ videoDirectory: path.join(dir, 'nowhere') }));

      await expect(planner.tick(MONDAY_0930)).resolves.toEqual([]);
      expect(scheduler.inputs).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith('No video found for plan Morning');
    });

    test('keeps going when adding a task fails', async () => {
      const planner = new UploadPlanner(
        {
          addTask: async () => {
            throw new Error('store offline');
          },
          getAllTasks: () => [],
        },
        { filePath: statePath, random: () => 0, logger }
      );
      const id = await planner.createPlan(planInput());

      await expect(planner.tick(MONDAY_0930)).resolves.toEqual([]);
      expect(planner.getPlan(id)?.lastRun).toBeNull();
      expect(logger.error).toHaveBeenCalledWith("Plan 'Morning' failed to create an upload:", new Error('store offline'));
    });
  });

  describe('persistence', () => {
    test('restores plans and used media from its state file', async () => {
      const planner = makePlanner();
      await planner.createPlan(planInput());
      await planner.tick(MONDAY_0930);

      const raw = JSON.parse(await fs.readFile(statePath, 'utf-8'));
      expect(raw.version).toBe(1);
      expect(raw.usedVideos).toEqual([path.join(videoDir, 'a.mp4')]);
      expect(raw.usedTitles).toEqual(['First title']);

      const reloaded = makePlanner();
      await reloaded.load();
      expect(reloaded.getAllPlans()).toEqual(planner.getAllPlans());
      await expect(reloaded.tick(MONDAY_0930)).resolves.toEqual([]);
      await reloaded.tick(at(6, 9, 30));
      expect(scheduler.inputs[1]?.media).toBe(path.join(videoDir, 'b.mov'));
    });

    test('refuses a corrupt state file', async () => {
      await fs.writeFile(statePath, '{bad');
      await expect(makePlanner().load()).rejects.toThrow(StoreCorruptError);
    });
  });

  describe('timer', () => {
    test('ticks on an interval until stopped', async () => {
      const planner = makePlanner();
      await planner.createPlan(planInput());

      await planner.start(10);
      expect(planner.isRunning).toBe(true);
      await planner.start(10);
      expect(logger.warn).toHaveBeenCalledWith('Upload planner already running');

      await waitFor(() => scheduler.inputs.length === 1);
      planner.stop();
      expect(planner.getStats().isRunning).toBe(false);
      expect(scheduler.inputs).toHaveLength(1);
    });
  });
});
