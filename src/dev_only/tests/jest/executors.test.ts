import { describe, expect, test, jest } from '@jest/globals';
import { ExecutorRegistry, checkMediaLocator, mediaExtension } from '../../../lib/executorRegistry.js';
import { InstagramExecutor } from '../../../platforms/instagram.executor.js';
import { TikTokExecutor, formatCaption, type UploadDriver } from '../../../platforms/tiktok.executor.js';
import type { UploadRequest } from '../../../types/index.js';
import { ExecutorAlreadyRegisteredError } from '../../../util/errors.js';
import { succeedingExecutor } from '../../fake.executors.js';

const request = (overrides: Partial<UploadRequest> = {}): UploadRequest => ({
  taskId: 'task-1',
  platform: 'tiktok',
  media: 'videos/clip.mp4',
  caption: 'Morning run',
  description: null,
  tags: [],
  privacy: { visibility: 'public', allowComments: true, allowDuet: true, allowStitch: true },
  metadata: {},
  attempt: 1,
  ...overrides,
});

describe('checkMediaLocator', () => {
  test('accepts local paths and URIs with a video extension', () => {
    expect(checkMediaLocator('videos/clip.MP4')).toEqual({ isValid: true, message: null });
    expect(checkMediaLocator('https://cdn.example.com/v/clip.webm?sig=abc')).toEqual({ isValid: true, message: null });
  });

  test('rejects locators without a supported extension', () => {
    expect(checkMediaLocator('https://cdn.example.com/v/clip')).toEqual({
      isValid: false,
      message: 'unsupported media format "(none)". Supported: .mp4, .mov, .avi, .webm',
    });
    expect(checkMediaLocator('clip.mkv').message).toBe('unsupported media format ".mkv". Supported: .mp4, .mov, .avi, .webm');
  });

  test('rejects empty and NUL-containing locators', () => {
    expect(checkMediaLocator('   ')).toEqual({ isValid: false, message: 'media locator must not be empty' });
    expect(checkMediaLocator('clip\0.mp4')).toEqual({ isValid: false, message: 'media locator contains a NUL byte' });
  });
});

describe('mediaExtension', () => {
  test('ignores the query and fragment of a URI', () => {
    expect(mediaExtension('https://cdn.example.test/v/a.MP4?sig=abc')).toBe('.mp4');
    expect(mediaExtension('https://cdn.example.test/v/a.mov#t=3')).toBe('.mov');
    expect(mediaExtension('videos/clip.webm')).toBe('.webm');
    expect(mediaExtension('http://[bad')).toBeUndefined();
  });
});

describe('ExecutorRegistry', () => {
  test('registers one executor per platform', () => {
    const registry = new ExecutorRegistry();
    registry.register(succeedingExecutor('tiktok'));
    expect(() => registry.register(succeedingExecutor('tiktok'))).toThrow(ExecutorAlreadyRegisteredError);

    const replacement = succeedingExecutor('tiktok');
    registry.register(replacement, { replace: true });
    expect(registry.get('tiktok')).toBe(replacement);
    expect(registry.platforms()).toEqual(['tiktok']);
  });

  test('reports where a media check failed', () => {
    const registry = new ExecutorRegistry();
    registry.register(new InstagramExecutor());
    expect(registry.validateMedia('instagram', 'clip.txt', 'hi')).toMatchObject({ isValid: false, source: 'locator' });
    expect(registry.validateMedia('instagram', 'clip.mov', 'hi')).toEqual({
      isValid: false,
      message: 'instagram: unsupported format ".mov", expected one of .mp4',
      source: 'executor',
    });
    expect(registry.validateMedia('instagram', 'clip.mp4', 'hi')).toEqual({ isValid: true, message: null, source: null });
  });
});

describe('formatCaption', () => {
  test('appends tags as hashtags', () => {
    expect(formatCaption('  Morning run ', ['#fitness', 'running', '  ', '##health'])).toBe('Morning run #fitness #running #health');
  });

  test('works without caption or tags', () => {
    expect(formatCaption('', ['solo'])).toBe('#solo');
    expect(formatCaption('just text', [])).toBe('just text');
  });
});

describe('TikTokExecutor', () => {
  const driverResult = { success: true, message: 'posted', resultId: 'tt-1', url: 'https://videos.test/tt-1' };

  test('validates format and caption length', () => {
    const executor = new TikTokExecutor(async () => driverResult);
    expect(executor.validate('clip.mov', 'hi')).toEqual({ isValid: true, message: null });
    expect(executor.validate('clip.mkv', 'hi')).toEqual({
      isValid: false,
      message: 'unsupported format ".mkv", expected one of .mp4, .mov, .avi, .webm',
    });
    expect(executor.validate('clip.mp4', 'x'.repeat(2201))).toEqual({
      isValid: false,
      message: 'caption is 2201 characters, the limit is 2200',
    });
  });

  test('accepts URIs with a query string', () => {
    const registry = new ExecutorRegistry();
    registry.register(new TikTokExecutor(async () => driverResult));
    expect(registry.validateMedia('tiktok', 'https://cdn.example.test/v/a.mp4?sig=abc', 'hi')).toEqual({
      isValid: true,
      message: null,
      source: null,
    });
    expect(new InstagramExecutor().validate('https://cdn.example.test/v/a.mov#t=3', 'hi')).toEqual({
      isValid: false,
      message: 'unsupported format ".mov", expected one of .mp4',
    });
  });

  test('hands the driver the caption with hashtags', async () => {
    const driver = jest.fn<UploadDriver>().mockResolvedValue(driverResult);
    const executor = new TikTokExecutor(driver);
    const signal = new AbortController().signal;

    await expect(executor.upload(request({ tags: ['run'] }), signal)).resolves.toEqual(driverResult);
    expect(driver).toHaveBeenCalledWith(expect.objectContaining({ taskId: 'task-1', fullCaption: 'Morning run #run' }), signal);
  });

  test('fails permanently when the hashtags push the caption over the limit', async () => {
    const driver = jest.fn<UploadDriver>().mockResolvedValue(driverResult);
    const executor = new TikTokExecutor(driver);
    const result = await executor.upload(request({ caption: 'x'.repeat(2195), tags: ['toolong'] }), new AbortController().signal);

    expect(result).toEqual({ success: false, message: 'caption with tags is 2204 characters, the limit is 2200', errorKind: 'permanent' });
    expect(driver).not.toHaveBeenCalled();
  });

  test('turns a driver exception into a failed result', async () => {
    const executor = new TikTokExecutor(async () => {
      throw new Error('upload button not found');
    });
    await expect(executor.upload(request(), new AbortController().signal)).resolves.toEqual({
      success: false,
      message: 'upload button not found',
    });
  });
});

describe('InstagramExecutor', () => {
  test('accepts only mp4 and reports a permanent failure', async () => {
    const executor = new InstagramExecutor();
    expect(executor.validate('clip.mp4', 'hi')).toEqual({ isValid: true, message: null });
    expect(executor.validate('clip.webm', 'hi').isValid).toBe(false);
    await expect(executor.upload(request({ platform: 'instagram' }), new AbortController().signal)).resolves.toEqual({
      success: false,
      message: 'Instagram upload not implemented yet',
      errorKind: 'permanent',
    });
  });
});
