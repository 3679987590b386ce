import type { LoggerLike, UploadRequest, UploadResult } from '../types/index.js';
import { PlatformExecutor, type UploadLimits } from './platform.executor.js';

/**
 * Drives one browser upload session. Supplied by the host application; it receives the caption with the tags appended.
 */
export type UploadDriver = (job: UploadRequest & { fullCaption: string }, signal: AbortSignal) => Promise<UploadResult>;

export const formatCaption = (caption: string, tags: string[]): string => {
  const hashtags = tags
    .map(tag => tag.trim().replace(/^#+/, ''))
    .filter(Boolean)
    .map(tag => `#${tag}`);
  return [caption.trim(), ...hashtags].filter(Boolean).join(' ');
};

export class TikTokExecutor extends PlatformExecutor {
  readonly platform = 'tiktok';
  readonly limits: UploadLimits = {
    maxFileSizeMb: 4096,
    maxDurationSeconds: 600,
    minDurationSeconds: 3,
    maxCaptionLength: 2200,
    supportedFormats: ['.mp4', '.mov', '.avi', '.webm'],
    maxUploadsPerDay: 100,
  };

  constructor(private readonly driver: UploadDriver, logger?: LoggerLike) {
    super(logger);
  }

  protected async performUpload(request: UploadRequest, signal: AbortSignal): Promise<UploadResult> {
    const fullCaption = formatCaption(request.caption, request.tags);
    if (fullCaption.length > this.limits.maxCaptionLength) {
      return {
        success: false,
        message: `caption with tags is ${fullCaption.length} characters, the limit is ${this.limits.maxCaptionLength}`,
        errorKind: 'permanent',
      };
    }
    return this.driver({ ...request, fullCaption }, signal);
  }
}
