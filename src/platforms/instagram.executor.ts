import type { LoggerLike, UploadResult } from '../types/index.js';
import { PlatformExecutor, type UploadLimits } from './platform.executor.js';

// Placeholder until Reels publishing exists: tasks are accepted and fail permanently on their first attempt.
export class InstagramExecutor extends PlatformExecutor {
  readonly platform = 'instagram';
  readonly limits: UploadLimits = {
    maxFileSizeMb: 100,
    maxDurationSeconds: 60,
    minDurationSeconds: 3,
    maxCaptionLength: 2200,
    supportedFormats: ['.mp4'],
    maxUploadsPerDay: 50,
  };

  constructor(logger?: LoggerLike) {
    super(logger);
  }

  protected async performUpload(): Promise<UploadResult> {
    return { success: false, message: 'Instagram upload not implemented yet', errorKind: 'permanent' };
  }
}
