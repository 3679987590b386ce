import { mediaExtension } from '../lib/executorRegistry.js';
import type { LoggerLike, UploadExecutor, UploadRequest, UploadResult, ValidationResult } from '../types/index.js';

export interface UploadLimits {
  maxFileSizeMb: number;
  maxDurationSeconds: number;
  minDurationSeconds: number;
  maxCaptionLength: number;
  supportedFormats: string[];
  maxUploadsPerDay: number;
}

/**
 * Base for platform uploaders: caption/format checks from `limits`, and exceptions from `performUpload` turned into failed results.
 */
export abstract class PlatformExecutor implements UploadExecutor {
  abstract readonly platform: string;
  abstract readonly limits: UploadLimits;

  constructor(protected readonly logger?: LoggerLike) {}

  protected abstract performUpload(request: UploadRequest, signal: AbortSignal): Promise<UploadResult>;

  validate(media: string, caption: string): ValidationResult {
    const extension = mediaExtension(media) ?? '';
    if (!this.limits.supportedFormats.includes(extension)) {
      return { isValid: false, message: `unsupported format "${extension}", expected one of ${this.limits.supportedFormats.join(', ')}` };
    }
    if (caption.length > this.limits.maxCaptionLength) {
      return { isValid: false, message: `caption is ${caption.length} characters, the limit is ${this.limits.maxCaptionLength}` };
    }
    return { isValid: true, message: null };
  }

  async upload(request: UploadRequest, signal: AbortSignal): Promise<UploadResult> {
    this.logger?.info(`[${this.platform}] uploading ${request.media} (attempt ${request.attempt})`);
    try {
      const result = await this.performUpload(request, signal);
      if (!result.success) {
        this.logger?.warn(`[${this.platform}] upload of ${request.media} failed: ${result.message}`);
      }
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger?.error(`[${this.platform}] upload of ${request.media} threw:`, err);
      return { success: false, message };
    }
  }
}
