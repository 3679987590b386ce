import path from 'path';
import type { UploadExecutor, ValidationResult } from '../types/index.js';
import { ExecutorAlreadyRegisteredError } from '../util/errors.js';

export const SUPPORTED_VIDEO_FORMATS = ['.mp4', '.mov', '.avi', '.webm'] as const;

type MediaValidationResult = ValidationResult & { source: 'locator' | 'executor' | null };

const URI_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Lower-cased extension of a local path, or of a URI's path without its query and fragment. Undefined for a URI that
 * does not parse.
 */
export const mediaExtension = (media: string): string | undefined => {
  let locatorPath = media;
  if (URI_PATTERN.test(media)) {
    try {
      locatorPath = new URL(media).pathname;
    } catch {
      return undefined;
    }
  }
  return path.extname(locatorPath).toLowerCase();
};

/**
 * Structural check of a media locator: a local path or a URI whose last path segment has a known video extension.
 */
export const checkMediaLocator = (media: string): ValidationResult => {
  if (!media.trim()) {
    return { isValid: false, message: 'media locator must not be empty' };
  }
  if (media.includes('\0')) {
    return { isValid: false, message: 'media locator contains a NUL byte' };
  }
  const extension = mediaExtension(media);
  if (extension === undefined) {
    return { isValid: false, message: `media locator "${media}" is not a valid URI` };
  }
  if (!(SUPPORTED_VIDEO_FORMATS as readonly string[]).includes(extension)) {
    return {
      isValid: false,
      message: `unsupported media format "${extension || '(none)'}". Supported: ${SUPPORTED_VIDEO_FORMATS.join(', ')}`,
    };
  }
  return { isValid: true, message: null };
};

export class ExecutorRegistry {
  private readonly executors = new Map<string, UploadExecutor>();

  register(executor: UploadExecutor, options?: { replace?: boolean }) {
    if (this.executors.has(executor.platform) && !options?.replace) {
      throw new ExecutorAlreadyRegisteredError(executor.platform);
    }
    this.executors.set(executor.platform, executor);
  }

  get(platform: string): UploadExecutor | undefined {
    return this.executors.get(platform);
  }

  has(platform: string): boolean {
    return this.executors.has(platform);
  }

  platforms(): string[] {
    return [...this.executors.keys()];
  }

  validateMedia(platform: string, media: string, caption: string): MediaValidationResult {
    const locator = checkMediaLocator(media);
    if (!locator.isValid) {
      return { ...locator, source: 'locator' };
    }

    const executor = this.get(platform);
    if (executor?.validate) {
      const result = executor.validate(media, caption);
      if (!result.isValid) {
        return { isValid: false, message: `${platform}: ${result.message}`, source: 'executor' };
      }
    }

    return { isValid: true, message: null, source: null };
  }
}
