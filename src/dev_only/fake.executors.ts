import type { UploadExecutor, UploadRequest, UploadResult, ValidationResult } from '../types/index.js';

type Behaviour = (request: UploadRequest, signal: AbortSignal) => UploadResult | Promise<UploadResult>;

/**
 * Executor test double: records every request and answers with `behaviour`.
 */
export class FakeExecutor implements UploadExecutor {
  readonly calls: UploadRequest[] = [];
  readonly signals: AbortSignal[] = [];

  constructor(
    readonly platform: string,
    private readonly behaviour: Behaviour = request => ({
      success: true,
      message: 'uploaded',
      resultId: `video-${request.taskId}`,
      url: `https://videos.test/${request.taskId}`,
    })
  ) {}

  validate(): ValidationResult {
    return { isValid: true, message: null };
  }

  async upload(request: UploadRequest, signal: AbortSignal): Promise<UploadResult> {
    this.calls.push(request);
    this.signals.push(signal);
    return this.behaviour(request, signal);
  }
}

export const succeedingExecutor = (platform = 'tiktok') => new FakeExecutor(platform);

export const failingExecutor = (message: string, platform = 'tiktok', errorKind?: UploadResult['errorKind']) =>
  new FakeExecutor(platform, () => ({ success: false, message, errorKind }));

/**
 * Holds callers until `open()`; later callers pass straight through.
 */
export class Gate {
  private readonly waiting: Array<() => void> = [];
  private opened = false;

  wait(): Promise<void> {
    if (this.opened) return Promise.resolve();
    return new Promise(resolve => this.waiting.push(resolve));
  }

  open() {
    this.opened = true;
    for (const resolve of this.waiting.splice(0)) resolve();
  }
}

export const gatedExecutor = (gate: Gate, platform = 'tiktok') =>
  new FakeExecutor(platform, async () => {
    await gate.wait();
    return { success: true, message: 'uploaded after gate' };
  });
