import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { CaptureLock } from './capture_lock.js';
import {
  AlreadyRunningError,
  AnalysisError,
  CaptureError,
  InvalidIntervalError,
  NotificationError,
  NotRunningError,
  VisionError,
  errorMessage
} from './errors.js';
import { MAX_DELAY_MS, startRepeatingTask, type RepeatingTask } from './repeating_task.js';
import { buildPrompt } from './vision.prompt.js';
import type {
  CapturedImage,
  DescribeSource,
  Description,
  ImageSource,
  Inference,
  RecordedError,
  SpeechBridge,
  VisionAnalyzer,
  VisionSettings,
  VisionStatus
} from './vision.types.js';

export type VisionSystemDeps = {
  source: ImageSource;
  analyzer: VisionAnalyzer;
  speech: SpeechBridge | null;
  settings: VisionSettings;
  logger: Logger;
};

export const MAX_INTERVAL_SECONDS = MAX_DELAY_MS / 1000;

export function isValidInterval(seconds: number): boolean {
  return Number.isFinite(seconds) && seconds > 0 && seconds <= MAX_INTERVAL_SECONDS;
}

export type DescribeOptions = {
  speak?: boolean;
  source?: DescribeSource;
};

/**
 * Orchestrates capture, analysis and speech, and owns the continuous loop.
 *
 * Events: `description` (Description, DescribeSource), `vision_error`
 * (RecordedError, DescribeSource), `notification_error` (RecordedError).
 */
export class VisionSystem extends EventEmitter {
  private readonly source: ImageSource;
  private readonly analyzer: VisionAnalyzer;
  private readonly speech: SpeechBridge | null;
  private readonly log: Logger;
  private readonly lock = new CaptureLock();
  private readonly deliveries = new Set<Promise<void>>();
  private settings: VisionSettings;
  private loop: { task: RepeatingTask; intervalSeconds: number } | null = null;
  // most recent task, kept after stop so close() can wait for its last tick
  private lastTask: RepeatingTask | null = null;
  private lastDescription: Description | null = null;
  private lastError: RecordedError | null = null;
  private lastNotificationError: RecordedError | null = null;
  private tickCount = 0;

  constructor(deps: VisionSystemDeps) {
    super();
    this.source = deps.source;
    this.analyzer = deps.analyzer;
    this.speech = deps.speech;
    this.settings = { ...deps.settings };
    this.log = deps.logger.child({ component: 'vision' });
  }

  async captureImage(): Promise<CapturedImage> {
    return this.lock.runExclusive(() => this.captureUnlocked());
  }

  async analyzeImage(image: CapturedImage): Promise<Description> {
    const prompt = buildPrompt(this.settings.firstPerson);
    let inference: Inference;
    try {
      inference = await this.analyzer.infer(image, prompt);
    } catch (error) {
      if (error instanceof AnalysisError) throw error;
      throw new AnalysisError('analysis_failed', errorMessage(error), { cause: error });
    }
    const text = inference.text.trim();
    if (!text) {
      throw new AnalysisError('empty_response', `Provider ${inference.provider} returned an empty description`);
    }
    return {
      text,
      capturedAt: image.capturedAt,
      describedAt: Date.now(),
      provider: inference.provider
    };
  }

  async describeCurrentView(options: DescribeOptions = {}): Promise<Description> {
    const source = options.source ?? 'on_demand';
    const description = await this.lock.runExclusive(() => this.describeLocked(source));
    this.publish(description, source, options.speak ?? false);
    return description;
  }

  startContinuousVision(intervalSeconds: number = this.settings.intervalSeconds): void {
    if (this.loop) {
      this.log.warn('Continuous vision already running');
      throw new AlreadyRunningError(this.loop.intervalSeconds);
    }
    if (!isValidInterval(intervalSeconds)) {
      throw new InvalidIntervalError(intervalSeconds, MAX_INTERVAL_SECONDS);
    }

    const task = startRepeatingTask(
      (signal) => this.tick(signal),
      Math.min(intervalSeconds * 1000, MAX_DELAY_MS),
      (error) => this.log.error({ err: error }, 'Continuous vision tick crashed')
    );
    this.loop = { task, intervalSeconds };
    this.lastTask = task;
    this.log.info(`Started continuous vision (interval: ${intervalSeconds}s)`);
  }

  stopContinuousVision(): void {
    if (!this.loop) {
      this.log.warn('Continuous vision not running');
      throw new NotRunningError();
    }
    this.loop.task.cancel();
    this.loop = null;
    this.log.info('Stopped continuous vision');
  }

  getStatus(): VisionStatus {
    return {
      loopState: this.loop ? 'running' : 'stopped',
      intervalSeconds: this.loop?.intervalSeconds ?? null,
      lastDescription: this.lastDescription,
      lastError: this.lastError,
      lastNotificationError: this.lastNotificationError,
      tickCount: this.tickCount,
      capturing: this.lock.locked
    };
  }

  getSettings(): VisionSettings {
    return { ...this.settings };
  }

  updateSettings(patch: Partial<VisionSettings>): VisionSettings {
    if (patch.intervalSeconds !== undefined && !isValidInterval(patch.intervalSeconds)) {
      throw new InvalidIntervalError(patch.intervalSeconds, MAX_INTERVAL_SECONDS);
    }
    this.settings = { ...this.settings, ...patch };
    this.log.info({ settings: this.settings }, 'Vision settings updated');
    return this.getSettings();
  }

  analyzerReady(): boolean {
    return this.analyzer.isReady();
  }

  /** Waits for speech deliveries that are still in flight. */
  async settled(): Promise<void> {
    await Promise.all(Array.from(this.deliveries));
  }

  async close(): Promise<void> {
    if (this.loop) {
      this.stopContinuousVision();
    }
    await this.lastTask?.idle();
    await this.settled();
    if (this.source.close) {
      await this.source.close();
    }
  }

  private async tick(signal: AbortSignal): Promise<void> {
    try {
      const description = await this.lock.runExclusive(async () => {
        // stop may have landed while this tick waited behind an on-demand capture
        if (signal.aborted) return null;
        this.tickCount += 1;
        return this.describeLocked('loop');
      });
      if (description) {
        this.publish(description, 'loop', true);
      } else {
        this.log.debug('Skipped tick queued before stop');
      }
    } catch (error) {
      this.log.warn({ err: error, tick: this.tickCount }, 'Continuous vision tick failed');
    }
  }

  private async describeLocked(source: DescribeSource): Promise<Description> {
    try {
      const image = await this.captureUnlocked();
      const result = await this.analyzeImage(image);
      this.lastDescription = result;
      this.lastError = null;
      return result;
    } catch (error) {
      const recorded = this.record(error);
      this.lastError = recorded;
      this.emit('vision_error', recorded, source);
      throw error;
    }
  }

  private publish(description: Description, source: DescribeSource, speak: boolean) {
    this.log.info({ source, provider: description.provider }, `Vision: ${description.text}`);
    this.emit('description', description, source);
    if (speak && this.settings.speechEnabled) {
      this.deliver(description.text);
    }
  }

  private async captureUnlocked(): Promise<CapturedImage> {
    let image: CapturedImage;
    try {
      image = await this.source.capture();
    } catch (error) {
      if (error instanceof CaptureError) throw error;
      throw new CaptureError('capture_failed', errorMessage(error), { cause: error });
    }
    if (image.data.length === 0) {
      throw new CaptureError('empty_frame', 'Camera returned an empty frame');
    }
    return image;
  }

  private deliver(text: string) {
    if (!this.speech) return;
    const delivery = this.speech.speak(text).then(
      () => {
        this.lastNotificationError = null;
      },
      (error: unknown) => {
        const wrapped =
          error instanceof NotificationError
            ? error
            : new NotificationError('speech_failed', errorMessage(error), { cause: error });
        const recorded = this.record(wrapped);
        this.lastNotificationError = recorded;
        this.log.warn({ err: wrapped }, 'Failed to speak description');
        this.emit('notification_error', recorded);
      }
    );
    this.deliveries.add(delivery);
    delivery.finally(() => this.deliveries.delete(delivery)).catch((error: unknown) => {
      this.log.error({ err: error }, 'Speech delivery bookkeeping failed');
    });
  }

  private record(error: unknown): RecordedError {
    if (error instanceof VisionError) {
      return { kind: error.kind, code: error.code, message: error.message, at: Date.now() };
    }
    return { kind: 'AnalysisError', code: 'unexpected', message: errorMessage(error), at: Date.now() };
  }
}
