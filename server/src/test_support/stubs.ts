import { setTimeout as sleep } from 'timers/promises';
import { pino, type Logger } from 'pino';
import type {
  CapturedImage,
  ImageSource,
  Inference,
  SpeechBridge,
  VisionAnalyzer,
  VisionSettings
} from '../vision/vision.types.js';

export const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46]);

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export const defaultSettings: VisionSettings = {
  intervalSeconds: 5,
  firstPerson: true,
  speechEnabled: true
};

export class StubImageSource implements ImageSource {
  calls = 0;
  active = 0;
  maxActive = 0;
  closed = false;
  delayMs = 0;
  failWith: Error | null = null;
  readonly windows: Array<{ start: number; end: number }> = [];

  async capture(): Promise<CapturedImage> {
    this.calls += 1;
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    const start = performance.now();
    try {
      if (this.delayMs > 0) {
        await sleep(this.delayMs);
      }
      if (this.failWith) {
        throw this.failWith;
      }
      return { data: JPEG_BYTES, mime: 'image/jpeg', capturedAt: 1_700_000_000_000 };
    } finally {
      this.windows.push({ start, end: performance.now() });
      this.active -= 1;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class StubAnalyzer implements VisionAnalyzer {
  calls = 0;
  ready = true;
  failWith: Error | null = null;
  readonly prompts: string[] = [];
  private readonly reply: (call: number) => string;

  constructor(reply: string | ((call: number) => string) = 'a red ball') {
    this.reply = typeof reply === 'string' ? () => reply : reply;
  }

  isReady(): boolean {
    return this.ready;
  }

  async infer(_image: CapturedImage, prompt: string): Promise<Inference> {
    this.calls += 1;
    this.prompts.push(prompt);
    if (this.failWith) {
      throw this.failWith;
    }
    return { text: this.reply(this.calls), provider: 'stub' };
  }
}

export class StubSpeech implements SpeechBridge {
  readonly spoken: string[] = [];
  failWith: Error | null = null;

  async speak(text: string): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.spoken.push(text);
  }
}
