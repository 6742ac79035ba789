import type { VisionErrorKind } from './errors.js';

export type ImageMime = 'image/jpeg' | 'image/png';

export type CapturedImage = {
  data: Buffer;
  mime: ImageMime;
  capturedAt: number; // ms since epoch
};

export type Description = {
  text: string;
  capturedAt: number;
  describedAt: number;
  provider?: string;
};

export type LoopState = 'stopped' | 'running';

export type DescribeSource = 'loop' | 'on_demand';

export type RecordedError = {
  kind: VisionErrorKind;
  code: string;
  message: string;
  at: number;
};

export type VisionStatus = {
  loopState: LoopState;
  // interval of the active loop, null while stopped
  intervalSeconds: number | null;
  lastDescription: Description | null;
  lastError: RecordedError | null;
  lastNotificationError: RecordedError | null;
  tickCount: number;
  capturing: boolean;
};

export type VisionSettings = {
  intervalSeconds: number;
  firstPerson: boolean;
  speechEnabled: boolean;
};

export interface ImageSource {
  capture(): Promise<CapturedImage>;
  close?(): Promise<void>;
}

export type Inference = {
  text: string;
  provider: string;
};

export interface VisionAnalyzer {
  isReady(): boolean;
  infer(image: CapturedImage, prompt: string): Promise<Inference>;
}

export interface SpeechBridge {
  speak(text: string): Promise<void>;
}
