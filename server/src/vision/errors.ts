export type VisionErrorKind =
  | 'CaptureError'
  | 'AnalysisError'
  | 'AlreadyRunningError'
  | 'NotRunningError'
  | 'NotificationError'
  | 'InvalidIntervalError';

export abstract class VisionError extends Error {
  abstract readonly kind: VisionErrorKind;
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

/** Device missing or busy, or the capture produced no usable frame. */
export class CaptureError extends VisionError {
  readonly kind = 'CaptureError';
}

/** Network, auth or malformed-response failure from the inference providers. */
export class AnalysisError extends VisionError {
  readonly kind = 'AnalysisError';
}

export class AlreadyRunningError extends VisionError {
  readonly kind = 'AlreadyRunningError';

  constructor(intervalSeconds: number) {
    super('already_running', `Continuous vision already running (interval: ${intervalSeconds}s)`);
  }
}

export class NotRunningError extends VisionError {
  readonly kind = 'NotRunningError';

  constructor() {
    super('not_running', 'Continuous vision is not running');
  }
}

/** Speech delivery failed. Never fatal to the loop. */
export class NotificationError extends VisionError {
  readonly kind = 'NotificationError';
}

export class InvalidIntervalError extends VisionError {
  readonly kind = 'InvalidIntervalError';

  constructor(interval: unknown, maxSeconds: number) {
    super(
      'invalid_interval',
      `Interval must be a number of seconds greater than 0 and at most ${maxSeconds}, got ${String(interval)}`
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
