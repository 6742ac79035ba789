import type { Description, RecordedError, VisionSettings, VisionStatus } from './vision/vision.types.js';

export type ErrorBody = {
  kind: string;
  code: string;
  message: string;
  at: number;
};

export function toErrorBody(error: RecordedError | null): ErrorBody | null {
  if (!error) return null;
  return { kind: error.kind, code: error.code, message: error.message, at: error.at };
}

export function toStatusBody(status: VisionStatus) {
  return {
    loop_state: status.loopState,
    last_description: status.lastDescription?.text ?? null,
    last_error: toErrorBody(status.lastError)
  };
}

export function toDescriptionBody(description: Description) {
  return {
    description: description.text,
    provider: description.provider ?? null,
    captured_at: description.capturedAt,
    described_at: description.describedAt
  };
}

export function toSettingsBody(settings: VisionSettings) {
  return {
    interval: settings.intervalSeconds,
    first_person: settings.firstPerson,
    speech_enabled: settings.speechEnabled
  };
}
