import { NotificationError } from '../vision/errors.js';
import type { SpeechBridge } from '../vision/vision.types.js';

export type SpeechConfig = {
  url: string;
  timeoutMs: number;
};

/** Forwards descriptions to the speech service's `POST /speak` endpoint. */
export class HttpSpeechBridge implements SpeechBridge {
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(config: SpeechConfig) {
    this.endpoint = `${config.url.replace(/\/+$/, '')}/speak`;
    this.timeoutMs = config.timeoutMs;
  }

  async speak(text: string): Promise<void> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'unknown_error';
      throw new NotificationError('speech_unreachable', `Speech service unreachable: ${reason}`, { cause: error });
    }
    // release the connection; the reply carries nothing we use
    await response.body?.cancel();
    if (!response.ok) {
      throw new NotificationError('speech_rejected', `Speech service replied status_${response.status}`);
    }
  }
}
