// setTimeout clamps anything above this to 1 ms
export const MAX_DELAY_MS = 2 ** 31 - 1;

export type RepeatingTask = {
  readonly intervalMs: number;
  readonly cancelled: boolean;
  cancel(): void;
  /** Resolves when no tick is in flight. */
  idle(): Promise<void>;
};

export type TickFn = (signal: AbortSignal) => Promise<void>;

/**
 * Runs `fn` right away and then again `intervalMs` after each run finishes,
 * until cancelled. Once `cancel()` returns no new tick starts; a tick that is
 * already running sees its signal aborted and is left to finish.
 */
export function startRepeatingTask(
  fn: TickFn,
  intervalMs: number,
  onError: (error: unknown) => void
): RepeatingTask {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0 || intervalMs > MAX_DELAY_MS) {
    throw new RangeError(`intervalMs must be in (0, ${MAX_DELAY_MS}], got ${intervalMs}`);
  }
  const controller = new AbortController();
  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<void> | null = null;

  const schedule = (delayMs: number) => {
    if (controller.signal.aborted) return;
    timer = setTimeout(run, delayMs);
  };

  const run = () => {
    timer = null;
    if (controller.signal.aborted) return;
    inFlight = fn(controller.signal)
      .catch(onError)
      .finally(() => {
        inFlight = null;
        schedule(intervalMs);
      });
  };

  schedule(0);

  return {
    intervalMs,
    get cancelled() {
      return controller.signal.aborted;
    },
    cancel() {
      controller.abort();
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },
    idle() {
      return inFlight ?? Promise.resolve();
    }
  };
}
