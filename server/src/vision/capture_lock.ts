/**
 * FIFO async lock guarding the camera. Callers queue in arrival order and
 * each one runs only after the previous holder has released.
 */
export class CaptureLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get locked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => gate);
    this.pending += 1;

    await previous;
    try {
      return await fn();
    } finally {
      this.pending -= 1;
      release();
    }
  }
}
