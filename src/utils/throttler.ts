/**
 * FIFO throttler that spaces provider calls on one shared clock.
 * The interval is measured from the last completed call, so a slow response
 * does not eat into the pause before the next request.
 */

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export class RequestThrottler {
  private lastCompleted: number | null = null;
  private chain: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number = 0,
    private readonly clock: Clock = systemClock
  ) {}

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.chain.then(async () => {
      const waitMs = this.getWaitMs();
      if (waitMs > 0) {
        await this.clock.sleep(waitMs);
      }
      return fn();
    });
    // Keep chain alive but swallow errors so subsequent tasks still run
    this.chain = run.catch(() => undefined);
    return run;
  }

  /** Records that a call got a response; starts the next interval. */
  markCompleted(): void {
    this.lastCompleted = this.clock.now();
  }

  getWaitMs(): number {
    if (this.lastCompleted === null) return 0;
    const elapsed = this.clock.now() - this.lastCompleted;
    return Math.max(0, this.minIntervalMs - elapsed);
  }
}
