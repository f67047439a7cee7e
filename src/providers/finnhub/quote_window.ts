/**
 * Sliding one-minute window for Finnhub quote calls (free tier: 60 per
 * minute). Quote lookups run one at a time, so `acquire` only has to wait
 * for the oldest call in the window to age out.
 */

import { createChildLogger } from '@/utils/logger';
import { systemClock, type Clock } from '@/utils/throttler';

const logger = createChildLogger('finnhub_window');

const WINDOW_MS = 60_000;

export class QuoteWindow {
  private readonly callTimes: number[] = [];

  constructor(
    private readonly maxPerMinute: number = 60,
    private readonly clock: Clock = systemClock
  ) {}

  private prune(now: number): void {
    while (this.callTimes.length > 0 && this.callTimes[0] <= now - WINDOW_MS) {
      this.callTimes.shift();
    }
  }

  async acquire(): Promise<void> {
    this.prune(this.clock.now());

    if (this.callTimes.length >= this.maxPerMinute) {
      const waitMs = this.callTimes[0] + WINDOW_MS - this.clock.now();
      logger.debug({ waitMs }, 'Finnhub window full, waiting');
      await this.clock.sleep(waitMs);
      this.prune(this.clock.now());
    }

    this.callTimes.push(this.clock.now());
  }

  callsInWindow(): number {
    this.prune(this.clock.now());
    return this.callTimes.length;
  }
}
