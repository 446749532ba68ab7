/**
 * Rate Gate
 * Minimum-interval gate shared by every request a fetcher makes
 */

import type { Clock } from './fetcher.types';

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export class RateGate {
  private lastCallTime: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly delayMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Resolve once `lastCallTime + delayMs` has passed, then record the new call time.
   * Callers are chained so the check and the update never interleave.
   */
  wait(): Promise<void> {
    const turn = this.queue.then(() => this.pass());
    this.queue = turn;
    return turn;
  }

  getLastCallTime(): number | null {
    return this.lastCallTime;
  }

  getDelayMs(): number {
    return this.delayMs;
  }

  private async pass(): Promise<void> {
    if (this.lastCallTime !== null) {
      const elapsed = this.clock.now() - this.lastCallTime;
      if (elapsed < this.delayMs) {
        await this.clock.sleep(this.delayMs - elapsed);
      }
    }
    this.lastCallTime = this.clock.now();
  }
}
