/**
 * Minimum spacing between calls to an external API
 */

export interface RateLimiterOptions {
  /** Injected for tests */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class RateLimiter {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  /** Time the most recently granted call may start */
  private nextSlot = Number.NEGATIVE_INFINITY;

  constructor(callsPerSecond: number, options: RateLimiterOptions = {}) {
    if (!(callsPerSecond > 0)) {
      throw new Error(`callsPerSecond must be positive, got ${callsPerSecond}`);
    }
    this.intervalMs = 1000 / callsPerSecond;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Resolve once the caller may make its call. Concurrent callers are
   * given consecutive slots.
   */
  async wait(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;
    const delay = slot - now;
    if (delay > 0) {
      await this.sleep(delay);
    }
  }
}
