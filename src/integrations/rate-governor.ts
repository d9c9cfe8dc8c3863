/**
 * Rate Governor
 *
 * Process-wide gate for outbound upstream requests. Admits at most
 * `maxRequests` requests inside any trailing window of `windowMs`.
 * Callers are admitted strictly in arrival order; a caller at the ceiling
 * waits until the oldest admission ages out of the window.
 */

import { logger } from "@/utils/logger";

/**
 * Time source used for admission decisions and waits
 */
export interface Clock {
  now(): number;
  /** Resolves after `ms`, or as soon as `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    }),
};

export interface RateGovernorOptions {
  maxRequests: number;
  windowMs: number;
  clock?: Clock;
}

export class RateGovernor {
  readonly maxRequests: number;
  readonly windowMs: number;
  private readonly clock: Clock;
  private readonly admitted: number[] = [];
  // Tail of the admission queue; each admit() chains onto it.
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateGovernorOptions) {
    if (!Number.isInteger(options.maxRequests) || options.maxRequests <= 0) {
      throw new RangeError(`maxRequests must be a positive integer, got ${options.maxRequests}`);
    }
    if (!(options.windowMs > 0)) {
      throw new RangeError(`windowMs must be positive, got ${options.windowMs}`);
    }
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Wait for a free slot in the window, then reserve it.
   *
   * Never rejects; it only delays.
   */
  admit(): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot());
    this.queue = turn.catch((error: unknown) => {
      logger.error("Rate governor clock failed while waiting for a slot", error);
    });
    return this.queue;
  }

  /**
   * Number of admissions currently inside the trailing window
   */
  inFlightWindow(): number {
    this.prune(this.clock.now());
    return this.admitted.length;
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      this.prune(now);

      if (this.admitted.length < this.maxRequests) {
        this.admitted.push(now);
        return;
      }

      const waitMs = this.admitted[0] + this.windowMs - now;
      logger.info(
        `Rate ceiling reached (${this.inFlightWindow()}/${this.maxRequests} in ${this.windowMs}ms): waiting ${waitMs}ms`
      );
      await this.clock.sleep(waitMs);
    }
  }

  private prune(now: number) {
    while (this.admitted.length > 0 && now - this.admitted[0] >= this.windowMs) {
      this.admitted.shift();
    }
  }
}
