import { MAX_TIMER_DELAY_MS } from "./config.ts";

/**
 * Exponential backoff between reconnection attempts.
 *
 * Holds the per-run attempt state: how many reconnections have been tried
 * and how long to wait before the next one. The delay doubles after every
 * attempt and saturates at the maximum.
 */
export class Backoff {
  private attempt = 0;
  private delay: number;
  private readonly initialMs: number;

  private readonly maxMs: number;

  constructor(initialMs: number, maxMs: number) {
    // Delays are waited on with timers, which cannot go past MAX_TIMER_DELAY_MS.
    this.maxMs = Math.min(maxMs, MAX_TIMER_DELAY_MS);
    // An initial delay above the cap just saturates.
    this.initialMs = Math.min(initialMs, this.maxMs);
    this.delay = this.initialMs;
  }

  /** Reconnection attempts made since the last reset. */
  get attempts(): number {
    return this.attempt;
  }

  /** Delay the next attempt will wait, in milliseconds. */
  get currentDelay(): number {
    return this.delay;
  }

  /** True when a nonzero budget has been used up. */
  exhausted(maxAttempts: number): boolean {
    return maxAttempts > 0 && this.attempt >= maxAttempts;
  }

  /** Count an attempt and return how long to wait before it. */
  next(): number {
    this.attempt++;
    const delay = this.delay;
    this.delay = Math.min(this.delay * 2, this.maxMs);
    return delay;
  }

  /** Back to zero attempts and the initial delay. */
  reset(): void {
    this.attempt = 0;
    this.delay = this.initialMs;
  }
}
