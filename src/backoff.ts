/**
 * Exponential reconnect delay with an explicit `currentDelayMs`.
 *
 * `next()` hands out the delay to sleep for and then doubles it (up to the cap),
 * so after N consecutive failures the N-th sleep is `min(max, base * 2^(N-1))`.
 * `reset()` returns to the floor; the supervisor calls it on the first frame of
 * a connection.
 */
export class ReconnectBackoff {
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private currentDelayMs: number;
  private failures = 0;

  constructor(baseDelayMs = 1_000, maxDelayMs = 60_000) {
    if (!Number.isFinite(baseDelayMs) || baseDelayMs <= 0) {
      throw new Error(`Invalid baseDelayMs: ${baseDelayMs}`);
    }
    if (!Number.isFinite(maxDelayMs) || maxDelayMs < baseDelayMs) {
      throw new Error(`Invalid maxDelayMs: ${maxDelayMs}`);
    }
    this.baseDelayMs = baseDelayMs;
    this.maxDelayMs = maxDelayMs;
    this.currentDelayMs = baseDelayMs;
  }

  get delayMs(): number {
    return this.currentDelayMs;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  next(): number {
    const delay = this.currentDelayMs;
    this.failures += 1;
    this.currentDelayMs = Math.min(this.currentDelayMs * 2, this.maxDelayMs);
    return delay;
  }

  reset(): void {
    this.failures = 0;
    this.currentDelayMs = this.baseDelayMs;
  }
}
