export interface BackoffOptions {
  /** Delay before the first retry. */
  minDelayMs: number;
  /** Upper bound for any single delay. */
  maxDelayMs: number;
  /** Growth per consecutive failure. */
  factor: number;
  /** Highest attempt number tracked; further failures stay at this step. */
  maxAttempt: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  minDelayMs: 1000,
  maxDelayMs: 30_000,
  factor: 2,
  maxAttempt: 16,
};

/**
 * Capped exponential delay sequence for one sink.
 *
 * `attempt` is 0 while healthy. Each failure advances it by one (up to
 * `maxAttempt`); a successful connect or send resets it.
 *
 *   delay(n) = min(maxDelayMs, minDelayMs * factor^(n - 1))
 */
export class BackoffSchedule {
  private readonly options: BackoffOptions;
  private current = 0;

  constructor(options: Partial<BackoffOptions> = {}) {
    const merged = { ...DEFAULT_BACKOFF, ...options };
    if (merged.minDelayMs <= 0 || merged.maxDelayMs < merged.minDelayMs) {
      throw new RangeError('Backoff requires 0 < minDelayMs <= maxDelayMs');
    }
    if (merged.factor < 1 || merged.maxAttempt < 1) {
      throw new RangeError('Backoff requires factor >= 1 and maxAttempt >= 1');
    }
    this.options = merged;
  }

  get attempt(): number {
    return this.current;
  }

  /** Delay for a given attempt number; 0 for attempt 0. */
  delayFor(attempt: number): number {
    if (attempt <= 0) return 0;
    const { minDelayMs, maxDelayMs, factor, maxAttempt } = this.options;
    const step = Math.min(attempt, maxAttempt);
    return Math.min(maxDelayMs, Math.round(minDelayMs * factor ** (step - 1)));
  }

  /** Records a failure; returns the new attempt number and its delay. */
  advance(): { attempt: number; delayMs: number } {
    this.current = Math.min(this.current + 1, this.options.maxAttempt);
    return { attempt: this.current, delayMs: this.delayFor(this.current) };
  }

  reset(): void {
    this.current = 0;
  }
}
