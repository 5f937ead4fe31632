import type { RandomSourcePort } from '@sensorgrid/domain';

export interface BackoffOptions {
  minMs: number;
  maxMs: number;
  factor?: number;
  /** Extra random delay, as a fraction of the base delay. */
  jitterRatio?: number;
  rng?: RandomSourcePort;
}

/**
 * Exponential backoff with bounded jitter. Delays never decrease between
 * resets: jitter is applied on top of the base and then held at or above the
 * previous delay, capped at `maxMs`.
 */
export class ExponentialBackoff {
  private attempt = 0;
  private lastDelayMs = 0;
  private readonly factor: number;
  private readonly jitterRatio: number;
  private readonly rng: RandomSourcePort;

  constructor(private readonly options: BackoffOptions) {
    this.factor = options.factor ?? 2;
    this.jitterRatio = options.jitterRatio ?? 0;
    this.rng = options.rng ?? { next: Math.random };
  }

  /** Base delay the next failure starts from (no jitter). */
  get currentDelayMs(): number {
    return Math.min(this.options.maxMs, this.options.minMs * this.factor ** this.attempt);
  }

  get attempts(): number {
    return this.attempt;
  }

  next(): number {
    const base = this.currentDelayMs;
    const jittered = Math.min(this.options.maxMs, base + base * this.jitterRatio * this.rng.next());
    const delay = Math.max(this.lastDelayMs, Math.round(jittered));
    this.attempt += 1;
    this.lastDelayMs = delay;
    return delay;
  }

  reset(): void {
    this.attempt = 0;
    this.lastDelayMs = 0;
  }
}
