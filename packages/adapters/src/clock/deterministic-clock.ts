import type { ClockPort, RandomSourcePort } from '@sensorgrid/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Drives the reading random walk and backoff jitter so runs can be replayed.
 */
export class SeededRng implements RandomSourcePort {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /** Independent stream for `key` under a shared base seed. */
  static forKey(baseSeed: number, key: string): SeededRng {
    return new SeededRng(deriveSeed(baseSeed, key));
  }
}

/** Derives a stable per-key seed (FNV-1a) so each device walks independently. */
export function deriveSeed(baseSeed: number, key: string): number {
  let hash = (0x811c9dc5 ^ baseSeed) >>> 0;
  for (let i = 0; i < key.length; i += 1) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Deterministic clock for tests and replays.
 * Advances by `tickMs` each call to `now()` starting from `epochMs`.
 */
export class DeterministicClock implements ClockPort {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 1_000,
  ) {
    this.currentMs = epochMs;
  }

  now(): Date {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  }

  peek(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}

/** Wall-clock implementation for live mode. */
export const systemClock: ClockPort = {
  now: () => new Date(),
};
