import { describeError, toEpochSeconds, type ClockPort, type PurgeableStorePort } from '@sensorgrid/domain';
import { systemClock } from '@sensorgrid/adapters';

export function isPurgeable(store: object): store is PurgeableStorePort {
  return 'purgeExpired' in store && typeof store.purgeExpired === 'function';
}

/** Periodically deletes expired records from stores without native TTL. */
export class RetentionSweeper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<number> | null = null;

  constructor(
    private readonly store: PurgeableStorePort,
    private readonly intervalMs: number,
    private readonly clock: ClockPort = systemClock,
  ) {}

  start(): void {
    if (this.timer || this.intervalMs <= 0) return;
    this.timer = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        console.warn(`[retention] sweep failed: ${describeError(err)}`);
      });
    }, this.intervalMs);
    this.timer.unref();
    console.log(`[retention] sweeping every ${this.intervalMs}ms`);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  /** Runs one sweep; overlapping calls share the sweep in progress. */
  sweep(): Promise<number> {
    if (!this.running) {
      this.running = this.store
        .purgeExpired(toEpochSeconds(this.clock.now()))
        .then((purged) => {
          if (purged > 0) console.log(`[retention] purged ${purged} expired records`);
          return purged;
        })
        .finally(() => {
          this.running = null;
        });
    }
    return this.running;
  }
}
