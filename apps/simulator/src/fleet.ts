import { ExponentialBackoff, SeededRng, type BackoffOptions } from '@sensorgrid/adapters';
import type {
  ClockPort,
  CredentialProviderPort,
  Device,
  MessageTransportPort,
  RandomSourcePort,
} from '@sensorgrid/domain';
import { ReadingGenerator } from './generator/reading-generator.js';
import { DEFAULT_INTERVAL_MS, SENSOR_PROFILES } from './generator/sensor-profiles.js';
import {
  PublisherSession,
  type SessionObserver,
  type SessionStats,
} from './session/publisher-session.js';

export interface SimulatorFleetOptions {
  devices: readonly Device[];
  transport: MessageTransportPort;
  credentials?: CredentialProviderPort;
  clock: ClockPort;
  seed: number;
  backoff: Omit<BackoffOptions, 'rng'>;
  /** Overrides every device's cadence. */
  publishIntervalMs?: number;
  topicPrefix?: string;
  observerFor?: (device: Device) => SessionObserver | undefined;
  signal?: AbortSignal;
}

export interface Cadence {
  minMs: number;
  maxMs: number;
}

/** Cadence precedence: global override, device entry, sensor profile. */
export function cadenceFor(device: Device, override?: number): Cadence {
  if (override !== undefined) return { minMs: override, maxMs: override };
  if (device.intervalMs !== undefined) {
    return { minMs: device.intervalMs, maxMs: Math.max(device.intervalMs, device.maxIntervalMs ?? 0) };
  }
  const profile = SENSOR_PROFILES[device.sensorType];
  if (!profile) return { minMs: DEFAULT_INTERVAL_MS, maxMs: DEFAULT_INTERVAL_MS };
  return { minMs: profile.intervalMs, maxMs: Math.max(profile.intervalMs, profile.maxIntervalMs ?? 0) };
}

/** Whole-millisecond delays drawn uniformly from the cadence's range. */
export function cadenceSchedule({ minMs, maxMs }: Cadence, rng: RandomSourcePort): () => number {
  if (maxMs <= minMs) return () => minMs;
  const span = maxMs - minMs + 1;
  return () => minMs + Math.min(span - 1, Math.floor(rng.next() * span));
}

/**
 * One publisher session per device. Each session has its own generator,
 * backoff and random streams seeded from the fleet seed and the device id;
 * only the credential resolver is shared.
 */
export class SimulatorFleet {
  readonly sessions: readonly PublisherSession[];

  constructor(options: SimulatorFleetOptions) {
    this.sessions = options.devices.map(
      (device) =>
        new PublisherSession({
          device,
          generator: new ReadingGenerator({
            rng: SeededRng.forKey(options.seed, device.deviceId),
            clock: options.clock,
          }),
          transport: options.transport,
          credentials: options.credentials,
          backoff: new ExponentialBackoff({
            ...options.backoff,
            rng: SeededRng.forKey(options.seed, `${device.deviceId}:backoff`),
          }),
          nextIntervalMs: cadenceSchedule(
            cadenceFor(device, options.publishIntervalMs),
            SeededRng.forKey(options.seed, `${device.deviceId}:cadence`),
          ),
          topicPrefix: options.topicPrefix,
          observer: options.observerFor?.(device),
          signal: options.signal,
        }),
    );
  }

  start(): void {
    for (const session of this.sessions) session.start();
    console.log(`[fleet] started ${this.sessions.length} publisher sessions`);
  }

  async shutdown(): Promise<void> {
    await Promise.all(this.sessions.map((session) => session.shutdown()));
  }

  stats(): Record<string, SessionStats> {
    const out: Record<string, SessionStats> = {};
    for (const session of this.sessions) out[session.deviceId] = session.stats();
    return out;
  }
}
