import {
  READING_SCHEMA_VERSION,
  formatIsoSeconds,
  type ClockPort,
  type Device,
  type RandomSourcePort,
  type Reading,
} from '@sensorgrid/domain';
import {
  SENSOR_PROFILES,
  type FieldProfile,
  type SensorProfile,
  type StatusProfile,
} from './sensor-profiles.js';

export interface ReadingGeneratorOptions {
  rng: RandomSourcePort;
  clock: ClockPort;
  profiles?: Readonly<Record<string, SensorProfile>>;
}

function roundTo(value: number, decimals: number): number {
  const scale = 10 ** decimals;
  return Math.round(value * scale) / scale;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Bounded random walk per device and field: each value moves from the
 * previous one by at most the field's `maxStep` and stays inside its range.
 * Status codes are drawn afresh on every reading.
 * Deterministic for a given random source and clock.
 */
export class ReadingGenerator {
  private readonly previous = new Map<string, Record<string, number>>();
  private readonly profiles: Readonly<Record<string, SensorProfile>>;

  constructor(private readonly options: ReadingGeneratorOptions) {
    this.profiles = options.profiles ?? SENSOR_PROFILES;
  }

  next(device: Device): Reading {
    const profile = this.profiles[device.sensorType];
    const last = this.previous.get(device.deviceId);
    const values: Record<string, number> = {};
    for (const field of profile?.fields ?? []) {
      const prev = last?.[field.name];
      values[field.name] = prev === undefined ? this.initial(field) : this.step(field, prev);
    }
    this.previous.set(device.deviceId, { ...values });
    for (const status of profile?.statuses ?? []) {
      values[status.name] = this.pick(status);
    }

    return {
      deviceId: device.deviceId,
      sensorType: device.sensorType,
      timestamp: formatIsoSeconds(this.options.clock.now()),
      values,
      schemaVersion: READING_SCHEMA_VERSION,
    };
  }

  private initial(field: FieldProfile): number {
    const raw = field.min + this.options.rng.next() * (field.max - field.min);
    return clamp(roundTo(raw, field.decimals), field.min, field.max);
  }

  private pick(status: StatusProfile): number {
    const index = Math.min(status.codes.length - 1, Math.floor(this.options.rng.next() * status.codes.length));
    return status.codes[index] ?? 0;
  }

  private step(field: FieldProfile, prev: number): number {
    const scale = 10 ** field.decimals;
    // Truncate the delta to the field's precision so rounding never widens it.
    const delta = Math.trunc((this.options.rng.next() * 2 - 1) * field.maxStep * scale) / scale;
    return clamp(roundTo(prev + delta, field.decimals), field.min, field.max);
  }
}
