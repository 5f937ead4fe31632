import { describe, it, expect } from '@jest/globals';
import { DeterministicClock, SeededRng } from '@sensorgrid/adapters';
import type { Device, RandomSourcePort } from '@sensorgrid/domain';
import { ReadingGenerator } from '../generator/reading-generator.js';
import { SENSOR_PROFILES } from '../generator/sensor-profiles.js';

class SequenceRng implements RandomSourcePort {
  private index = 0;
  constructor(private readonly values: number[]) {}
  next(): number {
    const value = this.values[this.index % this.values.length] ?? 0;
    this.index += 1;
    return value;
  }
}

const START = Date.UTC(2024, 0, 1);
const roomSensor: Device = { deviceId: 'unit_1_space_temp_kitchen', sensorType: 'space_temperature' };

describe('ReadingGenerator', () => {
  it('should start inside the range and walk by truncated steps', () => {
    const generator = new ReadingGenerator({
      rng: new SequenceRng([0.5, 0.75, 0]),
      clock: new DeterministicClock(START, 60_000),
    });

    const first = generator.next(roomSensor);
    const second = generator.next(roomSensor);
    const third = generator.next(roomSensor);

    expect(first).toEqual({
      deviceId: 'unit_1_space_temp_kitchen',
      sensorType: 'space_temperature',
      timestamp: '2024-01-01T00:00:00Z',
      values: { temperature_f: 70 },
      schemaVersion: 1,
    });
    expect(second.values).toEqual({ temperature_f: 70.25 });
    expect(second.timestamp).toBe('2024-01-01T00:01:00Z');
    expect(third.values).toEqual({ temperature_f: 69.75 });
  });

  it('should clamp at the range limits', () => {
    const generator = new ReadingGenerator({
      rng: new SequenceRng([0.99999, 0.9999]),
      clock: new DeterministicClock(START),
    });
    expect(generator.next(roomSensor).values).toEqual({ temperature_f: 75 });
    expect(generator.next(roomSensor).values).toEqual({ temperature_f: 75 });
  });

  it('should never move a field by more than its step bound', () => {
    const generator = new ReadingGenerator({ rng: new SeededRng(42), clock: new DeterministicClock(START) });
    for (const sensorType of Object.keys(SENSOR_PROFILES)) {
      const device: Device = { deviceId: `walk_${sensorType}`, sensorType };
      const fields = SENSOR_PROFILES[sensorType]?.fields ?? [];
      let previous = generator.next(device).values;
      for (let i = 0; i < 200; i += 1) {
        const current = generator.next(device).values;
        for (const field of fields) {
          const before = previous[field.name] ?? Number.NaN;
          const after = current[field.name] ?? Number.NaN;
          expect(Math.abs(after - before)).toBeLessThanOrEqual(field.maxStep + 1e-9);
          expect(after).toBeGreaterThanOrEqual(field.min);
          expect(after).toBeLessThanOrEqual(field.max);
        }
        previous = current;
      }
    }
  });

  it('should keep independent walks per device', () => {
    const generator = new ReadingGenerator({
      rng: new SequenceRng([0.5, 0, 0.5]),
      clock: new DeterministicClock(START),
    });
    const other: Device = { deviceId: 'unit_2_space_temp_kitchen', sensorType: 'space_temperature' };
    generator.next(roomSensor); // 70
    generator.next(other); // 65
    expect(generator.next(roomSensor).values).toEqual({ temperature_f: 70 });
  });

  it('should be reproducible for the same seed', () => {
    const run = () => {
      const generator = new ReadingGenerator({ rng: new SeededRng(7), clock: new DeterministicClock(START) });
      const hvac: Device = { deviceId: 'unit_1_hvac', sensorType: 'hvac' };
      return Array.from({ length: 10 }, () => generator.next(hvac));
    };
    expect(run()).toEqual(run());
  });

  it('should draw status codes afresh beside the walked fields', () => {
    const generator = new ReadingGenerator({
      rng: new SequenceRng([0.5, 0.25, 0.5, 0.75]),
      clock: new DeterministicClock(START),
    });
    const occupancy: Device = { deviceId: 'occupancy_sensor', sensorType: 'occupancy' };
    expect(generator.next(occupancy).values).toEqual({ battery_level: 60, status_code: 0 });
    expect(generator.next(occupancy).values).toEqual({ battery_level: 60, status_code: 1 });
  });

  it('should report gateway health and motion events as codes', () => {
    const generator = new ReadingGenerator({
      rng: new SequenceRng([0, 0.5, 0.99]),
      clock: new DeterministicClock(START),
    });
    const gateway: Device = { deviceId: 'local_gateway', sensorType: 'gateway' };
    const codes = [1, 2, 3].map(() => generator.next(gateway).values);
    expect(codes).toEqual([{ status_code: 0 }, { status_code: 1 }, { status_code: 2 }]);

    const motion: Device = { deviceId: 'occupancy_sensor_motion', sensorType: 'occupancy_event' };
    expect(generator.next(motion).values).toEqual({ motion_detected: 1 });
  });

  it('should produce empty values for an unknown sensor type', () => {
    const generator = new ReadingGenerator({ rng: new SeededRng(1), clock: new DeterministicClock(START) });
    expect(generator.next({ deviceId: 'mystery', sensorType: 'mystery' }).values).toEqual({});
  });
});
