import type { SensorType } from './device.js';

export const READING_SCHEMA_VERSION = 1;

export type ReadingValues = Readonly<Record<string, number>>;

export interface Reading {
  readonly deviceId: string;
  readonly sensorType: SensorType;
  /** ISO-8601, UTC, second precision (`2024-01-01T00:00:00Z`). */
  readonly timestamp: string;
  readonly values: ReadingValues;
  readonly schemaVersion: number;
}

/** Snake-case JSON shape carried on the transport. */
export interface WireReading {
  device_id: string;
  sensor_type: string;
  timestamp: string;
  values: Record<string, number>;
  schema_version: number;
}

export function formatIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function toWireReading(reading: Reading): WireReading {
  return {
    device_id: reading.deviceId,
    sensor_type: reading.sensorType,
    timestamp: reading.timestamp,
    values: { ...reading.values },
    schema_version: reading.schemaVersion,
  };
}
