import type { SensorType } from '@sensorgrid/domain';

export interface FieldProfile {
  readonly name: string;
  readonly min: number;
  readonly max: number;
  /** Largest change allowed between two consecutive readings. */
  readonly maxStep: number;
  readonly decimals: number;
}

/** Health or event code drawn uniformly on every reading. */
export interface StatusProfile {
  readonly name: string;
  readonly codes: readonly number[];
}

export interface SensorProfile {
  readonly sensorType: SensorType;
  readonly intervalMs: number;
  /** Jittered cadence: each delay is drawn from `[intervalMs, maxIntervalMs]`. */
  readonly maxIntervalMs?: number;
  readonly fields: readonly FieldProfile[];
  readonly statuses?: readonly StatusProfile[];
}

const SECOND = 1_000;

const MINUTE = 60_000;

/** Plausible ranges and cadences for the building energy-monitoring points. */
export const SENSOR_PROFILES: Readonly<Record<string, SensorProfile>> = {
  building: {
    sensorType: 'building',
    intervalMs: MINUTE,
    fields: [
      { name: 'building_total_energy_kwh', min: 1000, max: 2000, maxStep: 25, decimals: 2 },
      { name: 'building_demand_kw', min: 50, max: 150, maxStep: 5, decimals: 2 },
    ],
  },
  network: {
    sensorType: 'network',
    intervalMs: MINUTE,
    fields: [
      { name: 'latency_ms', min: 10, max: 100, maxStep: 10, decimals: 0 },
      { name: 'packet_loss_percent', min: 0, max: 5, maxStep: 0.5, decimals: 2 },
    ],
  },
  panel: {
    sensorType: 'panel',
    intervalMs: MINUTE,
    fields: [
      { name: 'sub_meter_energy_kwh', min: 100, max: 200, maxStep: 5, decimals: 2 },
      { name: 'demand_kw', min: 10, max: 50, maxStep: 3, decimals: 2 },
    ],
  },
  hvac: {
    sensorType: 'hvac',
    intervalMs: MINUTE,
    fields: [
      { name: 'hvac_runtime_minutes', min: 0, max: 60, maxStep: 10, decimals: 0 },
      { name: 'hvac_power_kw', min: 0.5, max: 3, maxStep: 0.25, decimals: 2 },
    ],
  },
  dhw: {
    sensorType: 'dhw',
    intervalMs: 5 * MINUTE,
    fields: [
      { name: 'energy_consumption_kwh', min: 10, max: 50, maxStep: 4, decimals: 2 },
      { name: 'cycle_duration_minutes', min: 5, max: 30, maxStep: 5, decimals: 0 },
    ],
  },
  appliance: {
    sensorType: 'appliance',
    intervalMs: MINUTE,
    fields: [{ name: 'appliance_energy_kwh', min: 1, max: 5, maxStep: 0.4, decimals: 2 }],
  },
  space_temperature: {
    sensorType: 'space_temperature',
    intervalMs: 5 * MINUTE,
    fields: [{ name: 'temperature_f', min: 65, max: 75, maxStep: 0.5, decimals: 2 }],
  },
  lighting: {
    sensorType: 'lighting',
    intervalMs: MINUTE,
    fields: [{ name: 'lighting_energy_kwh', min: 1, max: 5, maxStep: 0.4, decimals: 2 }],
  },
  occupancy: {
    sensorType: 'occupancy',
    intervalMs: MINUTE,
    fields: [{ name: 'battery_level', min: 20, max: 100, maxStep: 1, decimals: 0 }],
    // 0 OK, 1 LOW_BATTERY
    statuses: [{ name: 'status_code', codes: [0, 1] }],
  },
  occupancy_event: {
    sensorType: 'occupancy_event',
    intervalMs: 10 * SECOND,
    maxIntervalMs: 30 * SECOND,
    fields: [],
    statuses: [{ name: 'motion_detected', codes: [1] }],
  },
  environment: {
    sensorType: 'environment',
    intervalMs: 5 * MINUTE,
    fields: [
      { name: 'ambient_temp', min: 65, max: 80, maxStep: 0.5, decimals: 1 },
      { name: 'humidity', min: 30, max: 60, maxStep: 2, decimals: 1 },
    ],
  },
  gateway: {
    sensorType: 'gateway',
    intervalMs: 30 * SECOND,
    fields: [],
    // 0 OK, 1 WARN, 2 ERROR
    statuses: [{ name: 'status_code', codes: [0, 1, 2] }],
  },
};

export const DEFAULT_INTERVAL_MS = MINUTE;
