export type SensorType =
  | 'building'
  | 'network'
  | 'panel'
  | 'hvac'
  | 'dhw'
  | 'appliance'
  | 'space_temperature'
  | 'lighting'
  | 'occupancy'
  | 'occupancy_event'
  | 'environment'
  | 'gateway'
  // Catalogues may name types this build has no profile for.
  | (string & {});

export interface Device {
  readonly deviceId: string;
  readonly sensorType: SensorType;
  /** Per-device cadence override; defaults to the sensor profile's interval. */
  readonly intervalMs?: number;
  /** With `intervalMs`, each delay is drawn from `[intervalMs, maxIntervalMs]`. */
  readonly maxIntervalMs?: number;
  readonly labels?: Readonly<Record<string, string>>;
}
