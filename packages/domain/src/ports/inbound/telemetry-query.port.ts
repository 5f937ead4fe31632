import type { Reading } from '../../entities/reading.js';

export type SeriesSelector = { sensorType: string } | { deviceId: string };

/** Inclusive window, ISO-8601 timestamps. */
export interface TimeWindow {
  from: string;
  to: string;
}

export interface SeriesOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface SeriesResult {
  readings: Reading[];
  /** Records inside the window that were skipped because their TTL had passed. */
  expired: number;
}

export interface SeriesPage {
  readings: Reading[];
  expired: number;
}

export interface TelemetryQueryPort {
  series(selector: SeriesSelector, window: TimeWindow, options?: SeriesOptions): Promise<SeriesResult>;
  pages(selector: SeriesSelector, window: TimeWindow, options?: SeriesOptions): AsyncGenerator<SeriesPage>;
}
