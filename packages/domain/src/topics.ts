import { ERROR_PARTITION } from './entities/storage-record.js';

/** Topic segment grammar shared by sensor types and device ids. */
const SEGMENT = /^[A-Za-z0-9_-]+$/;

export interface TelemetryTopic {
  sensorType: string;
  deviceId: string;
}

function normalizePrefix(prefix: string | undefined): string[] {
  if (!prefix) return [];
  return prefix.split('/').filter((part) => part.length > 0);
}

/** `[<prefix>/]<sensorType>/<deviceId>` */
export function buildTelemetryTopic(sensorType: string, deviceId: string, prefix?: string): string {
  return [...normalizePrefix(prefix), sensorType, deviceId].join('/');
}

/** Subscription filter matching every topic `buildTelemetryTopic` can produce. */
export function telemetryTopicFilter(prefix?: string): string {
  return [...normalizePrefix(prefix), '+', '+'].join('/');
}

/**
 * Extracts sensor type and device id from a telemetry topic.
 * Returns null for topics outside the prefix, with the wrong depth, with
 * characters outside the segment grammar, or naming the error partition.
 */
export function parseTelemetryTopic(topic: string, prefix?: string): TelemetryTopic | null {
  const expected = normalizePrefix(prefix);
  const parts = topic.split('/');
  if (parts.length !== expected.length + 2) return null;
  for (let i = 0; i < expected.length; i += 1) {
    if (parts[i] !== expected[i]) return null;
  }
  const sensorType = parts[expected.length];
  const deviceId = parts[expected.length + 1];
  if (sensorType === undefined || deviceId === undefined) return null;
  if (!SEGMENT.test(sensorType) || !SEGMENT.test(deviceId)) return null;
  if (sensorType === ERROR_PARTITION) return null;
  return { sensorType, deviceId };
}
