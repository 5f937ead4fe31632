import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { Device } from '@sensorgrid/domain';

export const DEFAULT_DEVICES_FILE = resolve(__dirname, '../../config/devices.json');

const segment = z.string().regex(/^[A-Za-z0-9_-]+$/, 'must be a single topic segment');

const catalogueSchema = z.object({
  devices: z
    .array(
      z
        .object({
          deviceId: segment,
          sensorType: segment.refine((v) => v !== 'error', 'reserved sensor type'),
          intervalMs: z.number().int().positive().optional(),
          maxIntervalMs: z.number().int().positive().optional(),
          labels: z.record(z.string()).optional(),
        })
        .refine(
          (d) => d.maxIntervalMs === undefined || (d.intervalMs !== undefined && d.maxIntervalMs >= d.intervalMs),
          { message: 'maxIntervalMs needs an intervalMs no greater than it', path: ['maxIntervalMs'] },
        ),
    )
    .min(1),
});

/** Parses a device catalogue document. Device ids must be unique. */
export function parseDeviceCatalogue(raw: unknown): Device[] {
  const { devices } = catalogueSchema.parse(raw);
  const seen = new Set<string>();
  for (const device of devices) {
    if (seen.has(device.deviceId)) {
      throw new Error(`duplicate deviceId in catalogue: ${device.deviceId}`);
    }
    seen.add(device.deviceId);
  }
  return devices.map((device) => Object.freeze({ ...device }));
}

export function loadDeviceCatalogue(path: string = DEFAULT_DEVICES_FILE): Device[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const devices = parseDeviceCatalogue(raw);
  console.log(`[catalogue] loaded ${devices.length} devices from ${path}`);
  return devices;
}
