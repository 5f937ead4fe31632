import type { Device } from '@sensorgrid/domain';
import type { SessionObserver } from './publisher-session.js';

/**
 * Logs the first reading a device drops and, once it publishes again, how
 * many were lost in between; one line per outage rather than per reading.
 */
export function dropReporter(device: Device): SessionObserver {
  let dropped = 0;
  return {
    onDropped(_reading, reason) {
      dropped += 1;
      if (dropped === 1) console.warn(`[simulator] ${device.deviceId} dropping readings: ${reason}`);
    },
    onPublished() {
      if (dropped > 0) {
        console.log(`[simulator] ${device.deviceId} publishing again after ${dropped} dropped`);
      }
      dropped = 0;
    },
  };
}
