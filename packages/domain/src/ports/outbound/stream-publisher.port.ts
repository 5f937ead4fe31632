import type { Reading } from '../../entities/reading.js';

export interface StreamPublisherPort {
  publishReading(reading: Reading): Promise<void>;
}
