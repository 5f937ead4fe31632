import { z } from 'zod';
import {
  ERROR_PARTITION,
  StoreUnavailableError,
  ValidationFailureError,
  describeError,
  formatIsoSeconds,
  parseTelemetryTopic,
  recordToReading,
  toEpochSeconds,
  type ClockPort,
  type ErrorRecord,
  type InboundMessage,
  type IngestionDiagnostic,
  type RouteOutcome,
  type StorageRecord,
  type StreamPublisherPort,
  type TelemetryIngestionPort,
  type TelemetryTopic,
  type TimeSeriesStorePort,
} from '@sensorgrid/domain';
import { systemClock } from '@sensorgrid/adapters';
import { KeyedSerialQueue } from './keyed-serial-queue.js';

const wireReadingSchema = z.object({
  device_id: z.string().min(1),
  sensor_type: z.string().min(1),
  timestamp: z.string().datetime(),
  values: z.record(z.number().finite()),
  schema_version: z.number().int().positive(),
});

export interface IngestionRouterOptions {
  store: TimeSeriesStorePort;
  retentionSeconds: number;
  topicPrefix?: string;
  clock?: ClockPort;
  /** Total write attempts for a reading while the store is unavailable. */
  maxWriteAttempts?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  streamPublisher?: StreamPublisherPort;
  onDiagnostic?: (diagnostic: IngestionDiagnostic) => void;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Maps inbound telemetry messages onto storage records.
 *
 * Messages are keyed by the sensor type in their topic and processed serially
 * per key. Anything that cannot be stored ends up as an error record plus a
 * diagnostic; `route()` itself never rejects.
 */
export class IngestionRouter implements TelemetryIngestionPort {
  private readonly queue = new KeyedSerialQueue();
  private readonly clock: ClockPort;
  private readonly maxWriteAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: IngestionRouterOptions) {
    this.clock = options.clock ?? systemClock;
    this.maxWriteAttempts = Math.max(1, options.maxWriteAttempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 200;
    this.sleep = options.sleep ?? defaultSleep;
  }

  route(message: InboundMessage): Promise<RouteOutcome> {
    const topic = parseTelemetryTopic(message.topic, this.options.topicPrefix);
    return this.queue.run(topic?.sensorType ?? ERROR_PARTITION, () => this.process(message, topic));
  }

  /** Waits for every queued message to finish. */
  drain(): Promise<void> {
    return this.queue.drain();
  }

  private async process(message: InboundMessage, topic: TelemetryTopic | null): Promise<RouteOutcome> {
    const ingestedAt = message.receivedAt ?? this.clock.now();
    const sortKey = formatIsoSeconds(ingestedAt);
    const ttl = toEpochSeconds(ingestedAt) + this.options.retentionSeconds;
    const rawPayload = typeof message.payload === 'string' ? message.payload : message.payload.toString('utf8');

    if (!topic) {
      return this.divert({ topic: message.topic, rawPayload, sortKey, ttl, reason: 'unroutable topic' });
    }

    let record: StorageRecord;
    try {
      record = this.toRecord(topic, rawPayload, sortKey, ttl);
    } catch (err) {
      return this.divert({
        topic: message.topic,
        rawPayload,
        sortKey,
        ttl,
        partitionKey: topic.sensorType,
        deviceId: topic.deviceId,
        reason: describeError(err),
      });
    }

    try {
      await this.write(record);
    } catch (err) {
      return this.divert({
        topic: message.topic,
        rawPayload,
        sortKey,
        ttl,
        partitionKey: record.partitionKey,
        deviceId: record.deviceId,
        reason: describeError(err),
      });
    }

    this.offer(record);
    return 'stored';
  }

  private toRecord(topic: TelemetryTopic, rawPayload: string, sortKey: string, ttl: number): StorageRecord {
    let json: unknown;
    try {
      json = JSON.parse(rawPayload);
    } catch {
      throw new ValidationFailureError('payload is not valid JSON');
    }
    const parsed = wireReadingSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'payload'}: ${i.message}`);
      throw new ValidationFailureError(`invalid payload (${issues.join('; ')})`);
    }
    const reading = parsed.data;
    if (reading.sensor_type !== topic.sensorType) {
      throw new ValidationFailureError(
        `sensor type mismatch: topic ${topic.sensorType}, payload ${reading.sensor_type}`,
      );
    }
    if (reading.device_id !== topic.deviceId) {
      throw new ValidationFailureError(`device mismatch: topic ${topic.deviceId}, payload ${reading.device_id}`);
    }
    return {
      partitionKey: topic.sensorType,
      sortKey,
      deviceId: reading.device_id,
      payload: reading.values,
      schemaVersion: reading.schema_version,
      deviceTimestamp: reading.timestamp,
      ttl,
    };
  }

  private async write(record: StorageRecord): Promise<void> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        await this.options.store.put(record);
        return;
      } catch (err) {
        if (!(err instanceof StoreUnavailableError) || attempt >= this.maxWriteAttempts) throw err;
        const delay = this.retryDelayMs * 2 ** (attempt - 1);
        console.warn(
          `[ingestion-router] store unavailable for ${record.partitionKey} (attempt ${attempt}/${this.maxWriteAttempts}), retrying in ${delay}ms`,
        );
        await this.sleep(delay);
      }
    }
  }

  private async divert(failure: {
    topic: string;
    rawPayload: string;
    sortKey: string;
    ttl: number;
    reason: string;
    partitionKey?: string;
    deviceId?: string;
  }): Promise<RouteOutcome> {
    const errorRecord: ErrorRecord = {
      partitionKey: ERROR_PARTITION,
      sortKey: failure.sortKey,
      deviceId: failure.deviceId,
      topic: failure.topic,
      rawPayload: failure.rawPayload,
      reason: failure.reason,
      ttl: failure.ttl,
    };
    let errorRecordWritten = true;
    try {
      await this.options.store.put(errorRecord);
    } catch (err) {
      errorRecordWritten = false;
      console.error(`[ingestion-router] error record write failed for ${failure.topic}: ${describeError(err)}`);
    }

    console.warn(`[ingestion-router] diverted message on ${failure.topic}: ${failure.reason}`);
    const diagnostic: IngestionDiagnostic = {
      topic: failure.topic,
      partitionKey: failure.partitionKey ?? ERROR_PARTITION,
      deviceId: failure.deviceId,
      reason: failure.reason,
      errorRecordWritten,
    };
    try {
      this.options.onDiagnostic?.(diagnostic);
    } catch (err) {
      console.error(`[ingestion-router] diagnostic hook failed: ${describeError(err)}`);
    }
    return 'diverted';
  }

  private offer(record: StorageRecord): void {
    const publisher = this.options.streamPublisher;
    if (!publisher) return;
    publisher.publishReading(recordToReading(record)).catch((err: unknown) => {
      console.warn(`[ingestion-router] live feed publish failed: ${describeError(err)}`);
    });
  }
}
