import type { Reading, ReadingValues } from './reading.js';

/** Partition reserved for records the ingestion router could not store. */
export const ERROR_PARTITION = 'error';

/**
 * Persisted form of a reading.
 *
 * `(partitionKey, sortKey)` is the table key. Two devices of the same sensor
 * type reporting within the same ingest second share that key, and the later
 * write replaces the earlier one (last-write-wins).
 */
export interface StorageRecord {
  readonly partitionKey: string;
  /** Ingest-side timestamp, ISO-8601 second precision. */
  readonly sortKey: string;
  readonly deviceId: string;
  readonly payload: ReadingValues;
  readonly schemaVersion: number;
  /** Timestamp the device put on the reading; informational only. */
  readonly deviceTimestamp?: string;
  /** Expiry, epoch seconds. */
  readonly ttl: number;
}

export interface ErrorRecord {
  readonly partitionKey: typeof ERROR_PARTITION;
  readonly sortKey: string;
  /** Source device when it could be recovered from the message. */
  readonly deviceId?: string;
  readonly topic: string;
  /** Original message body, verbatim. */
  readonly rawPayload: string;
  readonly reason: string;
  readonly ttl: number;
}

export type StoredItem = StorageRecord | ErrorRecord;

export function isErrorRecord(item: StoredItem): item is ErrorRecord {
  return item.partitionKey === ERROR_PARTITION;
}

export function isExpired(record: { ttl: number }, nowEpochSeconds: number): boolean {
  return record.ttl <= nowEpochSeconds;
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/** Splits a fetched page into live records and a count of expired ones. */
export function splitExpired<T extends { ttl: number }>(
  records: readonly T[],
  nowEpochSeconds: number,
): { live: T[]; expired: number } {
  const live: T[] = [];
  let expired = 0;
  for (const record of records) {
    if (isExpired(record, nowEpochSeconds)) expired += 1;
    else live.push(record);
  }
  return { live, expired };
}

/** Reading as served by the query side: timestamp is the ingest sort key. */
export function recordToReading(record: StorageRecord): Reading {
  return {
    deviceId: record.deviceId,
    sensorType: record.partitionKey,
    timestamp: record.sortKey,
    values: record.payload,
    schemaVersion: record.schemaVersion,
  };
}
