import type { StorageRecord, StoredItem } from '../../entities/storage-record.js';

export interface PageRequest {
  /** Maximum raw records to fetch, expired ones included. */
  limit: number;
  /** Opaque continuation token from the previous page. */
  cursor?: string;
  /** Records with `ttl <= nowEpochSeconds` are reported as expired. */
  nowEpochSeconds: number;
  signal?: AbortSignal;
}

export interface StoragePage {
  /** Live records, ascending by sort key. */
  records: StorageRecord[];
  /** Records in the page that had already expired. */
  expired: number;
  /** Present when more records may follow. */
  cursor?: string;
}

/**
 * Partitioned, TTL-bounded record store with a secondary index by device.
 * Query bounds are inclusive on both ends.
 */
export interface TimeSeriesStorePort {
  put(item: StoredItem): Promise<void>;
  queryByPartition(
    partitionKey: string,
    fromTs: string,
    toTs: string,
    page: PageRequest,
  ): Promise<StoragePage>;
  queryByDevice(
    deviceId: string,
    fromTs: string,
    toTs: string,
    page: PageRequest,
  ): Promise<StoragePage>;
}

/** Stores without native TTL deletion expose an explicit sweep. */
export interface PurgeableStorePort {
  purgeExpired(nowEpochSeconds: number): Promise<number>;
}
