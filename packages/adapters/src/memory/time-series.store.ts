import {
  ERROR_PARTITION,
  isErrorRecord,
  isExpired,
  splitExpired,
  type ErrorRecord,
  type PageRequest,
  type PurgeableStorePort,
  type StoragePage,
  type StorageRecord,
  type StoredItem,
  type TimeSeriesStorePort,
} from '@sensorgrid/domain';
import { decodeCursor, encodeCursor, readString } from '../records.js';

/**
 * Process-local store with the same key, index and expiry semantics as the
 * PostgreSQL and DynamoDB adapters. Used for development and tests.
 */
export class InMemoryTimeSeriesStore implements TimeSeriesStorePort, PurgeableStorePort {
  private readonly partitions = new Map<string, Map<string, StoredItem>>();

  async put(item: StoredItem): Promise<void> {
    let partition = this.partitions.get(item.partitionKey);
    if (!partition) {
      partition = new Map();
      this.partitions.set(item.partitionKey, partition);
    }
    partition.set(item.sortKey, item);
  }

  async queryByPartition(
    partitionKey: string,
    fromTs: string,
    toTs: string,
    page: PageRequest,
  ): Promise<StoragePage> {
    if (partitionKey === ERROR_PARTITION) return { records: [], expired: 0 };
    const after = page.cursor ? readString(decodeCursor(page.cursor), 's') : undefined;
    const matches: StorageRecord[] = [];
    for (const item of this.partitions.get(partitionKey)?.values() ?? []) {
      if (isErrorRecord(item)) continue;
      if (item.sortKey < fromTs || item.sortKey > toTs) continue;
      if (after !== undefined && item.sortKey <= after) continue;
      matches.push(item);
    }
    matches.sort((a, b) => compare(a.sortKey, b.sortKey));
    return paginate(matches, page, (last) => ({ s: last.sortKey }));
  }

  async queryByDevice(
    deviceId: string,
    fromTs: string,
    toTs: string,
    page: PageRequest,
  ): Promise<StoragePage> {
    const position = page.cursor ? decodeCursor(page.cursor) : undefined;
    const afterSort = position ? readString(position, 's') ?? '' : undefined;
    const afterPartition = position ? readString(position, 'p') ?? '' : '';
    const matches: StorageRecord[] = [];
    for (const [partitionKey, partition] of this.partitions) {
      if (partitionKey === ERROR_PARTITION) continue;
      for (const item of partition.values()) {
        if (isErrorRecord(item) || item.deviceId !== deviceId) continue;
        if (item.sortKey < fromTs || item.sortKey > toTs) continue;
        if (
          afterSort !== undefined &&
          compare(item.sortKey, afterSort) * 2 + compare(item.partitionKey, afterPartition) <= 0
        ) {
          continue;
        }
        matches.push(item);
      }
    }
    matches.sort(
      (a, b) => compare(a.sortKey, b.sortKey) * 2 + compare(a.partitionKey, b.partitionKey),
    );
    return paginate(matches, page, (last) => ({ s: last.sortKey, p: last.partitionKey }));
  }

  async purgeExpired(nowEpochSeconds: number): Promise<number> {
    let purged = 0;
    for (const partition of this.partitions.values()) {
      for (const [sortKey, item] of partition) {
        if (isExpired(item, nowEpochSeconds)) {
          partition.delete(sortKey);
          purged += 1;
        }
      }
    }
    return purged;
  }

  errorRecords(): ErrorRecord[] {
    const out: ErrorRecord[] = [];
    for (const item of this.partitions.get(ERROR_PARTITION)?.values() ?? []) {
      if (isErrorRecord(item)) out.push(item);
    }
    return out.sort((a, b) => compare(a.sortKey, b.sortKey));
  }

  get size(): number {
    let total = 0;
    for (const partition of this.partitions.values()) total += partition.size;
    return total;
  }
}

function compare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function paginate(
  matches: StorageRecord[],
  page: PageRequest,
  position: (last: StorageRecord) => Record<string, string>,
): StoragePage {
  const slice = matches.slice(0, page.limit);
  const last = slice[slice.length - 1];
  const { live, expired } = splitExpired(slice, page.nowEpochSeconds);
  return {
    records: live,
    expired,
    cursor: last && matches.length > page.limit ? encodeCursor(position(last)) : undefined,
  };
}
