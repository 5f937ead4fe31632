import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import {
  ERROR_PARTITION,
  StoreUnavailableError,
  ValidationFailureError,
  describeError,
  isErrorRecord,
  splitExpired,
  type PageRequest,
  type StoragePage,
  type StorageRecord,
  type StoredItem,
  type TimeSeriesStorePort,
} from '@sensorgrid/domain';
import { coercePayload, decodeCursor, encodeCursor, readNumber, readString } from '../records.js';

export interface DynamoTimeSeriesStoreOptions {
  tableName: string;
  /** GSI keyed by `device_id` (hash) and `sort_key` (range). */
  deviceIndexName: string;
  client?: DynamoDBDocumentClient;
  region?: string;
}

const VALIDATION_ERRORS = new Set(['ValidationException', 'ConditionalCheckFailedException']);

export function mapDynamoError(err: unknown, operation: string): Error {
  const name = err instanceof Error ? err.name : '';
  if (name === 'AbortError') return err instanceof Error ? err : new Error(String(err));
  const detail = `${operation}: ${describeError(err)}`;
  if (VALIDATION_ERRORS.has(name)) return new ValidationFailureError(detail, { cause: err });
  // throttling, capacity, 5xx and network failures
  return new StoreUnavailableError(detail, { cause: err });
}

/**
 * DynamoDB table with `partition_key`/`sort_key` keys, a `ttl` attribute
 * registered for native expiry, and a device GSI. Error items carry their
 * device under `source_device_id` so the sparse GSI never indexes them.
 * Native TTL deletion lags expiry, so pages still split expired items out.
 */
export class DynamoTimeSeriesStore implements TimeSeriesStorePort {
  private readonly ddb: DynamoDBDocumentClient;

  constructor(private readonly options: DynamoTimeSeriesStoreOptions) {
    this.ddb =
      options.client ??
      DynamoDBDocumentClient.from(new DynamoDBClient({ region: options.region }), {
        marshallOptions: { removeUndefinedValues: true },
      });
  }

  async put(item: StoredItem): Promise<void> {
    const Item = isErrorRecord(item)
      ? {
          partition_key: item.partitionKey,
          sort_key: item.sortKey,
          source_device_id: item.deviceId,
          topic: item.topic,
          raw_payload: item.rawPayload,
          reason: item.reason,
          ttl: item.ttl,
        }
      : {
          partition_key: item.partitionKey,
          sort_key: item.sortKey,
          device_id: item.deviceId,
          payload: { ...item.payload },
          schema_version: item.schemaVersion,
          device_ts: item.deviceTimestamp,
          ttl: item.ttl,
        };
    try {
      await this.ddb.send(new PutCommand({ TableName: this.options.tableName, Item }));
    } catch (err) {
      throw mapDynamoError(err, 'put');
    }
  }

  async queryByPartition(
    partitionKey: string,
    fromTs: string,
    toTs: string,
    page: PageRequest,
  ): Promise<StoragePage> {
    if (partitionKey === ERROR_PARTITION) return { records: [], expired: 0 };
    return this.query('partition_key', partitionKey, fromTs, toTs, page, undefined);
  }

  async queryByDevice(
    deviceId: string,
    fromTs: string,
    toTs: string,
    page: PageRequest,
  ): Promise<StoragePage> {
    return this.query('device_id', deviceId, fromTs, toTs, page, this.options.deviceIndexName);
  }

  private async query(
    hashAttribute: string,
    hashValue: string,
    fromTs: string,
    toTs: string,
    page: PageRequest,
    indexName: string | undefined,
  ): Promise<StoragePage> {
    const operation = indexName ? 'queryByDevice' : 'queryByPartition';
    try {
      const out = await this.ddb.send(
        new QueryCommand({
          TableName: this.options.tableName,
          IndexName: indexName,
          KeyConditionExpression: '#h = :h AND #s BETWEEN :from AND :to',
          ExpressionAttributeNames: { '#h': hashAttribute, '#s': 'sort_key' },
          ExpressionAttributeValues: { ':h': hashValue, ':from': fromTs, ':to': toTs },
          ExclusiveStartKey: page.cursor ? decodeCursor(page.cursor) : undefined,
          ScanIndexForward: true,
          Limit: page.limit,
        }),
        { abortSignal: page.signal },
      );
      const records: StorageRecord[] = [];
      for (const item of out.Items ?? []) {
        const record = toStorageRecord(item);
        if (record) records.push(record);
      }
      const { live, expired } = splitExpired(records, page.nowEpochSeconds);
      return {
        records: live,
        expired,
        cursor: out.LastEvaluatedKey ? encodeCursor(out.LastEvaluatedKey) : undefined,
      };
    } catch (err) {
      if (err instanceof ValidationFailureError) throw err;
      throw mapDynamoError(err, operation);
    }
  }
}

function toStorageRecord(item: Record<string, unknown>): StorageRecord | null {
  const partitionKey = readString(item, 'partition_key');
  const sortKey = readString(item, 'sort_key');
  const deviceId = readString(item, 'device_id');
  const ttl = readNumber(item, 'ttl');
  if (!partitionKey || !sortKey || !deviceId || ttl === undefined) return null;
  return {
    partitionKey,
    sortKey,
    deviceId,
    payload: coercePayload(item['payload']),
    schemaVersion: readNumber(item, 'schema_version') ?? 1,
    deviceTimestamp: readString(item, 'device_ts'),
    ttl,
  };
}
