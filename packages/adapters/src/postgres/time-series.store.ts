import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  ERROR_PARTITION,
  StoreUnavailableError,
  ValidationFailureError,
  isErrorRecord,
  splitExpired,
  describeError,
  type PageRequest,
  type PurgeableStorePort,
  type StoragePage,
  type StorageRecord,
  type StoredItem,
  type TimeSeriesStorePort,
} from '@sensorgrid/domain';
import { getPool, type Queryable } from './pool.js';
import { coercePayload, decodeCursor, encodeCursor, errorCode, readString } from '../records.js';

type ReadingRow = {
  partition_key: string;
  sort_key: string;
  device_id: string | null;
  payload: unknown;
  schema_version: number;
  device_ts: string | null;
  // BIGINT arrives as a string
  ttl: string | number;
};

const SELECT_COLUMNS = `partition_key, sort_key, device_id, payload, schema_version, device_ts, ttl`;

/** Applies db/postgres/schema.sql. Idempotent. */
export async function applyTimeSeriesSchema(db: Queryable = getPool()): Promise<void> {
  let ddl: string;
  try {
    ddl = await readFile(resolve(__dirname, '../../../../db/postgres/schema.sql'), 'utf8');
  } catch {
    // Fallback path for dist layout
    ddl = await readFile(resolve(process.cwd(), 'db/postgres/schema.sql'), 'utf8');
  }
  await db.query(ddl);
  console.log('[pg-store] schema applied');
}

export function mapPgError(err: unknown, operation: string): Error {
  const code = errorCode(err);
  const detail = `${operation}: ${describeError(err)}`;
  // SQLSTATE 22xxx data exception, 23xxx integrity violation
  if (code && (code.startsWith('22') || code.startsWith('23'))) {
    return new ValidationFailureError(detail, { cause: err });
  }
  // connection refused/reset, SQLSTATE 08xxx, 53xxx and anything unrecognised
  return new StoreUnavailableError(detail, { cause: err });
}

/**
 * PostgreSQL-backed time-series table. `(partition_key, sort_key)` is the
 * primary key and `readings_by_device` plays the secondary index. Expired rows
 * stay queryable until `purgeExpired` runs, so every page splits them out.
 */
export class PgTimeSeriesStore implements TimeSeriesStorePort, PurgeableStorePort {
  constructor(private readonly db: Queryable = getPool()) {}

  async put(item: StoredItem): Promise<void> {
    const values = isErrorRecord(item)
      ? [
          item.partitionKey,
          item.sortKey,
          item.deviceId ?? null,
          '{}',
          0,
          null,
          item.topic,
          item.rawPayload,
          item.reason,
          item.ttl,
        ]
      : [
          item.partitionKey,
          item.sortKey,
          item.deviceId,
          JSON.stringify(item.payload),
          item.schemaVersion,
          item.deviceTimestamp ?? null,
          null,
          null,
          null,
          item.ttl,
        ];
    try {
      await this.db.query(
        `INSERT INTO telemetry.readings
           (partition_key, sort_key, device_id, payload, schema_version,
            device_ts, topic, raw_payload, reason, ttl)
         VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7, $8, $9, $10)
         ON CONFLICT (partition_key, sort_key) DO UPDATE SET
           device_id = EXCLUDED.device_id,
           payload = EXCLUDED.payload,
           schema_version = EXCLUDED.schema_version,
           device_ts = EXCLUDED.device_ts,
           topic = EXCLUDED.topic,
           raw_payload = EXCLUDED.raw_payload,
           reason = EXCLUDED.reason,
           ttl = EXCLUDED.ttl`,
        values,
      );
    } catch (err) {
      throw mapPgError(err, 'put');
    }
  }

  async queryByPartition(
    partitionKey: string,
    fromTs: string,
    toTs: string,
    page: PageRequest,
  ): Promise<StoragePage> {
    if (partitionKey === ERROR_PARTITION) return { records: [], expired: 0 };

    const params: unknown[] = [partitionKey, fromTs, toTs];
    let sql = `
      SELECT ${SELECT_COLUMNS} FROM telemetry.readings
      WHERE partition_key = $1
        AND sort_key >= $2
        AND sort_key <= $3`;
    if (page.cursor) {
      const after = readString(decodeCursor(page.cursor), 's');
      if (after === undefined) throw new ValidationFailureError('malformed page cursor');
      params.push(after);
      sql += ` AND sort_key > $${params.length}`;
    }
    params.push(page.limit);
    sql += ` ORDER BY sort_key ASC LIMIT $${params.length}`;

    const rows = await this.select(sql, params, 'queryByPartition');
    return this.toPage(rows, page, (last) => ({ s: last.sortKey }));
  }

  async queryByDevice(
    deviceId: string,
    fromTs: string,
    toTs: string,
    page: PageRequest,
  ): Promise<StoragePage> {
    const params: unknown[] = [deviceId, fromTs, toTs];
    let sql = `
      SELECT ${SELECT_COLUMNS} FROM telemetry.readings
      WHERE device_id = $1
        AND partition_key <> 'error'
        AND sort_key >= $2
        AND sort_key <= $3`;
    if (page.cursor) {
      const position = decodeCursor(page.cursor);
      const s = readString(position, 's');
      const p = readString(position, 'p');
      if (s === undefined || p === undefined) throw new ValidationFailureError('malformed page cursor');
      params.push(s, p);
      sql += ` AND (sort_key, partition_key) > ($${params.length - 1}, $${params.length})`;
    }
    params.push(page.limit);
    sql += ` ORDER BY sort_key ASC, partition_key ASC LIMIT $${params.length}`;

    const rows = await this.select(sql, params, 'queryByDevice');
    return this.toPage(rows, page, (last) => ({ s: last.sortKey, p: last.partitionKey }));
  }

  async purgeExpired(nowEpochSeconds: number): Promise<number> {
    try {
      const result = await this.db.query(`DELETE FROM telemetry.readings WHERE ttl <= $1`, [
        nowEpochSeconds,
      ]);
      return result.rowCount ?? 0;
    } catch (err) {
      throw mapPgError(err, 'purgeExpired');
    }
  }

  private async select(sql: string, params: unknown[], operation: string): Promise<ReadingRow[]> {
    try {
      const { rows } = await this.db.query<ReadingRow>(sql, params);
      return rows;
    } catch (err) {
      throw mapPgError(err, operation);
    }
  }

  private toPage(
    rows: ReadingRow[],
    page: PageRequest,
    position: (last: StorageRecord) => Record<string, string>,
  ): StoragePage {
    const records = rows.map(mapReadingRow);
    const last = records[records.length - 1];
    const { live, expired } = splitExpired(records, page.nowEpochSeconds);
    return {
      records: live,
      expired,
      cursor: last && rows.length >= page.limit ? encodeCursor(position(last)) : undefined,
    };
  }
}

function mapReadingRow(row: ReadingRow): StorageRecord {
  return {
    partitionKey: row.partition_key,
    sortKey: row.sort_key,
    deviceId: row.device_id ?? '',
    payload: coercePayload(row.payload),
    schemaVersion: row.schema_version,
    deviceTimestamp: row.device_ts ?? undefined,
    ttl: Number(row.ttl),
  };
}
