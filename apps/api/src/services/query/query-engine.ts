import {
  ERROR_PARTITION,
  InvalidWindowError,
  QueryTimeoutError,
  StoreUnavailableError,
  describeError,
  formatIsoSeconds,
  isTelemetryError,
  recordToReading,
  toEpochSeconds,
  type ClockPort,
  type Reading,
  type SeriesOptions,
  type SeriesPage,
  type SeriesResult,
  type SeriesSelector,
  type StoragePage,
  type TelemetryQueryPort,
  type TimeSeriesStorePort,
  type TimeWindow,
} from '@sensorgrid/domain';
import { systemClock } from '@sensorgrid/adapters';

export interface QueryEngineOptions {
  store: TimeSeriesStorePort;
  clock?: ClockPort;
  pageSize?: number;
  defaultTimeoutMs?: number;
}

interface SortKeyBounds {
  fromTs: string;
  toTs: string;
}

function compareReadings(a: Reading, b: Reading): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
  if (a.sensorType !== b.sensorType) return a.sensorType < b.sensorType ? -1 : 1;
  return 0;
}

function sameKey(a: Reading | undefined, b: Reading): boolean {
  return a !== undefined && a.timestamp === b.timestamp && a.sensorType === b.sensorType;
}

/** Drops entries whose (partition, sort key) repeats the one before. */
function dedupeSorted(readings: readonly Reading[], previous?: Reading): Reading[] {
  const out: Reading[] = [];
  let last = previous;
  for (const reading of readings) {
    if (sameKey(last, reading)) continue;
    out.push(reading);
    last = reading;
  }
  return out;
}

/**
 * Converts an ISO window into sort-key bounds at second precision.
 * A fractional `from` rounds up and a fractional `to` rounds down so the
 * bounds never widen the window.
 */
export function toSortKeyBounds(window: TimeWindow): SortKeyBounds {
  const fromMs = Date.parse(window.from);
  const toMs = Date.parse(window.to);
  if (Number.isNaN(fromMs) || Number.isNaN(toMs)) {
    throw new InvalidWindowError('from and to must be ISO-8601 timestamps');
  }
  if (fromMs > toMs) {
    throw new InvalidWindowError('from must not be after to');
  }
  return {
    fromTs: formatIsoSeconds(new Date(Math.ceil(fromMs / 1000) * 1000)),
    toTs: formatIsoSeconds(new Date(Math.floor(toMs / 1000) * 1000)),
  };
}

function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new QueryTimeoutError('query aborted'));
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Reconstructs time-ordered series from the store, by sensor type (table
 * partition) or by device (secondary index), following cursors until the
 * window is exhausted.
 */
export class QueryEngine implements TelemetryQueryPort {
  private readonly clock: ClockPort;
  private readonly pageSize: number;
  private readonly defaultTimeoutMs: number;

  constructor(private readonly options: QueryEngineOptions) {
    this.clock = options.clock ?? systemClock;
    this.pageSize = options.pageSize ?? 500;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 10_000;
  }

  async series(selector: SeriesSelector, window: TimeWindow, options: SeriesOptions = {}): Promise<SeriesResult> {
    let readings: Reading[] = [];
    let expired = 0;
    let outOfOrder = false;
    for await (const page of this.pages(selector, window, options)) {
      const first = page.readings[0];
      const last = readings[readings.length - 1];
      if (first && last && compareReadings(first, last) < 0) outOfOrder = true;
      readings.push(...page.readings);
      expired += page.expired;
    }
    if (outOfOrder) {
      console.warn('[query-engine] store returned pages out of order; re-sorting result');
      readings = dedupeSorted([...readings].sort(compareReadings));
    }
    return { readings, expired };
  }

  async *pages(
    selector: SeriesSelector,
    window: TimeWindow,
    options: SeriesOptions = {},
  ): AsyncGenerator<SeriesPage> {
    const bounds = toSortKeyBounds(window);
    if ('sensorType' in selector && selector.sensorType === ERROR_PARTITION) return;
    if (bounds.fromTs > bounds.toTs) return;

    const deadline = new AbortController();
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const timer = setTimeout(() => deadline.abort(), timeoutMs);
    const onCallerAbort = () => deadline.abort();
    if (options.signal?.aborted) deadline.abort();
    else options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      let cursor: string | undefined;
      let previous: Reading | undefined;
      do {
        const page = await this.fetch(selector, bounds, cursor, deadline.signal, timeoutMs);
        const readings = dedupeSorted(page.records.map(recordToReading).sort(compareReadings), previous);
        previous = readings[readings.length - 1] ?? previous;
        cursor = page.cursor;
        yield { readings, expired: page.expired };
      } while (cursor);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async fetch(
    selector: SeriesSelector,
    { fromTs, toTs }: SortKeyBounds,
    cursor: string | undefined,
    signal: AbortSignal,
    timeoutMs: number,
  ): Promise<StoragePage> {
    if (signal.aborted) throw new QueryTimeoutError(`query exceeded ${timeoutMs}ms`);
    const page = {
      limit: this.pageSize,
      cursor,
      nowEpochSeconds: toEpochSeconds(this.clock.now()),
      signal,
    };
    const { store } = this.options;
    try {
      const work =
        'sensorType' in selector
          ? store.queryByPartition(selector.sensorType, fromTs, toTs, page)
          : store.queryByDevice(selector.deviceId, fromTs, toTs, page);
      return await raceAbort(work, signal);
    } catch (err) {
      if (signal.aborted) throw new QueryTimeoutError(`query exceeded ${timeoutMs}ms`, { cause: err });
      if (isTelemetryError(err)) throw err;
      throw new StoreUnavailableError(describeError(err), { cause: err });
    }
  }
}
