import { StoreWriteError } from '../../common/errors';
import {
  AggregateFn,
  ReadingField,
  ReadingRecord,
  ReadingStore,
  TimeRange,
  resolveAggregate,
} from '../interfaces/reading-store.interface';

/**
 * In-process ReadingStore for tests and offline simulation.
 *
 * Applies the same ordering rule as the database store. `failNextWrites`
 * makes the next N appends reject with StoreWriteError.
 */
export class InMemoryReadingStore implements ReadingStore {
  private readonly series = new Map<string, ReadingRecord[]>();
  private pendingFailures = 0;
  appendCalls = 0;

  failNextWrites(count: number): void {
    this.pendingFailures = count;
  }

  append(reading: ReadingRecord): Promise<void> {
    this.appendCalls++;
    if (this.pendingFailures > 0) {
      this.pendingFailures--;
      return Promise.reject(
        new StoreWriteError(reading.deviceId, 'Simulated write failure'),
      );
    }
    const rows = this.series.get(reading.deviceId) ?? [];
    const last = rows[rows.length - 1];
    if (last && reading.timestamp.getTime() <= last.timestamp.getTime()) {
      return Promise.reject(
        new StoreWriteError(
          reading.deviceId,
          `Out-of-order reading: ${reading.timestamp.toISOString()} is not after ${last.timestamp.toISOString()}`,
        ),
      );
    }
    rows.push({ ...reading });
    this.series.set(reading.deviceId, rows);
    return Promise.resolve();
  }

  query(deviceId: string, range: TimeRange): AsyncIterable<ReadingRecord> {
    const select = () => this.inRange(deviceId, range);
    return {
      [Symbol.asyncIterator]: async function* () {
        for (const reading of select()) {
          yield reading;
        }
      },
    };
  }

  aggregate(
    deviceId: string,
    range: TimeRange,
    fn: AggregateFn,
    field: ReadingField = 'powerWatts',
  ): Promise<number | null> {
    const values = this.inRange(deviceId, range).map((r) => r[field]);
    return Promise.resolve(
      resolveAggregate(
        {
          count: values.length,
          sum: values.reduce((acc, v) => acc + v, 0),
          sumSquares: values.reduce((acc, v) => acc + v * v, 0),
          max: values.length > 0 ? values.reduce((acc, v) => Math.max(acc, v)) : null,
        },
        fn,
      ),
    );
  }

  latest(deviceId: string): Promise<ReadingRecord | null> {
    const rows = this.series.get(deviceId) ?? [];
    return Promise.resolve(rows.length > 0 ? { ...rows[rows.length - 1] } : null);
  }

  /** Every stored reading of a device, oldest first. */
  all(deviceId: string): ReadingRecord[] {
    return (this.series.get(deviceId) ?? []).map((r) => ({ ...r }));
  }

  private inRange(deviceId: string, range: TimeRange): ReadingRecord[] {
    const from = range.from.getTime();
    const to = range.to.getTime();
    return (this.series.get(deviceId) ?? [])
      .filter((r) => r.timestamp.getTime() >= from && r.timestamp.getTime() < to)
      .map((r) => ({ ...r }));
  }
}
