export const READING_STORE = Symbol('READING_STORE');

/**
 * Immutable record of one successful poll.
 */
export interface ReadingRecord {
  deviceId: string;
  timestamp: Date;
  rawValue: number;
  powerWatts: number;
  energyWh: number;
  cost: number;
  ratePerKwh: number;
}

/** Half-open interval [from, to). */
export interface TimeRange {
  from: Date;
  to: Date;
}

export type AggregateFn = 'mean' | 'max' | 'sum' | 'stdev';
export type ReadingField = 'powerWatts' | 'energyWh' | 'cost';

/**
 * ReadingStore - append-only time-series of readings
 *
 * Writes are serialized through a single writer. Reads never block writes.
 */
export interface ReadingStore {
  /**
   * Persist one reading.
   *
   * Timestamps are strictly increasing per device. A timestamp equal to the
   * last stored one is rejected as well, since `(deviceId, timestamp)` is the
   * key.
   *
   * @throws StoreWriteError when the timestamp is not after the device's last
   *   stored reading, or when persistence fails
   */
  append(reading: ReadingRecord): Promise<void>;

  /**
   * Readings of a device in ascending time order. The returned iterable is
   * lazy and may be iterated more than once; each iteration re-reads the
   * store.
   */
  query(deviceId: string, range: TimeRange): AsyncIterable<ReadingRecord>;

  /**
   * Aggregate a field over the stored readings of a device. `stdev` is the
   * population standard deviation.
   *
   * @returns null when the range holds no readings
   */
  aggregate(
    deviceId: string,
    range: TimeRange,
    fn: AggregateFn,
    field?: ReadingField,
  ): Promise<number | null>;

  /** Most recent reading of a device, if any. */
  latest(deviceId: string): Promise<ReadingRecord | null>;
}

/**
 * Running totals from which every AggregateFn can be derived.
 */
export interface AggregateTotals {
  count: number;
  sum: number;
  sumSquares: number;
  max: number | null;
}

export function resolveAggregate(
  totals: AggregateTotals,
  fn: AggregateFn,
): number | null {
  if (totals.count === 0) return null;
  const mean = totals.sum / totals.count;
  switch (fn) {
    case 'mean':
      return mean;
    case 'sum':
      return totals.sum;
    case 'max':
      return totals.max;
    case 'stdev':
      return Math.sqrt(Math.max(0, totals.sumSquares / totals.count - mean * mean));
  }
}
