import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Reading } from '../database/entities/reading.entity';
import { StoreWriteError, formatErrorMessage, toError } from '../common/errors';
import {
  AggregateFn,
  ReadingField,
  ReadingRecord,
  ReadingStore,
  TimeRange,
  resolveAggregate,
} from './interfaces/reading-store.interface';

/**
 * Raw row returned by the aggregate query. Drivers disagree on numeric
 * types (pg returns COUNT and SUM as strings), so every field is coerced.
 */
interface AggregateRow {
  count: string | number | null;
  sum: string | number | null;
  sumSquares: string | number | null;
  max: string | number | null;
}

const AGGREGATE_COLUMNS: Record<ReadingField, string> = {
  powerWatts: 'reading.powerWatts',
  energyWh: 'reading.energyWh',
  cost: 'reading.cost',
};

/**
 * TypeOrmReadingStore - ReadingStore over the `readings` table
 *
 * Responsibilities:
 * 1. Single writer: appends are chained so at most one insert is in flight
 * 2. Ordering: rejects a reading that is not newer than the device's last one
 * 3. Streaming reads: keyset-paged ascending scans, one page in memory
 * 4. Aggregates: COUNT / SUM / SUM of squares / MAX in SQL, derived in code
 *
 * Time bounds are bound as epoch milliseconds to match the BIGINT key.
 */
@Injectable()
export class TypeOrmReadingStore implements ReadingStore {
  private readonly logger = new Logger(TypeOrmReadingStore.name);
  private readonly PAGE_SIZE = 500;
  private readonly lastTimestamps = new Map<string, Date>();
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    @InjectRepository(Reading)
    private readonly readingRepository: Repository<Reading>,
  ) {}

  append(reading: ReadingRecord): Promise<void> {
    const write = this.writeQueue.then(() => this.write(reading));
    // The caller receives the failure; the chain itself keeps going
    this.writeQueue = write.catch(() => undefined);
    return write;
  }

  query(deviceId: string, range: TimeRange): AsyncIterable<ReadingRecord> {
    return {
      [Symbol.asyncIterator]: () => this.scan(deviceId, range),
    };
  }

  async aggregate(
    deviceId: string,
    range: TimeRange,
    fn: AggregateFn,
    field: ReadingField = 'powerWatts',
  ): Promise<number | null> {
    const column = AGGREGATE_COLUMNS[field];
    const row = await this.readingRepository
      .createQueryBuilder('reading')
      .select('COUNT(*)', 'count')
      .addSelect(`SUM(${column})`, 'sum')
      .addSelect(`SUM(${column} * ${column})`, 'sumSquares')
      .addSelect(`MAX(${column})`, 'max')
      .where('reading.deviceId = :deviceId', { deviceId })
      .andWhere('reading.timestamp >= :from', { from: range.from.getTime() })
      .andWhere('reading.timestamp < :to', { to: range.to.getTime() })
      .getRawOne<AggregateRow>();

    const count = toNumber(row?.count) ?? 0;
    return resolveAggregate(
      {
        count,
        sum: toNumber(row?.sum) ?? 0,
        sumSquares: toNumber(row?.sumSquares) ?? 0,
        max: toNumber(row?.max),
      },
      fn,
    );
  }

  async latest(deviceId: string): Promise<ReadingRecord | null> {
    const reading = await this.readingRepository.findOne({
      where: { deviceId },
      order: { timestamp: 'DESC' },
    });
    return reading ? toRecord(reading) : null;
  }

  private async write(reading: ReadingRecord): Promise<void> {
    const last = await this.lastTimestampOf(reading.deviceId);
    if (last && reading.timestamp.getTime() <= last.getTime()) {
      throw new StoreWriteError(
        reading.deviceId,
        `Out-of-order reading: ${reading.timestamp.toISOString()} is not after ${last.toISOString()}`,
      );
    }

    try {
      await this.readingRepository.insert({
        deviceId: reading.deviceId,
        timestamp: reading.timestamp,
        rawValue: reading.rawValue,
        powerWatts: reading.powerWatts,
        energyWh: reading.energyWh,
        cost: reading.cost,
        ratePerKwh: reading.ratePerKwh,
      });
    } catch (error) {
      this.logger.error(
        `Insert failed for ${reading.deviceId} at ${reading.timestamp.toISOString()}: ${formatErrorMessage(error)}`,
      );
      throw new StoreWriteError(reading.deviceId, 'Failed to persist reading', toError(error));
    }
    this.lastTimestamps.set(reading.deviceId, reading.timestamp);
  }

  private async lastTimestampOf(deviceId: string): Promise<Date | null> {
    const cached = this.lastTimestamps.get(deviceId);
    if (cached) return cached;
    try {
      const latest = await this.latest(deviceId);
      if (latest) this.lastTimestamps.set(deviceId, latest.timestamp);
      return latest?.timestamp ?? null;
    } catch (error) {
      throw new StoreWriteError(deviceId, 'Failed to load last stored reading', toError(error));
    }
  }

  private async *scan(deviceId: string, range: TimeRange): AsyncGenerator<ReadingRecord> {
    // Timestamps are whole milliseconds, so the next page starts 1 ms past the last key
    let from = range.from.getTime();
    for (;;) {
      const page = await this.readingRepository
        .createQueryBuilder('reading')
        .where('reading.deviceId = :deviceId', { deviceId })
        .andWhere('reading.timestamp >= :from', { from })
        .andWhere('reading.timestamp < :to', { to: range.to.getTime() })
        .orderBy('reading.timestamp', 'ASC')
        .limit(this.PAGE_SIZE)
        .getMany();

      for (const reading of page) {
        yield toRecord(reading);
      }
      if (page.length < this.PAGE_SIZE) return;
      from = page[page.length - 1].timestamp.getTime() + 1;
    }
  }
}

function toRecord(reading: Reading): ReadingRecord {
  return {
    deviceId: reading.deviceId,
    timestamp: reading.timestamp,
    rawValue: reading.rawValue,
    powerWatts: reading.powerWatts,
    energyWh: reading.energyWh,
    cost: reading.cost,
    ratePerKwh: reading.ratePerKwh,
  };
}

function toNumber(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}
