import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { StoreWriteError } from '../common/errors';
import { Reading, epochMillis } from '../database/entities/reading.entity';
import { ReadingRecord } from './interfaces/reading-store.interface';
import { TypeOrmReadingStore } from './typeorm-reading.store';

const T0 = new Date('2026-02-01T00:00:00.000Z');
const minutes = (n: number) => new Date(T0.getTime() + n * 60_000);

function record(timestamp: Date, powerWatts = 100): ReadingRecord {
  return {
    deviceId: 'fridge',
    timestamp,
    rawValue: powerWatts / 100,
    powerWatts,
    energyWh: 1.5,
    cost: 0.0003,
    ratePerKwh: 0.2,
  };
}

function entity(timestamp: Date, powerWatts = 100): Reading {
  return Object.assign(new Reading(), record(timestamp, powerWatts), {
    createdAt: new Date('2026-02-02T00:00:00.000Z'),
  });
}

describe('TypeOrmReadingStore', () => {
  let store: TypeOrmReadingStore;

  const mockQueryBuilder = {
    select: jest.fn().mockReturnThis(),
    addSelect: jest.fn().mockReturnThis(),
    where: jest.fn().mockReturnThis(),
    andWhere: jest.fn().mockReturnThis(),
    orderBy: jest.fn().mockReturnThis(),
    limit: jest.fn().mockReturnThis(),
    getRawOne: jest.fn(),
    getMany: jest.fn(),
  };

  const mockRepository = {
    insert: jest.fn(),
    findOne: jest.fn(),
    createQueryBuilder: jest.fn(() => mockQueryBuilder),
  };

  beforeEach(async () => {
    mockRepository.findOne.mockResolvedValue(null);
    mockRepository.insert.mockResolvedValue({ identifiers: [] });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TypeOrmReadingStore,
        { provide: getRepositoryToken(Reading), useValue: mockRepository },
      ],
    }).compile();

    store = module.get<TypeOrmReadingStore>(TypeOrmReadingStore);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('append', () => {
    it('should insert the reading', async () => {
      await store.append(record(minutes(0)));

      expect(mockRepository.insert).toHaveBeenCalledWith(record(minutes(0)));
    });

    it('should reject a reading older than the last stored one', async () => {
      mockRepository.findOne.mockResolvedValue(entity(minutes(5)));

      const write = store.append(record(minutes(4)));

      await expect(write).rejects.toBeInstanceOf(StoreWriteError);
      await expect(write).rejects.toThrow(
        '[fridge] Out-of-order reading: 2026-02-01T00:04:00.000Z is not after 2026-02-01T00:05:00.000Z',
      );
      expect(mockRepository.insert).not.toHaveBeenCalled();
    });

    it('should reject a duplicate timestamp', async () => {
      await store.append(record(minutes(1)));

      await expect(store.append(record(minutes(1)))).rejects.toThrow('Out-of-order reading');
      expect(mockRepository.insert).toHaveBeenCalledTimes(1);
    });

    it('should look up the last stored timestamp only once per device', async () => {
      await store.append(record(minutes(1)));
      await store.append(record(minutes(2)));
      await store.append(record(minutes(3)));

      expect(mockRepository.findOne).toHaveBeenCalledTimes(1);
      expect(mockRepository.insert).toHaveBeenCalledTimes(3);
    });

    it('should wrap insert failures and keep accepting writes', async () => {
      mockRepository.insert.mockRejectedValueOnce(new Error('disk full'));

      const failed = store.append(record(minutes(1)));
      await expect(failed).rejects.toThrow('[fridge] Failed to persist reading');

      // The failed timestamp was never stored, so it may be retried
      await expect(store.append(record(minutes(1)))).resolves.toBeUndefined();
      expect(mockRepository.insert).toHaveBeenCalledTimes(2);
    });

    it('should wrap a failed last-reading lookup', async () => {
      mockRepository.findOne.mockRejectedValueOnce(new Error('connection reset'));

      await expect(store.append(record(minutes(1)))).rejects.toThrow(
        '[fridge] Failed to load last stored reading',
      );
    });

    it('should serialize concurrent appends', async () => {
      let releaseFirst: () => void = () => undefined;
      mockRepository.insert.mockImplementationOnce(
        () => new Promise<void>((resolve) => (releaseFirst = resolve)),
      );

      const first = store.append(record(minutes(1)));
      const second = store.append(record(minutes(2)));
      await new Promise((resolve) => setImmediate(resolve));

      expect(mockRepository.insert).toHaveBeenCalledTimes(1);
      releaseFirst();
      await Promise.all([first, second]);
      expect(mockRepository.insert).toHaveBeenCalledTimes(2);
      expect(mockRepository.insert.mock.calls[1][0].timestamp).toEqual(minutes(2));
    });
  });

  describe('query', () => {
    const range = { from: minutes(0), to: minutes(1000) };

    it('should page through the range in ascending order', async () => {
      const firstPage = Array.from({ length: 500 }, (_, i) => entity(minutes(i)));
      const secondPage = [entity(minutes(500)), entity(minutes(501))];
      mockQueryBuilder.getMany.mockResolvedValueOnce(firstPage).mockResolvedValueOnce(secondPage);

      const timestamps: Date[] = [];
      for await (const reading of store.query('fridge', range)) {
        timestamps.push(reading.timestamp);
      }

      expect(timestamps).toHaveLength(502);
      expect(timestamps[501]).toEqual(minutes(501));
      expect(mockQueryBuilder.getMany).toHaveBeenCalledTimes(2);
      expect(mockQueryBuilder.orderBy).toHaveBeenCalledWith('reading.timestamp', 'ASC');
      expect(mockQueryBuilder.limit).toHaveBeenCalledWith(500);
    });

    it('should bind the time bounds as epoch milliseconds', async () => {
      const firstPage = Array.from({ length: 500 }, (_, i) => entity(minutes(i)));
      mockQueryBuilder.getMany.mockResolvedValueOnce(firstPage).mockResolvedValueOnce([]);

      for await (const _ of store.query('fridge', range)) {
        // drain
      }

      const fromBounds = mockQueryBuilder.andWhere.mock.calls
        .filter(([clause]) => clause === 'reading.timestamp >= :from')
        .map(([, params]) => params);
      expect(fromBounds).toEqual([
        { from: minutes(0).getTime() },
        { from: minutes(499).getTime() + 1 },
      ]);
      expect(mockQueryBuilder.andWhere).toHaveBeenCalledWith('reading.timestamp < :to', {
        to: minutes(1000).getTime(),
      });
    });

    it('should return records without storage columns', async () => {
      mockQueryBuilder.getMany.mockResolvedValueOnce([entity(minutes(3), 42)]);

      const readings: ReadingRecord[] = [];
      for await (const reading of store.query('fridge', range)) {
        readings.push(reading);
      }

      expect(readings).toEqual([record(minutes(3), 42)]);
    });

    it('should re-read the store on every iteration', async () => {
      mockQueryBuilder.getMany
        .mockResolvedValueOnce([entity(minutes(1))])
        .mockResolvedValueOnce([entity(minutes(1)), entity(minutes(2))]);
      const readings = store.query('fridge', range);

      let first = 0;
      for await (const _ of readings) first++;
      let second = 0;
      for await (const _ of readings) second++;

      expect(first).toBe(1);
      expect(second).toBe(2);
    });
  });

  describe('aggregate', () => {
    const range = { from: minutes(0), to: minutes(60) };

    beforeEach(() => {
      mockQueryBuilder.getRawOne.mockResolvedValue({
        count: '4',
        sum: '40',
        sumSquares: '500',
        max: '20',
      });
    });

    it.each([
      ['mean', 10],
      ['sum', 40],
      ['max', 20],
      ['stdev', 5],
    ] as const)('should derive %s from the SQL totals', async (fn, expected) => {
      await expect(store.aggregate('fridge', range, fn)).resolves.toBe(expected);
    });

    it('should aggregate the requested column', async () => {
      await store.aggregate('fridge', range, 'sum', 'energyWh');

      expect(mockQueryBuilder.addSelect).toHaveBeenCalledWith('SUM(reading.energyWh)', 'sum');
      expect(mockQueryBuilder.where).toHaveBeenCalledWith('reading.deviceId = :deviceId', {
        deviceId: 'fridge',
      });
      expect(mockQueryBuilder.andWhere).toHaveBeenCalledWith('reading.timestamp >= :from', {
        from: minutes(0).getTime(),
      });
    });

    it('should return null for an empty range', async () => {
      mockQueryBuilder.getRawOne.mockResolvedValue({
        count: 0,
        sum: null,
        sumSquares: null,
        max: null,
      });

      await expect(store.aggregate('fridge', range, 'mean')).resolves.toBeNull();
    });
  });

  describe('latest', () => {
    it('should return the newest reading', async () => {
      mockRepository.findOne.mockResolvedValue(entity(minutes(9), 55));

      await expect(store.latest('fridge')).resolves.toEqual(record(minutes(9), 55));
      expect(mockRepository.findOne).toHaveBeenCalledWith({
        where: { deviceId: 'fridge' },
        order: { timestamp: 'DESC' },
      });
    });

    it('should return null for a device without readings', async () => {
      await expect(store.latest('fridge')).resolves.toBeNull();
    });
  });

  describe('timestamp column', () => {
    it('should store instants as epoch milliseconds', () => {
      expect(epochMillis.to(new Date('2026-02-01T00:00:00.000Z'))).toBe(1769904000000);
    });

    it('should keep an hour repeated by a DST change as two keys', () => {
      // 01:30 EDT and 01:30 EST on 2026-11-01 share a local wall time
      const first = new Date('2026-11-01T01:30:00-04:00');
      const second = new Date('2026-11-01T01:30:00-05:00');

      expect(epochMillis.to(second) - epochMillis.to(first)).toBe(3_600_000);
    });

    it('should read BIGINT strings back as dates', () => {
      expect(epochMillis.from('1769904000000')).toEqual(new Date('2026-02-01T00:00:00.000Z'));
      expect(epochMillis.from(null)).toBeNull();
    });
  });
});
