import { Test, TestingModule } from '@nestjs/testing';
import { CLOCK } from '../common/time/clock';
import { MONITOR_CONFIG, MonitorEnv } from '../config/monitor-config';
import { DeviceRegistryService } from '../devices/device-registry.service';
import { TariffService } from '../energy/tariff.service';
import { READING_STORE } from '../readings/interfaces/reading-store.interface';
import { InMemoryReadingStore, ManualClock, buildTestConfig } from '../test-utils';
import { ReportsService } from './reports.service';

describe('ReportsService', () => {
  let service: ReportsService;
  let store: InMemoryReadingStore;

  async function setup(env: MonitorEnv = {}): Promise<void> {
    store = new InMemoryReadingStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReportsService,
        DeviceRegistryService,
        TariffService,
        { provide: READING_STORE, useValue: store },
        { provide: CLOCK, useValue: new ManualClock('2026-01-06T12:00:00.000Z') },
        {
          provide: MONITOR_CONFIG,
          useValue: buildTestConfig(
            {
              tv: { name: 'TV', location: 'Living Room' },
              fridge: { name: 'Fridge', location: 'Kitchen' },
              lamp: { name: 'Lamp', location: 'Office' },
              spare: { name: 'Spare', location: 'Garage' },
            },
            env,
          ),
        },
      ],
    }).compile();

    service = module.get<ReportsService>(ReportsService);
  }

  async function add(
    deviceId: string,
    iso: string,
    powerWatts: number,
    energyWh: number,
    cost: number,
  ): Promise<void> {
    await store.append({
      deviceId,
      timestamp: new Date(iso),
      rawValue: powerWatts,
      powerWatts,
      energyWh,
      cost,
      ratePerKwh: 0.2,
    });
  }

  beforeEach(async () => {
    await setup();
    await add('tv', '2026-01-05T08:00:00Z', 200, 0, 0);
    await add('tv', '2026-01-05T09:00:00Z', 200, 200, 0.04);
    await add('tv', '2026-01-06T07:00:00Z', 150, 100, 0.02);
    await add('fridge', '2026-01-05T08:00:00Z', 100, 0, 0);
    await add('fridge', '2026-01-05T09:00:00Z', 100, 100, 0.02);
    await add('fridge', '2026-01-05T10:00:00Z', 100, 100, 0.02);
    await add('lamp', '2026-01-05T08:30:00Z', 10, 5, 0.001);
  });

  describe('dailyReport', () => {
    it('should total each device over the local day', async () => {
      const report = await service.dailyReport(new Date('2026-01-05T15:00:00Z'));

      expect(report.date).toBe('2026-01-05T00:00:00.000Z');
      expect(report.devices.map((d) => [d.deviceId, d.readings, d.averageWatts, d.status])).toEqual([
        ['tv', 2, 200, 'active'],
        ['fridge', 3, 100, 'active'],
        ['lamp', 1, 10, 'standby'],
        ['spare', 0, 0, 'off'],
      ]);
      expect(report.devices[0]).toMatchObject({
        name: 'TV',
        location: 'Living Room',
        energyKwh: 0.2,
        cost: 0.04,
        peakWatts: 200,
      });
      expect(report.totalEnergyKwh).toBeCloseTo(0.405, 12);
      expect(report.totalCost).toBeCloseTo(0.081, 12);
      expect(report.projectedMonthlyCost).toBeCloseTo(2.43, 12);
    });

    it('should rank the top consumers by cost', async () => {
      const report = await service.dailyReport(new Date('2026-01-05T15:00:00Z'));

      expect(report.topConsumers.map((c) => c.deviceId)).toEqual(['tv', 'fridge', 'lamp']);
    });

    it('should find the hour with the highest combined draw', async () => {
      const report = await service.dailyReport(new Date('2026-01-05T15:00:00Z'));

      // 08:00 carries 200 + 100 + 10 W
      expect(report.peakHour).toBe(8);
    });

    it('should report an empty day', async () => {
      const report = await service.dailyReport(new Date('2026-01-01T12:00:00Z'));

      expect(report.totalCost).toBe(0);
      expect(report.topConsumers).toEqual([]);
      expect(report.peakHour).toBeNull();
    });

    it('should align the day to the configured UTC offset', async () => {
      await setup({ UTC_OFFSET_MINUTES: '-300' });

      const report = await service.dailyReport(new Date('2026-01-05T03:00:00Z'));

      expect(report.date).toBe('2026-01-04T05:00:00.000Z');
    });
  });

  describe('monthlyProjection', () => {
    it('should scale month-to-date totals to 30 days', async () => {
      const projection = await service.monthlyProjection(2026, 1);

      expect(projection.daysWithData).toBe(2);
      expect(projection.energyKwh).toBeCloseTo(0.505, 12);
      expect(projection.cost).toBeCloseTo(0.101, 12);
      expect(projection.projectedEnergyKwh).toBeCloseTo(7.575, 12);
      expect(projection.projectedCost).toBeCloseTo(1.515, 12);
    });

    it('should project nothing for a month without data', async () => {
      await expect(service.monthlyProjection(2026, 2)).resolves.toEqual({
        year: 2026,
        month: 2,
        energyKwh: 0,
        cost: 0,
        daysWithData: 0,
        projectedEnergyKwh: 0,
        projectedCost: 0,
      });
    });
  });

  describe('currentPowerSummary', () => {
    it('should sum the latest reading of each device', async () => {
      const summary = await service.currentPowerSummary();

      expect(summary.timestamp).toBe('2026-01-06T12:00:00.000Z');
      expect(summary.devices).toEqual([
        { deviceId: 'tv', powerWatts: 150, status: 'active', readAt: '2026-01-06T07:00:00.000Z' },
        { deviceId: 'fridge', powerWatts: 100, status: 'active', readAt: '2026-01-05T10:00:00.000Z' },
        { deviceId: 'lamp', powerWatts: 10, status: 'standby', readAt: '2026-01-05T08:30:00.000Z' },
      ]);
      expect(summary.totalWatts).toBe(260);
      expect(summary.activeDevices).toBe(2);
      // 0.26 kW for 24 h at 0.2 per kWh
      expect(summary.projectedDailyCost).toBeCloseTo(1.248, 12);
      expect(summary.projectedMonthlyCost).toBeCloseTo(37.44, 10);
    });
  });
});
