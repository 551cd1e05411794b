import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock, addDays, startOfLocalDay } from '../common/time/clock';
import { MONITOR_CONFIG, MonitorConfig } from '../config/monitor-config';
import { DeviceRegistryService } from '../devices/device-registry.service';
import { DeviceStatus, classifyDeviceStatus } from '../energy/energy-calculator';
import { TariffService } from '../energy/tariff.service';
import {
  READING_STORE,
  ReadingRecord,
  ReadingStore,
  TimeRange,
} from '../readings/interfaces/reading-store.interface';
import { combinedHourlyLoad, peakHourOf } from '../analysis/statistics';

const HOURS_PER_DAY = 24;
const MONTH_DAYS = 30;
const TOP_CONSUMERS = 3;

export interface DeviceDailySummary {
  deviceId: string;
  name: string;
  location: string;
  energyKwh: number;
  cost: number;
  averageWatts: number;
  peakWatts: number;
  readings: number;
  status: DeviceStatus;
}

export interface DailyReport {
  date: string;
  devices: DeviceDailySummary[];
  totalEnergyKwh: number;
  totalCost: number;
  topConsumers: Array<{ deviceId: string; name: string; cost: number; energyKwh: number }>;
  /** Local hour with the highest combined draw, null without data. */
  peakHour: number | null;
  projectedMonthlyCost: number;
}

export interface MonthlyProjection {
  year: number;
  month: number;
  energyKwh: number;
  cost: number;
  daysWithData: number;
  projectedEnergyKwh: number;
  projectedCost: number;
}

export interface CurrentPowerSummary {
  timestamp: string;
  totalWatts: number;
  activeDevices: number;
  devices: Array<{ deviceId: string; powerWatts: number; status: DeviceStatus; readAt: string }>;
  projectedDailyCost: number;
  projectedMonthlyCost: number;
}

/**
 * ReportsService - daily, monthly and live summaries over the store
 */
@Injectable()
export class ReportsService {
  private readonly logger = new Logger(ReportsService.name);
  private readonly utcOffsetMinutes: number;

  constructor(
    private readonly devices: DeviceRegistryService,
    private readonly tariff: TariffService,
    @Inject(READING_STORE) private readonly store: ReadingStore,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(MONITOR_CONFIG) config: MonitorConfig,
  ) {
    this.utcOffsetMinutes = config.utcOffsetMinutes;
  }

  /**
   * Totals for the local day containing `date`.
   */
  async dailyReport(date: Date): Promise<DailyReport> {
    const from = startOfLocalDay(date, this.utcOffsetMinutes);
    const range: TimeRange = { from, to: addDays(from, 1) };
    const summaries: DeviceDailySummary[] = [];
    const series: ReadingRecord[][] = [];

    for (const device of this.devices.list()) {
      const readings: ReadingRecord[] = [];
      for await (const reading of this.store.query(device.id, range)) {
        readings.push(reading);
      }
      const energyWh = readings.reduce((sum, r) => sum + r.energyWh, 0);
      const cost = readings.reduce((sum, r) => sum + r.cost, 0);
      const averageWatts =
        readings.length > 0 ? readings.reduce((sum, r) => sum + r.powerWatts, 0) / readings.length : 0;

      series.push(readings);

      summaries.push({
        deviceId: device.id,
        name: device.name,
        location: device.location,
        energyKwh: energyWh / 1000,
        cost,
        averageWatts,
        peakWatts: readings.reduce((max, r) => Math.max(max, r.powerWatts), 0),
        readings: readings.length,
        status: classifyDeviceStatus(averageWatts),
      });
    }

    const totalCost = summaries.reduce((sum, d) => sum + d.cost, 0);
    const peakHour = peakHourOf(combinedHourlyLoad(series, this.utcOffsetMinutes));
    const report: DailyReport = {
      date: from.toISOString(),
      devices: summaries,
      totalEnergyKwh: summaries.reduce((sum, d) => sum + d.energyKwh, 0),
      totalCost,
      topConsumers: [...summaries]
        .filter((d) => d.readings > 0)
        .sort((a, b) => b.cost - a.cost)
        .slice(0, TOP_CONSUMERS)
        .map(({ deviceId, name, cost, energyKwh }) => ({ deviceId, name, cost, energyKwh })),
      peakHour: peakHour >= 0 ? peakHour : null,
      projectedMonthlyCost: totalCost * MONTH_DAYS,
    };
    this.logger.log(
      `Daily report ${report.date}: ${report.totalEnergyKwh.toFixed(2)} kWh, $${report.totalCost.toFixed(2)}`,
    );
    return report;
  }

  /**
   * Month-to-date totals and a 30-day projection from the days that have data.
   *
   * @param month 1-12
   */
  async monthlyProjection(year: number, month: number): Promise<MonthlyProjection> {
    const offsetMs = this.utcOffsetMinutes * 60_000;
    const from = new Date(Date.UTC(year, month - 1, 1) - offsetMs);
    const to = new Date(Date.UTC(year, month, 1) - offsetMs);
    const range: TimeRange = { from, to };

    let energyWh = 0;
    let cost = 0;
    let first: number | null = null;
    let last: number | null = null;
    for (const device of this.devices.list()) {
      energyWh += (await this.store.aggregate(device.id, range, 'sum', 'energyWh')) ?? 0;
      cost += (await this.store.aggregate(device.id, range, 'sum', 'cost')) ?? 0;
      for await (const reading of this.store.query(device.id, range)) {
        const t = reading.timestamp.getTime();
        first = first === null ? t : Math.min(first, t);
        last = last === null ? t : Math.max(last, t);
      }
    }

    const daysWithData =
      first !== null && last !== null
        ? Math.round(
            (startOfLocalDay(new Date(last), this.utcOffsetMinutes).getTime() -
              startOfLocalDay(new Date(first), this.utcOffsetMinutes).getTime()) /
              86_400_000,
          ) + 1
        : 0;
    const scale = daysWithData > 0 ? MONTH_DAYS / daysWithData : 0;

    return {
      year,
      month,
      energyKwh: energyWh / 1000,
      cost,
      daysWithData,
      projectedEnergyKwh: (energyWh / 1000) * scale,
      projectedCost: cost * scale,
    };
  }

  /**
   * Latest reading of each device and what the current draw would cost if
   * sustained.
   */
  async currentPowerSummary(): Promise<CurrentPowerSummary> {
    const now = this.clock.now();
    const devices: CurrentPowerSummary['devices'] = [];
    for (const device of this.devices.list()) {
      const latest = await this.store.latest(device.id);
      if (!latest) continue;
      devices.push({
        deviceId: device.id,
        powerWatts: latest.powerWatts,
        status: classifyDeviceStatus(latest.powerWatts),
        readAt: latest.timestamp.toISOString(),
      });
    }

    const totalWatts = devices.reduce((sum, d) => sum + d.powerWatts, 0);
    const projectedDailyCost = (totalWatts / 1000) * HOURS_PER_DAY * this.tariff.rateAt(now);
    return {
      timestamp: now.toISOString(),
      totalWatts,
      activeDevices: devices.filter((d) => d.status === 'active').length,
      devices,
      projectedDailyCost,
      projectedMonthlyCost: projectedDailyCost * MONTH_DAYS,
    };
  }
}
