import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  HourWindow,
  MONITOR_CONFIG,
  MonitorConfig,
  TariffConfig,
} from '../config/monitor-config';
import { inHourWindow, isWeekend, localHour, toLocal } from '../common/time/clock';

export type TariffPeriod = 'flat' | 'peak' | 'mid-peak' | 'off-peak';
export type Season = 'winter' | 'spring' | 'summer' | 'fall';

export interface RateQuote {
  period: TariffPeriod;
  season: Season;
  ratePerKwh: number;
}

/**
 * TariffService - electricity price at a point in time
 *
 * Flat tariffs return one rate. Time-of-use tariffs pick peak, mid-peak or
 * off-peak from the local hour (peak windows differ on weekends) and apply
 * the seasonal multiplier.
 */
@Injectable()
export class TariffService {
  private readonly logger = new Logger(TariffService.name);
  private readonly tariff: TariffConfig;
  private readonly utcOffsetMinutes: number;

  constructor(@Inject(MONITOR_CONFIG) config: MonitorConfig) {
    this.tariff = config.tariff;
    this.utcOffsetMinutes = config.utcOffsetMinutes;
    this.logger.debug(`Tariff mode: ${this.tariff.mode}`);
  }

  get mode(): TariffConfig['mode'] {
    return this.tariff.mode;
  }

  rateAt(timestamp: Date): number {
    return this.quote(timestamp).ratePerKwh;
  }

  quote(timestamp: Date): RateQuote {
    const season = seasonOf(toLocal(timestamp, this.utcOffsetMinutes).getUTCMonth());
    const tariff = this.tariff;
    if (tariff.mode === 'flat') {
      return { period: 'flat', season, ratePerKwh: tariff.ratePerKwh };
    }

    const hour = localHour(timestamp, this.utcOffsetMinutes);
    const peakWindows = isWeekend(timestamp, this.utcOffsetMinutes)
      ? tariff.peakHours.weekend
      : tariff.peakHours.weekday;
    const multiplier = tariff.seasonalMultipliers?.[season] ?? 1;

    let period: TariffPeriod = 'mid-peak';
    let base = tariff.rates.midPeak;
    if (matchesAny(hour, peakWindows)) {
      period = 'peak';
      base = tariff.rates.peak;
    } else if (matchesAny(hour, tariff.offPeakHours)) {
      period = 'off-peak';
      base = tariff.rates.offPeak;
    }
    return { period, season, ratePerKwh: base * multiplier };
  }

  /**
   * Lowest rate the tariff offers in the given season; used to price the
   * benefit of moving load out of peak hours.
   */
  cheapestRate(timestamp: Date): number {
    const tariff = this.tariff;
    if (tariff.mode === 'flat') return tariff.ratePerKwh;
    const season = seasonOf(toLocal(timestamp, this.utcOffsetMinutes).getUTCMonth());
    const multiplier = tariff.seasonalMultipliers?.[season] ?? 1;
    return Math.min(tariff.rates.offPeak, tariff.rates.midPeak, tariff.rates.peak) * multiplier;
  }
}

function matchesAny(hour: number, windows: readonly HourWindow[]): boolean {
  return windows.some((window) => inHourWindow(hour, window));
}

/**
 * Meteorological season for a 0-based month (northern hemisphere).
 */
export function seasonOf(month: number): Season {
  if (month === 11 || month <= 1) return 'winter';
  if (month <= 4) return 'spring';
  if (month <= 7) return 'summer';
  return 'fall';
}
