import { AnalysisPolicy } from '../config/monitor-config';
import { isWeekend, localHour } from '../common/time/clock';
import { ReadingRecord } from '../readings/interfaces/reading-store.interface';
import {
  Anomaly,
  EfficiencyFactors,
  UsagePattern,
  UsageStatistics,
} from './interfaces/analysis.types';

const HOUR_MS = 60 * 60 * 1000;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

/** Population standard deviation. */
export function stdev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  return Math.sqrt(mean(values.map((v) => (v - avg) ** 2)));
}

/**
 * Descriptive statistics of one device's readings. `readings` must be in
 * ascending time order and non-empty.
 */
export function computeUsageStatistics(
  readings: readonly ReadingRecord[],
  onThresholdWatts: number,
  utcOffsetMinutes: number,
): UsageStatistics {
  const powers = readings.map((r) => r.powerWatts);

  let peakIndex = 0;
  let minWatts = powers[0];
  powers.forEach((p, i) => {
    if (p > powers[peakIndex]) peakIndex = i;
    if (p < minWatts) minWatts = p;
  });

  const weekend = readings.filter((r) => isWeekend(r.timestamp, utcOffsetMinutes));
  const weekday = readings.filter((r) => !isWeekend(r.timestamp, utcOffsetMinutes));
  const weekdayMean = mean(weekday.map((r) => r.powerWatts));
  const weekendRatio =
    weekend.length > 0 && weekday.length > 0 && weekdayMean > 0
      ? mean(weekend.map((r) => r.powerWatts)) / weekdayMean
      : null;

  return {
    sampleCount: readings.length,
    meanWatts: mean(powers),
    medianWatts: median(powers),
    stdevWatts: stdev(powers),
    minWatts,
    peakWatts: powers[peakIndex],
    peakAt: readings[peakIndex].timestamp.toISOString(),
    dutyCycle: dutyCycle(powers, onThresholdWatts),
    onThresholdWatts,
    totalEnergyWh: readings.reduce((sum, r) => sum + r.energyWh, 0),
    totalCost: readings.reduce((sum, r) => sum + r.cost, 0),
    peakHour: busiestHour(readings, utcOffsetMinutes),
    weekendToWeekdayRatio: weekendRatio,
  };
}

/**
 * Share of samples strictly above the on threshold.
 */
export function dutyCycle(powers: readonly number[], onThresholdWatts: number): number {
  if (powers.length === 0) return 0;
  return powers.filter((p) => p > onThresholdWatts).length / powers.length;
}

/**
 * Mean power per local hour of day; null for hours without samples.
 */
export function hourlyMeans(
  readings: readonly ReadingRecord[],
  utcOffsetMinutes: number,
): Array<number | null> {
  const sums = new Array<number>(24).fill(0);
  const counts = new Array<number>(24).fill(0);
  for (const reading of readings) {
    const hour = localHour(reading.timestamp, utcOffsetMinutes);
    sums[hour] += reading.powerWatts;
    counts[hour]++;
  }
  return sums.map((sum, hour) => (counts[hour] > 0 ? sum / counts[hour] : null));
}

/**
 * Index of the largest non-null value; ties go to the earlier hour. -1 when
 * every hour is empty.
 */
export function peakHourOf(load: ReadonlyArray<number | null>): number {
  let best = -1;
  load.forEach((value, hour) => {
    if (value === null) return;
    const current = best >= 0 ? load[best] : null;
    if (current === null || value > current) best = hour;
  });
  return best;
}

/**
 * Local hour of day with the highest mean power.
 */
export function busiestHour(readings: readonly ReadingRecord[], utcOffsetMinutes: number): number {
  return peakHourOf(hourlyMeans(readings, utcOffsetMinutes));
}

/**
 * Hour-by-hour sum of several devices' hourly means.
 */
export function combinedHourlyLoad(
  series: ReadonlyArray<readonly ReadingRecord[]>,
  utcOffsetMinutes: number,
): Array<number | null> {
  const load = new Array<number | null>(24).fill(null);
  for (const readings of series) {
    hourlyMeans(readings, utcOffsetMinutes).forEach((value, hour) => {
      if (value !== null) load[hour] = (load[hour] ?? 0) + value;
    });
  }
  return load;
}

/**
 * Duty cycle of each clock hour that holds at least one sample.
 */
export function hourlyDutyCycles(
  readings: readonly ReadingRecord[],
  onThresholdWatts: number,
): number[] {
  const buckets = new Map<number, number[]>();
  for (const reading of readings) {
    const bucket = Math.floor(reading.timestamp.getTime() / HOUR_MS);
    const powers = buckets.get(bucket) ?? [];
    powers.push(reading.powerWatts);
    buckets.set(bucket, powers);
  }
  return [...buckets.values()].map((powers) => dutyCycle(powers, onThresholdWatts));
}

export function classifyPattern(
  stats: Pick<UsageStatistics, 'dutyCycle' | 'peakWatts'>,
  ratedMaxWatts: number,
  policy: AnalysisPolicy,
): UsagePattern {
  if (stats.dutyCycle > policy.alwaysOnDutyCycle) return 'always-on';
  if (stats.dutyCycle >= policy.intermittentDutyCycle) return 'intermittent';
  if (stats.dutyCycle > 0 && stats.peakWatts >= policy.peakOnlyRatio * ratedMaxWatts) {
    return 'peak-only';
  }
  return 'idle';
}

/**
 * Readings more than `sigma` standard deviations above the mean. A flat
 * series (stdev 0) has no anomalies.
 */
export function detectAnomalies(
  deviceId: string,
  readings: readonly ReadingRecord[],
  stats: Pick<UsageStatistics, 'meanWatts' | 'stdevWatts'>,
  sigma: number,
): Anomaly[] {
  if (!(stats.stdevWatts > 0)) return [];
  const threshold = stats.meanWatts + sigma * stats.stdevWatts;
  return readings
    .filter((r) => r.powerWatts > threshold)
    .map((r) => ({
      deviceId,
      timestamp: r.timestamp.toISOString(),
      powerWatts: r.powerWatts,
      thresholdWatts: threshold,
      sigma: (r.powerWatts - stats.meanWatts) / stats.stdevWatts,
    }));
}

/**
 * Efficiency score in [0, 100]:
 *
 *   100 - peakPenalty(peak / mean) - volatilityPenalty(stdev of hourly duty cycles)
 *
 * Each penalty is capped; a non-finite input costs the full cap.
 */
export function scoreEfficiency(
  inputs: { peakToAverageRatio: number; dutyCycleVolatility: number },
  policy: AnalysisPolicy,
): { score: number; factors: EfficiencyFactors } {
  const peakPenalty = cappedPenalty(
    policy.peakPenaltyPerRatio * (inputs.peakToAverageRatio - 1),
    policy.maxPeakPenalty,
  );
  const volatilityPenalty = cappedPenalty(
    policy.volatilityPenaltyScale * inputs.dutyCycleVolatility,
    policy.maxVolatilityPenalty,
  );
  const raw = 100 - peakPenalty - volatilityPenalty;
  const score = Number.isFinite(raw) ? Math.min(100, Math.max(0, raw)) : 0;
  const consistency = Number.isFinite(inputs.dutyCycleVolatility)
    ? 1 - Math.min(1, Math.max(0, 2 * inputs.dutyCycleVolatility))
    : 0;

  return {
    score: Math.round(score * 10) / 10,
    factors: {
      peakToAverageRatio: inputs.peakToAverageRatio,
      dutyCycleVolatility: inputs.dutyCycleVolatility,
      dutyCycleConsistency: consistency,
      peakPenalty,
      volatilityPenalty,
    },
  };
}

function cappedPenalty(value: number, cap: number): number {
  const limit = Number.isFinite(cap) ? Math.max(0, cap) : 100;
  if (Number.isNaN(value)) return limit;
  return Math.min(limit, Math.max(0, value));
}

/**
 * Seconds each reading stands for: the gap to the next reading, and for the
 * last one the median gap (or `fallbackSeconds` for a single reading).
 */
export function sampleDurations(
  readings: readonly ReadingRecord[],
  fallbackSeconds: number,
): number[] {
  const gaps: number[] = [];
  for (let i = 1; i < readings.length; i++) {
    gaps.push((readings[i].timestamp.getTime() - readings[i - 1].timestamp.getTime()) / 1000);
  }
  const tail = gaps.length > 0 ? median(gaps) : fallbackSeconds;
  return [...gaps, tail];
}

/**
 * Energy (Wh) drawn above `baselineWatts`.
 */
export function excessEnergyWh(
  readings: readonly ReadingRecord[],
  durations: readonly number[],
  baselineWatts: number,
): number {
  return readings.reduce(
    (sum, r, i) => sum + (Math.max(0, r.powerWatts - baselineWatts) * durations[i]) / 3600,
    0,
  );
}
