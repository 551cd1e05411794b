import { Inject, Injectable, Logger } from '@nestjs/common';
import { AnalysisError, formatErrorMessage, toError } from '../common/errors';
import { CLOCK, Clock, durationDays } from '../common/time/clock';
import { AnalysisPolicy, MONITOR_CONFIG, MonitorConfig } from '../config/monitor-config';
import { Device, DeviceRegistryService } from '../devices/device-registry.service';
import { getDeviceType } from '../devices/device-types';
import { TariffService } from '../energy/tariff.service';
import {
  READING_STORE,
  ReadingRecord,
  ReadingStore,
  TimeRange,
} from '../readings/interfaces/reading-store.interface';
import { DraftInsight, deviceInsights, rankInsights, systemInsights } from './insight-rules';
import {
  AnalysisResult,
  AnalysisScope,
  DeviceAnalysis,
  EfficiencyScore,
  PeriodJson,
} from './interfaces/analysis.types';
import { IInsightProducer } from './interfaces/insight-producer.interface';
import {
  classifyPattern,
  combinedHourlyLoad,
  computeUsageStatistics,
  detectAnomalies,
  hourlyDutyCycles,
  peakHourOf,
  sampleDurations,
  scoreEfficiency,
  stdev,
} from './statistics';

const MONTH_DAYS = 30;

interface DeviceWork {
  device: Device;
  readings: ReadingRecord[];
  analysis: DeviceAnalysis;
}

/**
 * RuleBasedAnalyzer - statistics, pattern, anomalies, efficiency score and
 * template insights from stored readings.
 *
 * Read-only against the store. A device whose analysis throws is logged and
 * left out of the result; an unknown device yields an empty result.
 */
@Injectable()
export class RuleBasedAnalyzer implements IInsightProducer {
  readonly name = 'rule-based';
  private readonly logger = new Logger(RuleBasedAnalyzer.name);
  private readonly policy: AnalysisPolicy;

  constructor(
    private readonly devices: DeviceRegistryService,
    private readonly tariff: TariffService,
    @Inject(READING_STORE) private readonly store: ReadingStore,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(MONITOR_CONFIG) private readonly config: MonitorConfig,
  ) {
    this.policy = config.analysis;
  }

  async analyze(scope: AnalysisScope, period: TimeRange): Promise<AnalysisResult> {
    const generatedAt = this.clock.now();
    const validUntil = new Date(generatedAt.getTime() + this.config.cacheTtlMs);
    const periodJson: PeriodJson = {
      from: period.from.toISOString(),
      to: period.to.toISOString(),
    };
    const result: AnalysisResult = {
      scope,
      period: periodJson,
      generatedAt: generatedAt.toISOString(),
      validUntil: validUntil.toISOString(),
      statistics: null,
      pattern: null,
      anomalies: [],
      efficiencyScore: null,
      devices: [],
      insights: [],
    };

    const targets = this.resolveScope(scope);
    const spanMs = period.to.getTime() - period.from.getTime();
    if (spanMs < this.config.collector.pollIntervalMs) {
      this.logger.debug(`Period shorter than one polling interval; nothing to analyze`);
      return result;
    }

    const work: DeviceWork[] = [];
    const drafts: DraftInsight[] = [];
    const monthlyScale = MONTH_DAYS / durationDays(period.from, period.to);

    for (const device of targets) {
      try {
        const readings = await this.collect(device.id, period);
        if (readings.length === 0) continue;
        const analysis = this.analyzeDevice(device, readings, periodJson);
        work.push({ device, readings, analysis });
        drafts.push(...this.deviceDrafts(device, readings, analysis, monthlyScale));
      } catch (error) {
        const failure = new AnalysisError(
          `Analysis failed: ${formatErrorMessage(error)}`,
          device.id,
          toError(error),
        );
        this.logger.error(failure.message);
      }
    }

    if (work.length === 0) {
      this.logger.debug(`No readings for ${describeScope(scope)} in ${periodJson.from}..${periodJson.to}`);
      return result;
    }

    result.devices = work.map((w) => w.analysis);
    result.anomalies = work.flatMap((w) => w.analysis.anomalies);

    if (scope.kind === 'device') {
      const [only] = work;
      result.statistics = only.analysis.statistics;
      result.pattern = only.analysis.pattern;
      result.efficiencyScore = only.analysis.efficiencyScore;
    } else {
      result.efficiencyScore = systemScore(result.devices, periodJson);
      drafts.push(
        ...systemInsights({
          devices: result.devices,
          deviceNames: new Map(work.map((w) => [w.device.id, w.device.name])),
          peakHour: peakHourOf(
            combinedHourlyLoad(
              work.map((w) => w.readings),
              this.config.utcOffsetMinutes,
            ),
          ),
          totalEnergyWh: sumOf(result.devices, (d) => d.statistics.totalEnergyWh),
          totalCost: sumOf(result.devices, (d) => d.statistics.totalCost),
          monthlyScale,
        }),
      );
    }

    result.insights = rankInsights(drafts, generatedAt, validUntil);
    this.logger.log(
      `Analyzed ${describeScope(scope)}: ${work.length} device(s), ${result.anomalies.length} anomalies, ${result.insights.length} insights`,
    );
    return result;
  }

  private resolveScope(scope: AnalysisScope): Device[] {
    if (scope.kind === 'system') return this.devices.list();
    const device = this.devices.find(scope.deviceId);
    if (!device) {
      this.logger.warn(`Unknown device ${scope.deviceId}; returning an empty analysis`);
      return [];
    }
    return [device];
  }

  private async collect(deviceId: string, period: TimeRange): Promise<ReadingRecord[]> {
    const readings: ReadingRecord[] = [];
    for await (const reading of this.store.query(deviceId, period)) {
      readings.push(reading);
    }
    return readings;
  }

  private analyzeDevice(
    device: Device,
    readings: ReadingRecord[],
    period: PeriodJson,
  ): DeviceAnalysis {
    const onThreshold =
      device.onThresholdWatts ?? this.policy.onThresholdFraction * device.ratedWatts.max;
    const statistics = computeUsageStatistics(readings, onThreshold, this.config.utcOffsetMinutes);
    const peakToAverageRatio =
      statistics.meanWatts > 0 ? statistics.peakWatts / statistics.meanWatts : 1;
    const dutyCycleVolatility = stdev(hourlyDutyCycles(readings, onThreshold));
    const { score, factors } = scoreEfficiency(
      { peakToAverageRatio, dutyCycleVolatility },
      this.policy,
    );

    return {
      deviceId: device.id,
      deviceName: device.name,
      statistics,
      pattern: classifyPattern(statistics, device.ratedWatts.max, this.policy),
      anomalies: detectAnomalies(device.id, readings, statistics, this.policy.anomalySigma),
      efficiencyScore: { deviceId: device.id, period, score, factors },
    };
  }

  private deviceDrafts(
    device: Device,
    readings: ReadingRecord[],
    analysis: DeviceAnalysis,
    monthlyScale: number,
  ): DraftInsight[] {
    const { totalEnergyWh, totalCost } = analysis.statistics;
    const lastTimestamp = readings[readings.length - 1].timestamp;
    const ratePerKwh =
      totalEnergyWh > 0 ? totalCost / (totalEnergyWh / 1000) : this.tariff.rateAt(lastTimestamp);

    let peakEnergyWh = 0;
    let peakPremium = 0;
    if (this.tariff.mode === 'time-of-use') {
      for (const reading of readings) {
        if (reading.energyWh <= 0) continue;
        if (this.tariff.quote(reading.timestamp).period !== 'peak') continue;
        peakEnergyWh += reading.energyWh;
        peakPremium +=
          (reading.energyWh / 1000) *
          Math.max(0, reading.ratePerKwh - this.tariff.cheapestRate(reading.timestamp));
      }
    }

    return deviceInsights({
      device,
      type: getDeviceType(device.type),
      readings,
      durations: sampleDurations(readings, this.config.collector.pollIntervalMs / 1000),
      analysis,
      policy: this.policy,
      ratePerKwh,
      monthlyScale,
      peakEnergyWh,
      peakShiftSavings: peakPremium * monthlyScale,
    });
  }

}

/**
 * Energy-weighted mean of device scores (plain mean when nothing was drawn).
 */
function systemScore(devices: readonly DeviceAnalysis[], period: PeriodJson): EfficiencyScore {
  const totalEnergy = sumOf(devices, (d) => d.statistics.totalEnergyWh);
  const weight = (d: DeviceAnalysis) =>
    totalEnergy > 0 ? d.statistics.totalEnergyWh / totalEnergy : 1 / devices.length;
  const weighted = (pick: (d: DeviceAnalysis) => number) =>
    sumOf(devices, (d) => weight(d) * pick(d));

  return {
    deviceId: null,
    period,
    score: Math.round(weighted((d) => d.efficiencyScore.score) * 10) / 10,
    factors: {
      peakToAverageRatio: weighted((d) => d.efficiencyScore.factors.peakToAverageRatio),
      dutyCycleVolatility: weighted((d) => d.efficiencyScore.factors.dutyCycleVolatility),
      dutyCycleConsistency: weighted((d) => d.efficiencyScore.factors.dutyCycleConsistency),
      peakPenalty: weighted((d) => d.efficiencyScore.factors.peakPenalty),
      volatilityPenalty: weighted((d) => d.efficiencyScore.factors.volatilityPenalty),
    },
  };
}

function sumOf<T>(items: readonly T[], pick: (item: T) => number): number {
  return items.reduce((sum, item) => sum + pick(item), 0);
}

export function describeScope(scope: AnalysisScope): string {
  return scope.kind === 'device' ? `device ${scope.deviceId}` : 'system';
}
