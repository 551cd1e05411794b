import { AnalysisPolicy } from '../config/monitor-config';
import { Device } from '../devices/device-registry.service';
import { DeviceTypeDefinition } from '../devices/device-types';
import { ReadingRecord } from '../readings/interfaces/reading-store.interface';
import {
  DeviceAnalysis,
  Insight,
  InsightCategory,
  PriorityLevel,
} from './interfaces/analysis.types';
import { excessEnergyWh } from './statistics';

/** An insight before it is ranked and stamped. */
export type DraftInsight = Omit<Insight, 'priority' | 'priorityLevel' | 'generatedAt' | 'validUntil'>;

/**
 * Share of the excess energy each rule expects the user to recover.
 */
const RECOVERABLE_FRACTION = {
  maintenance: 1.0,
  efficiency: 0.2,
  alwaysOn: 0.3,
  standby: 1.0,
  peakShift: 0.5,
} as const;

/**
 * Static feasibility weight per category; lower means easier to act on.
 * Breaks ties between insights with equal savings.
 */
export const FEASIBILITY_WEIGHT: Record<InsightCategory, number> = {
  'usage-pattern': 1,
  environmental: 1,
  cost: 2,
  efficiency: 2,
  maintenance: 3,
};

const HIGH_PRIORITY_SAVINGS = 5;
const MEDIUM_PRIORITY_SAVINGS = 1;

export interface DeviceRuleContext {
  device: Device;
  type: DeviceTypeDefinition;
  readings: readonly ReadingRecord[];
  /** Seconds each reading stands for. */
  durations: readonly number[];
  analysis: DeviceAnalysis;
  policy: AnalysisPolicy;
  /** Average price paid per kWh over the period. */
  ratePerKwh: number;
  /** Factor from the analyzed period to 30 days. */
  monthlyScale: number;
  /** Monthly saving from moving peak-rate consumption to the cheapest rate. */
  peakShiftSavings: number;
  peakEnergyWh: number;
}

export interface SystemRuleContext {
  devices: readonly DeviceAnalysis[];
  deviceNames: ReadonlyMap<string, string>;
  /** Local hour with the highest combined mean draw, -1 when unknown. */
  peakHour: number;
  totalEnergyWh: number;
  totalCost: number;
  monthlyScale: number;
}

export function monthlySavings(
  excessWh: number,
  ctx: Pick<DeviceRuleContext, 'ratePerKwh' | 'monthlyScale'>,
  fraction: number,
): number {
  return roundMoney((excessWh / 1000) * ctx.ratePerKwh * fraction * ctx.monthlyScale);
}

/**
 * Device-level rules. Each returns zero or one draft.
 */
export function deviceInsights(ctx: DeviceRuleContext): DraftInsight[] {
  return [
    maintenanceRule(ctx),
    efficiencyRule(ctx),
    alwaysOnRule(ctx),
    standbyRule(ctx),
    peakShiftRule(ctx),
    costSummaryRule(ctx),
  ].filter((draft): draft is DraftInsight => draft !== null);
}

function maintenanceRule(ctx: DeviceRuleContext): DraftInsight | null {
  const { anomalies, statistics } = ctx.analysis;
  if (anomalies.length === 0) return null;
  const worst = anomalies.reduce((a, b) => (b.powerWatts > a.powerWatts ? b : a));
  const excess = excessEnergyWh(ctx.readings, ctx.durations, worst.thresholdWatts);
  return draft(
    ctx,
    'maintenance',
    `${ctx.device.name} spiked to ${watts(worst.powerWatts)} W at ${worst.timestamp}, ` +
      `${worst.sigma.toFixed(1)} standard deviations above its ${watts(statistics.meanWatts)} W average ` +
      `(${anomalies.length} reading(s) flagged). Inspect it for a failing component.`,
    monthlySavings(excess, ctx, RECOVERABLE_FRACTION.maintenance),
  );
}

function efficiencyRule(ctx: DeviceRuleContext): DraftInsight | null {
  const { efficiencyScore, statistics } = ctx.analysis;
  if (efficiencyScore.score >= ctx.policy.efficiencyThreshold) return null;
  const excess = excessEnergyWh(ctx.readings, ctx.durations, statistics.meanWatts);
  return draft(
    ctx,
    'efficiency',
    `${ctx.device.name} scored ${efficiencyScore.score}/100: its peaks reach ` +
      `${efficiencyScore.factors.peakToAverageRatio.toFixed(1)}x its average draw. ${ctx.type.tips[0]}`,
    monthlySavings(excess, ctx, RECOVERABLE_FRACTION.efficiency),
  );
}

function alwaysOnRule(ctx: DeviceRuleContext): DraftInsight | null {
  if (ctx.analysis.pattern !== 'always-on' || ctx.type.alwaysOnExpected) return null;
  const { statistics } = ctx.analysis;
  const excess = excessEnergyWh(ctx.readings, ctx.durations, statistics.onThresholdWatts);
  return draft(
    ctx,
    'usage-pattern',
    `${ctx.device.name} was on ${percent(statistics.dutyCycle)}% of the time, ` +
      `which is unusual for a ${ctx.type.label.toLowerCase()}. ${ctx.type.tips[ctx.type.tips.length - 1]}`,
    monthlySavings(excess, ctx, RECOVERABLE_FRACTION.alwaysOn),
  );
}

function standbyRule(ctx: DeviceRuleContext): DraftInsight | null {
  const { onThresholdWatts } = ctx.analysis.statistics;
  const floor = ctx.policy.standbyFloorWatts;
  let standbyWh = 0;
  let standbySeconds = 0;
  ctx.readings.forEach((reading, i) => {
    if (reading.powerWatts > floor && reading.powerWatts <= onThresholdWatts) {
      standbyWh += (reading.powerWatts * ctx.durations[i]) / 3600;
      standbySeconds += ctx.durations[i];
    }
  });
  if (standbyWh <= 0 || standbySeconds <= 0) return null;
  const averageStandby = (standbyWh * 3600) / standbySeconds;
  return draft(
    ctx,
    'environmental',
    `${ctx.device.name} draws ${averageStandby.toFixed(1)} W while idle ` +
      `(${(standbyWh / 1000).toFixed(2)} kWh over the period). ` +
      'A switched outlet or smart plug would remove this standby load.',
    monthlySavings(standbyWh, ctx, RECOVERABLE_FRACTION.standby),
  );
}

function peakShiftRule(ctx: DeviceRuleContext): DraftInsight | null {
  if (ctx.peakEnergyWh <= 0 || ctx.peakShiftSavings <= 0) return null;
  const savings = roundMoney(ctx.peakShiftSavings * RECOVERABLE_FRACTION.peakShift);
  return draft(
    ctx,
    'cost',
    `${ctx.device.name} used ${kwh(ctx.peakEnergyWh)} kWh during peak-rate hours. ` +
      `Moving that use to off-peak hours would save about $${savings.toFixed(2)} per month.`,
    savings,
  );
}

function costSummaryRule(ctx: DeviceRuleContext): DraftInsight | null {
  const { totalEnergyWh, totalCost } = ctx.analysis.statistics;
  if (totalEnergyWh <= 0) return null;
  return draft(
    ctx,
    'cost',
    `${ctx.device.name} used ${kwh(totalEnergyWh)} kWh costing $${totalCost.toFixed(2)} ` +
      `over the period, about $${(totalCost * ctx.monthlyScale).toFixed(2)} per month.`,
    0,
  );
}

/**
 * Household-level rules.
 */
export function systemInsights(ctx: SystemRuleContext): DraftInsight[] {
  const drafts: DraftInsight[] = [];
  if (ctx.peakHour >= 0) {
    drafts.push(
      systemDraft(
        'usage-pattern',
        `Household demand peaks around ${String(ctx.peakHour).padStart(2, '0')}:00. ` +
          'Running flexible loads outside this hour lowers peak demand.',
      ),
    );
  }
  if (ctx.totalEnergyWh > 0) {
    drafts.push(
      systemDraft(
        'cost',
        `Projected monthly electricity cost: $${(ctx.totalCost * ctx.monthlyScale).toFixed(2)} ` +
          `($${ctx.totalCost.toFixed(2)} for ${kwh(ctx.totalEnergyWh)} kWh over the period).`,
      ),
    );
  }
  if (ctx.devices.length >= 2 && ctx.totalEnergyWh > 0) {
    const top = ctx.devices.reduce((a, b) =>
      b.statistics.totalEnergyWh > a.statistics.totalEnergyWh ? b : a,
    );
    const share = top.statistics.totalEnergyWh / ctx.totalEnergyWh;
    drafts.push(
      systemDraft(
        'usage-pattern',
        `${ctx.deviceNames.get(top.deviceId) ?? top.deviceId} accounts for ${percent(share)}% of monitored energy use.`,
      ),
    );
  }
  return drafts;
}

/**
 * Order by savings (highest first), then feasibility weight, then device and
 * message for a stable order; stamp rank, level and validity.
 */
export function rankInsights(
  drafts: readonly DraftInsight[],
  generatedAt: Date,
  validUntil: Date,
): Insight[] {
  return [...drafts]
    .sort(
      (a, b) =>
        b.estimatedSavings - a.estimatedSavings ||
        FEASIBILITY_WEIGHT[a.category] - FEASIBILITY_WEIGHT[b.category] ||
        (a.deviceId ?? '').localeCompare(b.deviceId ?? '') ||
        a.message.localeCompare(b.message),
    )
    .map((insight, index) => ({
      ...insight,
      priority: index + 1,
      priorityLevel: priorityLevel(insight.estimatedSavings),
      generatedAt: generatedAt.toISOString(),
      validUntil: validUntil.toISOString(),
    }));
}

export function priorityLevel(estimatedSavings: number): PriorityLevel {
  if (estimatedSavings >= HIGH_PRIORITY_SAVINGS) return 'high';
  if (estimatedSavings >= MEDIUM_PRIORITY_SAVINGS) return 'medium';
  return 'low';
}

function draft(
  ctx: DeviceRuleContext,
  category: InsightCategory,
  message: string,
  estimatedSavings: number,
): DraftInsight {
  return { scope: 'device', deviceId: ctx.device.id, category, message, estimatedSavings };
}

function systemDraft(category: InsightCategory, message: string): DraftInsight {
  return { scope: 'system', deviceId: null, category, message, estimatedSavings: 0 };
}

function roundMoney(value: number): number {
  return Number.isFinite(value) ? Math.round(value * 100) / 100 : 0;
}

function watts(value: number): string {
  return value.toFixed(0);
}

function kwh(wh: number): string {
  return (wh / 1000).toFixed(2);
}

function percent(fraction: number): string {
  return (fraction * 100).toFixed(0);
}
