/**
 * Result types of the analyzer. Everything here is plain JSON: timestamps are
 * ISO-8601 strings, absent values are null.
 */

export type AnalysisScope = { kind: 'device'; deviceId: string } | { kind: 'system' };

export type UsagePattern = 'always-on' | 'intermittent' | 'peak-only' | 'idle';

export type InsightCategory =
  | 'efficiency'
  | 'usage-pattern'
  | 'cost'
  | 'maintenance'
  | 'environmental';

export type PriorityLevel = 'high' | 'medium' | 'low';

export interface PeriodJson {
  from: string;
  to: string;
}

export interface UsageStatistics {
  sampleCount: number;
  meanWatts: number;
  medianWatts: number;
  stdevWatts: number;
  minWatts: number;
  peakWatts: number;
  peakAt: string;
  /** Share of samples above `onThresholdWatts`, 0..1. */
  dutyCycle: number;
  onThresholdWatts: number;
  totalEnergyWh: number;
  totalCost: number;
  /** Local hour of day (0-23) with the highest mean draw. */
  peakHour: number;
  /** Weekend mean / weekday mean; null unless both are present. */
  weekendToWeekdayRatio: number | null;
}

export interface Anomaly {
  deviceId: string;
  timestamp: string;
  powerWatts: number;
  thresholdWatts: number;
  /** Distance above the mean in standard deviations. */
  sigma: number;
}

export interface EfficiencyFactors {
  peakToAverageRatio: number;
  dutyCycleVolatility: number;
  dutyCycleConsistency: number;
  peakPenalty: number;
  volatilityPenalty: number;
}

export interface EfficiencyScore {
  /** null for the system-wide score */
  deviceId: string | null;
  period: PeriodJson;
  score: number;
  factors: EfficiencyFactors;
}

export interface Insight {
  scope: 'device' | 'system';
  deviceId: string | null;
  category: InsightCategory;
  message: string;
  /** Currency per 30 days. */
  estimatedSavings: number;
  /** Rank within the result, 1 first. */
  priority: number;
  priorityLevel: PriorityLevel;
  generatedAt: string;
  validUntil: string;
}

export interface DeviceAnalysis {
  deviceId: string;
  deviceName: string;
  statistics: UsageStatistics;
  pattern: UsagePattern;
  anomalies: Anomaly[];
  efficiencyScore: EfficiencyScore;
}

export interface AnalysisResult {
  scope: AnalysisScope;
  period: PeriodJson;
  generatedAt: string;
  validUntil: string;
  /** The device's statistics for device scope; null for system scope. */
  statistics: UsageStatistics | null;
  pattern: UsagePattern | null;
  anomalies: Anomaly[];
  efficiencyScore: EfficiencyScore | null;
  devices: DeviceAnalysis[];
  insights: Insight[];
}
