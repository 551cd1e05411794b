import { TimeRange } from '../../readings/interfaces/reading-store.interface';
import { AnalysisResult, AnalysisScope } from './analysis.types';

export const INSIGHT_PRODUCER = Symbol('INSIGHT_PRODUCER');

/**
 * IInsightProducer - turns stored readings into statistics and insights
 *
 * The rule-based analyzer is the shipped implementation; a learned model can
 * be bound to INSIGHT_PRODUCER without touching callers.
 */
export interface IInsightProducer {
  readonly name: string;

  /**
   * Analyze a device or the whole system over a period. Never writes to the
   * store. Too little data yields a result with no insights, not an error.
   */
  analyze(scope: AnalysisScope, period: TimeRange): Promise<AnalysisResult>;
}
