import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../common/time/clock';
import { TimeRange } from '../readings/interfaces/reading-store.interface';
import { InsightCache } from './insight-cache';
import { AnalysisResult, AnalysisScope } from './interfaces/analysis.types';
import { IInsightProducer, INSIGHT_PRODUCER } from './interfaces/insight-producer.interface';
import { describeScope } from './rule-based.analyzer';

/**
 * AnalysisService - cached entry point for analysis requests
 *
 * Results are cached per (scope, period) until their `validUntil`. Within
 * that window repeated requests get the same result object; concurrent
 * requests for the same key share one computation.
 */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);
  private readonly cache = new InsightCache<AnalysisResult>();
  private readonly pending = new Map<string, Promise<AnalysisResult>>();

  constructor(
    @Inject(INSIGHT_PRODUCER) private readonly producer: IInsightProducer,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  analyze(scope: AnalysisScope, period: TimeRange): Promise<AnalysisResult> {
    const key = cacheKey(scope, period);
    const cached = this.cache.get(key, this.clock.now());
    if (cached) {
      this.logger.debug(`Cache hit for ${key}`);
      return Promise.resolve(cached);
    }

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const computation = this.producer
      .analyze(scope, period)
      .then((result) => {
        this.cache.set(key, result, new Date(result.validUntil), this.clock.now());
        this.logger.debug(`Cached ${describeScope(scope)} analysis until ${result.validUntil}`);
        return result;
      })
      .finally(() => this.pending.delete(key));
    this.pending.set(key, computation);
    return computation;
  }

  /**
   * Drop every cached result, e.g. after recalibrating a device.
   */
  invalidate(): void {
    this.cache.clear();
  }
}

export function cacheKey(scope: AnalysisScope, period: TimeRange): string {
  const scopeKey = scope.kind === 'device' ? `device:${scope.deviceId}` : 'system';
  return `${scopeKey}|${period.from.toISOString()}|${period.to.toISOString()}`;
}
