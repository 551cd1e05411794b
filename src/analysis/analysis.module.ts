import { Module } from '@nestjs/common';
import { DevicesModule } from '../devices/devices.module';
import { EnergyModule } from '../energy/energy.module';
import { ReadingsModule } from '../readings/readings.module';
import { AnalysisService } from './analysis.service';
import { INSIGHT_PRODUCER } from './interfaces/insight-producer.interface';
import { RuleBasedAnalyzer } from './rule-based.analyzer';

/**
 * AnalysisModule
 *
 * Components:
 * - RuleBasedAnalyzer: statistics, patterns, anomalies, scores, insights
 * - INSIGHT_PRODUCER: the analyzer in use (rule-based)
 * - AnalysisService: cache in front of the producer
 */
@Module({
  imports: [DevicesModule, EnergyModule, ReadingsModule],
  providers: [
    RuleBasedAnalyzer,
    { provide: INSIGHT_PRODUCER, useExisting: RuleBasedAnalyzer },
    AnalysisService,
  ],
  exports: [AnalysisService],
})
export class AnalysisModule {}
