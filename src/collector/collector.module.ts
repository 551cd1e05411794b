import { Module } from '@nestjs/common';
import { DevicesModule } from '../devices/devices.module';
import { EnergyModule } from '../energy/energy.module';
import { ReadingsModule } from '../readings/readings.module';
import { SensorsModule } from '../sensors/sensors.module';
import { CollectorService } from './collector.service';

/**
 * CollectorModule
 *
 * Components:
 * - CollectorService: sampling loop (read -> power -> energy/cost -> append)
 */
@Module({
  imports: [DevicesModule, SensorsModule, EnergyModule, ReadingsModule],
  providers: [CollectorService],
  exports: [CollectorService],
})
export class CollectorModule {}
