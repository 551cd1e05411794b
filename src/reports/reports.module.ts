import { Module } from '@nestjs/common';
import { DevicesModule } from '../devices/devices.module';
import { EnergyModule } from '../energy/energy.module';
import { ReadingsModule } from '../readings/readings.module';
import { ReportsService } from './reports.service';

@Module({
  imports: [DevicesModule, EnergyModule, ReadingsModule],
  providers: [ReportsService],
  exports: [ReportsService],
})
export class ReportsModule {}
