import { Module } from '@nestjs/common';
import { DevicesModule } from '../devices/devices.module';
import { SensorsModule } from '../sensors/sensors.module';
import { CalibrationService } from './calibration.service';

@Module({
  imports: [DevicesModule, SensorsModule],
  providers: [CalibrationService],
  exports: [CalibrationService],
})
export class CalibrationModule {}
