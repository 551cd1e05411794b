/**
 * Calibrate one device against a reference load of known wattage.
 *
 * Usage:
 *   npm run build && npm run calibrate -- <deviceId> <knownWatts>
 *
 * The reference load must be running on the device's circuit. The new factor
 * is printed; copy it into the device's `calibrationFactor` in the
 * configuration file to keep it across restarts.
 */
import 'reflect-metadata';
import { Logger, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { CalibrationModule } from '../src/calibration/calibration.module';
import { CalibrationService } from '../src/calibration/calibration.service';
import { formatErrorMessage } from '../src/common/errors';
import { ConfigurationModule } from '../src/config/configuration.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), ConfigurationModule, CalibrationModule],
})
class CalibrationToolModule {}

async function main(): Promise<void> {
  const [deviceId, wattsArg] = process.argv.slice(2);
  const knownWatts = Number(wattsArg);
  if (!deviceId || !Number.isFinite(knownWatts)) {
    console.error('Usage: calibrate <deviceId> <knownWatts>');
    process.exitCode = 2;
    return;
  }

  const app = await NestFactory.createApplicationContext(CalibrationToolModule);
  try {
    const result = await app.get(CalibrationService).calibrate(deviceId, knownWatts);
    console.log(JSON.stringify(result, null, 2));
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  new Logger('Calibrate').error(formatErrorMessage(error));
  process.exitCode = 1;
});
