import { Inject, Injectable, Logger } from '@nestjs/common';
import { CalibrationError, formatErrorMessage, toError } from '../common/errors';
import { MONITOR_CONFIG, MonitorConfig } from '../config/monitor-config';
import { DeviceRegistryService } from '../devices/device-registry.service';
import { readSample } from '../sensors/read-sample';
import { SensorSourceRegistry } from '../sensors/sensor-source.registry';

/** Raw means below this are treated as "no signal". */
const ZERO_SIGNAL_EPSILON = 1e-9;

export interface CalibrationResult {
  deviceId: string;
  knownWatts: number;
  samples: number;
  meanRaw: number;
  previousFactor: number;
  factor: number;
}

/**
 * CalibrationService - derives a device's calibration factor from a
 * reference load of known wattage.
 *
 *   factor = knownWatts / mean(raw * ctRatio * voltage)
 *
 * The device keeps its previous factor when calibration fails.
 */
@Injectable()
export class CalibrationService {
  private readonly logger = new Logger(CalibrationService.name);
  private readonly sampleCount: number;
  private readonly readTimeoutMs: number;

  constructor(
    private readonly devices: DeviceRegistryService,
    private readonly sensors: SensorSourceRegistry,
    @Inject(MONITOR_CONFIG) config: MonitorConfig,
  ) {
    this.sampleCount = config.calibrationSamples;
    this.readTimeoutMs = config.collector.readTimeoutMs;
  }

  /**
   * @throws CalibrationError for an unknown device, a non-positive reference
   *   load, a failed or timed-out sample read or a flat-zero signal
   */
  async calibrate(deviceId: string, knownWatts: number): Promise<CalibrationResult> {
    const device = this.devices.find(deviceId);
    if (!device) {
      throw new CalibrationError(deviceId, 'Unknown device');
    }
    if (!Number.isFinite(knownWatts) || knownWatts <= 0) {
      throw new CalibrationError(deviceId, `Reference load must be positive, got ${knownWatts}`);
    }

    const source = this.sensors.sourceFor(deviceId);
    const samples: number[] = [];
    for (let i = 0; i < this.sampleCount; i++) {
      try {
        samples.push(await readSample(source, deviceId, device.channel, this.readTimeoutMs));
      } catch (error) {
        throw new CalibrationError(
          deviceId,
          `Sample ${i + 1}/${this.sampleCount} failed: ${formatErrorMessage(error)}`,
          toError(error),
        );
      }
    }

    const meanRaw = samples.reduce((sum, value) => sum + value, 0) / samples.length;
    if (samples.every((value) => Math.abs(value) < ZERO_SIGNAL_EPSILON)) {
      throw new CalibrationError(deviceId, 'No signal: sensor disconnected or load not running');
    }
    const scaledMean = meanRaw * device.ctRatio * device.voltage;
    if (Math.abs(scaledMean) < ZERO_SIGNAL_EPSILON || scaledMean < 0) {
      throw new CalibrationError(
        deviceId,
        `Mean reading ${meanRaw} cannot be scaled to ${knownWatts}W`,
      );
    }

    const factor = knownWatts / scaledMean;
    const previousFactor = device.calibrationFactor;
    this.devices.updateCalibrationFactor(deviceId, factor);
    this.logger.log(
      `Calibrated ${deviceId} against ${knownWatts}W over ${samples.length} samples: factor ${factor.toFixed(4)}`,
    );
    return { deviceId, knownWatts, samples: samples.length, meanRaw, previousFactor, factor };
  }
}
