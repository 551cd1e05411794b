import { Inject, Injectable, Logger } from '@nestjs/common';
import { DeviceConfig, MONITOR_CONFIG, MonitorConfig } from '../config/monitor-config';
import { getDeviceType, DeviceTypeDefinition } from './device-types';

/**
 * A monitored device. Everything except `calibrationFactor` is fixed for the
 * lifetime of the process.
 */
export type Device = Readonly<Omit<DeviceConfig, 'calibrationFactor'>> & {
  calibrationFactor: number;
};

/**
 * DeviceRegistryService - in-memory table of monitored devices
 *
 * Built from MonitorConfig at start-up. Calibration is the only writer.
 */
@Injectable()
export class DeviceRegistryService {
  private readonly logger = new Logger(DeviceRegistryService.name);
  private readonly devices = new Map<string, Device>();

  constructor(@Inject(MONITOR_CONFIG) config: MonitorConfig) {
    for (const entry of config.devices) {
      this.devices.set(entry.id, { ...entry, ratedWatts: { ...entry.ratedWatts } });
    }
    this.logger.log(
      `Registered ${this.devices.size} device(s): ${this.list().map((d) => d.id).join(', ')}`,
    );
  }

  list(): Device[] {
    return [...this.devices.values()];
  }

  find(deviceId: string): Device | undefined {
    return this.devices.get(deviceId);
  }

  /**
   * @throws Error when the device is not registered
   */
  get(deviceId: string): Device {
    const device = this.devices.get(deviceId);
    if (!device) {
      throw new Error(`Unknown device: ${deviceId}`);
    }
    return device;
  }

  typeOf(deviceId: string): DeviceTypeDefinition {
    return getDeviceType(this.get(deviceId).type);
  }

  updateCalibrationFactor(deviceId: string, factor: number): Device {
    const device = this.get(deviceId);
    const previous = device.calibrationFactor;
    device.calibrationFactor = factor;
    this.logger.log(
      `Calibration factor for ${deviceId}: ${previous.toFixed(4)} -> ${factor.toFixed(4)}`,
    );
    return device;
  }
}
