import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { CLOCK, Clock } from '../common/time/clock';
import { MONITOR_CONFIG, MonitorConfig } from '../config/monitor-config';
import { DeviceRegistryService } from '../devices/device-registry.service';
import { getDeviceType } from '../devices/device-types';
import { ISensorSource } from './interfaces/sensor-source.interface';
import { Mcp3008Source } from './strategies/mcp3008.source';
import { SimulatedSource } from './strategies/simulated.source';
import { ADC_TRANSPORT, AdcTransport } from './transport/adc-transport';

/**
 * SensorSourceRegistry - binds every device to its sensor strategy
 *
 * Hardware devices share the single MCP3008 source; simulated devices each
 * get an appliance model built from their device type's profile.
 */
@Injectable()
export class SensorSourceRegistry implements OnModuleDestroy {
  private readonly logger = new Logger(SensorSourceRegistry.name);
  private readonly sources = new Map<string, ISensorSource>();

  constructor(
    devices: DeviceRegistryService,
    hardwareSource: Mcp3008Source,
    @Inject(ADC_TRANSPORT) private readonly transport: AdcTransport,
    @Inject(CLOCK) clock: Clock,
    @Inject(MONITOR_CONFIG) config: MonitorConfig,
  ) {
    for (const device of devices.list()) {
      const source =
        device.source === 'hardware'
          ? hardwareSource
          : new SimulatedSource(
              device.id,
              getDeviceType(device.type).profile,
              device,
              clock,
              { utcOffsetMinutes: config.utcOffsetMinutes },
            );
      this.sources.set(device.id, source);
    }
    const hardwareCount = devices.list().filter((d) => d.source === 'hardware').length;
    this.logger.log(
      `Sensor sources ready: ${hardwareCount} hardware, ${this.sources.size - hardwareCount} simulated`,
    );
  }

  /**
   * @throws Error when the device has no source
   */
  sourceFor(deviceId: string): ISensorSource {
    const source = this.sources.get(deviceId);
    if (!source) {
      throw new Error(`No sensor source registered for device: ${deviceId}`);
    }
    return source;
  }

  async onModuleDestroy(): Promise<void> {
    await this.transport.close();
  }
}
