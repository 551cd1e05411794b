import { Module } from '@nestjs/common';
import { MONITOR_CONFIG, MonitorConfig } from '../config/monitor-config';
import { DevicesModule } from '../devices/devices.module';
import { SensorSourceRegistry } from './sensor-source.registry';
import { Mcp3008Source } from './strategies/mcp3008.source';
import { ADC_TRANSPORT, SpiAdcTransport } from './transport/adc-transport';

/**
 * SensorsModule
 *
 * Components:
 * - SensorSourceRegistry: resolves the sensor strategy for a device
 * - Mcp3008Source: hardware strategy (SPI ADC)
 * - SimulatedSource: appliance model strategy, built per device
 * - ADC_TRANSPORT: SPI bus, opened on first use
 */
@Module({
  imports: [DevicesModule],
  providers: [
    {
      provide: ADC_TRANSPORT,
      useFactory: (config: MonitorConfig) => new SpiAdcTransport(config.hardware),
      inject: [MONITOR_CONFIG],
    },
    Mcp3008Source,
    SensorSourceRegistry,
  ],
  exports: [SensorSourceRegistry],
})
export class SensorsModule {}
