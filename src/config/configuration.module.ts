import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CLOCK, systemClock } from '../common/time/clock';
import { MONITOR_CONFIG } from './monitor-config';
import { loadMonitorConfig } from './monitor-config.loader';

/**
 * ConfigurationModule
 *
 * Global providers shared by every feature module:
 * - MONITOR_CONFIG: validated, frozen MonitorConfig
 * - CLOCK: wall clock (replaced by a manual clock in tests)
 */
@Global()
@Module({
  providers: [
    {
      provide: MONITOR_CONFIG,
      useFactory: (configService: ConfigService) =>
        loadMonitorConfig(configService),
      inject: [ConfigService],
    },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [MONITOR_CONFIG, CLOCK],
})
export class ConfigurationModule {}
