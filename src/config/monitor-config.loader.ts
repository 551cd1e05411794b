import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, formatErrorMessage } from '../common/errors';
import {
  buildMonitorConfig,
  monitorEnvSchema,
  MonitorConfig,
  MonitorEnv,
} from './monitor-config';

const DEFAULT_CONFIG_FILE = 'config/monitor.json';

/**
 * Read the configuration file and the environment (via ConfigService) and
 * build the MonitorConfig. Runs once, while the application context starts.
 */
export function loadMonitorConfig(configService: ConfigService): MonitorConfig {
  const logger = new Logger('MonitorConfig');
  const file = path.resolve(
    configService.get<string>('MONITOR_CONFIG_FILE', DEFAULT_CONFIG_FILE),
  );

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${file}: ${formatErrorMessage(error)}`,
    );
  }

  const env: MonitorEnv = {};
  for (const key of Object.keys(monitorEnvSchema.shape)) {
    const value = configService.get<string>(key);
    // Empty values fall back to defaults
    if (value !== undefined && String(value).trim() !== '') {
      env[key] = String(value);
    }
  }

  const config = buildMonitorConfig(raw, env);
  logger.log(
    `Loaded ${config.devices.length} device(s) from ${file}; polling every ${config.collector.pollIntervalMs}ms, tariff ${config.tariff.mode}`,
  );
  return config;
}
