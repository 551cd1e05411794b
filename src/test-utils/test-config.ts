import { MonitorConfig, MonitorEnv, buildMonitorConfig } from '../config/monitor-config';

export interface TestDeviceEntry {
  name?: string;
  location?: string;
  type?: string;
  channel?: number;
  ctRatio?: number;
  voltage?: number;
  calibrationFactor?: number;
  ratedWatts?: { min: number; max: number };
  source?: 'hardware' | 'simulated';
  pollingIntervalMs?: number;
  onThresholdWatts?: number;
}

/**
 * Build a MonitorConfig through the real validation path. Devices default to
 * a unity front end (ctRatio 1, voltage 1) so raw values equal watts.
 */
export function buildTestConfig(
  devices: Record<string, TestDeviceEntry>,
  env: MonitorEnv = {},
  file: Record<string, unknown> = {},
): MonitorConfig {
  const entries = Object.fromEntries(
    Object.entries(devices).map(([id, entry], index) => [
      id,
      {
        name: entry.name ?? id,
        location: entry.location ?? 'Test Bench',
        type: entry.type ?? 'generic',
        channel: entry.channel ?? index,
        ctRatio: entry.ctRatio ?? 1,
        voltage: entry.voltage ?? 1,
        calibrationFactor: entry.calibrationFactor,
        ratedWatts: entry.ratedWatts ?? { min: 0, max: 200 },
        source: entry.source ?? 'simulated',
        pollingIntervalMs: entry.pollingIntervalMs,
        onThresholdWatts: entry.onThresholdWatts,
      },
    ]),
  );
  return buildMonitorConfig(
    { tariff: { mode: 'flat', ratePerKwh: 0.2 }, ...file, devices: entries },
    { READ_RETRY_BASE_MS: '0', READ_TIMEOUT_MS: '200', ...env },
  );
}
