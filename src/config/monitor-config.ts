import { z } from 'zod';
import { ConfigurationError } from '../common/errors';
import { isKnownDeviceType } from '../devices/device-types';

/**
 * Injection token for the immutable MonitorConfig built at start-up.
 */
export const MONITOR_CONFIG = Symbol('MONITOR_CONFIG');

const hourWindowSchema = z.tuple([
  z.number().int().min(0).max(23),
  z.number().int().min(0).max(24),
]);

const deviceEntrySchema = z
  .object({
    name: z.string().min(1),
    location: z.string().default(''),
    type: z.string().min(1),
    channel: z.number().int().min(0).max(7),
    ctRatio: z.number().positive(),
    voltage: z.number().positive(),
    calibrationFactor: z.number().positive().default(1.0),
    ratedWatts: z.object({
      min: z.number().nonnegative(),
      max: z.number().positive(),
    }),
    source: z.enum(['hardware', 'simulated']).default('simulated'),
    pollingIntervalMs: z.number().int().positive().optional(),
    onThresholdWatts: z.number().nonnegative().optional(),
  })
  .refine((device) => device.ratedWatts.min <= device.ratedWatts.max, {
    message: 'ratedWatts.min must not exceed ratedWatts.max',
    path: ['ratedWatts'],
  });

const tariffSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('flat'),
    ratePerKwh: z.number().nonnegative(),
  }),
  z.object({
    mode: z.literal('time-of-use'),
    rates: z.object({
      peak: z.number().nonnegative(),
      midPeak: z.number().nonnegative(),
      offPeak: z.number().nonnegative(),
    }),
    peakHours: z.object({
      weekday: z.array(hourWindowSchema),
      weekend: z.array(hourWindowSchema),
    }),
    offPeakHours: z.array(hourWindowSchema),
    seasonalMultipliers: z
      .object({
        winter: z.number().positive(),
        spring: z.number().positive(),
        summer: z.number().positive(),
        fall: z.number().positive(),
      })
      .optional(),
  }),
]);

const hardwareSchema = z
  .object({
    spiBus: z.number().int().nonnegative().default(0),
    spiDevice: z.number().int().nonnegative().default(0),
    speedHz: z.number().int().positive().default(1_350_000),
    vref: z.number().positive().default(3.3),
    biasVolts: z.number().optional(),
  })
  .default({});

const analysisSchema = z
  .object({
    onThresholdFraction: z.number().min(0).max(1).default(0.05),
    alwaysOnDutyCycle: z.number().min(0).max(1).default(0.8),
    intermittentDutyCycle: z.number().min(0).max(1).default(0.15),
    peakOnlyRatio: z.number().min(0).default(0.5),
    anomalySigma: z.number().positive().default(3),
    efficiencyThreshold: z.number().min(0).max(100).default(70),
    peakPenaltyPerRatio: z.number().nonnegative().default(8),
    maxPeakPenalty: z.number().nonnegative().default(50),
    volatilityPenaltyScale: z.number().nonnegative().default(100),
    maxVolatilityPenalty: z.number().nonnegative().default(50),
    standbyFloorWatts: z.number().nonnegative().default(1),
  })
  .default({});

/**
 * Schema of the configuration file (config/monitor.json by default).
 */
export const monitorFileSchema = z.object({
  devices: z.record(deviceEntrySchema),
  tariff: tariffSchema.optional(),
  hardware: hardwareSchema,
  analysis: analysisSchema,
});

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Schema of the environment values read through ConfigService.
 */
export const monitorEnvSchema = z.object({
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  READ_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  READ_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  READ_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(1_000),
  COLLECTOR_MAX_CONCURRENCY: z.coerce.number().int().min(1).default(8),
  COLLECTOR_AUTOSTART: booleanFlag.default('true'),
  ELECTRICITY_RATE: z.coerce.number().nonnegative().default(0.1168),
  ANALYSIS_CACHE_TTL_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(6 * 60 * 60 * 1000),
  CALIBRATION_SAMPLES: z.coerce.number().int().min(1).default(10),
  UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(0),
});

/** Raw environment values, as strings, keyed by variable name. */
export type MonitorEnv = Record<string, string | undefined>;
export type TariffConfig = z.infer<typeof tariffSchema>;
export type HardwareConfig = z.infer<typeof hardwareSchema>;
export type AnalysisPolicy = z.infer<typeof analysisSchema>;
export type HourWindow = z.infer<typeof hourWindowSchema>;

export type SensorKind = 'hardware' | 'simulated';

/**
 * Static description of one monitored device.
 */
export interface DeviceConfig {
  id: string;
  name: string;
  location: string;
  type: string;
  channel: number;
  ctRatio: number;
  voltage: number;
  calibrationFactor: number;
  ratedWatts: { min: number; max: number };
  source: SensorKind;
  pollingIntervalMs?: number;
  onThresholdWatts?: number;
}

export interface CollectorSettings {
  pollIntervalMs: number;
  readTimeoutMs: number;
  readMaxAttempts: number;
  readRetryBaseMs: number;
  maxConcurrency: number;
  autostart: boolean;
}

export interface MonitorConfig {
  devices: readonly DeviceConfig[];
  tariff: TariffConfig;
  hardware: HardwareConfig;
  analysis: AnalysisPolicy;
  collector: CollectorSettings;
  cacheTtlMs: number;
  calibrationSamples: number;
  utcOffsetMinutes: number;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
  );
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate the configuration file and environment and combine them into a
 * frozen MonitorConfig.
 *
 * @throws ConfigurationError on schema violations, unknown device types or
 *   hardware channel collisions
 */
export function buildMonitorConfig(
  file: unknown,
  env: MonitorEnv,
): MonitorConfig {
  const parsedFile = monitorFileSchema.safeParse(file);
  if (!parsedFile.success) {
    throw new ConfigurationError(
      'Invalid monitor configuration file',
      formatIssues(parsedFile.error),
    );
  }
  const parsedEnv = monitorEnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigurationError(
      'Invalid monitor environment',
      formatIssues(parsedEnv.error),
    );
  }

  const { devices: deviceEntries, tariff, hardware, analysis } = parsedFile.data;
  const settings = parsedEnv.data;

  const devices: DeviceConfig[] = Object.entries(deviceEntries).map(
    ([id, entry]) => ({ id, ...entry }),
  );

  const issues: string[] = [];
  if (devices.length === 0) {
    issues.push('devices: at least one device is required');
  }
  for (const device of devices) {
    if (!isKnownDeviceType(device.type)) {
      issues.push(`devices.${device.id}.type: unknown device type '${device.type}'`);
    }
  }
  const channels = new Map<number, string>();
  for (const device of devices.filter((d) => d.source === 'hardware')) {
    const owner = channels.get(device.channel);
    if (owner) {
      issues.push(
        `devices.${device.id}.channel: channel ${device.channel} already used by ${owner}`,
      );
    }
    channels.set(device.channel, device.id);
  }
  if (analysis.intermittentDutyCycle > analysis.alwaysOnDutyCycle) {
    issues.push(
      'analysis.intermittentDutyCycle: must not exceed analysis.alwaysOnDutyCycle',
    );
  }
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid monitor configuration', issues);
  }

  return deepFreeze<MonitorConfig>({
    devices,
    tariff: tariff ?? { mode: 'flat', ratePerKwh: settings.ELECTRICITY_RATE },
    hardware,
    analysis,
    collector: {
      pollIntervalMs: settings.POLL_INTERVAL_MS,
      readTimeoutMs: settings.READ_TIMEOUT_MS,
      readMaxAttempts: settings.READ_MAX_ATTEMPTS,
      readRetryBaseMs: settings.READ_RETRY_BASE_MS,
      maxConcurrency: settings.COLLECTOR_MAX_CONCURRENCY,
      autostart: settings.COLLECTOR_AUTOSTART,
    },
    cacheTtlMs: settings.ANALYSIS_CACHE_TTL_MS,
    calibrationSamples: settings.CALIBRATION_SAMPLES,
    utcOffsetMinutes: settings.UTC_OFFSET_MINUTES,
  });
}
