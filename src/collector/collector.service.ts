import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import {
  ReadFaultError,
  StoreWriteError,
  formatErrorMessage,
  toError,
} from '../common/errors';
import { CLOCK, Clock, sleep } from '../common/time/clock';
import { CollectorSettings, MONITOR_CONFIG, MonitorConfig } from '../config/monitor-config';
import { Device, DeviceRegistryService } from '../devices/device-registry.service';
import {
  EnergyPredecessor,
  computePower,
  costDelta,
  energyDelta,
} from '../energy/energy-calculator';
import { TariffService } from '../energy/tariff.service';
import {
  READING_STORE,
  ReadingRecord,
  ReadingStore,
} from '../readings/interfaces/reading-store.interface';
import { readSample } from '../sensors/read-sample';
import { SensorSourceRegistry } from '../sensors/sensor-source.registry';

export type CollectorState = 'idle' | 'running' | 'stopping';

/**
 * Outcome of polling one device during a tick.
 * - stored: the reading was appended
 * - skipped: every read attempt failed
 * - dropped: the reading was taken but could not be stored
 */
export interface DeviceTickOutcome {
  deviceId: string;
  status: 'stored' | 'skipped' | 'dropped';
  attempts: number;
  powerWatts?: number;
  energyWh?: number;
  error?: string;
}

/**
 * Tick Result Summary
 */
export interface TickSummary {
  tick: number;
  startedAt: string;
  polled: number;
  stored: number;
  skipped: number;
  dropped: number;
  outcomes: DeviceTickOutcome[];
  durationMs: number;
}

export interface CollectorStatus {
  state: CollectorState;
  ticks: number;
  lastTick: TickSummary | null;
}

/**
 * Thrown internally when every read attempt of a device failed.
 */
class ReadsExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: Error,
  ) {
    super(lastError.message);
    this.name = 'ReadsExhaustedError';
  }
}

/**
 * CollectorService - periodic sampling loop
 *
 * Responsibilities:
 * 1. Cadence: a tick right after start(), then one per polling interval
 * 2. Fan-out: devices polled independently, at most `maxConcurrency` at once
 * 3. Reads: per-attempt timeout, exponential backoff between attempts
 * 4. Accounting: power, trapezoidal energy and cost against the device's
 *    last stored reading
 * 5. Writes: one retry on StoreWriteError, then the reading is dropped
 *
 * A failing device never affects the others or the loop.
 */
@Injectable()
export class CollectorService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(CollectorService.name);
  private readonly settings: CollectorSettings;
  private readonly WRITE_ATTEMPTS = 2;

  private state: CollectorState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<TickSummary> | null = null;
  private stopping: Promise<void> | null = null;
  private tickCount = 0;
  private lastTick: TickSummary | null = null;

  private readonly predecessors = new Map<string, EnergyPredecessor>();
  private readonly lastAttempts = new Map<string, number>();

  constructor(
    private readonly devices: DeviceRegistryService,
    private readonly sensors: SensorSourceRegistry,
    private readonly tariff: TariffService,
    @Inject(READING_STORE) private readonly store: ReadingStore,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(MONITOR_CONFIG) config: MonitorConfig,
  ) {
    this.settings = config.collector;
  }

  onApplicationBootstrap(): void {
    if (this.settings.autostart) {
      this.start();
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  getStatus(): CollectorStatus {
    return { state: this.state, ticks: this.tickCount, lastTick: this.lastTick };
  }

  /**
   * Start sampling. No-op unless the collector is idle.
   */
  start(): void {
    if (this.state !== 'idle') {
      this.logger.debug(`start() ignored while ${this.state}`);
      return;
    }
    this.state = 'running';
    this.logger.log(
      `Collector started: ${this.devices.list().length} device(s) every ${this.settings.pollIntervalMs}ms`,
    );
    this.schedule(0);
  }

  /**
   * Stop sampling. Resolves once the in-flight tick (if any) has finished;
   * no tick is started afterwards.
   */
  stop(): Promise<void> {
    if (this.state === 'idle') return Promise.resolve();
    if (this.stopping) return this.stopping;

    this.state = 'stopping';
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.stopping = this.drain().finally(() => {
      this.state = 'idle';
      this.stopping = null;
      this.logger.log(`Collector stopped after ${this.tickCount} tick(s)`);
    });
    return this.stopping;
  }

  /**
   * Run one tick now. Joins the in-flight tick instead of overlapping it.
   */
  runTick(): Promise<TickSummary> {
    if (!this.inFlight) {
      this.inFlight = this.executeTick().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.loop();
    }, delayMs);
  }

  private async loop(): Promise<void> {
    if (this.state !== 'running') return;
    const started = Date.now();
    try {
      await this.runTick();
    } catch (error) {
      this.logger.error(`Tick failed: ${formatErrorMessage(error)}`);
    }
    if (this.state === 'running') {
      const elapsed = Date.now() - started;
      this.schedule(Math.max(0, this.settings.pollIntervalMs - elapsed));
    }
  }

  private async drain(): Promise<void> {
    if (!this.inFlight) return;
    try {
      await this.inFlight;
    } catch (error) {
      this.logger.error(`In-flight tick failed during stop: ${formatErrorMessage(error)}`);
    }
  }

  private async executeTick(): Promise<TickSummary> {
    const startTime = Date.now();
    const startedAt = this.clock.now();
    const due = this.devices.list().filter((device) => this.isDue(device, startedAt));
    const summary: TickSummary = {
      tick: ++this.tickCount,
      startedAt: startedAt.toISOString(),
      polled: due.length,
      stored: 0,
      skipped: 0,
      dropped: 0,
      outcomes: [],
      durationMs: 0,
    };

    for (let i = 0; i < due.length; i += this.settings.maxConcurrency) {
      const batch = due.slice(i, i + this.settings.maxConcurrency);
      const settled = await Promise.allSettled(batch.map((device) => this.pollDevice(device)));
      settled.forEach((result, index) => {
        summary.outcomes.push(
          result.status === 'fulfilled'
            ? result.value
            : {
                deviceId: batch[index].id,
                status: 'skipped',
                attempts: 0,
                error: formatErrorMessage(result.reason),
              },
        );
      });
    }

    for (const outcome of summary.outcomes) {
      summary[outcome.status]++;
    }
    summary.durationMs = Date.now() - startTime;
    this.lastTick = summary;

    const message = `Tick ${summary.tick}: ${summary.stored}/${summary.polled} stored, ${summary.skipped} skipped, ${summary.dropped} dropped (${summary.durationMs}ms)`;
    if (summary.skipped + summary.dropped > 0) {
      this.logger.warn(message);
    } else {
      this.logger.log(message);
    }
    return summary;
  }

  private isDue(device: Device, now: Date): boolean {
    if (!device.pollingIntervalMs) return true;
    const last = this.lastAttempts.get(device.id);
    if (last === undefined) return true;
    // Half a base period of slack so tick jitter does not skip a whole tick
    return now.getTime() - last >= device.pollingIntervalMs - this.settings.pollIntervalMs / 2;
  }

  private async pollDevice(device: Device): Promise<DeviceTickOutcome> {
    this.lastAttempts.set(device.id, this.clock.now().getTime());

    let raw: number;
    let attempts: number;
    try {
      ({ raw, attempts } = await this.readWithRetry(device));
    } catch (error) {
      const exhausted = error instanceof ReadsExhaustedError ? error : null;
      const message = formatErrorMessage(exhausted?.lastError ?? error);
      this.logger.warn(`Skipping ${device.id} this tick: ${message}`);
      return {
        deviceId: device.id,
        status: 'skipped',
        attempts: exhausted?.attempts ?? 0,
        error: message,
      };
    }

    const timestamp = this.clock.now();
    const powerWatts = computePower(raw, device);
    const energyWh = energyDelta(this.predecessors.get(device.id) ?? null, powerWatts, timestamp);
    const ratePerKwh = this.tariff.rateAt(timestamp);
    const reading: ReadingRecord = {
      deviceId: device.id,
      timestamp,
      rawValue: raw,
      powerWatts,
      energyWh,
      cost: costDelta(energyWh, ratePerKwh),
      ratePerKwh,
    };
    this.logger.debug(
      `${device.id}: raw=${raw.toFixed(5)} power=${powerWatts.toFixed(1)}W energy=${energyWh.toFixed(3)}Wh`,
    );

    const writeError = await this.appendWithRetry(reading);
    if (writeError) {
      return { deviceId: device.id, status: 'dropped', attempts, powerWatts, error: writeError };
    }
    this.predecessors.set(device.id, { timestamp, powerWatts });
    return { deviceId: device.id, status: 'stored', attempts, powerWatts, energyWh };
  }

  private async readWithRetry(device: Device): Promise<{ raw: number; attempts: number }> {
    const maxAttempts = this.settings.readMaxAttempts;
    const baseDelay = this.settings.readRetryBaseMs;
    let lastError: Error = new ReadFaultError(device.id, 'No read attempted');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const raw = await this.readOnce(device);
        return { raw, attempts: attempt };
      } catch (error) {
        lastError = toError(error);
        this.logger.warn(
          `Read attempt ${attempt}/${maxAttempts} failed for ${device.id}: ${lastError.message}`,
        );
        if (attempt < maxAttempts) {
          const delay = baseDelay * Math.pow(2, attempt - 1);
          this.logger.debug(`Retrying ${device.id} in ${delay}ms...`);
          await sleep(delay);
        }
      }
    }
    throw new ReadsExhaustedError(maxAttempts, lastError);
  }

  private readOnce(device: Device): Promise<number> {
    return readSample(
      this.sensors.sourceFor(device.id),
      device.id,
      device.channel,
      this.settings.readTimeoutMs,
    );
  }

  /**
   * @returns null when stored, otherwise the final error message
   */
  private async appendWithRetry(reading: ReadingRecord): Promise<string | null> {
    for (let attempt = 1; attempt <= this.WRITE_ATTEMPTS; attempt++) {
      try {
        await this.store.append(reading);
        return null;
      } catch (error) {
        const writeError =
          error instanceof StoreWriteError
            ? error
            : new StoreWriteError(reading.deviceId, formatErrorMessage(error), toError(error));
        if (attempt < this.WRITE_ATTEMPTS) {
          this.logger.warn(`Write failed, retrying once: ${writeError.message}`);
          continue;
        }
        this.logger.warn(
          `Dropping reading of ${reading.deviceId} at ${reading.timestamp.toISOString()}: ${writeError.message}`,
        );
        return writeError.message;
      }
    }
    return null;
  }
}
