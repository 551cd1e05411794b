import { createHash } from 'crypto';
import { ApplianceProfile } from '../../devices/device-types';
import { Clock } from '../../common/time/clock';
import { ISensorSource } from '../interfaces/sensor-source.interface';
import { profileWatts } from '../simulation/appliance-profile';

export interface SimulatedSourceOptions {
  /** Multiplicative noise bound; 0.05 means ±5 %. */
  jitterFraction?: number;
  utcOffsetMinutes?: number;
}

/**
 * SimulatedSource - deterministic appliance model
 *
 * Emits the raw value the front end would produce for the profile's load at
 * the clock's current time. Jitter is derived from a hash of the device id
 * and the sample second, so the same device and time always give the same
 * value.
 */
export class SimulatedSource implements ISensorSource {
  readonly name = 'simulated';
  private readonly jitterFraction: number;
  private readonly utcOffsetMinutes: number;

  constructor(
    private readonly deviceId: string,
    private readonly profile: ApplianceProfile,
    private readonly scaling: { ctRatio: number; voltage: number },
    private readonly clock: Clock,
    options: SimulatedSourceOptions = {},
  ) {
    this.jitterFraction = options.jitterFraction ?? 0.05;
    this.utcOffsetMinutes = options.utcOffsetMinutes ?? 0;
  }

  read(_channel: number): Promise<number> {
    const now = this.clock.now();
    const nominal = profileWatts(this.profile, now, this.utcOffsetMinutes);
    const jitter = (2 * unitNoise(this.deviceId, now) - 1) * this.jitterFraction;
    const watts = nominal * (1 + jitter);
    return Promise.resolve(watts / (this.scaling.ctRatio * this.scaling.voltage));
  }
}

/**
 * Uniform value in [0, 1] keyed on device and second.
 */
export function unitNoise(seed: string, timestamp: Date): number {
  const second = Math.floor(timestamp.getTime() / 1000);
  const digest = createHash('sha256').update(`${seed}:${second}`).digest();
  return digest.readUInt32BE(0) / 0xffffffff;
}
