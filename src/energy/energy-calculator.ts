/**
 * Pure conversions from raw sensor values to power, energy and cost.
 *
 * Units: raw is the sensor's native value, power in W, energy in Wh,
 * rate in currency per kWh.
 */

/** Front-end parameters needed to scale a raw sample to watts. */
export interface PowerScaling {
  ctRatio: number;
  voltage: number;
  calibrationFactor: number;
}

/** The last successfully stored reading of a device. */
export interface EnergyPredecessor {
  timestamp: Date;
  powerWatts: number;
}

export type DeviceStatus = 'active' | 'standby' | 'off';

export const ACTIVE_THRESHOLD_WATTS = 50;
export const STANDBY_THRESHOLD_WATTS = 1;

/**
 * Scale a raw sample to watts. Negative results (inverted CT wiring, ADC
 * offset) clamp to zero, as do non-finite ones.
 */
export function computePower(raw: number, scaling: PowerScaling): number {
  const watts =
    raw * scaling.ctRatio * scaling.voltage * scaling.calibrationFactor;
  return Number.isFinite(watts) && watts > 0 ? watts : 0;
}

/**
 * Trapezoidal energy (Wh) for the interval between two power samples.
 * Returns 0 for the first reading of a device and for a non-positive gap.
 */
export function energyDelta(
  previous: EnergyPredecessor | null,
  powerWatts: number,
  timestamp: Date,
): number {
  if (!previous) return 0;
  const elapsedSeconds = (timestamp.getTime() - previous.timestamp.getTime()) / 1000;
  return trapezoidWh(previous.powerWatts, powerWatts, elapsedSeconds);
}

export function trapezoidWh(
  previousWatts: number,
  currentWatts: number,
  elapsedSeconds: number,
): number {
  if (!(elapsedSeconds > 0)) return 0;
  return (((previousWatts + currentWatts) / 2) * elapsedSeconds) / 3600;
}

export function costDelta(energyWh: number, ratePerKwh: number): number {
  return (energyWh / 1000) * ratePerKwh;
}

/**
 * Classify a device by its average draw.
 */
export function classifyDeviceStatus(averageWatts: number): DeviceStatus {
  if (averageWatts >= ACTIVE_THRESHOLD_WATTS) return 'active';
  if (averageWatts >= STANDBY_THRESHOLD_WATTS) return 'standby';
  return 'off';
}
