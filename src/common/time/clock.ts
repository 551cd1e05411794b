/**
 * Source of the current time. Injected so that scheduling, reading
 * timestamps and cache expiry can be driven by tests.
 */
export interface Clock {
  now(): Date;
}

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = {
  now: () => new Date(),
};

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Shift a UTC instant by a fixed offset so the UTC getters read local wall time.
 */
export function toLocal(timestamp: Date, utcOffsetMinutes: number): Date {
  return new Date(timestamp.getTime() + utcOffsetMinutes * 60_000);
}

/** Local hour of day (0-23). */
export function localHour(timestamp: Date, utcOffsetMinutes: number): number {
  return toLocal(timestamp, utcOffsetMinutes).getUTCHours();
}

/** Local minute of day (0-1439). */
export function localMinuteOfDay(
  timestamp: Date,
  utcOffsetMinutes: number,
): number {
  const local = toLocal(timestamp, utcOffsetMinutes);
  return local.getUTCHours() * 60 + local.getUTCMinutes();
}

export function isWeekend(timestamp: Date, utcOffsetMinutes: number): boolean {
  const day = toLocal(timestamp, utcOffsetMinutes).getUTCDay();
  return day === 0 || day === 6;
}

/**
 * True when `hour` falls inside [start, end). Windows may wrap midnight,
 * e.g. [22, 6].
 */
export function inHourWindow(hour: number, [start, end]: [number, number]): boolean {
  if (start === end) return true;
  return start < end ? hour >= start && hour < end : hour >= start || hour < end;
}

/**
 * Start of the local day containing `timestamp`, as a UTC instant.
 */
export function startOfLocalDay(timestamp: Date, utcOffsetMinutes: number): Date {
  const local = toLocal(timestamp, utcOffsetMinutes).getTime();
  const dayStart = Math.floor(local / DAY_MS) * DAY_MS;
  return new Date(dayStart - utcOffsetMinutes * 60_000);
}

export function addDays(timestamp: Date, days: number): Date {
  return new Date(timestamp.getTime() + days * DAY_MS);
}

export function durationDays(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / DAY_MS;
}

/**
 * Promise-based delay helper.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
