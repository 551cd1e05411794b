import { ApplianceProfile } from '../../devices/device-types';
import { inHourWindow, localHour, localMinuteOfDay } from '../../common/time/clock';

const MINUTE_MS = 60_000;

/**
 * Nominal load (W) of an appliance profile at the given instant, before jitter.
 *
 * Cyclic profiles are phased on epoch minutes, so a cycle always starts on a
 * whole multiple of its period. Hour windows and burst start times are read
 * in local time.
 */
export function profileWatts(
  profile: ApplianceProfile,
  timestamp: Date,
  utcOffsetMinutes = 0,
): number {
  const epochMinute = Math.floor(timestamp.getTime() / MINUTE_MS);

  switch (profile.kind) {
    case 'cyclic':
      return epochMinute % profile.periodMinutes < profile.onMinutes
        ? profile.onWatts
        : profile.offWatts;

    case 'variable': {
      const hour = localHour(timestamp, utcOffsetMinutes);
      if (profile.activeHours && !profile.activeHours.some((w) => inHourWindow(hour, w))) {
        return profile.idleWatts;
      }
      const phase = (2 * Math.PI * (epochMinute % profile.periodMinutes)) / profile.periodMinutes;
      return Math.max(0, profile.baseWatts + profile.amplitudeWatts * Math.sin(phase));
    }

    case 'peak-only': {
      const hour = localHour(timestamp, utcOffsetMinutes);
      return profile.activeHours.some((w) => inHourWindow(hour, w))
        ? profile.watts
        : profile.idleWatts;
    }

    case 'burst': {
      const minute = localMinuteOfDay(timestamp, utcOffsetMinutes);
      const running = profile.startMinutes.some((start) => {
        const offset = (minute - start + 1440) % 1440;
        return offset < profile.durationMinutes;
      });
      return running ? profile.watts : profile.idleWatts;
    }
  }
}
