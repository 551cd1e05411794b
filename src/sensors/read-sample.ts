import {
  MonitorError,
  ReadFaultError,
  ReadTimeoutError,
  formatErrorMessage,
  toError,
} from '../common/errors';
import { ISensorSource } from './interfaces/sensor-source.interface';

/**
 * Take one sample from `source` for `deviceId`, bounded by `timeoutMs`.
 *
 * Failures come back as a ReadTimeoutError or a ReadFaultError tagged with
 * `deviceId`. Errors a source raised under its own tag (e.g. `mcp3008:ch2`)
 * are wrapped so the message leads with the device.
 */
export async function readSample(
  source: ISensorSource,
  deviceId: string,
  channel: number,
  timeoutMs: number,
): Promise<number> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ReadTimeoutError(deviceId, timeoutMs)), timeoutMs);
  });

  try {
    const raw = await Promise.race([source.read(channel), timeout]);
    if (!Number.isFinite(raw)) {
      throw new ReadFaultError(deviceId, `Sensor returned a non-numeric value: ${raw}`);
    }
    return raw;
  } catch (error) {
    if (error instanceof MonitorError && error.deviceId === deviceId) throw error;
    throw new ReadFaultError(deviceId, formatErrorMessage(error), toError(error));
  } finally {
    clearTimeout(timer);
  }
}
