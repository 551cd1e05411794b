import { z } from 'zod';
import catalogueJson from './data/device-types.json';

const hourWindowSchema = z.tuple([
  z.number().int().min(0).max(23),
  z.number().int().min(0).max(24),
]);

/**
 * Load shape used by the simulated sensor for each device type.
 */
export const applianceProfileSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('cyclic'),
    onWatts: z.number().nonnegative(),
    offWatts: z.number().nonnegative(),
    periodMinutes: z.number().int().positive(),
    onMinutes: z.number().int().nonnegative(),
  }),
  z.object({
    kind: z.literal('variable'),
    baseWatts: z.number().nonnegative(),
    amplitudeWatts: z.number().nonnegative(),
    periodMinutes: z.number().int().positive(),
    idleWatts: z.number().nonnegative(),
    activeHours: z.array(hourWindowSchema).optional(),
  }),
  z.object({
    kind: z.literal('peak-only'),
    watts: z.number().nonnegative(),
    idleWatts: z.number().nonnegative(),
    activeHours: z.array(hourWindowSchema).min(1),
  }),
  z.object({
    kind: z.literal('burst'),
    watts: z.number().nonnegative(),
    idleWatts: z.number().nonnegative(),
    startMinutes: z.array(z.number().int().min(0).max(1439)).min(1),
    durationMinutes: z.number().int().positive(),
  }),
]);

export type ApplianceProfile = z.infer<typeof applianceProfileSchema>;

const deviceTypeSchema = z.object({
  label: z.string(),
  alwaysOnExpected: z.boolean(),
  profile: applianceProfileSchema,
  tips: z.array(z.string()).min(1),
});

export type DeviceTypeDefinition = z.infer<typeof deviceTypeSchema>;

/**
 * Catalogue of known device types, keyed by the `type` tag used in the
 * device table.
 */
export const DEVICE_TYPES: Readonly<Record<string, DeviceTypeDefinition>> =
  z.record(deviceTypeSchema).parse(catalogueJson);

export function isKnownDeviceType(type: string): boolean {
  return Object.prototype.hasOwnProperty.call(DEVICE_TYPES, type);
}

/**
 * Look up a device type, falling back to `generic` for tags added to the
 * catalogue after the configuration was validated.
 */
export function getDeviceType(type: string): DeviceTypeDefinition {
  return isKnownDeviceType(type) ? DEVICE_TYPES[type] : DEVICE_TYPES.generic;
}
