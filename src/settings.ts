// settings.ts

import { Field } from './enums.js';

/**
 * Name used as the log prefix and event namespace for this package.
 */
export const PACKAGE_NAME = 'aircon-reconciler';

/**
 * Device generations differ in how quickly a command shows up in a poll, and in whether
 * the command call itself returns the post-command settings.
 */
export type DeviceProfileName = 'legacy' | 'standard' | 'brp084';

export interface DeviceProfile {
  protectionWindowMs: number;
  commandTimeDetection: boolean;
}

export const DEVICE_PROFILES: Readonly<Record<DeviceProfileName, DeviceProfile>> = {
  // Older boards apply a command a poll or two late and answer writes with a bare "ret=OK"
  legacy: { protectionWindowMs: 60_000, commandTimeDetection: false },
  standard: { protectionWindowMs: 30_000, commandTimeDetection: true },
  // Firmware 2.8.0 re-reads its status right after every write
  brp084: { protectionWindowMs: 20_000, commandTimeDetection: true },
};

export const DEFAULT_PROFILE: DeviceProfileName = 'standard';
export const DEFAULT_DEBOUNCE_COOLDOWN_MS = 5_000;
export const DEFAULT_TEMPERATURE_TOLERANCE = 0;
export const DEFAULT_TEMPERATURE_STEP = 0.5;
export const DEFAULT_UPDATE_INTERVAL_SECONDS = 30;
export const DEFAULT_MIN_REQUEST_DELAY_MS = 500;
export const DEFAULT_QUICK_REFRESH_DELAY_MS = 2_000;
// A command must be confirmable by the regular poll after next, even on a slow unit
export const POLL_INTERVALS_PER_WINDOW = 2.5;

/**
 * Reconciliation settings that can be given globally or per device.
 */
export interface ReconcilerConfig {
  profile?: DeviceProfileName;
  protectionWindowMs?: number | Partial<Record<Field, number>>; // globally or per field
  debounceCooldownMs?: number;
  temperatureTolerance?: number;  // degrees; readings are already rounded to temperatureStep
  temperatureStep?: number;       // normalizer rounding step
  commandTimeDetection?: boolean;
  debug?: boolean;                // enable debug logging
}

/**
 * Describes a single device entry (an air conditioner).
 */
export interface DeviceConfig extends ReconcilerConfig {
  id: string;                  // mandatory
  name?: string;
  updateInterval?: number;     // seconds between polls
  minRequestDelay?: number;    // minimum delay in milliseconds between commands
  quickRefreshDelay?: number;  // milliseconds from an executed command to the confirming poll
}

/**
 * What a device entry contributes to its engine settings.
 */
export type DeviceOverrides = ReconcilerConfig & Pick<DeviceConfig, 'updateInterval'>;

/**
 * Fully resolved settings for one device's reconciliation.
 */
export interface EngineSettings {
  protectionWindowMs: Readonly<Record<Field, number>>;
  debounceCooldownMs: number;
  temperatureTolerance: number;
  temperatureStep: number;
  commandTimeDetection: boolean;
  debug: boolean;
}

function nonNegative(value: number | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : undefined;
}

function resolveWindow(
  field: Field,
  setting: ReconcilerConfig['protectionWindowMs'],
): number | undefined {
  if (typeof setting === 'number') {
    return nonNegative(setting);
  }
  return nonNegative(setting?.[field]);
}

/**
 * Merges profile defaults, global config and device config, in that order of precedence (last wins).
 * Negative or non-finite numbers are ignored in favour of the next fallback.
 *
 * Without an explicit window, a device that states its `updateInterval` is protected for at least
 * {@link POLL_INTERVALS_PER_WINDOW} poll intervals.
 */
export function resolveEngineSettings(
  globalConfig: ReconcilerConfig = {},
  deviceConfig: DeviceOverrides = {},
): EngineSettings {
  const profileName = deviceConfig.profile ?? globalConfig.profile ?? DEFAULT_PROFILE;
  const profile = DEVICE_PROFILES[profileName] ?? DEVICE_PROFILES[DEFAULT_PROFILE];
  const pollIntervalMs = (nonNegative(deviceConfig.updateInterval) ?? 0) * 1000;
  const defaultWindowMs = Math.max(profile.protectionWindowMs, pollIntervalMs * POLL_INTERVALS_PER_WINDOW);

  const windowFor = (field: Field): number =>
    resolveWindow(field, deviceConfig.protectionWindowMs) ??
    resolveWindow(field, globalConfig.protectionWindowMs) ??
    defaultWindowMs;

  return {
    protectionWindowMs: {
      [Field.Power]: windowFor(Field.Power),
      [Field.TargetTemperature]: windowFor(Field.TargetTemperature),
      [Field.FanRate]: windowFor(Field.FanRate),
      [Field.FanDirection]: windowFor(Field.FanDirection),
      [Field.HvacMode]: windowFor(Field.HvacMode),
    },
    debounceCooldownMs:
      nonNegative(deviceConfig.debounceCooldownMs) ??
      nonNegative(globalConfig.debounceCooldownMs) ??
      DEFAULT_DEBOUNCE_COOLDOWN_MS,
    temperatureTolerance:
      nonNegative(deviceConfig.temperatureTolerance) ??
      nonNegative(globalConfig.temperatureTolerance) ??
      DEFAULT_TEMPERATURE_TOLERANCE,
    temperatureStep:
      nonNegative(deviceConfig.temperatureStep) ??
      nonNegative(globalConfig.temperatureStep) ??
      DEFAULT_TEMPERATURE_STEP,
    commandTimeDetection:
      deviceConfig.commandTimeDetection ??
      globalConfig.commandTimeDetection ??
      profile.commandTimeDetection,
    debug: !!(deviceConfig.debug ?? globalConfig.debug),
  };
}
