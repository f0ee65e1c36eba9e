// normalize.ts

import { ALL_FIELDS, FanDirection, FanRate, Field, HvacMode, PowerState, isField } from './enums.js';
import { DEFAULT_TEMPERATURE_STEP } from './settings.js';
import { SettingsMap } from './state/Snapshot.js';
import { formatTemperature, parseTemperature, roundTemperature } from './utils.js';

/**
 * Key-value settings as a controller reports them, e.g. `{ pow: '1', mode: '0200', stemp: '23.0' }`.
 */
export type RawDeviceSettings = Readonly<Record<string, string | number | boolean | null | undefined>>;

export interface NormalizeOptions {
  temperatureStep?: number;
}

export interface RejectedValue {
  field: Field;
  value: string;
}

export interface NormalizedSettings {
  values: SettingsMap;
  unknownKeys: string[];   // keys outside the tracked fields
  rejected: RejectedValue[]; // tracked fields whose value could not be interpreted
}

// Firmware 2.8.0 reports modes and fan rates as hex codes
const MODE_CODES: Readonly<Record<string, HvacMode>> = {
  '0300': HvacMode.Auto,
  '0200': HvacMode.Cool,
  '0100': HvacMode.Heat,
  '0000': HvacMode.Fan,
  '0500': HvacMode.Dry,
};

const FAN_RATE_CODES: Readonly<Record<string, FanRate>> = {
  '0A00': FanRate.Auto,
  '0B00': FanRate.Quiet,
  '0300': FanRate.Level1,
  '0400': FanRate.Level2,
  '0500': FanRate.Level3,
  '0600': FanRate.Level4,
  '0700': FanRate.Level5,
};

// Reported for settings the current mode does not have, e.g. stemp in fan mode
const NOT_APPLICABLE = '--';

const FAN_DIRECTION_ALIASES: Readonly<Record<string, FanDirection>> = {
  '3d': FanDirection.Both,
};

function lookup<T extends string>(allowed: readonly T[], value: string): T | undefined {
  return allowed.find(candidate => candidate === value);
}

function normalizePower(value: string): PowerState | undefined {
  switch (value.toLowerCase()) {
    case '1':
    case 'on':
    case 'true':
      return PowerState.On;
    case '0':
    case 'off':
    case 'false':
      return PowerState.Off;
    default:
      return undefined;
  }
}

function normalizeMode(value: string): HvacMode | undefined {
  return MODE_CODES[value.toUpperCase()] ?? lookup(Object.values(HvacMode), value.toLowerCase());
}

function normalizeFanRate(value: string): FanRate | undefined {
  return FAN_RATE_CODES[value.toUpperCase()] ?? lookup(Object.values(FanRate), value.toLowerCase());
}

function normalizeFanDirection(value: string): FanDirection | undefined {
  const lower = value.toLowerCase();
  return FAN_DIRECTION_ALIASES[lower] ?? lookup(Object.values(FanDirection), lower);
}

function normalizeTemperature(value: string, step: number): string | undefined {
  const parsed = parseTemperature(value);
  if (Number.isNaN(parsed)) {
    return undefined;
  }
  return formatTemperature(roundTemperature(parsed, step));
}

/**
 * Translates a controller's settings map into engine values.
 * A value that cannot be interpreted leaves its field absent rather than failing the whole map.
 */
export function normalizeSettings(raw: RawDeviceSettings, options: NormalizeOptions = {}): NormalizedSettings {
  const step = options.temperatureStep ?? DEFAULT_TEMPERATURE_STEP;
  const result: NormalizedSettings = { values: {}, unknownKeys: [], rejected: [] };

  for (const [key, rawValue] of Object.entries(raw)) {
    if (!isField(key)) {
      result.unknownKeys.push(key);
      continue;
    }
    if (rawValue === null || rawValue === undefined) {
      continue;
    }

    const value = String(rawValue).trim();
    if (value === NOT_APPLICABLE) {
      continue;
    }
    let normalized: string | undefined;
    switch (key) {
      case Field.Power:
        normalized = normalizePower(value);
        break;
      case Field.HvacMode:
        normalized = normalizeMode(value);
        break;
      case Field.TargetTemperature:
        normalized = normalizeTemperature(value, step);
        break;
      case Field.FanRate:
        normalized = normalizeFanRate(value);
        break;
      case Field.FanDirection:
        normalized = normalizeFanDirection(value);
        break;
    }

    if (normalized === undefined) {
      result.rejected.push({ field: key, value });
    } else {
      result.values[key] = normalized;
    }
  }

  // The controller folds power into the mode: an "off" unit reports mode "off",
  // and a mode given without power switches the unit accordingly
  const power = result.values[Field.Power];
  const mode = result.values[Field.HvacMode];
  if (power === PowerState.Off && mode !== undefined) {
    result.values[Field.HvacMode] = HvacMode.Off;
  } else if (power === undefined && mode !== undefined) {
    result.values[Field.Power] = mode === HvacMode.Off ? PowerState.Off : PowerState.On;
  }

  return result;
}

function invert(codes: Readonly<Record<string, string>>): ReadonlyMap<string, string> {
  return new Map(Object.entries(codes).map(([code, value]) => [value, code]));
}

const MODE_TO_CODE = invert(MODE_CODES);
const FAN_RATE_TO_CODE = invert(FAN_RATE_CODES);

/**
 * Renders engine values in the controller's key-value form, e.g.
 * `{ pow: 'on', mode: 'cool', f_dir: 'both' }` → `{ pow: '1', mode: '0200', f_dir: '3d' }`.
 * Mode "off" is sent as power off, the way the controller expects it.
 */
export function toDeviceSettings(values: SettingsMap): Record<string, string> {
  const settings: Record<string, string> = {};
  for (const field of ALL_FIELDS) {
    const value = values[field];
    if (value === undefined) {
      continue;
    }
    switch (field) {
      case Field.Power:
        settings[field] = value === PowerState.On ? '1' : '0';
        break;
      case Field.HvacMode:
        if (value === HvacMode.Off) {
          settings[Field.Power] = '0';
        } else {
          settings[field] = MODE_TO_CODE.get(value) ?? value;
        }
        break;
      case Field.FanRate:
        settings[field] = FAN_RATE_TO_CODE.get(value) ?? value;
        break;
      case Field.FanDirection:
        settings[field] = value === FanDirection.Both ? '3d' : value;
        break;
      case Field.TargetTemperature:
        settings[field] = value;
        break;
    }
  }
  return settings;
}
