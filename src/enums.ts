// src/enums.ts

/**
 * Controllable settings tracked by the reconciler.
 * Values double as the keys of the controller's key-value settings map.
 */
export enum Field {
  Power = 'pow',
  TargetTemperature = 'stemp',
  FanRate = 'f_rate',
  FanDirection = 'f_dir',
  HvacMode = 'mode',
}

export const ALL_FIELDS: readonly Field[] = [
  Field.Power,
  Field.TargetTemperature,
  Field.FanRate,
  Field.FanDirection,
  Field.HvacMode,
];

const FIELD_VALUES = new Set<string>(ALL_FIELDS);

export function isField(key: string): key is Field {
  return FIELD_VALUES.has(key);
}

/**
 * Represents the power state of the device.
 */
export enum PowerState {
  Off = 'off',
  On = 'on',
}

/**
 * Operation modes, as reported by the controller once power is folded in.
 */
export enum HvacMode {
  Auto = 'auto',
  Cool = 'cool',
  Heat = 'heat',
  Fan = 'fan',
  Dry = 'dry',
  Off = 'off',
}

export enum FanRate {
  Auto = 'auto',
  Quiet = 'quiet',
  Level1 = '1',
  Level2 = '2',
  Level3 = '3',
  Level4 = '4',
  Level5 = '5',
}

export enum FanDirection {
  Off = 'off',
  Vertical = 'vertical',
  Horizontal = 'horizontal',
  Both = 'both',
}

/**
 * Where a snapshot came from. Only poll snapshots ever become confirmed state.
 */
export enum SnapshotOrigin {
  Poll = 'poll',
  CommandResponse = 'command-response',
}

export enum DetectionSource {
  Poll = 'poll',
  CommandTime = 'command-time',
}

export enum OverrideCategory {
  Power = 'power',
  Temperature = 'temperature',
  Fan = 'fan',
  Swing = 'swing',
  Mode = 'mode',
  Combined = 'combined',
}

/**
 * Classification priority, highest first. Adding a field here is all it takes
 * to make its divergences classifiable.
 */
export const CATEGORY_PRIORITY: ReadonlyArray<readonly [Field, OverrideCategory]> = [
  [Field.Power, OverrideCategory.Power],
  [Field.TargetTemperature, OverrideCategory.Temperature],
  [Field.FanRate, OverrideCategory.Fan],
  [Field.FanDirection, OverrideCategory.Swing],
  [Field.HvacMode, OverrideCategory.Mode],
];
