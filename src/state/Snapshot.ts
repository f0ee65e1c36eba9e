// filepath: src/state/Snapshot.ts
import { Field, SnapshotOrigin, isField } from '../enums.js';

/** A normalized setting value, e.g. `"on"`, `"cool"`, `"23.5"`. */
export type SettingValue = string;

export type SettingsMap = Partial<Record<Field, SettingValue>>;

/**
 * Immutable, normalized view of a device's settings at one instant.
 * Fields the source did not report are simply absent.
 */
export interface SettingsSnapshot {
  readonly values: Readonly<SettingsMap>;
  readonly timestamp: number;
  readonly origin: SnapshotOrigin;
}

export type SnapshotInput = Readonly<Record<string, string | number | boolean | null | undefined>>;

/**
 * Copies the recognised fields out of `input`, dropping unknown keys and empty values.
 */
export function pickSettings(input: SnapshotInput): SettingsMap {
  const values: SettingsMap = {};
  for (const [key, value] of Object.entries(input)) {
    if (!isField(key) || value === null || value === undefined) {
      continue;
    }
    values[key] = String(value);
  }
  return values;
}

export function createSnapshot(
  input: SnapshotInput,
  timestamp: number,
  origin: SnapshotOrigin = SnapshotOrigin.Poll,
): SettingsSnapshot {
  return Object.freeze({
    values: Object.freeze(pickSettings(input)),
    timestamp,
    origin,
  });
}

export function snapshotFields(snapshot: SettingsSnapshot): Field[] {
  return Object.keys(snapshot.values).filter(isField);
}
