// filepath: src/state/ConfirmedStateStore.ts
import { Field, SnapshotOrigin } from '../enums.js';
import { SettingValue, SettingsMap, SettingsSnapshot, createSnapshot, snapshotFields } from './Snapshot.js';

/**
 * Last poll-confirmed settings of one device.
 * Only poll snapshots are accepted; command responses never become ground truth.
 */
export class ConfirmedStateStore {
  private readonly values = new Map<Field, SettingValue>();
  private _lastUpdated: number | null = null;

  get lastUpdated(): number | null {
    return this._lastUpdated;
  }

  /**
   * Merges a poll snapshot into the stored values. Fields the snapshot lacks keep their value.
   * @returns false when the snapshot was not poll-origin and nothing was stored.
   */
  public update(snapshot: SettingsSnapshot): boolean {
    if (snapshot.origin !== SnapshotOrigin.Poll) {
      return false;
    }
    for (const field of snapshotFields(snapshot)) {
      const value = snapshot.values[field];
      if (value !== undefined) {
        this.values.set(field, value);
      }
    }
    this._lastUpdated = snapshot.timestamp;
    return true;
  }

  public read(field: Field): SettingValue | undefined {
    return this.values.get(field);
  }

  public has(field: Field): boolean {
    return this.values.has(field);
  }

  public toSettingsMap(): SettingsMap {
    const map: SettingsMap = {};
    this.values.forEach((value, field) => {
      map[field] = value;
    });
    return map;
  }

  public toSnapshot(): SettingsSnapshot {
    return createSnapshot(this.toSettingsMap(), this._lastUpdated ?? 0, SnapshotOrigin.Poll);
  }
}
