// filepath: src/state/MismatchDetector.ts
import { DetectionSource, Field, SnapshotOrigin } from '../enums.js';
import { EngineLogger, consoleLogger } from '../logger.js';
import { parseTemperature, toError } from '../utils.js';
import { ConfirmedStateStore } from './ConfirmedStateStore.js';
import { SettingValue, SettingsSnapshot, snapshotFields } from './Snapshot.js';

export interface ComparisonOptions {
  temperatureTolerance: number;
}

/**
 * Decides whether two normalized values of one field mean the same setting.
 */
export type ComparisonRule = (expected: SettingValue, actual: SettingValue, options: ComparisonOptions) => boolean;

/**
 * A field whose observed value differs from the confirmed one.
 */
export interface Divergence {
  readonly field: Field;
  readonly expected: SettingValue;
  readonly actual: SettingValue;
  readonly source: DetectionSource;
}

export const exactMatch: ComparisonRule = (expected, actual) => expected === actual;

/**
 * Numeric readings match within the tolerance; anything else ("--") must match exactly.
 */
export const temperatureMatch: ComparisonRule = (expected, actual, { temperatureTolerance }) => {
  const a = parseTemperature(expected);
  const b = parseTemperature(actual);
  if (Number.isNaN(a) || Number.isNaN(b)) {
    return expected === actual;
  }
  return Math.abs(a - b) <= temperatureTolerance;
};

export const DEFAULT_COMPARISON_RULES: Readonly<Record<Field, ComparisonRule>> = {
  [Field.Power]: exactMatch,
  [Field.TargetTemperature]: temperatureMatch,
  [Field.FanRate]: exactMatch,
  [Field.FanDirection]: exactMatch,
  [Field.HvacMode]: exactMatch,
};

export function detectionSourceFor(origin: SnapshotOrigin): DetectionSource {
  return origin === SnapshotOrigin.Poll ? DetectionSource.Poll : DetectionSource.CommandTime;
}

export class MismatchDetector {
  private readonly rules: Readonly<Record<Field, ComparisonRule>>;

  constructor(
    private readonly options: ComparisonOptions,
    rules: Partial<Record<Field, ComparisonRule>> = {},
    private readonly log: EngineLogger = consoleLogger,
  ) {
    this.rules = { ...DEFAULT_COMPARISON_RULES, ...rules };
  }

  /**
   * Runs the field's rule.
   * @returns undefined when the rule threw; the error is logged.
   */
  public compare(field: Field, expected: SettingValue, actual: SettingValue): boolean | undefined {
    try {
      return this.rules[field](expected, actual, this.options);
    } catch (error) {
      const err = toError(error);
      this.log.warn(`[MismatchDetector] Comparison rule for ${field} failed on "${expected}" vs "${actual}": ${err.message}`);
      return undefined;
    }
  }

  /** Like compare(), falling back to strict equality when the rule throws. */
  public matches(field: Field, expected: SettingValue, actual: SettingValue): boolean {
    return this.compare(field, expected, actual) ?? expected === actual;
  }

  /**
   * Lists the fields of `snapshot` that differ from confirmed state.
   * Fields never confirmed by a poll are not compared, and a failing rule yields no divergence.
   */
  public detect(snapshot: SettingsSnapshot, confirmed: ConfirmedStateStore): Divergence[] {
    const source = detectionSourceFor(snapshot.origin);
    const divergences: Divergence[] = [];

    for (const field of snapshotFields(snapshot)) {
      const actual = snapshot.values[field];
      const expected = confirmed.read(field);
      if (actual === undefined || expected === undefined) {
        continue;
      }
      if (this.compare(field, expected, actual) === false) {
        divergences.push(Object.freeze({ field, expected, actual, source }));
      }
    }

    return divergences;
  }
}
