// filepath: src/state/ProtectionPolicy.ts
import { Field, HvacMode, PowerState } from '../enums.js';
import { EngineLogger, consoleLogger } from '../logger.js';
import { CommandIntent, CommandLedger } from './CommandLedger.js';
import { ConfirmedStateStore } from './ConfirmedStateStore.js';
import { Divergence } from './MismatchDetector.js';
import { SettingValue } from './Snapshot.js';

export type ValueMatcher = (field: Field, expected: SettingValue, actual: SettingValue) => boolean;

/**
 * Why a divergence was kept or suppressed.
 *
 * - `no-intent`: nothing of ours is in flight for the field, so someone else changed it.
 * - `confirmed-then-changed`: a poll already confirmed our command, and the value moved again since.
 * - `awaiting-confirmation`: the device is reporting the value we asked for before a poll confirmed it.
 * - `in-flight`: our command is unconfirmed and the device shows neither the old nor the new value yet.
 * - `power-transition`: the mode moved to or from "off" because of our unconfirmed power command.
 */
export type PolicyReason =
  | 'no-intent'
  | 'confirmed-then-changed'
  | 'awaiting-confirmation'
  | 'in-flight'
  | 'power-transition';

export interface PolicyVerdict {
  readonly real: boolean;
  readonly reason: PolicyReason;
  readonly intent?: CommandIntent;
}

export class ProtectionPolicy {
  constructor(
    private readonly matches: ValueMatcher,
    private readonly log: EngineLogger = consoleLogger,
    private readonly debugEnabled = false,
  ) {}

  public evaluate(
    divergence: Divergence,
    ledger: CommandLedger,
    confirmed: ConfirmedStateStore,
    now: number,
  ): PolicyVerdict {
    const { field, actual } = divergence;
    const intent = ledger.activeIntent(field, now);
    if (!intent) {
      const powerIntent = this.powerTransitionCause(divergence, ledger, confirmed, now);
      return powerIntent
        ? { real: false, reason: 'power-transition', intent: powerIntent }
        : { real: true, reason: 'no-intent' };
    }

    const confirmedValue = confirmed.read(field);
    const alreadyConfirmed = confirmedValue !== undefined && this.matches(field, confirmedValue, intent.target);

    if (this.matches(field, intent.target, actual)) {
      return alreadyConfirmed
        ? { real: true, reason: 'confirmed-then-changed', intent }
        : { real: false, reason: 'awaiting-confirmation', intent };
    }

    return alreadyConfirmed
      ? { real: true, reason: 'confirmed-then-changed', intent }
      : { real: false, reason: 'in-flight', intent };
  }

  /**
   * The controller reports an idle unit's mode as "off", so switching power also moves the mode.
   * Returns the power intent explaining a mode divergence, if there is one.
   */
  private powerTransitionCause(
    { field, expected, actual }: Divergence,
    ledger: CommandLedger,
    confirmed: ConfirmedStateStore,
    now: number,
  ): CommandIntent | undefined {
    if (field !== Field.HvacMode) {
      return undefined;
    }
    const powerIntent = ledger.activeIntent(Field.Power, now);
    const confirmedPower = confirmed.read(Field.Power);
    if (!powerIntent || (confirmedPower !== undefined && this.matches(Field.Power, confirmedPower, powerIntent.target))) {
      return undefined;
    }
    const switchedOff = powerIntent.target === PowerState.Off && actual === HvacMode.Off;
    const switchedOn = powerIntent.target === PowerState.On && expected === HvacMode.Off && actual !== HvacMode.Off;
    return switchedOff || switchedOn ? powerIntent : undefined;
  }

  /**
   * Returns the divergences that should be treated as external changes.
   */
  public filter(
    divergences: readonly Divergence[],
    ledger: CommandLedger,
    confirmed: ConfirmedStateStore,
    now: number,
  ): Divergence[] {
    return divergences.filter(divergence => {
      const verdict = this.evaluate(divergence, ledger, confirmed, now);
      if (!verdict.real && this.debugEnabled) {
        const age = verdict.intent ? now - verdict.intent.issuedAt : 0;
        this.log.debug(
          `[ProtectionPolicy] Suppressing ${divergence.field}: ${divergence.expected} → ${divergence.actual} ` +
          `(${verdict.reason}, intent #${verdict.intent?.sequence} → ${verdict.intent?.target}, ${age}ms old)`,
        );
      }
      return verdict.real;
    });
  }
}
