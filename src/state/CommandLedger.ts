// filepath: src/state/CommandLedger.ts
import { Field } from '../enums.js';
import { SettingValue } from './Snapshot.js';

/**
 * What we last asked the device to do for one field.
 */
export interface CommandIntent {
  readonly field: Field;
  readonly target: SettingValue;
  readonly issuedAt: number;
  // Increases with every recorded intent on the device, across fields
  readonly sequence: number;
}

/**
 * Tracks at most one intent per field. An intent protects its field until the
 * field's protection window has elapsed or until a poll confirms the target.
 */
export class CommandLedger {
  private readonly intents = new Map<Field, CommandIntent>();
  private lastSequence = 0;

  constructor(private readonly protectionWindowMs: Readonly<Record<Field, number>>) {}

  public windowFor(field: Field): number {
    return this.protectionWindowMs[field];
  }

  /**
   * Creates or replaces the intent for `field`; a replacement restarts the window.
   */
  public recordIntent(field: Field, target: SettingValue, now: number): CommandIntent {
    this.lastSequence++;
    const intent: CommandIntent = Object.freeze({
      field,
      target,
      issuedAt: now,
      sequence: this.lastSequence,
    });
    this.intents.set(field, intent);
    return intent;
  }

  /**
   * Returns the intent for `field` if its window is still open at `now`.
   * Expired intents are dropped as a side effect.
   */
  public activeIntent(field: Field, now: number): CommandIntent | undefined {
    const intent = this.intents.get(field);
    if (!intent) {
      return undefined;
    }
    if (now - intent.issuedAt > this.windowFor(field)) {
      this.intents.delete(field);
      return undefined;
    }
    return intent;
  }

  public activeIntents(now: number): CommandIntent[] {
    const active: CommandIntent[] = [];
    for (const field of [...this.intents.keys()]) {
      const intent = this.activeIntent(field, now);
      if (intent) {
        active.push(intent);
      }
    }
    return active.sort((a, b) => a.sequence - b.sequence);
  }

  public clear(field: Field): boolean {
    return this.intents.delete(field);
  }

  get size(): number {
    return this.intents.size;
  }
}
