// filepath: src/state/Debouncer.ts
import { OverrideCategory } from '../enums.js';

/**
 * Drops repeat notifications of the same category inside the cooldown window,
 * e.g. a command-time detection followed by the poll that sees the same change.
 */
export class Debouncer {
  private readonly lastEmitted = new Map<OverrideCategory, number>();

  constructor(private readonly cooldownMs: number) {}

  public admit(event: { readonly category: OverrideCategory }, now: number): boolean {
    const last = this.lastEmitted.get(event.category);
    if (last !== undefined && now - last < this.cooldownMs) {
      return false;
    }
    this.lastEmitted.set(event.category, now);
    return true;
  }

  public lastEmittedAt(category: OverrideCategory): number | undefined {
    return this.lastEmitted.get(category);
  }

  public reset(): void {
    this.lastEmitted.clear();
  }
}
