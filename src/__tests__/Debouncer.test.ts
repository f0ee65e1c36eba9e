import { describe, it, expect, beforeEach } from 'vitest';
import { OverrideCategory } from '../enums.js';
import { Debouncer } from '../state/Debouncer.js';

describe('Debouncer', () => {
  let debouncer: Debouncer;

  beforeEach(() => {
    debouncer = new Debouncer(5000);
  });

  it('admits the first event of a category', () => {
    expect(debouncer.admit({ category: OverrideCategory.Power }, 1000)).toBe(true);
    expect(debouncer.lastEmittedAt(OverrideCategory.Power)).toBe(1000);
  });

  it('drops a repeat inside the cooldown without extending it', () => {
    debouncer.admit({ category: OverrideCategory.Power }, 1000);
    expect(debouncer.admit({ category: OverrideCategory.Power }, 5999)).toBe(false);
    expect(debouncer.lastEmittedAt(OverrideCategory.Power)).toBe(1000);
    expect(debouncer.admit({ category: OverrideCategory.Power }, 6000)).toBe(true);
  });

  it('tracks categories independently', () => {
    debouncer.admit({ category: OverrideCategory.Power }, 1000);
    expect(debouncer.admit({ category: OverrideCategory.Temperature }, 1500)).toBe(true);
    expect(debouncer.lastEmittedAt(OverrideCategory.Fan)).toBeUndefined();
  });

  it('forgets everything on reset', () => {
    debouncer.admit({ category: OverrideCategory.Mode }, 1000);
    debouncer.reset();
    expect(debouncer.admit({ category: OverrideCategory.Mode }, 1001)).toBe(true);
  });

  it('admits every event when the cooldown is zero', () => {
    const immediate = new Debouncer(0);
    expect(immediate.admit({ category: OverrideCategory.Swing }, 1000)).toBe(true);
    expect(immediate.admit({ category: OverrideCategory.Swing }, 1000)).toBe(true);
  });
});
