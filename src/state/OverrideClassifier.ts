// filepath: src/state/OverrideClassifier.ts
import { CATEGORY_PRIORITY, Field, OverrideCategory } from '../enums.js';
import { Divergence } from './MismatchDetector.js';

/**
 * Maps divergence sets to a category through an ordered field → category table.
 */
export class OverrideClassifier {
  private readonly ranked: ReadonlyMap<Field, { category: OverrideCategory; rank: number }>;

  /**
   * @param priority Field → category pairs, highest priority first.
   * @param dominant Categories that win outright whenever they are present; everything
   *   else collapses into `combined` when more than one category diverges.
   */
  constructor(
    priority: ReadonlyArray<readonly [Field, OverrideCategory]> = CATEGORY_PRIORITY,
    private readonly dominant: ReadonlySet<OverrideCategory> = new Set([OverrideCategory.Power]),
  ) {
    this.ranked = new Map(priority.map(([field, category], rank) => [field, { category, rank }]));
  }

  /**
   * @returns undefined for an empty set or when no diverging field has a category.
   */
  public classify(divergences: readonly Divergence[]): OverrideCategory | undefined {
    const found = new Map<OverrideCategory, number>();
    for (const divergence of divergences) {
      const entry = this.ranked.get(divergence.field);
      if (entry) {
        found.set(entry.category, entry.rank);
      }
    }

    const byPriority = [...found.entries()].sort((a, b) => a[1] - b[1]).map(([category]) => category);
    const top = byPriority[0];
    if (top === undefined) {
      return undefined;
    }
    if (this.dominant.has(top) || byPriority.length === 1) {
      return top;
    }
    return OverrideCategory.Combined;
  }
}
