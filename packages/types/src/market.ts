import type { Category, Condition, SpecComponent } from './listings.js';

export type PriceStat = Readonly<{
  mean: number;
  median: number;
  stdev: number;
  count: number;
}>;

export type ComponentStats = Readonly<Record<SpecComponent, Readonly<Record<string, PriceStat>>>>;

export type ConditionStats = PriceStat &
  Readonly<{
    components: ComponentStats;
  }>;

export type CategoryStats = Readonly<Partial<Record<Condition, ConditionStats>>>;

export type SecondarySegment = 'BROKEN' | 'ACCESSORY';

/**
 * Reference price distribution built once per run from a historical corpus.
 * Read-only after publication; missing entries mean "insufficient data".
 */
export type MarketStatsTable = Readonly<{
  categories: Readonly<Partial<Record<Category, CategoryStats>>>;
  secondary: Readonly<Partial<Record<SecondarySegment, PriceStat>>>;
  uncertain: PriceStat | null;
}>;
