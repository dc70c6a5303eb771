import type { Logger } from '@app/logger';
import type {
  Category,
  CategoryStats,
  ComponentStats,
  Condition,
  ConditionStats,
  ListingRecord,
  MarketSegment,
  MarketStatsTable,
  PriceStat,
  SecondarySegment,
  SpecSet,
} from '@app/types';
import { SPEC_COMPONENTS } from '@app/types';

import { ENGINE_CONFIG, round2 } from './engine-config.js';
import { analyzeListing } from './listing-analyzer.js';
import { determineMarketSegment } from './market-segmenter.js';

export type AggregatedListing = Readonly<{
  price: number;
  segment: MarketSegment;
  category: Category;
  condition: Condition;
  specs: SpecSet;
}>;

type GroupAccumulator = {
  prices: number[];
  components: Record<keyof SpecSet, Map<string, number[]>>;
};

export type BuilderCounters = Readonly<{
  prime: number;
  secondary: number;
  uncertain: number;
  junk: number;
}>;

export const EMPTY_MARKET_STATS: MarketStatsTable = deepFreeze({
  categories: {},
  secondary: {},
  uncertain: null,
});

export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}

function median(sorted: readonly number[]): number {
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[middle - 1] ?? 0) + upper) / 2;
}

/**
 * Mean, median and population standard deviation, rounded to cents.
 * Returns null below `minCount`: a missing stat means "not enough data", never zero.
 */
export function summarizePrices(prices: readonly number[], minCount: number): PriceStat | null {
  const count = prices.length;
  if (count === 0 || count < minCount) return null;

  const mean = prices.reduce((sum, price) => sum + price, 0) / count;
  const variance = prices.reduce((sum, price) => sum + (price - mean) ** 2, 0) / count;
  const sorted = [...prices].sort((a, b) => a - b);

  return {
    mean: round2(mean),
    median: round2(median(sorted)),
    stdev: round2(Math.sqrt(variance)),
    count,
  };
}

function emptyGroup(): GroupAccumulator {
  return {
    prices: [],
    components: { cpu: new Map(), gpu: new Map(), ram: new Map() },
  };
}

function pushTo<K>(map: Map<K, number[]>, key: K, price: number): void {
  const bucket = map.get(key);
  if (bucket) bucket.push(price);
  else map.set(key, [price]);
}

export class MarketStatsBuilder {
  private readonly groups = new Map<Category, Map<Condition, GroupAccumulator>>();
  private readonly secondary = new Map<SecondarySegment, number[]>();
  private readonly uncertain: number[] = [];
  private junk = 0;
  private prime = 0;
  private built = false;

  add(listing: AggregatedListing): void {
    this.assertOpen();
    const { price, segment, specs } = listing;

    if (segment === 'JUNK') {
      this.junk += 1;
      return;
    }
    if (segment === 'UNCERTAIN' || (!specs.cpu && !specs.ram)) {
      this.uncertain.push(price);
      return;
    }
    if (segment === 'BROKEN' || segment === 'ACCESSORY') {
      pushTo(this.secondary, segment, price);
      return;
    }

    let byCondition = this.groups.get(listing.category);
    if (!byCondition) {
      byCondition = new Map();
      this.groups.set(listing.category, byCondition);
    }
    let group = byCondition.get(listing.condition);
    if (!group) {
      group = emptyGroup();
      byCondition.set(listing.condition, group);
    }

    group.prices.push(price);
    for (const component of SPEC_COMPONENTS) {
      const value = specs[component];
      if (value) pushTo(group.components[component], value, price);
    }
    this.prime += 1;
  }

  counters(): BuilderCounters {
    let secondary = 0;
    for (const prices of this.secondary.values()) secondary += prices.length;
    return { prime: this.prime, secondary, uncertain: this.uncertain.length, junk: this.junk };
  }

  /** Publishes the table. The builder is spent afterwards. */
  build(): MarketStatsTable {
    this.assertOpen();
    this.built = true;

    const categories: Partial<Record<Category, CategoryStats>> = {};
    for (const [category, byCondition] of this.groups) {
      const conditions: Partial<Record<Condition, ConditionStats>> = {};
      for (const [condition, group] of byCondition) {
        const stat = summarizePrices(group.prices, ENGINE_CONFIG.MIN_GROUP_SAMPLE);
        if (!stat) continue;
        conditions[condition] = { ...stat, components: summarizeComponents(group) };
      }
      if (Object.keys(conditions).length > 0) categories[category] = conditions;
    }

    const secondary: Partial<Record<SecondarySegment, PriceStat>> = {};
    for (const [segment, prices] of this.secondary) {
      const stat = summarizePrices(prices, ENGINE_CONFIG.MIN_FLAT_SAMPLE);
      if (stat) secondary[segment] = stat;
    }

    return deepFreeze({
      categories,
      secondary,
      uncertain: summarizePrices(this.uncertain, ENGINE_CONFIG.MIN_FLAT_SAMPLE),
    });
  }

  private assertOpen(): void {
    if (this.built) throw new Error('MarketStatsBuilder has already been built');
  }
}

function summarizeComponents(group: GroupAccumulator): ComponentStats {
  const result: Record<keyof SpecSet, Record<string, PriceStat>> = { cpu: {}, gpu: {}, ram: {} };
  for (const component of SPEC_COMPONENTS) {
    for (const [name, prices] of group.components[component]) {
      const stat = summarizePrices(prices, ENGINE_CONFIG.MIN_GROUP_SAMPLE);
      if (stat) result[component][name] = stat;
    }
  }
  return result;
}

export function buildMarketStats(records: Iterable<ListingRecord>, logger?: Logger): MarketStatsTable {
  const builder = new MarketStatsBuilder();
  for (const record of records) {
    const analysis = analyzeListing(record);
    const segment = determineMarketSegment({
      title: record.title,
      price: analysis.price,
      condition: analysis.condition,
      specs: analysis.specs,
    });
    builder.add({
      price: analysis.price,
      segment,
      category: analysis.category,
      condition: analysis.condition,
      specs: analysis.specs,
    });
  }

  const table = builder.build();
  logger?.info(
    { ...builder.counters(), categories: Object.keys(table.categories).length },
    'Market statistics built'
  );
  return table;
}
