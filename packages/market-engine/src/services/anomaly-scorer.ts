import type {
  Category,
  Condition,
  ConditionStats,
  MarketStatsTable,
  RiskResult,
  SpecSet,
} from '@app/types';
import { SPEC_COMPONENTS } from '@app/types';

import { ENGINE_CONFIG, clampScore, round2 } from './engine-config.js';
import { EXTERNAL_CONTACT_PATTERN } from './pattern-tables.js';

export type ScoringInput = Readonly<{
  price: number;
  description: string;
  category: Category;
  condition: Condition;
  specs: SpecSet;
}>;

type PriceSignal = Readonly<{
  z: number;
  weight: number;
  reference: number;
  source: string;
}>;

export type StatsLookup = Readonly<{
  node: ConditionStats | null;
  fallbackUsed: boolean;
}>;

export const SYMBOLIC_PRICE_FACTOR = 'Symbolic Price';
export const EXTERNAL_CONTACT_FACTOR = 'External Contact';

/** Exact category × condition node, else the next-closest condition. */
export function lookupStatsNode(
  table: MarketStatsTable,
  category: Category,
  condition: Condition
): StatsLookup {
  const byCondition = table.categories[category];
  if (!byCondition) return { node: null, fallbackUsed: false };

  const exact = byCondition[condition];
  if (exact) return { node: exact, fallbackUsed: false };

  for (const fallback of ENGINE_CONFIG.CONDITION_FALLBACK[condition]) {
    const node = byCondition[fallback];
    if (node) return { node, fallbackUsed: true };
  }
  return { node: null, fallbackUsed: false };
}

function collectSignals(price: number, specs: SpecSet, node: ConditionStats, category: Category): PriceSignal[] {
  const weights = ENGINE_CONFIG.SIGNAL_WEIGHTS;
  const signals: PriceSignal[] = [];

  for (const component of SPEC_COMPONENTS) {
    const value = specs[component];
    if (!value) continue;
    const stat = node.components[component][value];
    if (!stat || stat.stdev <= 0) continue;
    signals.push({
      z: (price - stat.mean) / stat.stdev,
      weight: weights[component],
      reference: stat.mean,
      source: `${component}:${value}`,
    });
  }

  if (node.stdev > 0) {
    signals.push({
      z: (price - node.mean) / node.stdev,
      weight: weights.category,
      reference: node.mean,
      source: category,
    });
  }
  return signals;
}

/**
 * Weighted composite Z-score of the price against the reference table, folded
 * with rule-based heuristics into a 0..100 risk score. Missing statistics only
 * reduce the number of signals.
 */
export function scoreListing(input: ScoringInput, table: MarketStatsTable): RiskResult {
  const { price, category, condition, specs } = input;
  const { node, fallbackUsed } = lookupStatsNode(table, category, condition);

  if (price < ENGINE_CONFIG.SYMBOLIC_PRICE) {
    return {
      riskScore: 0,
      riskFactors: [SYMBOLIC_PRICE_FACTOR],
      marketAnalysis: {
        category,
        condition,
        specs,
        compositeZScore: 0,
        estimatedMarketValue: 0,
        componentsUsed: [],
        fallbackUsed,
      },
    };
  }

  const signals = node ? collectSignals(price, specs, node, category) : [];
  const totalWeight = signals.reduce((sum, signal) => sum + signal.weight, 0);

  let compositeZ = 0;
  let estimate = 0;
  if (node && totalWeight > 0) {
    compositeZ = signals.reduce((sum, signal) => sum + signal.z * signal.weight, 0) / totalWeight;
    estimate = signals.reduce((sum, signal) => sum + signal.reference * signal.weight, 0) / totalWeight;

    // NEW listing measured against a LIKE_NEW or USED node.
    if (fallbackUsed && condition === 'NEW') {
      estimate *= ENGINE_CONFIG.NEW_ON_FALLBACK_MARKUP;
      const stdev = node.stdev > 0 ? node.stdev : ENGINE_CONFIG.FALLBACK_STDEV;
      compositeZ = (price - estimate) / stdev;
    }
  }

  const risk = ENGINE_CONFIG.RISK;
  const factors: string[] = [];
  let score = 0;

  if (compositeZ < risk.CHEAP_Z) {
    score += risk.CHEAP_POINTS;
    factors.push(`Statistically Cheap (Z=${compositeZ.toFixed(2)}) [${condition}]`);
  }
  if (compositeZ < risk.EXTREME_Z) {
    score += risk.EXTREME_POINTS;
    factors.push('EXTREME Price Anomaly');
  }
  if (estimate > 0) {
    const ratio = price / estimate;
    if (ratio < risk.LOW_RATIO) {
      score += risk.LOW_RATIO_POINTS;
      factors.push(`Price is <40% of est. value (${Math.trunc(ratio * 100)}%)`);
    }
  }
  if (input.description.length < risk.SHORT_DESCRIPTION_LENGTH && price > risk.SHORT_DESCRIPTION_MIN_PRICE) {
    score += risk.SHORT_DESCRIPTION_POINTS;
    factors.push('Short Desc');
  }
  if (EXTERNAL_CONTACT_PATTERN.test(input.description)) {
    score += risk.EXTERNAL_CONTACT_POINTS;
    factors.push(EXTERNAL_CONTACT_FACTOR);
  }

  return {
    riskScore: clampScore(score),
    riskFactors: factors,
    marketAnalysis: {
      category,
      condition,
      specs,
      compositeZScore: round2(compositeZ),
      estimatedMarketValue: round2(estimate),
      componentsUsed: signals.map((signal) => signal.source),
      fallbackUsed,
    },
  };
}
