import type { MarketStatsTable } from '@app/types';
import { describe, expect, it } from 'vitest';

import { lookupStatsNode, scoreListing, type ScoringInput } from '../services/anomaly-scorer.js';
import { EMPTY_MARKET_STATS } from '../services/stats-aggregator.js';

import { node, stat } from './fixtures.js';

const noSpecs = { cpu: null, ram: null, gpu: null } as const;
const longDescription = 'Portatil en buen estado, bateria nueva y cargador';

function table(categories: MarketStatsTable['categories']): MarketStatsTable {
  return { categories, secondary: {}, uncertain: null };
}

function input(overrides: Partial<ScoringInput>): ScoringInput {
  return {
    price: 500,
    description: longDescription,
    category: 'GENERICO',
    condition: 'USED',
    specs: noSpecs,
    ...overrides,
  };
}

describe('scoreListing', () => {
  it('never penalizes symbolic prices', () => {
    const result = scoreListing(input({ price: 4 }), EMPTY_MARKET_STATS);
    expect(result.riskScore).toBe(0);
    expect(result.riskFactors).toEqual(['Symbolic Price']);
    expect(result.marketAnalysis.estimatedMarketValue).toBe(0);
  });

  it('weights component and category signals', () => {
    const stats = table({
      GENERICO: {
        USED: node(stat(700, 100), {
          cpu: { 'INTEL I7': stat(800, 100) },
          ram: { '16GB': stat(600, 50) },
        }),
      },
    });
    const result = scoreListing(
      input({ specs: { cpu: 'INTEL I7', ram: '16GB', gpu: null } }),
      stats
    );
    expect(result.marketAnalysis.compositeZScore).toBe(-2.71);
    expect(result.marketAnalysis.estimatedMarketValue).toBe(757.14);
    expect(result.marketAnalysis.componentsUsed).toEqual(['cpu:INTEL I7', 'ram:16GB', 'GENERICO']);
    expect(result.riskFactors).toEqual([
      'Statistically Cheap (Z=-2.71) [USED]',
      'EXTREME Price Anomaly',
    ]);
    expect(result.riskScore).toBe(70);
  });

  it('decreases Z with price and adds each anomaly increment once', () => {
    const stats = table({ GENERICO: { USED: node(stat(1000, 100)) } });
    const results = [1100, 900, 840, 740, 600].map((price) => scoreListing(input({ price }), stats));

    const zScores = results.map((result) => result.marketAnalysis.compositeZScore);
    for (let i = 1; i < zScores.length; i += 1) {
      expect(zScores[i]).toBeLessThan(zScores[i - 1] ?? Number.POSITIVE_INFINITY);
    }
    expect(results.map((result) => result.riskScore)).toEqual([0, 0, 30, 70, 70]);

    const extreme = results[3]?.riskFactors ?? [];
    expect(extreme.filter((factor) => factor.startsWith('Statistically Cheap'))).toHaveLength(1);
    expect(extreme.filter((factor) => factor === 'EXTREME Price Anomaly')).toHaveLength(1);
  });

  it('inflates the estimate for NEW listings scored against used data', () => {
    const stats = table({ GENERICO: { USED: node(stat(500, 100)) } });

    const asNew = scoreListing(input({ condition: 'NEW' }), stats);
    expect(asNew.marketAnalysis.fallbackUsed).toBe(true);
    expect(asNew.marketAnalysis.estimatedMarketValue).toBeCloseTo(600, 2);
    expect(asNew.marketAnalysis.compositeZScore).toBeCloseTo(-1, 2);

    const asUsed = scoreListing(input({ condition: 'USED' }), stats);
    expect(asUsed.marketAnalysis.fallbackUsed).toBe(false);
    expect(asUsed.marketAnalysis.estimatedMarketValue).toBe(500);
    expect(asUsed.marketAnalysis.compositeZScore).toBe(0);
  });

  it('still scores heuristics without statistics', () => {
    const result = scoreListing(
      input({ price: 300, description: 'Llamame al 612345678 o por whatsapp' }),
      EMPTY_MARKET_STATS
    );
    expect(result.riskScore).toBe(30);
    expect(result.riskFactors).toEqual(['External Contact']);
    expect(result.marketAnalysis.componentsUsed).toEqual([]);
  });

  it('flags short descriptions on expensive listings and very low ratios', () => {
    const stats = table({ GENERICO: { USED: node(stat(1000, 0), { cpu: { 'INTEL I5': stat(1000, 1000) } }) } });
    const result = scoreListing(
      input({ price: 300, description: 'Como nuevo', specs: { ...noSpecs, cpu: 'INTEL I5' } }),
      stats
    );
    expect(result.marketAnalysis.compositeZScore).toBe(-0.7);
    expect(result.riskFactors).toEqual(['Price is <40% of est. value (30%)', 'Short Desc']);
    expect(result.riskScore).toBe(35);
  });
});

describe('lookupStatsNode', () => {
  it('walks NEW to LIKE_NEW before USED', () => {
    const likeNew = node(stat(800, 50));
    const stats = table({ APPLE: { LIKE_NEW: likeNew, USED: node(stat(600, 50)) } });
    expect(lookupStatsNode(stats, 'APPLE', 'NEW')).toEqual({ node: likeNew, fallbackUsed: true });
    expect(lookupStatsNode(stats, 'APPLE', 'BROKEN')).toEqual({ node: null, fallbackUsed: false });
    expect(lookupStatsNode(stats, 'GAMING', 'USED')).toEqual({ node: null, fallbackUsed: false });
  });
});
