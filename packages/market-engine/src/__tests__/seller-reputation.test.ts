import type { RiskResult, SellerReputation } from '@app/types';
import { describe, expect, it } from 'vitest';

import {
  applySellerReputation,
  shouldReviewSeller,
  summarizeReviewScores,
} from '../services/seller-reputation.js';

const now = new Date('2026-03-01T12:00:00Z');
const DAY_MS = 24 * 60 * 60 * 1000;

function result(riskScore: number, overrides: Partial<RiskResult['marketAnalysis']> = {}): RiskResult {
  return {
    riskScore,
    riskFactors: ['Statistically Cheap (Z=-1.80) [USED]'],
    marketAnalysis: {
      category: 'GENERICO',
      condition: 'USED',
      specs: { cpu: null, ram: null, gpu: null },
      compositeZScore: -1.8,
      estimatedMarketValue: 600,
      componentsUsed: ['GENERICO'],
      fallbackUsed: false,
      ...overrides,
    },
  };
}

function seller(overrides: Partial<SellerReputation> = {}): SellerReputation {
  return {
    reviewCount: 2,
    avgStars: 4,
    badges: [],
    isProfessional: false,
    registeredAt: new Date(now.getTime() - 100 * DAY_MS),
    scamReports: 0,
    ...overrides,
  };
}

describe('applySellerReputation', () => {
  it('rewards trusted sellers', () => {
    const adjusted = applySellerReputation(result(70), seller({ reviewCount: 6, avgStars: 4.5 }), now);
    expect(adjusted.riskScore).toBe(40);
    expect(adjusted.riskFactors).toEqual([
      'Statistically Cheap (Z=-1.80) [USED]',
      'Trusted Seller (6+ reviews)',
    ]);
  });

  it('applies the top seller bonus once for badge or professional account', () => {
    const adjusted = applySellerReputation(
      result(70),
      seller({ badges: ['top_seller'], isProfessional: true }),
      now
    );
    expect(adjusted.riskScore).toBe(20);
    expect(adjusted.riskFactors.filter((factor) => factor === 'TOP SELLER')).toHaveLength(1);
  });

  it('penalizes brand-new and dormant accounts', () => {
    const fresh = applySellerReputation(
      result(30),
      seller({ registeredAt: new Date(now.getTime() - DAY_MS) }),
      now
    );
    expect(fresh.riskScore).toBe(60);
    expect(fresh.riskFactors.at(-1)).toBe('New User');

    const dormant = applySellerReputation(
      result(30),
      seller({ reviewCount: 0, registeredAt: new Date(now.getTime() - 400 * DAY_MS) }),
      now
    );
    expect(dormant.riskScore).toBe(50);
    expect(dormant.riskFactors.at(-1)).toBe('Dormant Account');
  });

  it('forces reported scammers to the maximum', () => {
    const adjusted = applySellerReputation(
      result(0),
      seller({ reviewCount: 10, avgStars: 5, isProfessional: true, scamReports: 1 }),
      now
    );
    expect(adjusted.riskScore).toBe(100);
    expect(adjusted.riskFactors.at(-1)).toBe('REPORTED SCAMMER');
  });

  it('clamps at zero', () => {
    const adjusted = applySellerReputation(
      result(20),
      seller({ reviewCount: 8, avgStars: 4.9, isProfessional: true }),
      now
    );
    expect(adjusted.riskScore).toBe(0);
  });
});

describe('summarizeReviewScores', () => {
  it('converts 0-100 scorings to stars', () => {
    expect(summarizeReviewScores([100, 80, 90])).toEqual({ count: 3, avgStars: 4.5 });
    expect(summarizeReviewScores([100, 100, 60])).toEqual({ count: 3, avgStars: 4.33 });
    expect(summarizeReviewScores([])).toEqual({ count: 0, avgStars: 0 });
  });
});

describe('shouldReviewSeller', () => {
  it('asks for a lookup on cheap, contact or recovered-price listings', () => {
    expect(shouldReviewSeller(result(30), { priceRecovered: false })).toBe(true);

    const calm = result(0, { compositeZScore: -0.5 });
    expect(shouldReviewSeller(calm, { priceRecovered: false })).toBe(false);
    expect(shouldReviewSeller(calm, { priceRecovered: true })).toBe(true);
    expect(
      shouldReviewSeller({ ...calm, riskFactors: ['External Contact'] }, { priceRecovered: false })
    ).toBe(true);
  });
});
