import type { RiskResult, SellerReputation } from '@app/types';

import { EXTERNAL_CONTACT_FACTOR } from './anomaly-scorer.js';
import { ENGINE_CONFIG, clampScore, round2 } from './engine-config.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export type ReviewSummary = Readonly<{
  count: number;
  /** 0..5 */
  avgStars: number;
}>;

/** Review scorings arrive on a 0..100 scale. */
export function summarizeReviewScores(scorings: readonly number[]): ReviewSummary {
  if (scorings.length === 0) return { count: 0, avgStars: 0 };
  const total = scorings.reduce((sum, scoring) => sum + scoring, 0);
  return {
    count: scorings.length,
    avgStars: round2((total / scorings.length / 100) * 5),
  };
}

/** The reputation lookup costs a remote call; only suspicious listings earn one. */
export function shouldReviewSeller(result: RiskResult, context: Readonly<{ priceRecovered: boolean }>): boolean {
  return (
    result.marketAnalysis.compositeZScore < ENGINE_CONFIG.RISK.CHEAP_Z ||
    result.riskFactors.includes(EXTERNAL_CONTACT_FACTOR) ||
    context.priceRecovered
  );
}

export function accountAgeDays(registeredAt: Date, now: Date): number {
  return Math.floor((now.getTime() - registeredAt.getTime()) / DAY_MS);
}

export function applySellerReputation(
  result: RiskResult,
  reputation: SellerReputation,
  now: Date
): RiskResult {
  const rules = ENGINE_CONFIG.REPUTATION;
  const factors = [...result.riskFactors];
  let score = result.riskScore;

  if (reputation.reviewCount > rules.TRUSTED_MIN_REVIEWS && reputation.avgStars >= rules.TRUSTED_MIN_STARS) {
    score += rules.TRUSTED_POINTS;
    factors.push(`Trusted Seller (${reputation.reviewCount}+ reviews)`);
  }

  const topBadge = reputation.badges.some((badge) => badge.toUpperCase().includes('TOP'));
  if (topBadge || reputation.isProfessional) {
    score += rules.TOP_SELLER_POINTS;
    factors.push('TOP SELLER');
  }

  if (reputation.registeredAt) {
    const days = accountAgeDays(reputation.registeredAt, now);
    if (days < rules.NEW_ACCOUNT_DAYS) {
      score += rules.NEW_ACCOUNT_POINTS;
      factors.push('New User');
    }
    if (days > rules.DORMANT_ACCOUNT_DAYS && reputation.reviewCount === 0) {
      score += rules.DORMANT_ACCOUNT_POINTS;
      factors.push('Dormant Account');
    }
  }

  if (reputation.scamReports > 0) {
    score = 100;
    factors.push('REPORTED SCAMMER');
  }

  return { ...result, riskScore: clampScore(score), riskFactors: factors };
}
