import type { Category, Condition, SpecSet } from './listings.js';

export type MarketAnalysis = Readonly<{
  category: Category;
  condition: Condition;
  specs: SpecSet;
  compositeZScore: number;
  estimatedMarketValue: number;
  componentsUsed: readonly string[];
  fallbackUsed: boolean;
}>;

export type RiskResult = Readonly<{
  riskScore: number;
  riskFactors: readonly string[];
  marketAnalysis: MarketAnalysis;
}>;

export type SellerReputation = Readonly<{
  reviewCount: number;
  /** Average rating on a 0..5 scale. */
  avgStars: number;
  badges: readonly string[];
  isProfessional: boolean;
  registeredAt: Date | null;
  scamReports: number;
}>;
