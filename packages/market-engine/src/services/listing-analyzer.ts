import type { Logger } from '@app/logger';
import { silentLogger } from '@app/logger';
import type {
  Category,
  Condition,
  ConditionSource,
  ListingRecord,
  MarketSegment,
  MarketStatsTable,
  RiskResult,
  SellerReputation,
  SpecSet,
} from '@app/types';

import { scoreListing } from './anomaly-scorer.js';
import { resolveCategory } from './category-classifier.js';
import { resolveCondition } from './condition-resolver.js';
import { applyCategoryConstraints } from './constraint-corrector.js';
import { determineMarketSegment } from './market-segmenter.js';
import { cleanPrice, normalizeListingPrice } from './price-normalizer.js';
import { applySellerReputation, shouldReviewSeller } from './seller-reputation.js';
import { extractListingSpecs } from './spec-extractor.js';
import { sanitizeListingText } from './text-sanitizer.js';

export type ListingAnalysis = Readonly<{
  price: number;
  specs: SpecSet;
  category: Category;
  condition: Condition;
  conditionSource: ConditionSource;
  fullText: string;
}>;

export type EnrichedListing = ListingRecord &
  Readonly<{
    enrichment: RiskResult;
  }>;

export type EnrichOptions = Readonly<{
  /** Seller data from the marketplace, when the caller looked it up. */
  reputation?: SellerReputation | null;
  now?: Date;
}>;

/** Sanitizer, extractor, classifier, corrector and condition resolver in one pass. */
export function analyzeListing(record: ListingRecord): ListingAnalysis {
  const text = sanitizeListingText(record.title, record.description);
  const fullTextLower = text.fullText.toLowerCase();

  const extracted = extractListingSpecs(text.title, text.description);
  const { category, specs } = resolveCategory(text.title, fullTextLower, extracted);
  const corrected = applyCategoryConstraints(specs, category, fullTextLower);
  // Condition wording is read from the raw text, spam block included.
  const { condition, source } = resolveCondition(record, `${record.title} ${record.description}`.toLowerCase());

  return {
    price: cleanPrice(record),
    specs: corrected,
    category,
    condition,
    conditionSource: source,
    fullText: text.fullText,
  };
}

/** The listing's own user reference fills in an account age the lookup did not return. */
function withRegistrationDate(reputation: SellerReputation, record: ListingRecord): SellerReputation {
  const registerDate = record.user?.registerDate;
  if (reputation.registeredAt || registerDate === undefined) return reputation;
  return { ...reputation, registeredAt: new Date(registerDate) };
}

/**
 * Real-time scoring against one reference table. The table is injected and only
 * read, so one analyzer can be shared by concurrent callers.
 */
export class MarketAnalyzer {
  constructor(
    private readonly table: MarketStatsTable,
    private readonly logger: Logger = silentLogger
  ) {}

  segment(record: ListingRecord): MarketSegment {
    const analysis = analyzeListing(record);
    return determineMarketSegment({
      title: record.title,
      price: analysis.price,
      condition: analysis.condition,
      specs: analysis.specs,
    });
  }

  enrich(record: ListingRecord, options: EnrichOptions = {}): EnrichedListing {
    const { price, recovered } = normalizeListingPrice(record);
    const analysis = analyzeListing(record);

    let result = scoreListing(
      {
        price,
        description: record.description,
        category: analysis.category,
        condition: analysis.condition,
        specs: analysis.specs,
      },
      this.table
    );

    if (analysis.conditionSource === 'structured' || analysis.conditionSource === 'refurbished_flag') {
      result = { ...result, riskFactors: [...result.riskFactors, `Verified Condition: ${analysis.condition}`] };
    }

    if (options.reputation) {
      const reputation = withRegistrationDate(options.reputation, record);
      result = applySellerReputation(result, reputation, options.now ?? new Date());
    } else if (shouldReviewSeller(result, { priceRecovered: recovered })) {
      this.logger.debug({ listingId: record.id, userId: record.user?.id ?? null }, 'Seller review recommended');
    }

    if (recovered) {
      this.logger.info({ listingId: record.id, recoveredPrice: price }, 'Symbolic price replaced by price found in text');
    }
    this.logger.debug(
      {
        listingId: record.id,
        riskScore: result.riskScore,
        category: result.marketAnalysis.category,
        compositeZScore: result.marketAnalysis.compositeZScore,
      },
      'Listing scored'
    );

    return {
      ...record,
      ...(recovered ? { price: { amount: price, currency: 'EUR' } } : {}),
      enrichment: result,
    };
  }
}
