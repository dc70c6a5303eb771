import type { ListingRecord } from '@app/types';

import { ENGINE_CONFIG } from './engine-config.js';
import { matchAll } from './pattern-matcher.js';
import { HIDDEN_PRICE_PATTERN, LOOSE_PRICE_PATTERN } from './pattern-tables.js';

export type NormalizedPrice = Readonly<{
  price: number;
  /** The listed price was symbolic and a real one was found in the text. */
  recovered: boolean;
}>;

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value.trim().replace(',', '.'));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Plain number or `{amount}`; anything else is 0. */
export function cleanPrice(record: Pick<ListingRecord, 'price'>): number {
  const price = record.price;
  if (price == null) return 0;
  if (typeof price === 'number') return toFiniteNumber(price) ?? 0;
  return toFiniteNumber(price.amount) ?? 0;
}

/**
 * Sellers sometimes list at 0-1€ and write the real price in the text. Explicit
 * phrases ("vendo por 450€") win; otherwise the largest plausible loose amount.
 */
export function extractHiddenPrice(title: string, description: string): number | null {
  const text = `${title} \n ${description}`;

  for (const match of matchAll(text, HIDDEN_PRICE_PATTERN)) {
    const value = Number.parseInt(match[1] ?? '', 10);
    if (value > ENGINE_CONFIG.HIDDEN_PRICE.STRUCTURED_MIN) return value;
  }

  const { LOOSE_MIN, LOOSE_MAX } = ENGINE_CONFIG.HIDDEN_PRICE;
  const loose = matchAll(text, LOOSE_PRICE_PATTERN)
    .map((match) => Number.parseInt(match[1] ?? '', 10))
    .filter((value) => value >= LOOSE_MIN && value <= LOOSE_MAX);

  return loose.length > 0 ? Math.max(...loose) : null;
}

export function normalizeListingPrice(record: ListingRecord): NormalizedPrice {
  const price = cleanPrice(record);
  if (price >= ENGINE_CONFIG.SYMBOLIC_PRICE) return { price, recovered: false };

  const hidden = extractHiddenPrice(record.title, record.description);
  return hidden === null ? { price, recovered: false } : { price: hidden, recovered: true };
}
