import type { Condition, MarketSegment, SpecSet } from '@app/types';

import { ENGINE_CONFIG } from './engine-config.js';
import { containsAny, hasKeyword } from './pattern-matcher.js';
import {
  ACCESSORY_KEYWORDS,
  COMPONENT_KEYWORDS,
  LAPTOP_INDICATORS,
  STRONG_ACCESSORY_PREFIXES,
} from './pattern-tables.js';

export type SegmentInput = Readonly<{
  title: string;
  price: number;
  condition: Condition;
  specs: SpecSet;
}>;

export function determineMarketSegment(input: SegmentInput): MarketSegment {
  const { price } = input;
  if (price < ENGINE_CONFIG.SYMBOLIC_PRICE) return 'UNCERTAIN';
  if (price > ENGINE_CONFIG.ABSURD_PRICE) return 'JUNK';
  if (input.condition === 'BROKEN') return 'BROKEN';

  const title = input.title.trim().toLowerCase();
  const isLaptop = containsAny(title, LAPTOP_INDICATORS);

  const strongPrefix = STRONG_ACCESSORY_PREFIXES.some((word) => title.startsWith(word));

  if (strongPrefix || containsAny(title, ACCESSORY_KEYWORDS)) {
    if (price < ENGINE_CONFIG.ACCESSORY_PRICE_CEILING || !isLaptop || strongPrefix) {
      return 'ACCESSORY';
    }
    return 'PRIME';
  }

  // Component word ("ram", "pantalla") without a laptop word is a spare part, unless
  // a processor was detected: then the machine itself is on sale.
  if (hasKeyword(title, COMPONENT_KEYWORDS) && !isLaptop && !input.specs.cpu) {
    return 'ACCESSORY';
  }

  return 'PRIME';
}
