import type { Condition, ConditionSource, ListingRecord } from '@app/types';

import { matchFirst } from './pattern-matcher.js';
import { CONDITION_TEXT_PATTERNS, STRUCTURED_CONDITIONS } from './pattern-tables.js';

export type ConditionResolution = Readonly<{
  condition: Condition;
  source: ConditionSource;
}>;

export function mapStructuredCondition(value: string): Condition {
  return STRUCTURED_CONDITIONS.get(value.trim().toLowerCase()) ?? 'USED';
}

export function conditionFromText(textLower: string): Condition {
  return matchFirst(textLower, CONDITION_TEXT_PATTERNS) ?? 'USED';
}

/**
 * Structured marketplace data beats the refurbished flag, which beats wording in
 * the listing text. Unknown structured values count as USED.
 */
export function resolveCondition(record: ListingRecord, fullTextLower: string): ConditionResolution {
  const structured = record.typeAttributes?.condition?.value;
  if (structured && structured.trim()) {
    return { condition: mapStructuredCondition(structured), source: 'structured' };
  }

  if (record.isRefurbished?.flag === true) {
    return { condition: 'LIKE_NEW', source: 'refurbished_flag' };
  }

  const fromText = matchFirst(fullTextLower, CONDITION_TEXT_PATTERNS);
  if (fromText) return { condition: fromText, source: 'text' };

  return { condition: 'USED', source: 'default' };
}
