import type { Category, SpecSet } from '@app/types';

import { containsAny, matchKeywordRule } from './pattern-matcher.js';
import {
  APPLE_TEXT_MARKERS,
  CATEGORY_KEYWORD_RULES,
  TITLE_CATEGORY_RULES,
} from './pattern-tables.js';

export type CategoryResolution = Readonly<{
  category: Category;
  specs: SpecSet;
}>;

/**
 * General classifier, first match wins: Apple silicon, dedicated GPU, Apple wording
 * without an AMD processor, the keyword table, the literal "gaming", GENERICO.
 */
export function classifyCategory(textLower: string, specs: SpecSet): Category {
  const cpu = (specs.cpu ?? '').toUpperCase();
  if (cpu.includes('APPLE M')) return 'APPLE';

  if (specs.gpu) {
    return specs.gpu.toLowerCase().includes('quadro') ? 'WORKSTATION' : 'GAMING';
  }

  if (containsAny(textLower, APPLE_TEXT_MARKERS) && !cpu.includes('AMD')) return 'APPLE';

  const byKeyword = matchKeywordRule(textLower, CATEGORY_KEYWORD_RULES);
  if (byKeyword) return byKeyword;

  if (textLower.includes('gaming')) return 'GAMING';
  return 'GENERICO';
}

export function detectTitleCategory(title: string): Category | null {
  return matchKeywordRule(title.toLowerCase(), TITLE_CATEGORY_RULES, containsAny);
}

export function resolveCategory(title: string, fullTextLower: string, specs: SpecSet): CategoryResolution {
  const locked = detectTitleCategory(title);
  if (locked === 'CHROMEBOOK') {
    return { category: locked, specs: { ...specs, gpu: null } };
  }
  if (locked) return { category: locked, specs };
  return { category: classifyCategory(fullTextLower, specs), specs };
}
