import type { KeywordRule, TaggedPattern } from './pattern-tables.js';

const boundaryCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function boundaryPattern(keyword: string): RegExp {
  let pattern = boundaryCache.get(keyword);
  if (!pattern) {
    pattern = new RegExp(`\\b${escapeRegExp(keyword)}\\b`);
    boundaryCache.set(keyword, pattern);
  }
  return pattern;
}

/** Tag of the first pattern found anywhere in `text`, in table order. */
export function matchFirst<Tag extends string>(
  text: string,
  patterns: readonly TaggedPattern<Tag>[]
): Tag | null {
  for (const { tag, pattern } of patterns) {
    if (text.search(pattern) !== -1) return tag;
  }
  return null;
}

/** Every match of `pattern`, whether or not it was declared global. */
export function matchAll(text: string, pattern: RegExp): RegExpMatchArray[] {
  const global = pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
  return Array.from(text.matchAll(global));
}

/** Whole-word keyword test; expects lowercase text and keywords. */
export function hasKeyword(textLower: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => boundaryPattern(keyword).test(textLower));
}

export function containsAny(textLower: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => textLower.includes(keyword));
}

export function countDistinct(textLower: string, keywords: readonly string[]): number {
  return keywords.filter((keyword) => textLower.includes(keyword)).length;
}

export function matchKeywordRule<Tag extends string>(
  textLower: string,
  rules: readonly KeywordRule<Tag>[],
  match: (text: string, keywords: readonly string[]) => boolean = hasKeyword
): Tag | null {
  for (const rule of rules) {
    if (match(textLower, rule.keywords)) return rule.tag;
  }
  return null;
}
