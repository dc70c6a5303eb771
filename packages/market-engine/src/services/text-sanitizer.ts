import { ENGINE_CONFIG } from './engine-config.js';
import { countDistinct } from './pattern-matcher.js';
import { SPAM_INDICATORS, STORAGE_AFTER_M2, STORAGE_BEFORE_M2 } from './pattern-tables.js';

export type SanitizedText = Readonly<{
  title: string;
  description: string;
  /** `"<title> <description>"`, original casing. */
  fullText: string;
}>;

/**
 * Rewrites "SSD M.2" / "M.2 SSD" into single tokens so that the storage interface
 * never reads as an Apple M2 chip.
 */
export function disambiguateStorageTokens(text: string): string {
  return text.replace(STORAGE_BEFORE_M2, '$1_NVME').replace(STORAGE_AFTER_M2, 'NVME_$1');
}

/** Drops the first keyword-stuffed line and everything after it. */
export function truncateSpamBlock(text: string): string {
  const kept: string[] = [];
  for (const line of text.split('\n')) {
    if (countDistinct(line.toLowerCase(), SPAM_INDICATORS) > ENGINE_CONFIG.SPAM_HIT_THRESHOLD) {
      break;
    }
    kept.push(line);
  }
  return kept.join('\n');
}

export function capDescription(text: string): string {
  return text.slice(0, ENGINE_CONFIG.DESCRIPTION_CAP);
}

/** The description is not capped here; only spec extraction reads the capped form. */
export function sanitizeListingText(title: string, description: string): SanitizedText {
  const cleanTitle = disambiguateStorageTokens(title);
  const cleanDescription = disambiguateStorageTokens(truncateSpamBlock(description));
  return {
    title: cleanTitle,
    description: cleanDescription,
    fullText: `${cleanTitle} ${cleanDescription}`,
  };
}
