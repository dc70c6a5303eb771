import type { Category, Condition } from '@app/types';

export const ENGINE_CONFIG = {
  /** Prices strictly below this are placeholders ("1€, ask me"). */
  SYMBOLIC_PRICE: 5,
  ABSURD_PRICE: 10000,
  ACCESSORY_PRICE_CEILING: 100,

  HIDDEN_PRICE: {
    STRUCTURED_MIN: 20,
    LOOSE_MIN: 50,
    LOOSE_MAX: 5000,
  },

  DESCRIPTION_CAP: 400,
  SPAM_HIT_THRESHOLD: 3,

  RAM_WHITELIST: [4, 6, 8, 12, 16, 20, 24, 32, 40, 48, 64] as const,
  DEFAULT_RAM_CEILING: 128,
  RAM_CEILINGS: {
    CHROMEBOOK: 16,
    SURFACE: 32,
    PREMIUM_ULTRABOOK: 64,
    GENERICO: 64,
  } satisfies Partial<Record<Category, number>>,

  MIN_GROUP_SAMPLE: 2,
  MIN_FLAT_SAMPLE: 4,

  SIGNAL_WEIGHTS: {
    cpu: 0.5,
    gpu: 0.3,
    ram: 0.1,
    category: 0.1,
  },
  CONDITION_FALLBACK: {
    NEW: ['LIKE_NEW', 'USED'],
    LIKE_NEW: ['USED'],
    USED: [],
    BROKEN: [],
  } satisfies Record<Condition, readonly Condition[]>,
  NEW_ON_FALLBACK_MARKUP: 1.2,
  FALLBACK_STDEV: 100,

  RISK: {
    CHEAP_Z: -1.5,
    CHEAP_POINTS: 30,
    EXTREME_Z: -2.5,
    EXTREME_POINTS: 40,
    LOW_RATIO: 0.4,
    LOW_RATIO_POINTS: 20,
    SHORT_DESCRIPTION_LENGTH: 30,
    SHORT_DESCRIPTION_MIN_PRICE: 200,
    SHORT_DESCRIPTION_POINTS: 15,
    EXTERNAL_CONTACT_POINTS: 30,
  },

  REPUTATION: {
    TRUSTED_MIN_REVIEWS: 5,
    TRUSTED_MIN_STARS: 4.5,
    TRUSTED_POINTS: -30,
    TOP_SELLER_POINTS: -50,
    NEW_ACCOUNT_DAYS: 3,
    NEW_ACCOUNT_POINTS: 30,
    DORMANT_ACCOUNT_DAYS: 365,
    DORMANT_ACCOUNT_POINTS: 20,
  },
} as const;

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(Math.max(Math.round(value), 0), 100);
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
