import type { Category, Condition } from '@app/types';

export type TaggedPattern<Tag extends string> = Readonly<{
  tag: Tag;
  pattern: RegExp;
}>;

export type KeywordRule<Tag extends string> = Readonly<{
  tag: Tag;
  keywords: readonly string[];
}>;

// --- storage tokens -------------------------------------------------------

export const STORAGE_BEFORE_M2 = /\b(ssd|disco|disk|drive|almacenamiento)\s+m\.?2\b/gi;
export const STORAGE_AFTER_M2 = /\bm\.?2\s+(ssd|nvme|sata)\b/gi;

/** Substring markers of keyword-stuffing blocks appended to descriptions. */
export const SPAM_INDICATORS = [
  'rtx',
  'gtx',
  'amd',
  'intel',
  'ryzen',
  'i7',
  'i5',
  'ps5',
  'xbox',
  'iphone',
  'samsung',
  'asus',
  'msi',
] as const;

// --- hardware -------------------------------------------------------------

export const RAM_PATTERN =
  /\b(\d+)\s*(?:gb|gigas?)\b(?!\s*(?:[.,\-/]\s*)?(?:de\s+)?(?:ssd|hdd|emmc|rom|almacenamiento|storage|disco|nvme|flash|interno|interna))/gi;

export const CPU_BRAND_PATTERN = /\b(intel|amd|apple|qualcomm|microsoft)\b/i;

export type CpuFamily = 'INTEL_CORE' | 'RYZEN' | 'APPLE_SILICON' | 'INTEL_VALUE' | 'ARM';

export type CpuModelRule = TaggedPattern<CpuFamily> &
  Readonly<{
    /** Canonical model key for one match, e.g. `I7`, `RYZEN7`, `M2 PRO`. */
    toModel: (match: RegExpMatchArray) => string | null;
  }>;

function upper(value: string | undefined): string | null {
  return value ? value.toUpperCase() : null;
}

export const CPU_MODEL_RULES: readonly CpuModelRule[] = [
  {
    tag: 'INTEL_CORE',
    pattern: /\b(?:core\s*-?)?(i[3579])\b/gi,
    toModel: (match) => upper(match[1]),
  },
  {
    tag: 'RYZEN',
    pattern: /\bryzen\s*-?([3579])\b/gi,
    toModel: (match) => (match[1] ? `RYZEN${match[1]}` : null),
  },
  {
    tag: 'APPLE_SILICON',
    pattern: /\b(m[123])\s*(pro|max|ultra)?\b/gi,
    toModel: (match) => {
      const chip = upper(match[1]);
      if (!chip) return null;
      const variant = upper(match[2]);
      return variant ? `${chip} ${variant}` : chip;
    },
  },
  {
    tag: 'INTEL_VALUE',
    pattern: /\b(celeron|pentium|atom|xeon)\b/gi,
    toModel: (match) => upper(match[1]),
  },
  {
    tag: 'ARM',
    pattern: /\b(snapdragon|sq[123])\b/gi,
    toModel: (match) => upper(match[1]),
  },
];

/** Model family to the brand that ships it; first matching rule wins. */
export const CPU_BRAND_BY_MODEL: readonly TaggedPattern<string>[] = [
  { tag: 'APPLE', pattern: /^M[123]/ },
  { tag: 'AMD', pattern: /RYZEN/ },
  { tag: 'INTEL', pattern: /^I\d/ },
  { tag: 'INTEL', pattern: /CELERON|PENTIUM|ATOM|XEON/ },
  { tag: 'QUALCOMM', pattern: /SNAPDRAGON|SQ[123]/ },
];

export const GPU_BRAND_PATTERN = /\b(nvidia|amd|radeon|geforce)\b/i;

export const GPU_MODEL_PATTERN = /\b((?:rtx|gtx|rx)\s*-?\d{3,4}[a-z]*)\b/gi;

export const GPU_BRAND_BY_MODEL: readonly TaggedPattern<string>[] = [
  { tag: 'NVIDIA', pattern: /RTX|GTX|MX|QUADRO/ },
  { tag: 'AMD', pattern: /RX|RADEON|FIREPRO/ },
];

// --- categories -----------------------------------------------------------

/** Title phrases that lock the category before the general classifier runs. */
export const TITLE_CATEGORY_RULES: readonly KeywordRule<Category>[] = [
  { tag: 'CHROMEBOOK', keywords: ['chromebook'] },
  { tag: 'APPLE', keywords: ['macbook', 'mac air', 'mac pro', 'imac'] },
  { tag: 'SURFACE', keywords: ['surface'] },
];

export const APPLE_TEXT_MARKERS = ['apple', 'macbook', 'macos'] as const;

/** Checked in order with word boundaries. */
export const CATEGORY_KEYWORD_RULES: readonly KeywordRule<Category>[] = [
  { tag: 'SURFACE', keywords: ['surface', 'microsoft surface'] },
  {
    tag: 'WORKSTATION',
    keywords: ['thinkpad', 'latitude', 'precision', 'zbook', 'quadro', 'elitebook', 'probook'],
  },
  {
    tag: 'PREMIUM_ULTRABOOK',
    keywords: ['xps', 'spectre', 'zenbook', 'gram', 'yoga', 'matebook'],
  },
  { tag: 'CHROMEBOOK', keywords: ['chromebook', 'chrome'] },
];

// --- condition ------------------------------------------------------------

/** Text fallback, checked in order: a broken unit may still claim to be "like new". */
export const CONDITION_TEXT_PATTERNS: readonly TaggedPattern<Condition>[] = [
  {
    tag: 'BROKEN',
    pattern:
      /\b(roto|averiado|fallo|bloqueado|icloud|bios|pantalla rota|no enciende|no funciona|para piezas|despiece|repuesto|tarada|golpe|mojado|water|broken|parts|read|leer|reparar)\b/i,
  },
  {
    tag: 'NEW',
    pattern: /\b(nuevo|precintado|sin abrir|estrenar|sealed|new|garantia|factura)\b/i,
  },
  {
    tag: 'LIKE_NEW',
    pattern:
      /\b(como nuevo|impecable|perfecto estado|reacondicionado|refurbished|poquisimo uso|sin uso)\b/i,
  },
];

export const STRUCTURED_CONDITIONS: ReadonlyMap<string, Condition> = new Map<string, Condition>([
  ['new', 'NEW'],
  ['as_good_as_new', 'LIKE_NEW'],
  ['has_given_it_all', 'BROKEN'],
  ['good', 'USED'],
  ['fair', 'USED'],
]);

// --- segmentation ---------------------------------------------------------

export const LAPTOP_INDICATORS = [
  'portatil',
  'portátil',
  'laptop',
  'notebook',
  'macbook',
  'ultrabook',
  'chromebook',
] as const;

export const ACCESSORY_KEYWORDS = [
  'funda',
  'caja',
  'dock',
  'raton',
  'ratón',
  'mochila',
  'maletin',
  'maletín',
  'soporte',
  'base refrigeradora',
] as const;

/** An accessory word opening the title decides the segment on its own. */
export const STRONG_ACCESSORY_PREFIXES = [
  'funda',
  'caja',
  'dock',
  'docking',
  'raton',
  'ratón',
  'mochila',
  'maletin',
  'maletín',
  'soporte',
  'cargador',
] as const;

/** Matched with word boundaries; a single part sold without the machine. */
export const COMPONENT_KEYWORDS = [
  'pantalla',
  'screen',
  'teclado',
  'keyboard',
  'bateria',
  'batería',
  'battery',
  'cargador',
  'charger',
  'placa base',
  'motherboard',
  'disco',
  'ram',
] as const;

// --- price & contact ------------------------------------------------------

export const HIDDEN_PRICE_PATTERN =
  /(?:precio|valor|vende|vendo|pido|oferta)[:\s]*(?:por)?\s*(\d{2,4})(?:[.,]\d{2})?\s*(?:€|eur|euros)/gi;

export const LOOSE_PRICE_PATTERN = /\b(\d{2,4})\s*(?:€|euros\b)/gi;

export const EXTERNAL_CONTACT_PATTERN = /(whatsapp|telegram|\b[67]\d{8}\b)/i;
