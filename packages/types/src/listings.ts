export type ListingPriceValue =
  | number
  | Readonly<{ amount?: number | string | null | undefined; currency?: string | undefined }>;

export type ListingConditionHint = Readonly<{
  condition?: Readonly<{ value?: string | null | undefined }> | null | undefined;
}>;

export type ListingUserRef = Readonly<{
  id?: string | undefined;
  /** Epoch milliseconds, as the marketplace API reports it. */
  registerDate?: number | undefined;
}>;

/**
 * A listing as handed over by the external collector. Unknown collector fields
 * are carried through untouched; the engine only ever adds derived fields.
 */
export type ListingRecord = Readonly<{
  id: string;
  title: string;
  description: string;
  price?: ListingPriceValue | null | undefined;
  typeAttributes?: ListingConditionHint | null | undefined;
  isRefurbished?: Readonly<{ flag?: boolean | undefined }> | null | undefined;
  flags?: Readonly<{
    banned?: boolean | undefined;
    onHold?: boolean | undefined;
    reserved?: boolean | undefined;
  }> | null | undefined;
  user?: ListingUserRef | null | undefined;
  [extra: string]: unknown;
}>;

export type SpecSet = Readonly<{
  cpu: string | null;
  ram: string | null;
  gpu: string | null;
}>;

export type SpecComponent = keyof SpecSet;

export const SPEC_COMPONENTS = ['cpu', 'gpu', 'ram'] as const satisfies readonly SpecComponent[];

export const CATEGORIES = [
  'APPLE',
  'GAMING',
  'WORKSTATION',
  'PREMIUM_ULTRABOOK',
  'CHROMEBOOK',
  'SURFACE',
  'GENERICO',
] as const;

export type Category = (typeof CATEGORIES)[number];

export const CONDITIONS = ['NEW', 'LIKE_NEW', 'USED', 'BROKEN'] as const;

export type Condition = (typeof CONDITIONS)[number];

export type ConditionSource = 'structured' | 'refurbished_flag' | 'text' | 'default';

export type MarketSegment = 'PRIME' | 'BROKEN' | 'ACCESSORY' | 'UNCERTAIN' | 'JUNK';
