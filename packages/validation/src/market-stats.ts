import { z } from 'zod';

export const PriceStatSchema = z
  .object({
    mean: z.number().finite(),
    median: z.number().finite(),
    stdev: z.number().finite().min(0),
    count: z.number().int().min(1),
  })
  .strict();

/**
 * Flat bucket summaries. Older documents carry only `{mean, count}`; a malformed
 * bucket is dropped on its own since scoring never reads these.
 */
export const FlatStatSchema = z
  .object({
    mean: z.number().finite(),
    median: z.number().finite().optional(),
    stdev: z.number().finite().min(0).optional(),
    count: z.number().int().min(1),
  })
  .optional()
  .catch(undefined);

const ComponentTableSchema = z.record(z.string().min(1), PriceStatSchema);

export const ConditionNodeSchema = PriceStatSchema.extend({
  components: z
    .object({
      cpu: ComponentTableSchema.default({}),
      gpu: ComponentTableSchema.default({}),
      ram: ComponentTableSchema.default({}),
    })
    .strict(),
}).strict();

export const CategoryNodeSchema = z
  .object({
    NEW: ConditionNodeSchema.optional(),
    LIKE_NEW: ConditionNodeSchema.optional(),
    USED: ConditionNodeSchema.optional(),
    BROKEN: ConditionNodeSchema.optional(),
  })
  .strict();

/**
 * Persisted reference statistics: one node per category and condition, plus flat
 * summaries of the secondary and uncertain buckets.
 */
export const MarketStatsDocumentSchema = z
  .object({
    APPLE: CategoryNodeSchema.optional(),
    GAMING: CategoryNodeSchema.optional(),
    WORKSTATION: CategoryNodeSchema.optional(),
    PREMIUM_ULTRABOOK: CategoryNodeSchema.optional(),
    CHROMEBOOK: CategoryNodeSchema.optional(),
    SURFACE: CategoryNodeSchema.optional(),
    GENERICO: CategoryNodeSchema.optional(),
    BROKEN: FlatStatSchema,
    ACCESSORY: FlatStatSchema,
    UNCERTAIN: FlatStatSchema,
  })
  .strict();

export type PriceStatDocument = z.infer<typeof PriceStatSchema>;
export type FlatStatDocument = NonNullable<z.infer<typeof FlatStatSchema>>;
export type ConditionNodeDocument = z.infer<typeof ConditionNodeSchema>;
export type CategoryNodeDocument = z.infer<typeof CategoryNodeSchema>;
export type MarketStatsDocument = z.infer<typeof MarketStatsDocumentSchema>;
