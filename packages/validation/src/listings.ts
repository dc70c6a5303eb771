import type { ListingRecord } from '@app/types';
import { z } from 'zod';

const IdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

// Malformed prices are kept as null and normalize to 0 downstream.
const PriceSchema = z
  .union([
    z.number(),
    z
      .object({
        amount: z.union([z.number(), z.string(), z.null()]).optional(),
        currency: z.string().optional(),
      })
      .passthrough(),
  ])
  .nullish()
  .catch(null);

const ConditionHintSchema = z
  .object({
    condition: z
      .object({ value: z.string().nullish() })
      .passthrough()
      .nullish(),
  })
  .passthrough()
  .nullish()
  .catch(null);

const RefurbishedSchema = z
  .object({ flag: z.boolean().optional() })
  .passthrough()
  .nullish()
  .catch(null);

const FlagsSchema = z
  .object({
    banned: z.boolean().optional(),
    onHold: z.boolean().optional(),
    reserved: z.boolean().optional(),
  })
  .passthrough()
  .nullish()
  .catch(null);

const EpochMillisSchema = z.number().finite().optional();

// The marketplace API spells it `register_date`.
const UserRefSchema = z
  .object({
    id: IdSchema.optional(),
    registerDate: EpochMillisSchema,
    register_date: EpochMillisSchema,
  })
  .passthrough()
  .transform((user) => ({
    ...user,
    registerDate: user.registerDate ?? user.register_date,
  }))
  .nullish()
  .catch(null);

/**
 * Raw listing as produced by the collector. Only `id` and `title` are required;
 * every other known field degrades to null when malformed and unknown fields pass through.
 */
export const ListingRecordSchema = z
  .object({
    id: IdSchema,
    title: z.string(),
    description: z
      .string()
      .nullish()
      .transform((value) => value ?? ''),
    price: PriceSchema,
    typeAttributes: ConditionHintSchema,
    isRefurbished: RefurbishedSchema,
    flags: FlagsSchema,
    user: UserRefSchema,
  })
  .passthrough()
  .transform((record) => ({
    ...record,
    // Collector records keep the API's snake_case keys; they stay on the record as-is.
    typeAttributes: record.typeAttributes ?? ConditionHintSchema.parse(record['type_attributes']),
    isRefurbished: record.isRefurbished ?? RefurbishedSchema.parse(record['is_refurbished']),
  }));

export type ListingRecordInput = z.infer<typeof ListingRecordSchema>;

export type ListingParseResult =
  | Readonly<{ ok: true; record: ListingRecord }>
  | Readonly<{ ok: false; issues: readonly string[] }>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function parseListingRecord(input: unknown): ListingParseResult {
  const parsed = ListingRecordSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, issues: formatIssues(parsed.error) };
  }
  const record: ListingRecord = parsed.data;
  return { ok: true, record };
}
