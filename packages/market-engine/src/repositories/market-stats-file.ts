import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import type { Logger } from '@app/logger';
import type {
  Category,
  CategoryStats,
  ComponentStats,
  Condition,
  ConditionStats,
  MarketStatsTable,
  PriceStat,
  SecondarySegment,
} from '@app/types';
import { CATEGORIES, CONDITIONS } from '@app/types';
import {
  MarketStatsDocumentSchema,
  formatIssues,
  type CategoryNodeDocument,
  type ConditionNodeDocument,
  type FlatStatDocument,
  type MarketStatsDocument,
  type PriceStatDocument,
} from '@app/validation';

import { EMPTY_MARKET_STATS, deepFreeze } from '../services/stats-aggregator.js';

const SECONDARY_SEGMENTS: readonly SecondarySegment[] = ['BROKEN', 'ACCESSORY'];

function toPriceStat(stat: PriceStatDocument): PriceStat {
  return { mean: stat.mean, median: stat.median, stdev: stat.stdev, count: stat.count };
}

/** Mean-and-count buckets read back with the mean as median and no spread. */
function fromFlatStat(stat: FlatStatDocument): PriceStat {
  return { mean: stat.mean, median: stat.median ?? stat.mean, stdev: stat.stdev ?? 0, count: stat.count };
}

function fromConditionNode(node: ConditionNodeDocument): ConditionStats {
  const components: ComponentStats = {
    cpu: node.components.cpu,
    gpu: node.components.gpu,
    ram: node.components.ram,
  };
  return { ...toPriceStat(node), components };
}

function fromCategoryNode(node: CategoryNodeDocument): CategoryStats {
  const conditions: Partial<Record<Condition, ConditionStats>> = {};
  for (const condition of CONDITIONS) {
    const entry = node[condition];
    if (entry) conditions[condition] = fromConditionNode(entry);
  }
  return conditions;
}

/** Typed table to the persisted shape: categories and flat buckets share the top level. */
export function toStatsDocument(table: MarketStatsTable): MarketStatsDocument {
  const document: MarketStatsDocument = {};
  for (const category of CATEGORIES) {
    const node = table.categories[category];
    if (!node) continue;
    const conditions: CategoryNodeDocument = {};
    for (const condition of CONDITIONS) {
      const stats = node[condition];
      if (!stats) continue;
      conditions[condition] = {
        ...toPriceStat(stats),
        components: {
          cpu: { ...stats.components.cpu },
          gpu: { ...stats.components.gpu },
          ram: { ...stats.components.ram },
        },
      };
    }
    document[category] = conditions;
  }
  for (const segment of SECONDARY_SEGMENTS) {
    const stat = table.secondary[segment];
    if (stat) document[segment] = toPriceStat(stat);
  }
  if (table.uncertain) document.UNCERTAIN = toPriceStat(table.uncertain);
  return document;
}

export function fromStatsDocument(document: MarketStatsDocument): MarketStatsTable {
  const categories: Partial<Record<Category, CategoryStats>> = {};
  for (const category of CATEGORIES) {
    const node = document[category];
    if (node) categories[category] = fromCategoryNode(node);
  }

  const secondary: Partial<Record<SecondarySegment, PriceStat>> = {};
  for (const segment of SECONDARY_SEGMENTS) {
    const stat = document[segment];
    if (stat) secondary[segment] = fromFlatStat(stat);
  }

  return deepFreeze({
    categories,
    secondary,
    uncertain: document.UNCERTAIN ? fromFlatStat(document.UNCERTAIN) : null,
  });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Loads the reference table. A missing file is a cold start; an unreadable or
 * invalid one is logged and also yields the empty table.
 */
export async function loadMarketStats(filePath: string, logger: Logger): Promise<MarketStatsTable> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      logger.warn({ filePath }, 'Market statistics file not found, scoring without reference data');
    } else {
      logger.error({ filePath, error }, 'Failed to read market statistics file');
    }
    return EMPTY_MARKET_STATS;
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw);
  } catch (error) {
    logger.error({ filePath, error }, 'Market statistics file is not valid JSON');
    return EMPTY_MARKET_STATS;
  }

  const parsed = MarketStatsDocumentSchema.safeParse(parsedJson);
  if (!parsed.success) {
    logger.error({ filePath, issues: formatIssues(parsed.error) }, 'Market statistics file failed validation');
    return EMPTY_MARKET_STATS;
  }

  const table = fromStatsDocument(parsed.data);
  logger.info({ filePath, categories: Object.keys(table.categories).length }, 'Market statistics loaded');
  return table;
}

/** Writes through a sibling temp file so readers never see a partial document. */
export async function saveMarketStats(filePath: string, table: MarketStatsTable): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  await writeFile(tmpPath, `${JSON.stringify(toStatsDocument(table), null, 4)}\n`, 'utf8');
  await rename(tmpPath, filePath);
}
