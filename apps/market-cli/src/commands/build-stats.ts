import type { Logger } from '@app/logger';
import { buildMarketStats, saveMarketStats } from '@app/market-engine';
import type { ListingRecord } from '@app/types';

import { readListings } from '../io/listing-reader.js';

export type BuildStatsOptions = Readonly<{
  input: string;
  output: string;
}>;

export type BuildStatsSummary = Readonly<{
  listings: number;
  categories: number;
  output: string;
}>;

export async function runBuildStats(options: BuildStatsOptions, logger: Logger): Promise<BuildStatsSummary> {
  const records: ListingRecord[] = [];
  for await (const record of readListings(options.input, logger)) {
    records.push(record);
  }

  const table = buildMarketStats(records, logger);
  await saveMarketStats(options.output, table);

  const summary: BuildStatsSummary = {
    listings: records.length,
    categories: Object.keys(table.categories).length,
    output: options.output,
  };
  logger.info(summary, 'Market statistics saved');
  return summary;
}
