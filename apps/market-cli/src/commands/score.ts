import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { Writable } from 'node:stream';

import type { OutputFormat } from '@app/config';
import type { Logger } from '@app/logger';
import { loadMarketStats, MarketAnalyzer } from '@app/market-engine';

import { createEnrichedWriter } from '../io/enriched-writer.js';
import { readListings } from '../io/listing-reader.js';

export type ScoreOptions = Readonly<{
  input: string;
  stats: string;
  format: OutputFormat;
  /** Stdout when absent. */
  output?: string | undefined;
}>;

export type ScoreSummary = Readonly<{
  scored: number;
  flagged: number;
}>;

export type ScoreContext = Readonly<{
  logger: Logger;
  stdout: Writable;
}>;

export async function runScore(options: ScoreOptions, context: ScoreContext): Promise<ScoreSummary> {
  const { logger } = context;
  const table = await loadMarketStats(options.stats, logger);
  const analyzer = new MarketAnalyzer(table, logger);

  let stream: Writable = context.stdout;
  if (options.output !== undefined) {
    await mkdir(path.dirname(options.output), { recursive: true });
    stream = createWriteStream(options.output, { encoding: 'utf8' });
  }
  const writer = createEnrichedWriter(stream, {
    format: options.format,
    endStream: options.output !== undefined,
  });

  let flagged = 0;
  try {
    for await (const record of readListings(options.input, logger)) {
      const enriched = analyzer.enrich(record);
      if (enriched.enrichment.riskScore > 0) flagged += 1;
      await writer.write(enriched);
    }
  } finally {
    await writer.close();
  }

  const summary: ScoreSummary = { scored: writer.count(), flagged };
  logger.info({ ...summary, output: options.output ?? 'stdout' }, 'Listings scored');
  return summary;
}
