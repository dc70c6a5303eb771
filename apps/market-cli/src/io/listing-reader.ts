import { createReadStream } from 'node:fs';
import { access, readFile } from 'node:fs/promises';
import path from 'node:path';
import readline from 'node:readline';

import type { Logger } from '@app/logger';
import type { ListingRecord } from '@app/types';
import { parseListingRecord } from '@app/validation';

import { CliError } from '../errors.js';

export type ListingFileFormat = 'json' | 'ndjson';

/** `.ndjson` and `.jsonl` are one listing per line; anything else is a JSON array. */
export function detectListingFormat(filePath: string): ListingFileFormat {
  const extension = path.extname(filePath).toLowerCase();
  return extension === '.ndjson' || extension === '.jsonl' ? 'ndjson' : 'json';
}

async function assertReadable(filePath: string): Promise<void> {
  try {
    await access(filePath);
  } catch {
    throw new CliError(`Input file not found: ${filePath}`);
  }
}

async function* readJsonArray(filePath: string): AsyncGenerator<{ position: number; value: unknown }> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, 'utf8'));
  } catch {
    throw new CliError(`Input file is not valid JSON: ${filePath}`);
  }
  if (!Array.isArray(parsed)) {
    throw new CliError(`Input file must contain a JSON array of listings: ${filePath}`);
  }

  for (const [index, value] of parsed.entries()) {
    yield { position: index + 1, value };
  }
}

async function* readNdjson(
  filePath: string,
  logger: Logger
): AsyncGenerator<{ position: number; value: unknown }> {
  const rl = readline.createInterface({
    input: createReadStream(filePath, { encoding: 'utf8' }),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber += 1;
    if (!line.trim()) continue;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      logger.warn({ filePath, position: lineNumber }, 'Skipping unparsable listing line');
      continue;
    }
    yield { position: lineNumber, value };
  }
}

/**
 * Streams validated listings from a JSON array or NDJSON file. Records that fail
 * the schema are logged and skipped; `position` is the array index (1-based) or
 * the line number.
 */
export async function* readListings(filePath: string, logger: Logger): AsyncGenerator<ListingRecord> {
  await assertReadable(filePath);

  const format = detectListingFormat(filePath);
  const source = format === 'ndjson' ? readNdjson(filePath, logger) : readJsonArray(filePath);

  let accepted = 0;
  let skipped = 0;
  for await (const { position, value } of source) {
    const parsed = parseListingRecord(value);
    if (!parsed.ok) {
      skipped += 1;
      logger.warn({ filePath, position, issues: parsed.issues }, 'Skipping invalid listing');
      continue;
    }
    accepted += 1;
    yield parsed.record;
  }

  logger.info({ filePath, format, accepted, skipped }, 'Listings read');
}
