import type { Writable } from 'node:stream';
import { parseArgs } from 'node:util';

import { OUTPUT_FORMATS, isOneOf, type AppEnv, type OutputFormat } from '@app/config';
import type { Logger } from '@app/logger';

import { runBuildStats } from './commands/build-stats.js';
import { runScore } from './commands/score.js';
import { CliError } from './errors.js';

export const USAGE = `Usage:
  market-cli build-stats --input <listings.json|.ndjson> [--output <market_stats.json>]
  market-cli score --input <listings.json|.ndjson> [--stats <market_stats.json>]
                   [--format ndjson|json] [--output <file>]
`;

export type CliContext = Readonly<{
  env: AppEnv;
  logger: Logger;
  stdout: Writable;
}>;

function parseCommandLine(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        input: { type: 'string', short: 'i' },
        output: { type: 'string', short: 'o' },
        stats: { type: 'string', short: 's' },
        format: { type: 'string', short: 'f' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError(`${message}\n${USAGE}`);
  }
}

function parseFormat(value: string | undefined, fallback: OutputFormat): OutputFormat {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (isOneOf(OUTPUT_FORMATS, normalized)) return normalized;
  throw new CliError(`Invalid --format: ${value} (expected ndjson or json)`);
}

function requireInput(value: string | undefined, command: string): string {
  if (!value?.trim()) {
    throw new CliError(`${command} requires --input\n${USAGE}`);
  }
  return value.trim();
}

export async function runCli(argv: readonly string[], context: CliContext): Promise<void> {
  const { values, positionals } = parseCommandLine(argv);
  const [command, ...extra] = positionals;

  if (values.help || command === undefined) {
    context.stdout.write(USAGE);
    return;
  }
  if (extra.length > 0) {
    throw new CliError(`Unexpected arguments: ${extra.join(' ')}\n${USAGE}`);
  }

  const logger = context.logger.child({ command });

  switch (command) {
    case 'build-stats':
      await runBuildStats(
        {
          input: requireInput(values.input, command),
          output: values.output ?? context.env.marketStatsFile,
        },
        logger
      );
      return;
    case 'score':
      await runScore(
        {
          input: requireInput(values.input, command),
          stats: values.stats ?? context.env.marketStatsFile,
          format: parseFormat(values.format, context.env.outputFormat),
          output: values.output,
        },
        { logger, stdout: context.stdout }
      );
      return;
    default:
      throw new CliError(`Unknown command: ${command}\n${USAGE}`);
  }
}
