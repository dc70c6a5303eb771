import 'dotenv/config';

import { loadEnv } from '@app/config';
import { createLogger } from '@app/logger';
import pino from 'pino';

import { runCli } from './cli.js';
import { CliError } from './errors.js';

const env = loadEnv();
// stdout carries scored listings, so logs go to stderr.
const logger = createLogger({
  service: 'market-cli',
  env: env.nodeEnv,
  level: env.logLevel,
  destination: pino.destination(2),
});

try {
  await runCli(process.argv.slice(2), { env, logger, stdout: process.stdout });
} catch (error) {
  if (error instanceof CliError) {
    logger.fatal({ reason: error.message }, 'Command rejected');
    process.exitCode = error.exitCode;
  } else {
    logger.fatal({ error }, 'Command failed');
    process.exitCode = 1;
  }
}
