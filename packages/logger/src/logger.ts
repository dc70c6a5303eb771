import { trace } from '@opentelemetry/api';
import pino, { type Logger as PinoLogger } from 'pino';

import { redactDeep, type RedactionMode } from './redaction.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Logger = Readonly<{
  debug: (context: Record<string, unknown>, message: string) => void;
  info: (context: Record<string, unknown>, message: string) => void;
  warn: (context: Record<string, unknown>, message: string) => void;
  error: (context: Record<string, unknown>, message: string) => void;
  fatal: (context: Record<string, unknown>, message: string) => void;
  child: (baseContext: Record<string, unknown>) => Logger;
}>;

export type CreateLoggerOptions = Readonly<{
  service: string;
  env: RedactionMode;
  level: LogLevel;
  version?: string;
  /** Defaults to stdout; the CLI points it at stderr so stdout stays pure NDJSON. */
  destination?: pino.DestinationStream;
}>;

export function createLogger(options: CreateLoggerOptions): Logger {
  const pinoLogger = pino(
    {
      level: options.level,
      messageKey: 'message',
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      base: {
        service: options.service,
        env: options.env,
        version: options.version ?? process.env['npm_package_version'] ?? '0.0.0',
      },
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    options.destination ?? pino.destination(1)
  );
  return wrap(pinoLogger, options.env, {});
}

const noop = (): void => undefined;

/** Logger that drops everything; default for library callers that pass none. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  fatal: noop,
  child: () => silentLogger,
};

function wrap(pinoLogger: PinoLogger, mode: RedactionMode, baseContext: Record<string, unknown>): Logger {
  const log = (level: LogLevel, context: Record<string, unknown>, message: string): void => {
    const merged = toSnakeCaseDeep({ ...baseContext, ...context, ...traceContext() });
    const redacted = redactDeep(merged, mode);
    pinoLogger[level](redacted, message);
  };

  return {
    debug: (context, message) => log('debug', context, message),
    info: (context, message) => log('info', context, message),
    warn: (context, message) => log('warn', context, message),
    error: (context, message) => log('error', context, message),
    fatal: (context, message) => log('fatal', context, message),
    child: (ctx) => wrap(pinoLogger, mode, { ...baseContext, ...ctx }),
  };
}

function traceContext(): Record<string, unknown> {
  const spanContext = trace.getActiveSpan()?.spanContext();
  if (!spanContext) return {};
  return { trace_id: spanContext.traceId, span_id: spanContext.spanId };
}

function toSnakeCaseDeep(value: unknown): unknown {
  if (value == null || typeof value !== 'object' || value instanceof Error) return value;
  if (Array.isArray(value)) return value.map(toSnakeCaseDeep);

  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    out[toSnakeKey(key)] = toSnakeCaseDeep(entry);
  }
  return out;
}

export function toSnakeKey(key: string): string {
  if (key.includes('_')) return key.toLowerCase();
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z0-9]+)/g, '$1_$2')
    .toLowerCase();
}
