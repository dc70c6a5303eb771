export const NODE_ENVS = ['development', 'staging', 'production', 'test'] as const;
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;
export const OUTPUT_FORMATS = ['ndjson', 'json'] as const;

export type NodeEnv = (typeof NODE_ENVS)[number];
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type AppEnv = Readonly<{
  nodeEnv: NodeEnv;
  logLevel: (typeof LOG_LEVELS)[number];

  /** Reference statistics document read by the scorer and written by build-stats. */
  marketStatsFile: string;
  outputFormat: OutputFormat;
}>;

type EnvSource = Record<string, string | undefined>;

export function isOneOf<T extends string>(allowed: readonly T[], value: string): value is T {
  return allowed.some((entry) => entry === value);
}

/** Case-insensitive pick from a fixed list; blank or unset takes the fallback. */
function readChoice<T extends string>(env: EnvSource, key: string, allowed: readonly T[], fallback: T): T {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const normalized = raw.toLowerCase();
  if (isOneOf(allowed, normalized)) return normalized;
  throw new Error(`Invalid ${key}: ${raw}`);
}

function readStatsPath(env: EnvSource): string {
  const value = env['MARKET_STATS_FILE']?.trim() || 'market_stats.json';
  if (!value.endsWith('.json')) {
    throw new Error(`MARKET_STATS_FILE must point at a .json file: ${value}`);
  }
  return value;
}

export function loadEnv(env: EnvSource = process.env): AppEnv {
  return Object.freeze({
    nodeEnv: readChoice(env, 'NODE_ENV', NODE_ENVS, 'development'),
    logLevel: readChoice(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
    marketStatsFile: readStatsPath(env),
    outputFormat: readChoice(env, 'OUTPUT_FORMAT', OUTPUT_FORMATS, 'ndjson'),
  });
}
