import type { Logger } from '@app/logger';
import type { ConditionStats, PriceStat } from '@app/types';

export function stat(mean: number, stdev: number, count = 10): PriceStat {
  return { mean, median: mean, stdev, count };
}

export function node(
  base: PriceStat,
  components: Partial<ConditionStats['components']> = {}
): ConditionStats {
  return {
    ...base,
    components: { cpu: {}, gpu: {}, ram: {}, ...components },
  };
}

export type LogEntry = Readonly<{
  level: 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  context: Record<string, unknown>;
  message: string;
}>;

export function createRecordingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record =
    (level: LogEntry['level']) =>
    (context: Record<string, unknown>, message: string): void => {
      entries.push({ level, context, message });
    };
  const logger: Logger = {
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    fatal: record('fatal'),
    child: () => logger,
  };
  return { logger, entries };
}
