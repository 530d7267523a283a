// node/src/services/logger.ts: structured logging for the review insights backend
import { Logger, type ILogObj } from 'tslog';

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function resolveMinLevel(raw: string | undefined): number {
  if (process.env.VITEST) return LEVELS.fatal;
  return LEVELS[(raw ?? '').toLowerCase()] ?? LEVELS.info;
}

export const logger = new Logger<ILogObj>({
  name: 'review-insights',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
});

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
