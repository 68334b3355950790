// src/services/logger.ts: structured logging for the recommender
import { Logger } from 'tslog';

const LOG_LEVELS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

export type LogLevelName = keyof typeof LOG_LEVELS;

function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function resolveMinLevel(raw: string | undefined): number {
  if (raw && isLogLevelName(raw)) return LOG_LEVELS[raw];
  return LOG_LEVELS.info;
}

export const logger = new Logger({
  name: 'assessment-recommender',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});

/** Applies the validated LOG_LEVEL once configuration has loaded. */
export function setLogLevel(level: LogLevelName): void {
  logger.settings.minLevel = LOG_LEVELS[level];
}
