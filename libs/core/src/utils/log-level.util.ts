import { LogLevel } from '@nestjs/common';

const LOG_LEVELS: Record<string, LogLevel[]> = {
  fatal: ['fatal'],
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug'],
  trace: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

/** Maps `LOG_LEVEL` onto the Nest logger levels it enables. Unknown values fall back to info. */
export const resolveLogLevels = (level: string | undefined): LogLevel[] =>
  LOG_LEVELS[(level ?? 'info').trim().toLowerCase()] ?? LOG_LEVELS.info;
