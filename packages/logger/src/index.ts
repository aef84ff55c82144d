import pino from 'pino';
import type { Logger } from 'pino';
import { getConfig } from '@readygate/config';
import type { LogLevel, ReadygateConfig } from '@readygate/config';

const PID = process.pid;

export type ScopedLogger = Logger;

export type LoggingSettings = ReadygateConfig['logging'];

export interface LoggerOptions {
  level?: LogLevel;
  debug?: boolean;
  quiet?: boolean;
}

// Diagnostics never go to stdout; callers may capture it.
const destination = pino.destination({
  dest: 2,
  sync: true
});

// Error-level notices are never suppressed, so `fatal` is clamped to `error`.
export function resolveLevel(options: LoggerOptions = {}, settings: LoggingSettings = getConfig().logging): LogLevel {
  if (options.quiet ?? settings.quiet) {
    return 'error';
  }
  if (options.debug ?? settings.debug) {
    return 'debug';
  }
  const level = options.level ?? settings.level;
  return level === 'fatal' ? 'error' : level;
}

export function createLogger(scope: string, options?: LoggerOptions, settings?: LoggingSettings): ScopedLogger {
  return pino(
    {
      level: resolveLevel(options, settings),
      base: { pid: PID, scope },
      formatters: {
        level: (label) => ({ level: label })
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    destination
  );
}
