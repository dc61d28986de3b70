import chalk, { type ChalkInstance } from 'chalk';
import type { Logger, LogLevel, LogMeta } from '@trackmark/core';

export interface ConsoleLike {
  log(message: string): void;
  error(message: string): void;
}

export interface CliLoggerOptions {
  level: LogLevel;
  output?: ConsoleLike;
  colors?: ChalkInstance;
}

/**
 * Console logger for the command line. Info goes to stdout; everything else
 * to stderr. Debug output is dropped unless the level is `debug`.
 */
export function createCliLogger(options: CliLoggerOptions): Logger {
  const output = options.output ?? globalThis.console;
  const colors = options.colors ?? chalk;
  return {
    info(message) {
      output.log(message);
    },
    warn(message) {
      output.error(colors.yellow(message));
    },
    error(message) {
      output.error(colors.red(message));
    },
    debug(message, meta) {
      if (options.level !== 'debug') {
        return;
      }
      output.error(colors.gray(meta ? `${message} ${formatMeta(meta)}` : message));
    },
  };
}

function formatMeta(meta: LogMeta): string {
  return JSON.stringify(meta);
}

export function resolveLogLevel(levelFlag: string | undefined): LogLevel {
  if (levelFlag === undefined || levelFlag === 'info') {
    return 'info';
  }
  if (levelFlag === 'debug') {
    return 'debug';
  }
  throw new Error('Invalid log level. Use "info" or "debug".');
}
