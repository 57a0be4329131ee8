/**
 * Scoped stderr logger. Stdout is reserved for command output.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let minLevel: LogLevel = process.env.AI_LINT_DEBUG === '1' ? 'debug' : 'warn';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const STYLES: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string) => {
    if (LEVELS[level] < LEVELS[minLevel]) return;
    process.stderr.write(STYLES[level](`[${scope}] ${message}`) + '\n');
  };

  return {
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: message => write('warn', message),
    error: message => write('error', message),
  };
}
