import chalk from 'chalk';
import type { LogLevel } from './config.js';

/**
 * Leveled stderr logger. stdout is reserved for command output
 * (tables, JSON, CSV), so every diagnostic goes through console.error.
 */

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const TAGS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.dim('debug'),
  info: chalk.cyan('info '),
  warn: chalk.yellow('warn '),
  error: chalk.red('error'),
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

let threshold: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, message: string) => {
    if (RANK[level] < RANK[threshold]) return;
    console.error(`${TAGS[level]} ${chalk.dim(`[${scope}]`)} ${message}`);
  };

  return {
    debug: msg => emit('debug', msg),
    info: msg => emit('info', msg),
    warn: msg => emit('warn', msg),
    error: msg => emit('error', msg),
    child: sub => createLogger(`${scope}:${sub}`),
  };
}
