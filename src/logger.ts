/**
 * Console logging with levels and structured metadata.
 *
 * Usage:
 *   const logger = createLogger('orchestrator');
 *   logger.warn('Retrying', { attempt: 2, delay: '2s' });
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.cyan('INFO'),
  warn: chalk.yellow('WARN'),
  error: chalk.red('ERROR'),
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/**
 * Create a logger whose lines are tagged with the given scope.
 */
export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    const line = `${LEVEL_TAGS[level]} ${chalk.dim(`[${scope}]`)} ${message}${formatMeta(meta)}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
}

export function formatMeta(meta?: LogMeta): string {
  if (!meta) return '';
  return Object.entries(meta)
    .map(([k, v]) => ` ${k}=${typeof v === 'string' ? v : safeStringify(v)}`)
    .join('');
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
