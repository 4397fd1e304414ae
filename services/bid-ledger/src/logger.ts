import type { Logger } from './types.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Prefix for every line, e.g. `bid-ledger`. */
  name?: string;
  sink?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = RANK[options.level ?? 'warn'];
  const sink = options.sink ?? console;
  const prefix = options.name ? `${options.name}: ` : '';

  const emit =
    (level: Exclude<LogLevel, 'silent'>) =>
    (msg: string, ...args: unknown[]): void => {
      if (RANK[level] < threshold) return;
      sink[level](`${prefix}${msg}`, ...args);
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

export const silentLogger: Logger = createConsoleLogger({ level: 'silent' });
