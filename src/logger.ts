import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let threshold: LogLevel = 'info';

/**
 * Set the process-wide log threshold. Called once at startup from config.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[threshold];
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  child(scope: string): Logger;
}

function createLogger(scope?: string): Logger {
  const prefix = scope ? [chalk.dim(`(${scope})`)] : [];

  return {
    debug(...args: unknown[]) {
      if (shouldLog('debug')) {
        console.log(chalk.gray('[debug]'), ...prefix, ...args);
      }
    },

    info(...args: unknown[]) {
      if (shouldLog('info')) {
        console.log(chalk.blue('[info]'), ...prefix, ...args);
      }
    },

    warn(...args: unknown[]) {
      if (shouldLog('warn')) {
        console.log(chalk.yellow('[warn]'), ...prefix, ...args);
      }
    },

    error(...args: unknown[]) {
      if (shouldLog('error')) {
        console.error(chalk.red('[error]'), ...prefix, ...args);
      }
    },

    child(childScope: string) {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const logger = createLogger();
