/**
 * Structured Logging Module
 *
 * pino-based structured logging with scoped child loggers.
 * JSON output in production or when stdout is not a terminal,
 * pretty-printed otherwise.
 */

import pino, { Logger } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Initialize the root logger. Call once at startup; later calls replace it,
 * but child loggers already handed out keep writing to the old root.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = config.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const pretty = config.pretty ?? (process.env.NODE_ENV !== 'production' && process.stdout.isTTY === true);

  if (pretty) {
    rootLogger = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          messageFormat: '[{module}] {msg}',
        },
      },
    });
  } else {
    rootLogger = pino({ level });
  }
  return rootLogger;
}

/**
 * Get the root logger instance.
 * Auto-initializes if not already initialized.
 */
function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
