/**
 * Structured logging
 *
 * Diagnostics go to stderr through pino so that command output on stdout
 * stays clean. Library code takes a Logger and falls back to a silent one.
 */

import {
  destination,
  pino,
  stdTimeFunctions,
  type Logger as PinoLogger,
  type LoggerOptions as PinoLoggerOptions,
} from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  format?: LogFormat;
}

export type LogContext = Record<string, unknown>;

function createPinoLogger(options: LoggerOptions): PinoLogger {
  const pinoOptions: PinoLoggerOptions = {
    level: options.level ?? 'info',
    name: options.name ?? 'quarry',
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  if (options.format === 'pretty' && options.level !== 'silent') {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(pinoOptions, destination(2));
}

export class Logger {
  private readonly pino: PinoLogger;

  constructor(options: LoggerOptions = {}, instance?: PinoLogger) {
    this.pino = instance ?? createPinoLogger(options);
  }

  /**
   * Create a child logger with additional bindings
   */
  child(context: LogContext): Logger {
    return new Logger({}, this.pino.child(context));
  }

  get level(): string {
    return this.pino.level;
  }

  debug(msg: string, data?: LogContext): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: LogContext): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: LogContext): void {
    this.pino.warn(data ?? {}, msg);
  }

  error(msg: string, error?: Error | LogContext): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else {
      this.pino.error(error ?? {}, msg);
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

let silent: Logger | undefined;

/**
 * Shared logger that discards everything
 */
export function silentLogger(): Logger {
  if (!silent) {
    silent = new Logger({ level: 'silent' });
  }
  return silent;
}
