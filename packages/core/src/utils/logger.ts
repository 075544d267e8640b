import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logger wrapper for rolegraph
 */
export class Logger {
  private pino: pino.Logger;

  constructor(name: string = 'rolegraph', level: LogLevel = defaultLevel(), instance?: pino.Logger) {
    this.pino = instance ?? pino({
      name,
      level,
      transport: process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.pino.debug(data, message);
    } else {
      this.pino.debug(message);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.pino.info(data, message);
    } else {
      this.pino.info(message);
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.pino.warn(data, message);
    } else {
      this.pino.warn(message);
    }
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.pino.error({ ...data, err: error }, message);
    } else if (error !== undefined || data) {
      this.pino.error({ ...data, detail: error }, message);
    } else {
      this.pino.error(message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new Logger(undefined, undefined, this.pino.child(bindings));
  }
}

function defaultLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent';
  const level = process.env.ROLEGRAPH_LOG_LEVEL;
  return level === 'debug' || level === 'info' || level === 'warn' || level === 'error' || level === 'silent'
    ? level
    : 'info';
}

// Default logger instance
export const logger = new Logger();
