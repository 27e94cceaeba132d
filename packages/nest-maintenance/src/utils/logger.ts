import { LoggerPort } from './logger.interface';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Console logger that prints `[scope] [LEVEL] message` for levels at or above `minLevel`. */
export class MaintenanceLogger implements LoggerPort {
  constructor(
    private readonly scope = 'nest-maintenance',
    private readonly minLevel: LogLevel = 'info',
  ) {}

  debug(message: string, meta?: Record<string, unknown>): void {
    this.print('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.print('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.print('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.print('error', message, meta);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  private print(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const line = `[${this.scope}] [${level.toUpperCase()}] ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      // eslint-disable-next-line no-console
      console.log(line, meta);
      return;
    }
    // eslint-disable-next-line no-console
    console.log(line);
  }
}

/** Logger that drops everything; used when callers pass no logger to the standalone matchers. */
export const silentLogger: LoggerPort = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
