/**
 * Structured logging for Authority Sync
 *
 * Levels, timestamps and contextual metadata. JSON lines in production,
 * one readable line per event otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  /** Metadata merged into every event of this logger */
  readonly context?: LogMetadata;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[currentLevel(this.config.level)];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const merged: LogMetadata = { ...this.config.context, ...metadata };
    const hasMeta = Object.keys(merged).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMeta ? ` ${JSON.stringify(merged)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...merged,
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

let levelOverride: LogLevel | null = null;

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

function currentLevel(configured: LogLevel): LogLevel {
  return levelOverride ?? configured;
}

/**
 * Override the level of every logger (CLI --verbose / --quiet)
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level;
}

export const logger = new Logger({
  level: getLogLevel(),
  service: 'authority-sync',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a module logger, e.g. `createLogger({ module: 'feed-walker' })`
 */
export function createLogger(context: LogMetadata & { readonly module: string }): Logger {
  const { module, ...rest } = context;
  return new Logger({
    level: getLogLevel(),
    service: `authority-sync:${module}`,
    pretty: process.env.NODE_ENV !== 'production',
    context: rest,
  });
}
