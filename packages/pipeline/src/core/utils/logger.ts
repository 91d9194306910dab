/**
 * Structured logging utility for Airshed
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * Console-based: JSON lines when NODE_ENV=production, a readable line otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Logging surface the pipeline depends on; tests pass their own
 */
export interface PipelineLogger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
  child(context: LogMetadata): PipelineLogger;
}

interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  readonly context: LogMetadata;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class Logger implements PipelineLogger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const merged: LogMetadata = { ...this.config.context, ...(metadata ?? {}) };
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

  child(context: LogMetadata): PipelineLogger {
    const module = typeof context.module === 'string' ? context.module : null;
    return new Logger({
      ...this.config,
      service: module ? `${this.config.service}:${module}` : this.config.service,
      context: { ...this.config.context, ...omitModule(context) },
    });
  }
}

function omitModule(context: LogMetadata): LogMetadata {
  const { module: _module, ...rest } = context;
  return rest;
}

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return null;
}

const getLogLevel = (): LogLevel => parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

export const logger: PipelineLogger = new Logger({
  level: getLogLevel(),
  service: 'airshed',
  pretty: process.env.NODE_ENV !== 'production',
  context: {},
});

export interface CreateLoggerOptions {
  readonly level?: LogLevel;
  /** Force JSON lines regardless of NODE_ENV */
  readonly json?: boolean;
}

/**
 * Create a child logger with additional context
 *
 * `context.module` becomes part of the service name; every other key is
 * merged into each entry.
 */
export function createLogger(
  context: LogMetadata,
  options: CreateLoggerOptions = {}
): PipelineLogger {
  const root = new Logger({
    level: options.level ?? getLogLevel(),
    service: 'airshed',
    pretty: options.json ? false : process.env.NODE_ENV !== 'production',
    context: {},
  });
  return root.child(context);
}

/**
 * Logger that discards everything
 */
export const silentLogger: PipelineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
