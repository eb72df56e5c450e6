/**
 * Structured logging for the docket resolver
 *
 * Console-backed logger with levels, timestamps and bound context. Resolvers
 * take a logger per module through `createLogger({ module })`; the JSON form is
 * used when NODE_ENV is production, a single pretty line otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  readonly context?: LogMetadata;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const ROOT_SERVICE = 'docket-resolver';

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  get service(): string {
    return this.config.service;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.config.level];
  }

  /**
   * Logger sharing this one's service, with extra fields merged into every line.
   */
  child(context: LogMetadata): Logger {
    return new Logger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
  }

  formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const fields: LogMetadata = { ...this.config.context, ...metadata };
    const hasFields = Object.keys(fields).length > 0;

    if (this.config.pretty) {
      const metaStr = hasFields ? ` ${JSON.stringify(fields)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...fields,
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return fallback;
}

const isPretty = (): boolean => process.env.NODE_ENV !== 'production';

export const logger = new Logger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  service: ROOT_SERVICE,
  pretty: isPretty(),
});

/**
 * Create a module logger. `module` becomes part of the service name; any
 * other keys are bound as context.
 */
export function createLogger(context: LogMetadata): Logger {
  const { module, ...rest } = context;
  const name = typeof module === 'string' && module.length > 0 ? module : 'unknown';
  return new Logger({
    level: parseLogLevel(process.env.LOG_LEVEL),
    service: `${ROOT_SERVICE}:${name}`,
    pretty: isPretty(),
    context: rest,
  });
}
