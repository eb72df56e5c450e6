/**
 * Docket Resolver CLI Structured Logging
 *
 * Structured JSON lines for machine consumption, one coloured line per
 * entry for interactive use. Every entry goes to stderr; stdout carries
 * command output only. Tracks the running command and its duration.
 *
 * @module cli/lib/logger
 */

import type { LogLevel, LogMetadata } from '../../core/utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly service: string;
  readonly command?: string;
  readonly [key: string]: unknown;
}

export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  readonly json: boolean;
  readonly service: string;
  /** Colour human output (default: stderr is a TTY) */
  readonly color?: boolean;
  /** Line sink (default: stderr) */
  readonly write?: (line: string) => void;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

// ============================================================================
// CLI Logger Class
// ============================================================================

export class CLILogger {
  private readonly config: CLILoggerConfig;
  private readonly write: (line: string) => void;
  private readonly color: boolean;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = config;
    this.write = config.write ?? writeStderr;
    this.color = config.color ?? (!config.json && process.stderr.isTTY === true);
    this.startTime = Date.now();
  }

  get level(): LogLevel {
    return this.config.level;
  }

  get command(): string | null {
    return this.commandContext;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.service,
      ...(this.commandContext !== null && { command: this.commandContext }),
      ...metadata,
    };
    return JSON.stringify(entry);
  }

  private paint(color: string, text: string): string {
    return this.color ? `${color}${text}${COLORS.reset}` : text;
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${this.paint(COLORS.dim, new Date().toISOString())} `;
    line += `${this.paint(LEVEL_COLORS[level], LEVEL_LABELS[level])} `;
    line += message;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${this.paint(COLORS.cyan, key)}=${valueStr}`;
        })
        .join(' ');
      line += ` ${this.paint(COLORS.dim, `(${metaStr})`)}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;
    this.write(
      this.config.json
        ? this.formatJson(level, message, metadata)
        : this.formatHuman(level, message, metadata)
    );
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  /**
   * Set the command context and restart the timer.
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.debug(`Starting ${command}`, options);
  }

  /**
   * Log command completion with its duration.
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const duration_ms = Date.now() - this.startTime;
    if (success) {
      this.debug('Command completed', { duration_ms, ...metadata });
    } else {
      this.error('Command failed', { duration_ms, ...metadata });
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    ...config,
    level: config.level ?? 'info',
    json: config.json ?? false,
    service: config.service ?? 'docket-resolver',
  });
}
