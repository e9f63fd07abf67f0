/**
 * Structured logging utility for the crime pipeline
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * Console output plus an optional append-only log file shared by every stage.
 *
 * @module logger
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
  /** Append every emitted entry to this file */
  readonly logFile?: string;
  /** Suppress console output (file sink still receives entries; if it fails, stderr does) */
  readonly silent?: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  critical: 4,
};

export class Logger {
  private readonly config: LoggerConfig;
  private sinkFailed = false;

  constructor(config: LoggerConfig) {
    this.config = config;
    if (config.logFile) {
      mkdirSync(dirname(config.logFile), { recursive: true });
    }
  }

  get level(): LogLevel {
    return this.config.level;
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
    const baseLog = {
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };

    if (this.config.pretty) {
      const metaStr =
        metadata && Object.keys(metadata).length > 0
          ? ` ${JSON.stringify(metadata)}`
          : '';
      return `[${timestamp}] ${level.toUpperCase()}: ${message}${metaStr}`;
    }

    return JSON.stringify(baseLog);
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;
    const line = this.formatMessage(level, message, metadata);

    if (this.config.logFile && !this.sinkFailed) {
      try {
        appendFileSync(this.config.logFile, `${line}\n`, 'utf-8');
      } catch (error) {
        // Stop retrying the file; entries fall back to the console
        this.sinkFailed = true;
        console.error(
          `Log file ${this.config.logFile} is not writable, logging to console only: ${
            error instanceof Error ? error.message : String(error)
          }`
        );
      }
    }
    if (this.config.silent) {
      if (this.sinkFailed) console.error(line);
      return;
    }

    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
      case 'critical':
        console.error(line);
        break;
    }
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  critical(message: string, metadata?: LogMetadata): void {
    this.write('critical', message, metadata);
  }

  /**
   * Logger for a sub-module sharing this logger's sinks
   */
  child(module: string): Logger {
    return new Logger({
      ...this.config,
      service: `${this.config.service}:${module}`,
    });
  }
}

export const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (
    level === 'debug' ||
    level === 'info' ||
    level === 'warn' ||
    level === 'error' ||
    level === 'critical'
  ) {
    return level;
  }
  return 'info';
};

// Default logger instance
export const logger = new Logger({
  level: getLogLevel(),
  service: 'crime-pipeline',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a logger with the given overrides on top of environment defaults
 */
export function createLogger(config: Partial<LoggerConfig> & { module?: string } = {}): Logger {
  const { module, ...rest } = config;
  return new Logger({
    level: rest.level ?? getLogLevel(),
    service: module ? `crime-pipeline:${module}` : 'crime-pipeline',
    pretty: rest.pretty ?? process.env.NODE_ENV !== 'production',
    logFile: rest.logFile,
    silent: rest.silent,
  });
}
