/**
 * Shared behaviour for structured loggers: level filtering, context merging
 * and secret redaction. Subclasses decide where events go.
 */

import type {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
} from '../types/logger';
import { shouldLog, getEventLevel, redactSecrets, DEFAULT_REDACT_PATTERNS } from '../types/logger';

export abstract class StructuredLogger implements Logger {
  protected minLevel: LogLevel;
  protected context: Partial<LogMetadata> = {};
  protected readonly options: LoggerOptions;
  /** Shared with child loggers so a run's events stay in one place */
  protected readonly events: LogEvent[];

  constructor(options: LoggerOptions, defaultMinLevel: LogLevel, events: LogEvent[] = []) {
    this.minLevel = options.minLevel ?? defaultMinLevel;
    this.options = {
      redactPatterns: DEFAULT_REDACT_PATTERNS,
      ...options,
    };
    this.events = events;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(getEventLevel(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = this.createChild();
    childLogger.setContext({ ...this.context, ...additionalContext });
    childLogger.setMinLevel(this.minLevel);
    return childLogger;
  }

  /**
   * New logger of the same kind writing to the same destination and event list
   */
  protected abstract createChild(): StructuredLogger;

  /**
   * Deliver an event that passed level filtering
   */
  protected abstract output(event: LogEvent): void;

  private log(level: LogLevel, eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: this.redact(message),
      metadata: this.mergeMetadata(metadata),
    };

    this.events.push(event);
    this.output(event);
  }

  private mergeMetadata(metadata?: LogMetadata): LogMetadata {
    const merged: LogMetadata = { ...this.context, ...metadata };
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = this.redact(value);
      }
    }
    return merged;
  }

  private redact(text: string): string {
    return redactSecrets(text, this.options.redactPatterns);
  }
}
