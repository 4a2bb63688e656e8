/**
 * Logger interface
 * Structured logging with event types and metadata
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the production lifecycle
 */
export type LogEventType =
  // Run lifecycle
  | 'run_started'
  | 'run_completed'
  | 'run_failed'
  // Routing
  | 'route_decided'
  | 'route_fallback'
  | 'scorer_failed'
  | 'hop_limit_reached'
  // Stages
  | 'stage_started'
  | 'stage_completed'
  | 'stage_failed'
  // External calls
  | 'generation_requested'
  | 'generation_completed'
  | 'render_requested'
  | 'render_completed'
  | 'retry_scheduled'
  | 'retry_exhausted'
  // Review
  | 'review_received'
  // Artifacts
  | 'artifact_written'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Base metadata included in all log events
 */
export interface LogMetadata {
  /** Unique identifier for this run */
  runId?: string;
  /** Stage currently executing */
  stage?: string;
  /** Worker currently in control */
  worker?: string;
  /** Routing hop number */
  hop?: number;
  [key: string]: unknown;
}

export interface LogEvent {
  /** Timestamp of the event (ISO 8601) */
  timestamp: string;
  level: LogLevel;
  /** Event type for structured queries */
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Whether to use JSON format for output */
  jsonOutput?: boolean;
  /** Patterns to redact from log output (for secrets) */
  redactPatterns?: RegExp[];
}

/**
 * Interface for structured logging
 * Implementations write to the console, a JSONL run log, or a buffer (tests)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event; its level is derived from the event type
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Set context (runId, etc.) merged into all subsequent events
   */
  setContext(context: Partial<LogMetadata>): void;

  clearContext(): void;

  /**
   * Get all logged events (for tests and run summaries)
   */
  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Compare log levels (returns positive if a > b)
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LEVEL_ORDER[a] - LEVEL_ORDER[b];
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

/**
 * Map an event type to the level it is emitted at
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'run_failed':
    case 'stage_failed':
    case 'retry_exhausted':
      return 'error';
    case 'warn':
    case 'route_fallback':
    case 'scorer_failed':
    case 'retry_scheduled':
    case 'hop_limit_reached':
      return 'warn';
    case 'debug':
    case 'generation_requested':
    case 'render_requested':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Common secret patterns to redact
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  // API keys (generic patterns)
  /(?:api[_-]?key|apikey)[=:\s]*['"]?([a-zA-Z0-9_-]{20,})['"]?/gi,
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9._-]{8,}/gi,
  // Anthropic API keys
  /sk-ant-[a-zA-Z0-9-_]{40,}/gi,
  // Google API keys
  /AIza[0-9A-Za-z_-]{35}/g,
  // Generic secrets in env vars
  /(?:password|secret|token|credential)[=:\s]*['"]?([^\s'"]{8,})['"]?/gi,
];

/**
 * Redact secrets from a string using the given patterns
 */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    // Reset lastIndex for stateful regexes
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      // Keep the first few characters for debugging
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
