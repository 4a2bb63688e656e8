/**
 * Append-only JSONL run log
 * Every event becomes one line: {index, type, timestamp, payload}
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Logger, LogEvent, LoggerOptions } from '../types/logger';
import { StructuredLogger } from './structured-logger';

/**
 * One line of run-log.jsonl
 */
export interface RunLogEntry {
  index: number;
  type: string;
  timestamp: string;
  payload: Record<string, unknown>;
}

interface RunLogTarget {
  path: string;
  nextIndex: number;
  forwardTo?: Logger;
}

export interface RunLogOptions extends LoggerOptions {
  /** Receives every event after it is written */
  forwardTo?: Logger;
}

interface SharedRunLog {
  target: RunLogTarget;
  events: LogEvent[];
}

/**
 * Logger that appends to a JSONL file and forwards to another logger.
 * Children write to the same file and continue the same index sequence.
 */
export class RunLogWriter extends StructuredLogger {
  private readonly target: RunLogTarget;

  constructor(path: string, options: RunLogOptions = {}, shared?: SharedRunLog) {
    const { forwardTo, ...loggerOptions } = options;
    super(loggerOptions, 'debug', shared?.events);
    if (shared) {
      this.target = shared.target;
    } else {
      mkdirSync(dirname(path), { recursive: true });
      this.target = { path, nextIndex: 0, forwardTo };
    }
  }

  get path(): string {
    return this.target.path;
  }

  protected createChild(): StructuredLogger {
    return new RunLogWriter(this.target.path, this.options, {
      target: this.target,
      events: this.events,
    });
  }

  protected output(event: LogEvent): void {
    const entry: RunLogEntry = {
      index: this.target.nextIndex++,
      type: event.eventType,
      timestamp: event.timestamp,
      payload: { level: event.level, message: event.message, ...event.metadata },
    };
    appendFileSync(this.target.path, JSON.stringify(entry) + '\n', 'utf-8');

    // Metadata is already merged, so the inner logger gets it as-is
    this.target.forwardTo?.event(event.eventType, event.message, event.metadata);
  }
}
