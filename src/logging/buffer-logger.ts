/**
 * Buffer Logger implementation
 * For tests - stores events in memory without output
 */

import type { LogEvent, LogEventType, LoggerOptions } from '../types/logger';
import { StructuredLogger } from './structured-logger';

export class BufferLogger extends StructuredLogger {
  constructor(options: LoggerOptions = {}, events: LogEvent[] = []) {
    // Capture everything by default
    super(options, 'debug', events);
  }

  protected createChild(): StructuredLogger {
    return new BufferLogger(this.options, this.events);
  }

  protected output(): void {
    // Events are kept in the shared buffer only
  }

  clear(): void {
    this.events.length = 0;
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.events.filter((e) => e.eventType === eventType);
  }

  hasEventType(eventType: LogEventType): boolean {
    return this.events.some((e) => e.eventType === eventType);
  }

  getEventsMatching(pattern: RegExp): LogEvent[] {
    return this.events.filter((e) => pattern.test(e.message));
  }
}

export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
