/**
 * Console Logger implementation
 */

import type { Logger, LogEvent, LogLevel, LoggerOptions } from '../types/logger';
import { StructuredLogger } from './structured-logger';

const BASIC_EVENT_TYPES = new Set(['debug', 'info', 'warn', 'error']);

export class ConsoleLogger extends StructuredLogger {
  constructor(options: LoggerOptions = {}, events: LogEvent[] = []) {
    super({ includeTimestamp: true, jsonOutput: false, ...options }, 'info', events);
  }

  protected createChild(): StructuredLogger {
    return new ConsoleLogger(this.options, this.events);
  }

  protected output(event: LogEvent): void {
    const line = this.options.jsonOutput ? JSON.stringify(event) : this.formatPretty(event);
    if (event.level === 'error') {
      console.error(line);
    } else if (event.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private formatPretty(event: LogEvent): string {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      parts.push(`[${new Date(event.timestamp).toLocaleTimeString()}]`);
    }

    parts.push(levelIndicator(event.level));

    if (!BASIC_EVENT_TYPES.has(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }

    parts.push(event.message);

    const { runId, stage, worker, hop } = event.metadata;
    const metaParts: string[] = [];
    if (runId) metaParts.push(`run=${runId}`);
    if (worker) metaParts.push(`worker=${worker}`);
    if (stage) metaParts.push(`stage=${stage}`);
    if (hop !== undefined) metaParts.push(`hop=${hop}`);
    if (metaParts.length > 0) {
      parts.push(`{${metaParts.join(', ')}}`);
    }

    return parts.join(' ');
  }
}

function levelIndicator(level: LogLevel): string {
  switch (level) {
    case 'debug':
      return '🔍';
    case 'info':
      return 'ℹ️';
    case 'warn':
      return '⚠️';
    case 'error':
      return '❌';
  }
}

export function createConsoleLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
