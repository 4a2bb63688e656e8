/**
 * Logging module - structured logging implementations and run summaries
 */

export { StructuredLogger } from './structured-logger';
export { ConsoleLogger, createConsoleLogger } from './console-logger';
export { BufferLogger, createBufferLogger } from './buffer-logger';
export { RunLogWriter } from './run-log';
export type { RunLogEntry, RunLogOptions } from './run-log';
export { RunSummaryBuilder, formatRunSummaryMarkdown, formatDuration } from './run-summary';
export type { RunSummary, RunOutcome, RenderedShotRecord } from './run-summary';
