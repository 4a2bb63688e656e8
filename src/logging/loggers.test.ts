import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'node:path';
import { BufferLogger } from './buffer-logger';
import { RunLogWriter, type RunLogEntry } from './run-log';
import { createTempDirContext, type TempDirContext } from '../../tests/utils/temp-directory';

describe('BufferLogger', () => {
  it('should derive the level from the event type', () => {
    const logger = new BufferLogger();
    logger.event('route_fallback', 'fell back');
    logger.event('stage_failed', 'storyboard failed');
    logger.event('route_decided', 'planner');

    expect(logger.getEvents().map((e) => e.level)).toEqual(['warn', 'error', 'info']);
  });

  it('should drop events below the minimum level', () => {
    const logger = new BufferLogger({ minLevel: 'warn' });
    logger.info('hidden');
    logger.event('render_requested', 'hidden too');
    logger.warn('shown');

    expect(logger.getEvents().map((e) => e.message)).toEqual(['shown']);
  });

  it('should share events with children and merge their context', () => {
    const logger = new BufferLogger();
    logger.setContext({ runId: 'run-1' });
    const child = logger.child({ worker: 'renderer' });
    child.info('rendering');

    const [event] = logger.getEvents();
    expect(event.metadata).toEqual({ runId: 'run-1', worker: 'renderer' });
    expect(logger.getEventsByType('info')).toHaveLength(1);
  });

  it('should redact bearer tokens in messages and metadata', () => {
    const logger = new BufferLogger();
    logger.info('Using Bearer abcdefgh12', { header: 'Bearer abcdefgh12' });

    const [event] = logger.getEvents();
    expect(event.message).toBe('Using Bear[REDACTED]');
    expect(event.metadata.header).toBe('Bear[REDACTED]');
  });
});

describe('RunLogWriter', () => {
  let dir: TempDirContext;

  afterEach(() => {
    dir.cleanup();
  });

  function readEntries(path: string): RunLogEntry[] {
    return dir
      .readFile(path)
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));
  }

  it('should append one numbered line per event, children included', () => {
    dir = createTempDirContext();
    const path = join(dir.path, 'runs', 'r1', 'run-log.jsonl');
    const writer = new RunLogWriter(path);
    writer.setContext({ runId: 'r1' });

    writer.event('run_started', 'starting');
    writer.child({ stage: 'planning' }).event('stage_completed', 'planning done', { durationMs: 12 });
    writer.debug('details');

    const entries = readEntries(join('runs', 'r1', 'run-log.jsonl'));
    expect(entries.map((e) => [e.index, e.type])).toEqual([
      [0, 'run_started'],
      [1, 'stage_completed'],
      [2, 'debug'],
    ]);
    expect(entries[1].payload).toEqual({
      level: 'info',
      message: 'planning done',
      runId: 'r1',
      stage: 'planning',
      durationMs: 12,
    });
  });

  it('should forward events to the inner logger', () => {
    dir = createTempDirContext();
    const display = new BufferLogger({ minLevel: 'info' });
    const writer = new RunLogWriter(join(dir.path, 'run-log.jsonl'), { forwardTo: display });

    writer.event('generation_requested', 'calling model');
    writer.event('run_completed', 'done', { shots: 2 });

    expect(readEntries('run-log.jsonl')).toHaveLength(2);
    expect(display.getEvents().map((e) => [e.eventType, e.metadata])).toEqual([['run_completed', { shots: 2 }]]);
  });
});
