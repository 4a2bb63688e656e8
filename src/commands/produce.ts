/**
 * Production run
 *
 * Resolves configuration, wires the router, stages and clients, drives the
 * workflow to completion and writes the run's artifacts.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Clock } from '../types/clock';
import { getDefaultClock } from '../types/clock';
import type { EffectiveConfig } from '../types/effective-config';
import type { Logger, LogLevel } from '../types/logger';
import { ExitCode } from '../types/exit-codes';
import type { Task } from '../types/routing';
import {
  resolveConfig,
  resolveCredentials,
  setRunDirectory,
  type CliFlags,
} from '../config/resolve-config';
import { writeEffectiveConfigArtifact } from '../config/write-effective-config';
import { describeError } from '../core/errors';
import { createProductionContext, serializeProductionContext } from '../core/production-context';
import { createProduction, type Production, type ProductionDependencies } from '../orchestration/production-factory';
import { ConsoleLogger } from '../logging/console-logger';
import { RunLogWriter } from '../logging/run-log';
import { RunSummaryBuilder, formatRunSummaryMarkdown, type RunSummary } from '../logging/run-summary';
import { exitCodeForFailure, exitCodeForOutcome, isSetupError } from './exit-status';
import { previewRoute, type RoutePreview } from './route-preview';

export const RUN_LOG_FILE = 'run-log.jsonl';
export const PRODUCTION_FILE = 'production.json';
export const RUN_SUMMARY_JSON_FILE = 'run-summary.json';
export const RUN_SUMMARY_MD_FILE = 'run-summary.md';

export interface ProduceOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Home directory holding the user config */
  homeDir?: string;
  clock?: Clock;
  /** Receives every event the run log records; defaults to a console logger */
  logger?: Logger;
  /** Called once the configuration is resolved, before anything runs */
  onConfigResolved?: (config: EffectiveConfig) => void;
  /** Collaborators to use instead of the configured ones */
  dependencies?: Omit<ProductionDependencies, 'credentials' | 'logger' | 'clock'>;
}

export interface ProduceResult {
  exitCode: ExitCode;
  config?: EffectiveConfig;
  summary?: RunSummary;
  /** Set for --route-only */
  preview?: RoutePreview;
  runDirectory?: string;
  /** Why the run could not start */
  error?: string;
}

function consoleLevel(flags: CliFlags): LogLevel {
  if (flags.debug) return 'debug';
  if (flags.verbose) return 'info';
  return 'warn';
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n';
}

/**
 * Run a production from CLI flags
 *
 * Configuration and wiring problems come back as an exit code with an
 * error message; anything else propagates.
 */
export async function produce(flags: CliFlags, options: ProduceOptions = {}): Promise<ProduceResult> {
  const clock = options.clock ?? getDefaultClock();
  const env = options.env ?? process.env;
  const display = options.logger ?? new ConsoleLogger({ minLevel: consoleLevel(flags), jsonOutput: flags.jsonOutput });

  let config: EffectiveConfig;
  try {
    config = resolveConfig(flags, options.cwd, env, { homeDir: options.homeDir, clock });
  } catch (error) {
    if (!isSetupError(error)) throw error;
    display.error(describeError(error));
    return { exitCode: exitCodeForFailure(error), error: describeError(error) };
  }
  options.onConfigResolved?.(config);

  if (config.routeOnly) {
    try {
      const preview = previewRoute(config, display);
      return {
        exitCode: preview.reachedTerminal ? ExitCode.SUCCESS : ExitCode.LIMIT_EXCEEDED,
        config,
        preview,
      };
    } catch (error) {
      if (!isSetupError(error)) throw error;
      display.error(describeError(error));
      return { exitCode: exitCodeForFailure(error), config, error: describeError(error) };
    }
  }

  const runDirectory = join(config.paths.artifactBaseDir, 'runs', config.runId);
  config = setRunDirectory(config, runDirectory);
  mkdirSync(runDirectory, { recursive: true });

  const logger = new RunLogWriter(join(runDirectory, RUN_LOG_FILE), { forwardTo: display });
  logger.setContext({ runId: config.runId });

  const configPath = writeEffectiveConfigArtifact(config, runDirectory);
  logger.event('artifact_written', `Wrote ${configPath}`, { path: configPath });

  let production: Production;
  try {
    production = createProduction(config, {
      ...options.dependencies,
      credentials: resolveCredentials(env),
      logger,
      clock,
    });
  } catch (error) {
    if (!isSetupError(error)) throw error;
    logger.event('run_failed', describeError(error));
    return { exitCode: exitCodeForFailure(error), config, runDirectory, error: describeError(error) };
  }

  logger.event('run_started', `Production started: ${config.brief}`, {
    generation: production.generationClient.name,
    render: production.renderClient.name,
    review: production.reviewer.name,
  });

  const summaryBuilder = new RunSummaryBuilder(config, clock);
  const task: Task = { id: config.runId, kind: 'production', payload: { prompt: config.brief } };
  const context = createProductionContext(config.style, config.characters, config.brief);

  const result = await production.workflow.run(task, context);
  summaryBuilder.recordRetries(production.retryCount());
  const summary = summaryBuilder.build(result);

  const trace = result.ok ? result.value : result.error;
  const writeArtifact = (file: string, content: string): void => {
    const path = join(runDirectory, file);
    writeFileSync(path, content, 'utf-8');
    logger.event('artifact_written', `Wrote ${path}`, { path });
  };
  writeArtifact(PRODUCTION_FILE, toJson(serializeProductionContext(trace.context)));
  writeArtifact(RUN_SUMMARY_JSON_FILE, toJson(summary));
  writeArtifact(RUN_SUMMARY_MD_FILE, formatRunSummaryMarkdown(summary));

  if (!result.ok) {
    logger.event('run_failed', `Production failed in ${result.error.worker}: ${result.error.failure.message}`, {
      worker: result.error.worker,
      stage: result.error.failure.stage,
    });
    return { exitCode: exitCodeForFailure(result.error.failure), config, summary, runDirectory };
  }

  logger.event(
    'run_completed',
    result.value.outcome === 'completed'
      ? `Production completed: ${summary.renderedShots.length} shot(s) rendered`
      : `Production stopped at the hop limit (${config.routing.maxHops})`,
    { outcome: result.value.outcome }
  );
  return { exitCode: exitCodeForOutcome(result.value.outcome), config, summary, runDirectory };
}
