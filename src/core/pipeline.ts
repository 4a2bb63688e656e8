/**
 * Pipeline
 * Runs stages in order over one context and stops at the first failure
 */

import type { ProductionContext } from '../types/production';
import type { Logger } from '../types/logger';
import type { Clock } from '../types/clock';
import { getDefaultClock } from '../types/clock';
import type { Result } from '../types/result';
import { err, ok } from '../types/result';
import type { Stage } from '../stages/stage';
import type { StageFailure } from './errors';

export type StageRunStatus = 'completed' | 'failed';

export interface StageRun {
  stage: string;
  status: StageRunStatus;
  durationMs: number;
  /** Error message when the stage failed */
  error?: string;
}

export interface PipelineReport {
  context: ProductionContext;
  runs: StageRun[];
}

/**
 * Failure plus the stage runs recorded before and including it
 */
export interface PipelineFailure {
  failure: StageFailure;
  runs: StageRun[];
}

export interface PipelineOptions {
  logger?: Logger;
  clock?: Clock;
  /** Called after every stage attempt */
  onStageRun?: (run: StageRun) => void;
}

export class Pipeline {
  readonly stages: readonly Stage[];
  private readonly logger?: Logger;
  private readonly clock: Clock;
  private readonly onStageRun?: (run: StageRun) => void;

  constructor(stages: Stage[], options: PipelineOptions = {}) {
    this.stages = [...stages];
    this.logger = options.logger;
    this.clock = options.clock ?? getDefaultClock();
    this.onStageRun = options.onStageRun;
  }

  /**
   * Run every stage; the result carries the stage runs either way
   */
  async execute(initial: ProductionContext): Promise<Result<PipelineReport, PipelineFailure>> {
    const runs: StageRun[] = [];
    let context = initial;

    for (const stage of this.stages) {
      this.logger?.event('stage_started', `[${stage.name}] started`, { stage: stage.name });

      const { result, durationMs } = await this.clock.measure(() => stage.run(context));

      if (!result.ok) {
        const run: StageRun = { stage: stage.name, status: 'failed', durationMs, error: result.error.message };
        this.record(runs, run);
        return err({ failure: result.error, runs });
      }

      this.record(runs, { stage: stage.name, status: 'completed', durationMs });
      this.logger?.event('stage_completed', `[${stage.name}] completed in ${durationMs}ms`, {
        stage: stage.name,
        durationMs,
      });
      context = result.value;
    }

    return ok({ context, runs });
  }

  /**
   * Run every stage and return the final context
   * @throws the StageFailure of the first stage that fails
   */
  async run(initial: ProductionContext): Promise<ProductionContext> {
    const result = await this.execute(initial);
    if (!result.ok) {
      throw result.error.failure;
    }
    return result.value.context;
  }

  private record(runs: StageRun[], run: StageRun): void {
    runs.push(run);
    this.onStageRun?.(run);
  }
}
