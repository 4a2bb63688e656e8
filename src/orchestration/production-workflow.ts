/**
 * Production Workflow
 * Drives the router from entry to terminal, running each worker's
 * pipeline as control reaches it
 */

import type { ExecutionWorkerKind, SideContext, Task, WorkerKind } from '../types/routing';
import { isExecutionWorker } from '../types/routing';
import type { ProductionContext } from '../types/production';
import type { Logger } from '../types/logger';
import type { Result } from '../types/result';
import { err, ok } from '../types/result';
import type { Router } from '../core/router';
import type { Pipeline, StageRun } from '../core/pipeline';
import type { StageFailure } from '../core/errors';
import type { Reviewer, ReviewVerdict } from '../review/reviewer';

export interface RoutingStep {
  hop: number;
  /** null for the entry decision */
  from: WorkerKind | null;
  to: WorkerKind;
  reason: string;
}

export interface ReviewRecord extends ReviewVerdict {
  round: number;
  /** Acceptance imposed because the revision budget ran out */
  forced: boolean;
}

export type WorkflowOutcome = 'completed' | 'hop_limit';

interface WorkflowTrace {
  context: ProductionContext;
  steps: RoutingStep[];
  stageRuns: StageRun[];
  reviews: ReviewRecord[];
}

export interface WorkflowReport extends WorkflowTrace {
  outcome: WorkflowOutcome;
}

export interface WorkflowFailure extends WorkflowTrace {
  failure: StageFailure;
  /** Worker whose pipeline failed */
  worker: WorkerKind;
}

/**
 * The pipelines each worker runs
 */
export interface WorkerPipelines {
  planner: Pipeline;
  /** Storyboard + motion, framed for the given discipline */
  execution(kind: ExecutionWorkerKind): Pipeline;
  renderer: Pipeline;
}

/**
 * Progress callbacks for a display (spinner) layer
 */
export interface WorkflowProgress {
  workerStarted(worker: WorkerKind, hop: number): void;
  workerFinished(worker: WorkerKind, succeeded: boolean): void;
}

export interface ProductionWorkflowOptions {
  router: Router;
  pipelines: WorkerPipelines;
  reviewer: Reviewer;
  /** Routing decisions allowed before the run gives up */
  maxHops: number;
  /** Revise/redesign reviews allowed before acceptance is forced */
  maxRevisions: number;
  logger?: Logger;
  progress?: WorkflowProgress;
}

export class ProductionWorkflow {
  private readonly options: ProductionWorkflowOptions;

  constructor(options: ProductionWorkflowOptions) {
    if (!Number.isInteger(options.maxHops) || options.maxHops < 1) {
      throw new RangeError(`maxHops must be a positive integer, got ${options.maxHops}`);
    }
    this.options = options;
  }

  async run(task: Task, context: ProductionContext): Promise<Result<WorkflowReport, WorkflowFailure>> {
    const { router, maxHops, logger } = this.options;
    const trace: WorkflowTrace = { context, steps: [], stageRuns: [], reviews: [] };
    const sideContext: SideContext = {};
    let current: WorkerKind | null = null;

    while (trace.steps.length < maxHops) {
      const decision = router.route(current, task, sideContext);
      const [next] = decision.next;
      const hop = trace.steps.length + 1;
      trace.steps.push({ hop, from: current, to: next, reason: decision.reason });

      if (next === 'terminal') {
        return ok({ ...trace, outcome: 'completed' });
      }

      this.options.progress?.workerStarted(next, hop);
      const failure = await this.perform(next, trace, sideContext);
      this.options.progress?.workerFinished(next, failure === undefined);

      if (failure) {
        return err({ ...trace, failure, worker: next });
      }

      // Review only once the renderer's progress display has closed
      if (next === 'renderer') {
        const reviewFailure = await this.review(trace, sideContext);
        if (reviewFailure) {
          return err({ ...trace, failure: reviewFailure, worker: next });
        }
      }
      current = next;
    }

    logger?.event('hop_limit_reached', `Routing stopped after ${maxHops} hops without reaching terminal`, {
      hop: maxHops,
      worker: current ?? undefined,
    });
    return ok({ ...trace, outcome: 'hop_limit' });
  }

  /**
   * Run the worker's pipeline against the trace's context
   * @returns the failure, if the worker's pipeline failed
   */
  private async perform(
    worker: WorkerKind,
    trace: WorkflowTrace,
    sideContext: SideContext
  ): Promise<StageFailure | undefined> {
    const { pipelines } = this.options;
    const { context } = trace;

    if (worker === 'planner') {
      context.timeline = { scenes: [] };
      delete sideContext.reviewResult;
      return this.runPipeline(pipelines.planner, trace);
    }

    if (isExecutionWorker(worker)) {
      for (const scene of context.timeline.scenes) {
        scene.shots = [];
      }
      delete sideContext.reviewResult;
      return this.runPipeline(pipelines.execution(worker), trace);
    }

    if (worker === 'renderer') {
      return this.runPipeline(pipelines.renderer, trace);
    }

    // director: the router does the work on the next hop
    return undefined;
  }

  private async runPipeline(pipeline: Pipeline, trace: WorkflowTrace): Promise<StageFailure | undefined> {
    const result = await pipeline.execute(trace.context);
    if (!result.ok) {
      trace.stageRuns.push(...result.error.runs);
      return result.error.failure;
    }
    trace.stageRuns.push(...result.value.runs);
    trace.context = result.value.context;
    return undefined;
  }

  private async review(trace: WorkflowTrace, sideContext: SideContext): Promise<StageFailure | undefined> {
    const { reviewer, maxRevisions, logger } = this.options;
    const round = trace.reviews.length + 1;
    const revisions = trace.reviews.filter((r) => r.outcome !== 'accept').length;

    let record: ReviewRecord;
    if (revisions >= maxRevisions) {
      record = { outcome: 'accept', source: 'default', round, forced: true };
    } else {
      const verdict = await reviewer.review(trace.context, round);
      if (!verdict.ok) {
        return verdict.error;
      }
      record = { ...verdict.value, round, forced: false };
    }

    trace.reviews.push(record);
    sideContext.reviewResult = record.outcome;
    logger?.event(
      'review_received',
      record.forced
        ? `Review round ${round}: accepted after ${revisions} revision(s), the revision limit`
        : `Review round ${round}: ${record.outcome} (${record.source})`,
      { round, outcome: record.outcome, source: record.source }
    );
    return undefined;
  }
}
