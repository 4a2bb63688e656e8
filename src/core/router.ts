/**
 * Router
 * Confidence-scored state machine that picks the next worker for a task.
 *
 * Transitions:
 *   (entry)                  -> planner
 *   planner                  -> director
 *   director                 -> best-scoring execution worker, or the fallback
 *   animation | film | game  -> renderer
 *   renderer                 -> terminal | director | planner (by review outcome)
 *   terminal                 -> terminal
 */

import type { Logger } from '../types/logger';
import type {
  WorkerKind,
  Task,
  SideContext,
  ScoreResult,
  RouteResult,
  RoutingDecision,
} from '../types/routing';
import { isWorkerKind, isExecutionWorker } from '../types/routing';
import { RouteMisconfigurationError, describeError } from './errors';

/**
 * Self-assessment of how well a worker fits a task. Must be synchronous.
 */
export interface Scorer {
  score(task: Task, sideContext: SideContext): ScoreResult;
}

export type ScoringFunction = (task: Task, sideContext: SideContext) => ScoreResult;

export interface RouterOptions {
  /** Minimum top confidence for the director to pick a worker (default 0.6) */
  confidenceThreshold?: number;
  /** Worker chosen when nothing clears the threshold (default 'planner') */
  fallbackWorker?: WorkerKind;
  /** Scorers registered at construction, in registration order */
  scorers?: Iterable<readonly [WorkerKind, Scorer | ScoringFunction]>;
  logger?: Logger;
}

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.6;

function toScorer(scorer: Scorer | ScoringFunction): Scorer {
  return typeof scorer === 'function' ? { score: scorer } : scorer;
}

function clampConfidence(confidence: number): number {
  return Math.min(1, Math.max(0, confidence));
}

export class Router {
  readonly confidenceThreshold: number;
  readonly fallbackWorker: WorkerKind;
  private readonly scorers = new Map<WorkerKind, Scorer>();
  private readonly logger?: Logger;

  constructor(options: RouterOptions = {}) {
    this.confidenceThreshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.fallbackWorker = options.fallbackWorker ?? 'planner';
    this.logger = options.logger;

    for (const [kind, scorer] of options.scorers ?? []) {
      this.register(kind, scorer);
    }

    this.validate();
  }

  /**
   * Register or replace a worker's scorer. Replacing keeps the original
   * registration position for tie-breaking.
   */
  register(kind: WorkerKind, scorer: Scorer | ScoringFunction): this {
    if (!isWorkerKind(kind)) {
      throw new RouteMisconfigurationError(`Cannot register unknown worker "${String(kind)}"`);
    }
    this.scorers.set(kind, toScorer(scorer));
    return this;
  }

  /**
   * Workers with a registered scorer, in registration order
   */
  registeredWorkers(): WorkerKind[] {
    return [...this.scorers.keys()];
  }

  /**
   * Decide where a task goes after `current` (null at entry)
   */
  route(current: WorkerKind | null, task: Task, sideContext: SideContext = {}): RoutingDecision {
    const decision = this.decide(current, task, sideContext);
    this.logger?.event('route_decided', `${current ?? 'entry'} → ${decision.next.join(', ')}: ${decision.reason}`, {
      worker: current ?? 'entry',
      taskId: task.id,
      next: decision.next,
    });
    return decision;
  }

  /**
   * Score every registered execution worker, best first. Ties keep
   * registration order. Scorer failures become confidence 0.
   */
  score(task: Task, sideContext: SideContext = {}): RouteResult[] {
    const results: RouteResult[] = [];
    for (const [worker, scorer] of this.scorers) {
      if (!isExecutionWorker(worker)) {
        continue;
      }
      results.push(this.scoreWorker(worker, scorer, task, sideContext));
    }
    // Array.prototype.sort is stable
    return results.sort((a, b) => b.confidence - a.confidence);
  }

  private decide(current: WorkerKind | null, task: Task, sideContext: SideContext): RoutingDecision {
    if (current === null) {
      return { next: ['planner'], reason: 'new task entry → planner' };
    }

    switch (current) {
      case 'planner':
        return { next: ['director'], reason: 'planner output ready → director' };
      case 'director':
        return this.routeFromDirector(task, sideContext);
      case 'animation':
      case 'film':
      case 'game':
        return { next: ['renderer'], reason: 'execution output requires rendering → renderer' };
      case 'renderer':
        return this.routeFromRenderer(sideContext);
      case 'terminal':
        return { next: ['terminal'], reason: 'no matching rule' };
      default: {
        // Unreachable for typed callers; covers values arriving from untyped input
        const unknownWorker: never = current;
        return { next: ['terminal'], reason: `no matching rule for "${String(unknownWorker)}"` };
      }
    }
  }

  private routeFromDirector(task: Task, sideContext: SideContext): RoutingDecision {
    const candidates = this.score(task, sideContext);
    const best = candidates[0];

    if (best === undefined) {
      return {
        next: [this.fallbackWorker],
        reason: `no workers registered → fallback to '${this.fallbackWorker}'`,
        candidates,
      };
    }

    if (best.confidence < this.confidenceThreshold) {
      best.fallback = true;
      const reason =
        `confidence ${best.confidence.toFixed(2)} below threshold ${this.confidenceThreshold.toFixed(2)}. ` +
        `Fallback to '${this.fallbackWorker}'. Original reason: ${best.reason}`;
      this.logger?.event('route_fallback', reason, {
        taskId: task.id,
        rejectedWorker: best.worker,
        confidence: best.confidence,
        threshold: this.confidenceThreshold,
      });
      return { next: [this.fallbackWorker], reason, candidates };
    }

    return {
      next: [best.worker],
      reason: `director selected ${best.worker} | ${best.reason}`,
      candidates,
    };
  }

  private routeFromRenderer(sideContext: SideContext): RoutingDecision {
    const review = sideContext.reviewResult ?? 'accept';

    switch (review) {
      case 'accept':
        return { next: ['terminal'], reason: 'render accepted → terminal' };
      case 'revise':
        return { next: ['director'], reason: 'revision requested → director' };
      case 'redesign':
        return { next: ['planner'], reason: 'redesign requested → planner' };
      default:
        return { next: ['terminal'], reason: `unknown review result "${String(review)}" → terminal` };
    }
  }

  private scoreWorker(worker: WorkerKind, scorer: Scorer, task: Task, sideContext: SideContext): RouteResult {
    try {
      const { confidence, reason } = scorer.score(task, sideContext);
      if (!Number.isFinite(confidence)) {
        throw new Error(`non-finite confidence ${confidence}`);
      }
      return { worker, confidence: clampConfidence(confidence), reason, fallback: false };
    } catch (error) {
      const reason = `scoring error: ${describeError(error)}`;
      this.logger?.event('scorer_failed', `${worker} scorer failed: ${describeError(error)}`, {
        worker,
        taskId: task.id,
      });
      return { worker, confidence: 0, reason, fallback: false };
    }
  }

  private validate(): void {
    const threshold = this.confidenceThreshold;
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new RouteMisconfigurationError(`Confidence threshold must be within [0, 1], got ${threshold}`);
    }
    if (!isWorkerKind(this.fallbackWorker)) {
      throw new RouteMisconfigurationError(`Unknown fallback worker "${String(this.fallbackWorker)}"`);
    }
    if (this.fallbackWorker === 'terminal') {
      throw new RouteMisconfigurationError("Fallback worker cannot be 'terminal'");
    }
    if (isExecutionWorker(this.fallbackWorker) && !this.scorers.has(this.fallbackWorker)) {
      throw new RouteMisconfigurationError(
        `Fallback worker '${this.fallbackWorker}' has no registered scorer`
      );
    }
  }
}
