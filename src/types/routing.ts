/**
 * Routing types
 * Worker kinds, tasks and the values the router produces
 */

/**
 * Every role a task can be handed to. 'terminal' has no outbound transitions.
 */
export const WORKER_KINDS = [
  'planner',
  'director',
  'animation',
  'film',
  'game',
  'renderer',
  'terminal',
] as const;

export type WorkerKind = (typeof WORKER_KINDS)[number];

/**
 * Workers that produce content and compete for a task at the director
 */
export type ExecutionWorkerKind = 'animation' | 'film' | 'game';

/**
 * Workers that only steer control flow and never compete in scoring
 */
export type ControlWorkerKind = Exclude<WorkerKind, ExecutionWorkerKind>;

export function isWorkerKind(value: unknown): value is WorkerKind {
  return typeof value === 'string' && WORKER_KINDS.some((kind) => kind === value);
}

export function isExecutionWorker(kind: WorkerKind): kind is ExecutionWorkerKind {
  return kind === 'animation' || kind === 'film' || kind === 'game';
}

/**
 * A unit of work being routed. Read-only to the router.
 */
export interface Task {
  /** Unique per in-flight task */
  readonly id: string;
  /** Free-form task category, e.g. "production" */
  readonly kind: string;
  /** Arbitrary task data; keyword scorers read `prompt` */
  readonly payload: Readonly<Record<string, unknown>>;
  /** Optional stage marker set by the host */
  readonly stage?: string;
}

/**
 * Extra routing input supplied by the host at each decision point
 */
export interface SideContext {
  /** Outcome of reviewing rendered output: accept | revise | redesign */
  reviewResult?: unknown;
  [key: string]: unknown;
}

/**
 * Outcome of a review of rendered output
 */
export type ReviewOutcome = 'accept' | 'revise' | 'redesign';

export const REVIEW_OUTCOMES: readonly ReviewOutcome[] = ['accept', 'revise', 'redesign'];

export function isReviewOutcome(value: unknown): value is ReviewOutcome {
  return value === 'accept' || value === 'revise' || value === 'redesign';
}

/**
 * A scorer's self-assessment for one task
 */
export interface ScoreResult {
  /** Fitness in [0, 1] */
  confidence: number;
  reason: string;
}

/**
 * One worker's ranked fitness as recorded by the router
 */
export interface RouteResult {
  worker: WorkerKind;
  confidence: number;
  reason: string;
  /** True when this candidate topped the ranking but was rejected for the fallback worker */
  fallback: boolean;
}

/**
 * Router output. The first element of `next` is the primary target.
 */
export interface RoutingDecision {
  next: [WorkerKind, ...WorkerKind[]];
  reason: string;
  /** Ranked scorer results, present on director decisions that scored */
  candidates?: RouteResult[];
}
