/**
 * Core module - routing, stage execution and the production context
 * This module must not import from ui/ or talk to the network directly.
 */

// Router
export { Router, DEFAULT_CONFIDENCE_THRESHOLD } from './router';
export type { Scorer, ScoringFunction, RouterOptions } from './router';
export { DEFAULT_KEYWORD_SETS, createKeywordScorer, createDefaultScorers, taskPrompt } from './scorers';
export type { KeywordScorerDefinition } from './scorers';

// Stage pipeline
export { Pipeline } from './pipeline';
export type { StageRun, StageRunStatus, PipelineReport, PipelineFailure, PipelineOptions } from './pipeline';

// Retry
export { RetryPolicy, DEFAULT_RETRY_CONFIG, isTransientError, retryPolicyFromConfig } from './retry-policy';
export type {
  RetryClassifier,
  RetryObserver,
  RetryPolicyOptions,
  RetryPolicyDependencies,
  WrapOptions,
} from './retry-policy';

// Errors
export {
  RouteMisconfigurationError,
  RetryExhaustedError,
  StageParseError,
  StageLookupError,
  StageExecutionError,
  describeError,
  errorName,
} from './errors';
export type { StageFailure } from './errors';

// Production context
export {
  PLACEHOLDER_MOTION_VALUE,
  placeholderMotion,
  createProductionContext,
  describeStyle,
  describeCharacter,
  describeCamera,
  describeMotion,
  describeShot,
  buildPromptContext,
  describeScenes,
  describeShots,
  listShots,
  serializeProductionContext,
} from './production-context';
export type { SerializedProductionContext } from './production-context';
