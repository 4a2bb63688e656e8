/**
 * Types module - shared interfaces and types
 */

export type { Result, Ok, Err } from './result';
export { ok, err } from './result';

export { ExitCode, getExitCodeDescription } from './exit-codes';

export type { Clock } from './clock';
export { SystemClock, ImmediateClock, getDefaultClock } from './clock';

export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export {
  compareLogLevels,
  shouldLog,
  getEventLevel,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from './logger';

export type {
  WorkerKind,
  ExecutionWorkerKind,
  ControlWorkerKind,
  Task,
  SideContext,
  ReviewOutcome,
  ScoreResult,
  RouteResult,
  RoutingDecision,
} from './routing';
export {
  WORKER_KINDS,
  REVIEW_OUTCOMES,
  isWorkerKind,
  isExecutionWorker,
  isReviewOutcome,
} from './routing';

export type {
  GlobalStyle,
  CharacterProfile,
  Camera,
  Motion,
  Shot,
  Scene,
  Timeline,
  ProductionContext,
} from './production';

export type {
  EffectiveConfig,
  GenerationProvider,
  RenderProvider,
  RoutingConfig,
  RetryConfig,
  GenerationConfig,
  RenderConfig,
  StyleConfig,
  ReviewConfig,
  ReviewMode,
  VerbosityConfig,
  PathConfig,
  ConfigSource,
} from './effective-config';
export {
  DEFAULT_CONFIG,
  GENERATION_PROVIDERS,
  RENDER_PROVIDERS,
  REVIEW_MODES,
  redactConfigForLogging,
} from './effective-config';

export type {
  Prompter,
  PrompterError,
  PrompterErrorCode,
  SelectOptions,
  SelectChoice,
} from './prompter';
export { createPrompterError } from './prompter';
