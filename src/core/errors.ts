/**
 * Error taxonomy for routing, stages and retries
 */

/**
 * Router options that cannot work, rejected when the router is built
 */
export class RouteMisconfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RouteMisconfigurationError';
  }
}

/**
 * Thrown by a retry-wrapped call once every permitted attempt has failed
 */
export class RetryExhaustedError extends Error {
  constructor(
    readonly lastError: unknown,
    readonly attempts: number
  ) {
    super(`Retry exhausted after ${attempts} attempts. Last error: ${describeError(lastError)}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Generated content was not valid JSON or did not match the stage schema
 */
export class StageParseError extends Error {
  constructor(
    readonly stage: string,
    readonly details: string[]
  ) {
    super(`${stage} payload could not be parsed: ${details.join('; ')}`);
    this.name = 'StageParseError';
  }
}

/**
 * A payload referenced an entity the timeline does not contain
 */
export class StageLookupError extends Error {
  constructor(
    readonly stage: string,
    readonly entity: 'scene' | 'shot',
    readonly missingId: string
  ) {
    super(`${stage} references unknown ${entity} "${missingId}"`);
    this.name = 'StageLookupError';
  }
}

/**
 * An external call made by a stage failed
 */
export class StageExecutionError extends Error {
  constructor(
    readonly stage: string,
    message: string,
    cause: unknown,
    readonly shotId?: string
  ) {
    super(message, { cause });
    this.name = 'StageExecutionError';
  }
}

export type StageFailure = StageParseError | StageLookupError | StageExecutionError;

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Class name of an unknown thrown value, for log lines
 */
export function errorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  return typeof error;
}
