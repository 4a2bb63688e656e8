/**
 * Exit statuses for finished and failed runs
 */

import { ExitCode } from '../types/exit-codes';
import {
  RetryExhaustedError,
  RouteMisconfigurationError,
  StageExecutionError,
  StageLookupError,
  StageParseError,
} from '../core/errors';
import { ConfigError } from '../config/resolve-config';
import type { RunOutcome } from '../logging/run-summary';

export function exitCodeForFailure(error: unknown): ExitCode {
  if (error instanceof StageParseError || error instanceof StageLookupError) {
    return ExitCode.VALIDATION_ERROR;
  }
  if (error instanceof StageExecutionError || error instanceof RetryExhaustedError) {
    return ExitCode.GENERATION_ERROR;
  }
  if (error instanceof RouteMisconfigurationError || error instanceof ConfigError) {
    return ExitCode.CONFIG_ERROR;
  }
  return ExitCode.UNEXPECTED_ERROR;
}

/**
 * Exit code of a run that returned a workflow result. Failed runs map
 * through exitCodeForFailure instead.
 */
export function exitCodeForOutcome(outcome: Exclude<RunOutcome, 'failed'>): ExitCode {
  return outcome === 'completed' ? ExitCode.SUCCESS : ExitCode.LIMIT_EXCEEDED;
}

/**
 * Errors raised while wiring a run that are reported rather than thrown
 */
export function isSetupError(error: unknown): error is ConfigError | RouteMisconfigurationError {
  return error instanceof ConfigError || error instanceof RouteMisconfigurationError;
}
