import { describe, it, expect } from 'vitest';
import { exitCodeForFailure, exitCodeForOutcome, isSetupError } from './exit-status';
import { ExitCode } from '../types/exit-codes';
import {
  RetryExhaustedError,
  RouteMisconfigurationError,
  StageExecutionError,
  StageLookupError,
  StageParseError,
} from '../core/errors';
import { ConfigError } from '../config/resolve-config';

describe('exitCodeForFailure', () => {
  it('should map payload problems to the validation code', () => {
    expect(exitCodeForFailure(new StageParseError('planning', ['scenes: Required']))).toBe(ExitCode.VALIDATION_ERROR);
    expect(exitCodeForFailure(new StageLookupError('motion', 'shot', 'shot_9'))).toBe(ExitCode.VALIDATION_ERROR);
  });

  it('should map failed external calls to the generation code', () => {
    expect(exitCodeForFailure(new StageExecutionError('render', 'render failed', undefined))).toBe(
      ExitCode.GENERATION_ERROR
    );
    expect(exitCodeForFailure(new RetryExhaustedError(new Error('timeout'), 4))).toBe(ExitCode.GENERATION_ERROR);
  });

  it('should map setup problems to the config code', () => {
    expect(exitCodeForFailure(new RouteMisconfigurationError('bad threshold'))).toBe(ExitCode.CONFIG_ERROR);
    expect(exitCodeForFailure(new ConfigError('bad file'))).toBe(ExitCode.CONFIG_ERROR);
  });

  it('should treat anything else as unexpected', () => {
    expect(exitCodeForFailure(new TypeError('oops'))).toBe(ExitCode.UNEXPECTED_ERROR);
    expect(exitCodeForFailure('oops')).toBe(ExitCode.UNEXPECTED_ERROR);
  });
});

describe('exitCodeForOutcome', () => {
  it('should succeed only for completed runs', () => {
    expect(exitCodeForOutcome('completed')).toBe(ExitCode.SUCCESS);
    expect(exitCodeForOutcome('hop_limit')).toBe(ExitCode.LIMIT_EXCEEDED);
  });
});

describe('isSetupError', () => {
  it('should recognise config and routing errors only', () => {
    expect(isSetupError(new ConfigError('x'))).toBe(true);
    expect(isSetupError(new RouteMisconfigurationError('x'))).toBe(true);
    expect(isSetupError(new StageParseError('planning', []))).toBe(false);
  });
});
