/**
 * Standardized exit codes
 */

export const ExitCode = {
  /** Successful execution */
  SUCCESS: 0,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 1,
  /** Invalid CLI usage */
  USAGE_ERROR: 2,
  /** A stage payload failed to parse, validate or resolve */
  VALIDATION_ERROR: 3,
  /** Routing hop limit reached before the workflow terminated */
  LIMIT_EXCEEDED: 4,
  /** A generation or render call failed, including retry exhaustion */
  GENERATION_ERROR: 5,
  /** Configuration could not be loaded or is inconsistent */
  CONFIG_ERROR: 6,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Get a human-readable description of an exit code
 */
export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Successful execution';
    case ExitCode.UNEXPECTED_ERROR:
      return 'Unexpected or unhandled error';
    case ExitCode.USAGE_ERROR:
      return 'Invalid CLI usage';
    case ExitCode.VALIDATION_ERROR:
      return 'Stage payload validation failed';
    case ExitCode.LIMIT_EXCEEDED:
      return 'Routing hop limit exceeded';
    case ExitCode.GENERATION_ERROR:
      return 'Generation or render call failed';
    case ExitCode.CONFIG_ERROR:
      return 'Invalid configuration';
  }
}
