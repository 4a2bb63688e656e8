/**
 * Retry Policy
 * Exponential backoff wrapper applied to every external call
 */

import type { Clock } from '../types/clock';
import { getDefaultClock } from '../types/clock';
import type { Logger } from '../types/logger';
import type { RetryConfig } from '../types/effective-config';
import { RetryExhaustedError, describeError, errorName } from './errors';

/**
 * Decides whether a failure is worth another attempt
 */
export type RetryClassifier = (error: unknown) => boolean;

/**
 * Called before each backoff sleep with the error and the number of the attempt that failed
 */
export type RetryObserver = (error: unknown, attemptNumber: number) => void;

export interface RetryPolicyOptions extends Partial<RetryConfig> {
  /** Defaults to isTransientError with transientOnly, otherwise to retrying every error */
  isRetryable?: RetryClassifier;
  /** Policy-wide observer, invoked before the per-call one */
  onRetry?: RetryObserver;
}

export interface RetryPolicyDependencies {
  clock?: Clock;
  logger?: Logger;
}

export interface WrapOptions {
  /** Name of the call in log lines */
  label?: string;
  onRetry?: RetryObserver;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  enabled: true,
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  exponentialBase: 2,
  transientOnly: false,
};

const TRANSIENT_PATTERN =
  /timeout|timed?\s*out|rate.?limit|too many requests|overloaded|throttl|ECONNRESET|ECONNREFUSED|ETIMEDOUT|EPIPE|socket hang up/i;

const TRANSIENT_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504, 529]);

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Classifier that only retries timeouts, throttling, connection drops and 5xx responses
 */
export function isTransientError(error: unknown): boolean {
  const status = statusCodeOf(error);
  if (status !== undefined) {
    return TRANSIENT_STATUS_CODES.has(status);
  }
  return TRANSIENT_PATTERN.test(describeError(error));
}

export class RetryPolicy {
  readonly config: RetryConfig;
  private readonly isRetryable: RetryClassifier;
  private readonly policyObserver?: RetryObserver;
  private readonly clock: Clock;
  private readonly logger?: Logger;

  constructor(options: RetryPolicyOptions = {}, deps: RetryPolicyDependencies = {}) {
    const { isRetryable, onRetry, ...config } = options;
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.isRetryable = isRetryable ?? (this.config.transientOnly ? isTransientError : () => true);
    this.policyObserver = onRetry;
    this.clock = deps.clock ?? getDefaultClock();
    this.logger = deps.logger;

    if (!Number.isInteger(this.config.maxRetries) || this.config.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${this.config.maxRetries}`);
    }
    if (this.config.initialDelayMs < 0 || this.config.maxDelayMs < 0) {
      throw new RangeError('Retry delays must not be negative');
    }
  }

  /**
   * Backoff before the retry that follows a failed attempt (0-indexed)
   */
  calculateDelay(attempt: number): number {
    const { initialDelayMs, exponentialBase, maxDelayMs } = this.config;
    return Math.min(initialDelayMs * Math.pow(exponentialBase, attempt), maxDelayMs);
  }

  /**
   * Wrap an async operation with retry semantics. A disabled policy returns
   * the operation itself.
   */
  wrap<TArgs extends unknown[], TResult>(
    operation: (...args: TArgs) => Promise<TResult>,
    options: WrapOptions = {}
  ): (...args: TArgs) => Promise<TResult> {
    if (!this.config.enabled) {
      return operation;
    }

    const label = options.label ?? (operation.name || 'operation');
    const maxAttempts = this.config.maxRetries + 1;

    return async (...args: TArgs): Promise<TResult> => {
      for (let attempt = 0; ; attempt++) {
        try {
          return await operation(...args);
        } catch (error) {
          if (!this.isRetryable(error)) {
            throw error;
          }

          if (attempt + 1 >= maxAttempts) {
            this.logger?.event(
              'retry_exhausted',
              `[retry exhausted] ${label} failed after ${attempt + 1} attempts: ${describeError(error)}`,
              { label, attempts: attempt + 1 }
            );
            throw new RetryExhaustedError(error, attempt + 1);
          }

          const delayMs = this.calculateDelay(attempt);
          this.logger?.event(
            'retry_scheduled',
            `[retry] ${label} attempt ${attempt + 1} failed (${errorName(error)}), retrying in ${(delayMs / 1000).toFixed(2)}s`,
            { label, attempt: attempt + 1, delayMs }
          );

          this.notify(this.policyObserver, error, attempt + 1, label);
          this.notify(options.onRetry, error, attempt + 1, label);

          await this.clock.delay(delayMs);
        }
      }
    };
  }

  /**
   * Run an operation once under this policy
   */
  async execute<TResult>(operation: () => Promise<TResult>, options: WrapOptions = {}): Promise<TResult> {
    return this.wrap(operation, options)();
  }

  private notify(
    observer: RetryObserver | undefined,
    error: unknown,
    attemptNumber: number,
    label: string
  ): void {
    if (!observer) {
      return;
    }
    try {
      observer(error, attemptNumber);
    } catch (observerError) {
      this.logger?.debug(`Retry observer for ${label} threw: ${describeError(observerError)}`, {
        label,
      });
    }
  }
}

/**
 * Build a policy from resolved configuration
 */
export function retryPolicyFromConfig(
  config: RetryConfig,
  deps: RetryPolicyDependencies = {},
  extra: Pick<RetryPolicyOptions, 'isRetryable' | 'onRetry'> = {}
): RetryPolicy {
  return new RetryPolicy({ ...config, ...extra }, deps);
}
