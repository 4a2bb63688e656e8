/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

import type { GenerationProvider, RenderProvider, ReviewMode } from '../types/effective-config';
import type { ReviewOutcome, WorkerKind } from '../types/routing';

/** Parsed CLI arguments */
export interface ParsedArgs {
  /** Creative brief, joined from the positional arguments */
  brief: string;

  /** Minimum top confidence (0-1) for the director to pick a worker */
  threshold: number | null;

  /** Worker chosen when no scorer clears the threshold */
  fallback: WorkerKind | null;

  /** Routing hops allowed before the run gives up */
  maxHops: number | null;

  /** Retries per generation or render call */
  maxRetries: number | null;

  /** Disable the retry policy */
  noRetry: boolean;

  provider: GenerationProvider | null;

  model: string | null;

  renderProvider: RenderProvider | null;

  /** Use the mock generation and render clients (no API costs) */
  mockMode: boolean;

  /** Fixed review outcome */
  review: ReviewOutcome | null;

  reviewMode: ReviewMode | null;

  /** Print the routing decisions for the brief and exit */
  routeOnly: boolean;

  /** Base directory for run artifacts */
  outputDir: string | null;

  /** Show help and exit */
  help: boolean;

  /** Show version and exit */
  version: boolean;

  /** Disable interactive prompts; use defaults */
  noInteractive: boolean;

  /** Enable verbose output with more progress details */
  verbose: boolean;

  /** Enable debug mode with full diagnostics */
  debug: boolean;

  /** Output machine-readable JSON summary */
  jsonOutput: boolean;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  brief: '',
  threshold: null,
  fallback: null,
  maxHops: null,
  maxRetries: null,
  noRetry: false,
  provider: null,
  model: null,
  renderProvider: null,
  mockMode: false,
  review: null,
  reviewMode: null,
  routeOnly: false,
  outputDir: null,
  help: false,
  version: false,
  noInteractive: false,
  verbose: false,
  debug: false,
  jsonOutput: false,
};

/** Result of parsing arguments */
export type ParseResult = { success: true; args: ParsedArgs } | { success: false; error: string };
