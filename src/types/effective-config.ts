/**
 * EffectiveConfig type
 * Centralized configuration object passed through the system
 */

import type { WorkerKind, ReviewOutcome } from './routing';
import type { CharacterProfile } from './production';
import { redactSecrets } from './logger';

export type GenerationProvider = 'anthropic' | 'google' | 'openai' | 'mock';

export type RenderProvider = 'sora' | 'runway' | 'pika' | 'mock';

export const GENERATION_PROVIDERS: readonly GenerationProvider[] = ['anthropic', 'google', 'openai', 'mock'];

export const RENDER_PROVIDERS: readonly RenderProvider[] = ['sora', 'runway', 'pika', 'mock'];

/**
 * Router configuration
 */
export interface RoutingConfig {
  /** Minimum top confidence (0-1) for the director to pick an execution worker */
  confidenceThreshold: number;
  /** Worker selected when no scorer clears the threshold */
  fallbackWorker: WorkerKind;
  /** Maximum routing hops before the workflow gives up */
  maxHops: number;
}

/**
 * Retry policy applied to every generation and render call
 */
export interface RetryConfig {
  enabled: boolean;
  /** Retries after the first attempt */
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  exponentialBase: number;
  /** Retry only timeouts, throttling and 5xx responses instead of every failure */
  transientOnly: boolean;
}

export interface GenerationConfig {
  provider: GenerationProvider;
  model: string;
  /** Override the provider's base URL */
  apiBase?: string;
  /** Per-call timeout in milliseconds */
  timeoutMs: number;
}

export interface RenderConfig {
  provider: RenderProvider;
  apiBase?: string;
  timeoutMs: number;
}

export interface StyleConfig {
  visualStyle: string;
  lighting: string;
  colorPalette: string;
  fps: number;
  resolution: string;
}

/**
 * Who judges rendered output: nobody (default outcome), the user, or the generation model
 */
export type ReviewMode = 'static' | 'interactive' | 'model';

export const REVIEW_MODES: readonly ReviewMode[] = ['static', 'interactive', 'model'];

export interface ReviewConfig {
  /** Outcome used when no one is asked, or when asking is impossible */
  defaultOutcome: ReviewOutcome;
  mode: ReviewMode;
  /** Revise/redesign rounds allowed before acceptance is forced */
  maxRevisions: number;
}

export interface VerbosityConfig {
  verbose: boolean;
  debug: boolean;
  jsonOutput: boolean;
}

export interface PathConfig {
  workingDirectory: string;
  /** Base directory for run artifacts */
  artifactBaseDir: string;
  /** Directory for the current run */
  runDirectory?: string;
}

/**
 * Source of a configuration value (for debugging/logging)
 */
export type ConfigSource = 'cli' | 'repo' | 'user' | 'env' | 'default';

/**
 * The complete effective configuration for a run
 */
export interface EffectiveConfig {
  schemaVersion: '1.0.0';

  /** Creative brief for the run */
  brief: string;

  routing: RoutingConfig;
  retry: RetryConfig;
  generation: GenerationConfig;
  render: RenderConfig;
  style: StyleConfig;
  characters: CharacterProfile[];
  review: ReviewConfig;
  verbosity: VerbosityConfig;
  paths: PathConfig;

  /** Whether to print routing decisions only, without generation */
  routeOnly: boolean;

  /** Unique identifier for this run */
  runId: string;

  /** Timestamp when config was resolved */
  resolvedAt: string;

  /** Where each resolved value came from */
  sources?: Partial<Record<string, ConfigSource>>;
}

export const DEFAULT_CONFIG: Omit<EffectiveConfig, 'brief' | 'runId' | 'resolvedAt' | 'sources'> = {
  schemaVersion: '1.0.0',
  routing: {
    confidenceThreshold: 0.6,
    fallbackWorker: 'planner',
    maxHops: 20,
  },
  retry: {
    enabled: true,
    maxRetries: 3,
    initialDelayMs: 1000,
    maxDelayMs: 60000,
    exponentialBase: 2,
    transientOnly: false,
  },
  generation: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-5',
    timeoutMs: 120000,
  },
  render: {
    provider: 'mock',
    timeoutMs: 300000,
  },
  style: {
    visualStyle: 'stylized 3D animation',
    lighting: 'soft cinematic lighting',
    colorPalette: 'warm and saturated',
    fps: 24,
    resolution: '1920x1080',
  },
  characters: [],
  review: {
    defaultOutcome: 'accept',
    mode: 'interactive',
    maxRevisions: 2,
  },
  verbosity: {
    verbose: false,
    debug: false,
    jsonOutput: false,
  },
  paths: {
    workingDirectory: '.',
    artifactBaseDir: '.reelwright',
  },
  routeOnly: false,
};

function redactOptional(value: string | undefined): string | undefined {
  return value === undefined ? undefined : redactSecrets(value);
}

/**
 * Redact the free-text values that could carry a secret (the brief and
 * provider URLs). Keys are never stored here, only where they came from.
 */
export function redactConfigForLogging(config: EffectiveConfig): EffectiveConfig {
  return {
    ...config,
    brief: redactSecrets(config.brief),
    generation: { ...config.generation, apiBase: redactOptional(config.generation.apiBase) },
    render: { ...config.render, apiBase: redactOptional(config.render.apiBase) },
  };
}
