/**
 * Configuration Resolution
 * Single-pass resolution with explicit precedence:
 * CLI flags > repo config > user config > defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import type {
  EffectiveConfig,
  ConfigSource,
  GenerationProvider,
  RenderProvider,
  ReviewMode,
} from '../types/effective-config';
import { DEFAULT_CONFIG } from '../types/effective-config';
import type { ReviewOutcome, WorkerKind } from '../types/routing';
import type { Clock } from '../types/clock';
import { getDefaultClock } from '../types/clock';
import { configFileSchema, type ConfigFile } from './config-file.schema';

/** Directory holding the repo config and run artifacts */
export const PROJECT_DIR_NAME = '.reelwright';

/**
 * A config file exists but cannot be used
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path?: string,
    readonly details: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  brief?: string;
  confidenceThreshold?: number;
  fallbackWorker?: WorkerKind;
  maxHops?: number;
  maxRetries?: number;
  noRetry?: boolean;
  provider?: GenerationProvider;
  model?: string;
  renderProvider?: RenderProvider;
  /** Use the mock generation and render clients */
  mock?: boolean;
  /** Fixed review outcome; implies static review */
  review?: ReviewOutcome;
  reviewMode?: ReviewMode;
  routeOnly?: boolean;
  outputDir?: string;
  noInteractive?: boolean;
  verbose?: boolean;
  debug?: boolean;
  jsonOutput?: boolean;
}

export interface ResolveConfigOptions {
  /** Home directory holding .config/reelwright (defaults to the OS home) */
  homeDir?: string;
  clock?: Clock;
}

/**
 * API keys, read from the environment only and never written to artifacts
 */
export interface Credentials {
  anthropicApiKey?: string;
  googleApiKey?: string;
  openaiApiKey?: string;
  renderApiKey?: string;
}

export function repoConfigPath(cwd: string): string {
  return join(cwd, PROJECT_DIR_NAME, 'config.json');
}

export function userConfigPath(homeDir: string = homedir()): string {
  return join(homeDir, '.config', 'reelwright', 'config.json');
}

/**
 * Load and validate a config file
 * @returns null when the file does not exist
 * @throws ConfigError when the file is not valid JSON or fails the schema
 */
export function loadConfigFile(path: string): ConfigFile | null {
  if (!existsSync(path)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${path} is not valid JSON: ${reason}`, path, [reason]);
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Config file ${path} is invalid: ${details.join('; ')}`, path, details);
  }
  return result.data;
}

/**
 * Run ids sort by start time, e.g. 2025-01-01_00-00-00-000Z
 */
export function generateRunId(clock: Clock = getDefaultClock()): string {
  return clock.iso().replace(/[:.]/g, '-').replace('T', '_');
}

export function resolveCredentials(env: NodeJS.ProcessEnv): Credentials {
  const read = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };
  return {
    anthropicApiKey: read('ANTHROPIC_API_KEY'),
    googleApiKey: read('GOOGLE_GENERATIVE_AI_API_KEY'),
    openaiApiKey: read('OPENAI_API_KEY'),
    renderApiKey: read('RENDER_API_KEY'),
  };
}

/**
 * Resolve configuration from all sources with explicit precedence
 */
export function resolveConfig(
  cliFlags: CliFlags,
  workingDirectory: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
  options: ResolveConfigOptions = {}
): EffectiveConfig {
  const cwd = resolve(workingDirectory);
  const clock = options.clock ?? getDefaultClock();

  const repo = loadConfigFile(repoConfigPath(cwd)) ?? {};
  const user = loadConfigFile(userConfigPath(options.homeDir)) ?? {};

  const sources: Partial<Record<string, ConfigSource>> = {};

  function resolveValue<T>(key: string, cli: T | undefined, fromRepo: T | undefined, fromUser: T | undefined, defaultVal: T): T {
    if (cli !== undefined) {
      sources[key] = 'cli';
      return cli;
    }
    if (fromRepo !== undefined) {
      sources[key] = 'repo';
      return fromRepo;
    }
    if (fromUser !== undefined) {
      sources[key] = 'user';
      return fromUser;
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const mock = cliFlags.mock ?? false;
  const interactive = !(cliFlags.noInteractive ?? false);

  let reviewMode = resolveValue<ReviewMode>(
    'review.mode',
    cliFlags.reviewMode ?? (cliFlags.review !== undefined ? 'static' : undefined),
    repo.review?.mode,
    user.review?.mode,
    DEFAULT_CONFIG.review.mode
  );
  if (reviewMode === 'interactive' && !interactive) {
    reviewMode = 'static';
    sources['review.mode'] = 'cli';
  }

  const artifactDir = resolveValue(
    'paths.artifactBaseDir',
    cliFlags.outputDir,
    repo.paths?.artifactBaseDir,
    user.paths?.artifactBaseDir,
    DEFAULT_CONFIG.paths.artifactBaseDir
  );

  const credentials = resolveCredentials(env);
  for (const [name, value] of Object.entries(credentials)) {
    if (value !== undefined) {
      sources[`credentials.${name}`] = 'env';
    }
  }

  return {
    schemaVersion: '1.0.0',
    brief: cliFlags.brief ?? '',
    runId: generateRunId(clock),
    resolvedAt: clock.iso(),

    routing: {
      confidenceThreshold: resolveValue(
        'routing.confidenceThreshold',
        cliFlags.confidenceThreshold,
        repo.routing?.confidenceThreshold,
        user.routing?.confidenceThreshold,
        DEFAULT_CONFIG.routing.confidenceThreshold
      ),
      fallbackWorker: resolveValue<WorkerKind>(
        'routing.fallbackWorker',
        cliFlags.fallbackWorker,
        repo.routing?.fallbackWorker,
        user.routing?.fallbackWorker,
        DEFAULT_CONFIG.routing.fallbackWorker
      ),
      maxHops: resolveValue(
        'routing.maxHops',
        cliFlags.maxHops,
        repo.routing?.maxHops,
        user.routing?.maxHops,
        DEFAULT_CONFIG.routing.maxHops
      ),
    },

    retry: {
      enabled: resolveValue(
        'retry.enabled',
        cliFlags.noRetry ? false : undefined,
        repo.retry?.enabled,
        user.retry?.enabled,
        DEFAULT_CONFIG.retry.enabled
      ),
      maxRetries: resolveValue(
        'retry.maxRetries',
        cliFlags.maxRetries,
        repo.retry?.maxRetries,
        user.retry?.maxRetries,
        DEFAULT_CONFIG.retry.maxRetries
      ),
      initialDelayMs: resolveValue(
        'retry.initialDelayMs',
        undefined,
        repo.retry?.initialDelayMs,
        user.retry?.initialDelayMs,
        DEFAULT_CONFIG.retry.initialDelayMs
      ),
      maxDelayMs: resolveValue(
        'retry.maxDelayMs',
        undefined,
        repo.retry?.maxDelayMs,
        user.retry?.maxDelayMs,
        DEFAULT_CONFIG.retry.maxDelayMs
      ),
      exponentialBase: resolveValue(
        'retry.exponentialBase',
        undefined,
        repo.retry?.exponentialBase,
        user.retry?.exponentialBase,
        DEFAULT_CONFIG.retry.exponentialBase
      ),
      transientOnly: resolveValue(
        'retry.transientOnly',
        undefined,
        repo.retry?.transientOnly,
        user.retry?.transientOnly,
        DEFAULT_CONFIG.retry.transientOnly
      ),
    },

    generation: {
      provider: resolveValue<GenerationProvider>(
        'generation.provider',
        mock ? 'mock' : cliFlags.provider,
        repo.generation?.provider,
        user.generation?.provider,
        DEFAULT_CONFIG.generation.provider
      ),
      model: resolveValue(
        'generation.model',
        cliFlags.model,
        repo.generation?.model,
        user.generation?.model,
        DEFAULT_CONFIG.generation.model
      ),
      apiBase: resolveValue<string | undefined>(
        'generation.apiBase',
        undefined,
        repo.generation?.apiBase,
        user.generation?.apiBase,
        undefined
      ),
      timeoutMs: resolveValue(
        'generation.timeoutMs',
        undefined,
        repo.generation?.timeoutMs,
        user.generation?.timeoutMs,
        DEFAULT_CONFIG.generation.timeoutMs
      ),
    },

    render: {
      provider: resolveValue<RenderProvider>(
        'render.provider',
        mock ? 'mock' : cliFlags.renderProvider,
        repo.render?.provider,
        user.render?.provider,
        DEFAULT_CONFIG.render.provider
      ),
      apiBase: resolveValue<string | undefined>(
        'render.apiBase',
        undefined,
        repo.render?.apiBase,
        user.render?.apiBase,
        undefined
      ),
      timeoutMs: resolveValue(
        'render.timeoutMs',
        undefined,
        repo.render?.timeoutMs,
        user.render?.timeoutMs,
        DEFAULT_CONFIG.render.timeoutMs
      ),
    },

    // Style is a whole: a repo style replaces the user's field by field
    style: {
      ...DEFAULT_CONFIG.style,
      ...user.style,
      ...repo.style,
    },

    characters: resolveValue('characters', undefined, repo.characters, user.characters, DEFAULT_CONFIG.characters),

    review: {
      defaultOutcome: resolveValue<ReviewOutcome>(
        'review.defaultOutcome',
        cliFlags.review,
        repo.review?.defaultOutcome,
        user.review?.defaultOutcome,
        DEFAULT_CONFIG.review.defaultOutcome
      ),
      mode: reviewMode,
      maxRevisions: resolveValue(
        'review.maxRevisions',
        undefined,
        repo.review?.maxRevisions,
        user.review?.maxRevisions,
        DEFAULT_CONFIG.review.maxRevisions
      ),
    },

    verbosity: {
      verbose: cliFlags.verbose ?? DEFAULT_CONFIG.verbosity.verbose,
      debug: cliFlags.debug ?? DEFAULT_CONFIG.verbosity.debug,
      jsonOutput: cliFlags.jsonOutput ?? DEFAULT_CONFIG.verbosity.jsonOutput,
    },

    paths: {
      workingDirectory: cwd,
      artifactBaseDir: isAbsolute(artifactDir) ? artifactDir : join(cwd, artifactDir),
      runDirectory: undefined,
    },

    routeOnly: cliFlags.routeOnly ?? DEFAULT_CONFIG.routeOnly,
    sources,
  };
}

/**
 * Directory of one run's artifacts: <artifactBaseDir>/runs/<runId>
 */
export function setRunDirectory(config: EffectiveConfig, runDirectory?: string): EffectiveConfig {
  return {
    ...config,
    paths: {
      ...config.paths,
      runDirectory: runDirectory ?? join(config.paths.artifactBaseDir, 'runs', config.runId),
    },
  };
}
