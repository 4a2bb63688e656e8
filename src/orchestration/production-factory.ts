/**
 * Production Factory
 * Builds the router, clients, pipelines, reviewer and workflow for a run
 * from its EffectiveConfig
 */

import type { EffectiveConfig } from '../types/effective-config';
import type { ExecutionWorkerKind } from '../types/routing';
import type { Logger } from '../types/logger';
import type { Clock } from '../types/clock';
import { getDefaultClock } from '../types/clock';
import type { Prompter } from '../types/prompter';
import { Router } from '../core/router';
import { createDefaultScorers } from '../core/scorers';
import { type RetryPolicy, retryPolicyFromConfig } from '../core/retry-policy';
import { Pipeline, type StageRun } from '../core/pipeline';
import { ConfigError, type Credentials } from '../config/resolve-config';
import type { GenerationClient } from '../engines/generation-client';
import { AiSdkGenerationClient } from '../engines/ai-sdk-generation-client';
import { createDemoGenerationClient } from '../engines/mock-generation-client';
import type { RenderClient } from '../engines/render-client';
import { HttpRenderClient } from '../engines/http-render-client';
import { MockRenderClient } from '../engines/mock-render-client';
import { PlanningStage } from '../stages/planning-stage';
import { StoryboardStage } from '../stages/storyboard-stage';
import { MotionStage } from '../stages/motion-stage';
import { RenderStage } from '../stages/render-stage';
import type { Reviewer } from '../review/reviewer';
import { StaticReviewer } from '../review/reviewer';
import { PrompterReviewer } from '../review/prompter-reviewer';
import { ModelReviewer } from '../review/model-reviewer';
import { createInquirerPrompter } from '../ui/inquirer-prompter';
import { ProductionWorkflow, type WorkerPipelines, type WorkflowProgress } from './production-workflow';

/**
 * Collaborators a caller may supply instead of the configured ones
 */
export interface ProductionDependencies {
  credentials?: Credentials;
  generationClient?: GenerationClient;
  renderClient?: RenderClient;
  reviewer?: Reviewer;
  prompter?: Prompter;
  logger?: Logger;
  clock?: Clock;
  progress?: WorkflowProgress;
  onStageRun?: (run: StageRun) => void;
}

export interface Production {
  router: Router;
  workflow: ProductionWorkflow;
  retryPolicy: RetryPolicy;
  generationClient: GenerationClient;
  renderClient: RenderClient;
  reviewer: Reviewer;
  /** Retries scheduled so far across every external call */
  retryCount(): number;
}

function requireKey(value: string | undefined, variable: string, provider: string): string {
  if (!value) {
    throw new ConfigError(`${variable} must be set to use the ${provider} provider`);
  }
  return value;
}

export function createGenerationClient(config: EffectiveConfig, credentials: Credentials = {}): GenerationClient {
  const { provider, model, apiBase, timeoutMs } = config.generation;
  switch (provider) {
    case 'mock':
      return createDemoGenerationClient();
    case 'anthropic':
      return new AiSdkGenerationClient({
        provider,
        model,
        apiBase,
        timeoutMs,
        apiKey: requireKey(credentials.anthropicApiKey, 'ANTHROPIC_API_KEY', provider),
      });
    case 'google':
      return new AiSdkGenerationClient({
        provider,
        model,
        apiBase,
        timeoutMs,
        apiKey: requireKey(credentials.googleApiKey, 'GOOGLE_GENERATIVE_AI_API_KEY', provider),
      });
    case 'openai':
      return new AiSdkGenerationClient({
        provider,
        model,
        apiBase,
        timeoutMs,
        apiKey: requireKey(credentials.openaiApiKey, 'OPENAI_API_KEY', provider),
      });
  }
}

export function createRenderClient(config: EffectiveConfig, credentials: Credentials = {}): RenderClient {
  const { provider, apiBase, timeoutMs } = config.render;
  if (provider === 'mock') {
    return new MockRenderClient();
  }
  if (!apiBase) {
    throw new ConfigError(`render.apiBase must be configured to use the ${provider} render provider`);
  }
  return new HttpRenderClient({
    provider,
    apiBase,
    timeoutMs,
    apiKey: requireKey(credentials.renderApiKey, 'RENDER_API_KEY', provider),
  });
}

export function createReviewer(
  config: EffectiveConfig,
  deps: { generationClient: GenerationClient; retryPolicy: RetryPolicy; prompter?: Prompter; logger?: Logger }
): Reviewer {
  const { mode, defaultOutcome } = config.review;
  switch (mode) {
    case 'static':
      return new StaticReviewer(defaultOutcome);
    case 'interactive':
      return new PrompterReviewer(deps.prompter ?? createInquirerPrompter(), defaultOutcome, deps.logger);
    case 'model':
      return new ModelReviewer(
        { client: deps.generationClient, retryPolicy: deps.retryPolicy, logger: deps.logger },
        defaultOutcome
      );
  }
}

/**
 * Router with the built-in keyword scorers and the configured routing settings
 * @throws RouteMisconfigurationError
 */
export function createRouter(config: EffectiveConfig, logger?: Logger): Router {
  return new Router({
    confidenceThreshold: config.routing.confidenceThreshold,
    fallbackWorker: config.routing.fallbackWorker,
    scorers: createDefaultScorers(),
    logger,
  });
}

/**
 * Wire a production run
 * @throws ConfigError when a provider lacks its key or endpoint
 * @throws RouteMisconfigurationError when the routing settings cannot work
 */
export function createProduction(config: EffectiveConfig, deps: ProductionDependencies = {}): Production {
  const clock = deps.clock ?? getDefaultClock();
  const logger = deps.logger;
  let retries = 0;

  const router = createRouter(config, logger);

  const retryPolicy = retryPolicyFromConfig(
    config.retry,
    { clock, logger },
    {
      onRetry: () => {
        retries++;
      },
    }
  );

  const generationClient = deps.generationClient ?? createGenerationClient(config, deps.credentials);
  const renderClient = deps.renderClient ?? createRenderClient(config, deps.credentials);
  const reviewer =
    deps.reviewer ?? createReviewer(config, { generationClient, retryPolicy, prompter: deps.prompter, logger });

  const stageDeps = { client: generationClient, retryPolicy, logger, clock };
  const pipelineOptions = { logger, clock, onStageRun: deps.onStageRun };

  const executionPipelines = new Map<ExecutionWorkerKind, Pipeline>();
  const pipelines: WorkerPipelines = {
    planner: new Pipeline([new PlanningStage(stageDeps)], pipelineOptions),
    execution: (kind) => {
      let pipeline = executionPipelines.get(kind);
      if (!pipeline) {
        pipeline = new Pipeline(
          [new StoryboardStage(stageDeps, { discipline: kind }), new MotionStage(stageDeps)],
          pipelineOptions
        );
        executionPipelines.set(kind, pipeline);
      }
      return pipeline;
    },
    renderer: new Pipeline([new RenderStage({ client: renderClient, retryPolicy, logger })], pipelineOptions),
  };

  const workflow = new ProductionWorkflow({
    router,
    pipelines,
    reviewer,
    maxHops: config.routing.maxHops,
    maxRevisions: config.review.maxRevisions,
    logger,
    progress: deps.progress,
  });

  return {
    router,
    workflow,
    retryPolicy,
    generationClient,
    renderClient,
    reviewer,
    retryCount: () => retries,
  };
}
