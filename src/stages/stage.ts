/**
 * Stage contract and the shared generate → parse → apply flow
 */

import type { ZodSchema } from 'zod';
import type { ProductionContext } from '../types/production';
import type { Logger } from '../types/logger';
import type { Clock } from '../types/clock';
import { getDefaultClock } from '../types/clock';
import type { Result } from '../types/result';
import { err } from '../types/result';
import type { GenerationClient, GenerationResponse, PromptMessage } from '../engines/generation-client';
import type { RetryPolicy } from '../core/retry-policy';
import type { StageFailure } from '../core/errors';
import { StageExecutionError, StageParseError, describeError } from '../core/errors';
import type { StagePromptTemplate } from '../templates/prompt-template';
import { interpolateTemplate } from '../templates/prompt-template';
import { parseStagePayload } from '../schemas/stage-payloads';

/**
 * One step of a pipeline. Returns the context it was given (mutated) or the
 * reason it stopped.
 */
export interface Stage {
  readonly name: string;
  run(context: ProductionContext): Promise<Result<ProductionContext, StageFailure>>;
}

export interface GenerativeStageDependencies {
  client: GenerationClient;
  retryPolicy: RetryPolicy;
  logger?: Logger;
  clock?: Clock;
}

/**
 * A stage that asks the generation client for a JSON payload and applies it
 * to the context. Subclasses supply the prompt, the schema and the delta.
 */
export abstract class GenerativeStage<TPayload> implements Stage {
  abstract readonly name: string;
  protected abstract readonly template: StagePromptTemplate;
  protected abstract readonly schema: ZodSchema<TPayload>;

  protected readonly client: GenerationClient;
  protected readonly retryPolicy: RetryPolicy;
  protected readonly logger?: Logger;
  protected readonly clock: Clock;

  constructor(deps: GenerativeStageDependencies) {
    this.client = deps.client;
    this.retryPolicy = deps.retryPolicy;
    this.logger = deps.logger;
    this.clock = deps.clock ?? getDefaultClock();
  }

  /**
   * Values for the template's placeholders
   */
  protected abstract templateVariables(context: ProductionContext): Record<string, string>;

  /**
   * Apply a validated payload. Must not mutate the context when it returns an error.
   */
  protected abstract apply(context: ProductionContext, payload: TPayload): Result<ProductionContext, StageFailure>;

  buildMessages(context: ProductionContext): PromptMessage[] {
    return [
      { role: 'system', content: this.template.system },
      { role: 'user', content: interpolateTemplate(this.template, this.templateVariables(context)) },
    ];
  }

  async run(context: ProductionContext): Promise<Result<ProductionContext, StageFailure>> {
    const messages = this.buildMessages(context);

    let response: GenerationResponse;
    try {
      response = await this.retryPolicy.execute(() => this.generate(messages), {
        label: `${this.name} generation`,
      });
    } catch (error) {
      return this.fail(
        new StageExecutionError(this.name, `${this.name} generation failed: ${describeError(error)}`, error)
      );
    }

    const parsed = parseStagePayload(response.content, this.schema);
    if (!parsed.success) {
      return this.fail(new StageParseError(this.name, parsed.errors));
    }

    const applied = this.apply(context, parsed.data);
    if (!applied.ok) {
      return this.fail(applied.error);
    }
    return applied;
  }

  private async generate(messages: PromptMessage[]): Promise<GenerationResponse> {
    this.logger?.event('generation_requested', `[${this.name}] requesting generation from ${this.client.name}`, {
      stage: this.name,
      client: this.client.name,
    });

    const { result, durationMs } = await this.clock.measure(() => this.client.generate(messages));

    this.logger?.event('generation_completed', `[${this.name}] generation completed in ${durationMs}ms`, {
      stage: this.name,
      durationMs,
      finishReason: result.finishReason,
      inputTokens: result.usage?.inputTokens,
      outputTokens: result.usage?.outputTokens,
    });
    return result;
  }

  private fail(failure: StageFailure): Result<ProductionContext, StageFailure> {
    this.logger?.event('stage_failed', `[${this.name}] ${failure.message}`, {
      stage: this.name,
      error: failure.name,
    });
    return err(failure);
  }
}
