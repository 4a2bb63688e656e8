/**
 * Render stage: sends every shot to the render client in timeline order
 */

import type { ProductionContext } from '../types/production';
import type { Logger } from '../types/logger';
import type { Result } from '../types/result';
import { err, ok } from '../types/result';
import type { RetryPolicy } from '../core/retry-policy';
import type { StageFailure } from '../core/errors';
import { StageExecutionError, describeError } from '../core/errors';
import { listShots } from '../core/production-context';
import type { RenderClient } from '../engines/render-client';
import type { Stage } from './stage';

export interface RenderStageDependencies {
  client: RenderClient;
  retryPolicy: RetryPolicy;
  logger?: Logger;
}

/**
 * A shot that fails after its retries stops the stage. Shots rendered
 * before it keep their locators.
 */
export class RenderStage implements Stage {
  readonly name = 'render';
  private readonly client: RenderClient;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger?: Logger;

  constructor(deps: RenderStageDependencies) {
    this.client = deps.client;
    this.retryPolicy = deps.retryPolicy;
    this.logger = deps.logger;
  }

  async run(context: ProductionContext): Promise<Result<ProductionContext, StageFailure>> {
    const render = this.retryPolicy.wrap(this.client.renderShot.bind(this.client), { label: 'render' });

    for (const { sceneId, shot } of listShots(context)) {
      this.logger?.event('render_requested', `[render] ${sceneId}/${shot.id} → ${this.client.name}`, {
        stage: this.name,
        sceneId,
        shotId: shot.id,
      });

      try {
        shot.renderOutput = await render(shot, context.style);
      } catch (error) {
        const failure = new StageExecutionError(
          this.name,
          `render failed for shot ${shot.id}: ${describeError(error)}`,
          error,
          shot.id
        );
        this.logger?.event('stage_failed', `[render] ${failure.message}`, {
          stage: this.name,
          shotId: shot.id,
          error: failure.name,
        });
        return err(failure);
      }

      this.logger?.event('render_completed', `[render] ${sceneId}/${shot.id} → ${shot.renderOutput}`, {
        stage: this.name,
        sceneId,
        shotId: shot.id,
      });
    }

    return ok(context);
  }
}
