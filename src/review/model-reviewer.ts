/**
 * Model-judged review: the generation client grades the shot list
 */

import type { ProductionContext } from '../types/production';
import type { ReviewOutcome } from '../types/routing';
import type { Logger } from '../types/logger';
import type { Result } from '../types/result';
import { err, ok } from '../types/result';
import type { StageFailure } from '../core/errors';
import { StageExecutionError, describeError } from '../core/errors';
import type { RetryPolicy } from '../core/retry-policy';
import { describeShot, listShots } from '../core/production-context';
import type { GenerationClient, PromptMessage } from '../engines/generation-client';
import { reviewTemplate } from '../templates/review.template';
import { interpolateTemplate } from '../templates/prompt-template';
import { parseStagePayload, reviewPayloadSchema } from '../schemas/stage-payloads';
import type { Reviewer, ReviewVerdict } from './reviewer';

export interface ModelReviewerDependencies {
  client: GenerationClient;
  retryPolicy: RetryPolicy;
  logger?: Logger;
}

export class ModelReviewer implements Reviewer {
  readonly name = 'model';

  constructor(
    private readonly deps: ModelReviewerDependencies,
    private readonly defaultOutcome: ReviewOutcome
  ) {}

  buildMessages(context: ProductionContext): PromptMessage[] {
    const shots = listShots(context)
      .map(({ shot }) => `${describeShot(shot)} Output: ${shot.renderOutput ?? 'not rendered'}`)
      .join('\n');
    return [
      { role: 'system', content: reviewTemplate.system },
      {
        role: 'user',
        content: interpolateTemplate(reviewTemplate, {
          brief: context.brief?.trim() || '(no brief given)',
          shots: shots || '(no shots)',
        }),
      },
    ];
  }

  async review(context: ProductionContext): Promise<Result<ReviewVerdict, StageFailure>> {
    const messages = this.buildMessages(context);

    let content: string;
    try {
      const response = await this.deps.retryPolicy.execute(() => this.deps.client.generate(messages), {
        label: 'review generation',
      });
      content = response.content;
    } catch (error) {
      return err(new StageExecutionError('review', `review generation failed: ${describeError(error)}`, error));
    }

    const parsed = parseStagePayload(content, reviewPayloadSchema);
    if (!parsed.success) {
      this.deps.logger?.warn(
        `Review answer could not be parsed (${parsed.errors.join('; ')}); using "${this.defaultOutcome}"`
      );
      return ok({ outcome: this.defaultOutcome, source: 'default' });
    }

    return ok({ outcome: parsed.data.review, source: 'model', notes: parsed.data.notes });
  }
}
