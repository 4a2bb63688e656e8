/**
 * Asks the person running the CLI to review the render
 */

import type { ProductionContext } from '../types/production';
import type { ReviewOutcome } from '../types/routing';
import type { Prompter, SelectChoice } from '../types/prompter';
import type { Logger } from '../types/logger';
import type { Result } from '../types/result';
import { ok } from '../types/result';
import type { StageFailure } from '../core/errors';
import { listShots } from '../core/production-context';
import type { Reviewer, ReviewVerdict } from './reviewer';

const CHOICES: SelectChoice<ReviewOutcome>[] = [
  { name: 'Accept', value: 'accept', description: 'finish the run' },
  { name: 'Revise', value: 'revise', description: 'keep the scenes, redo the shots' },
  { name: 'Redesign', value: 'redesign', description: 'start again from the scene plan' },
];

export class PrompterReviewer implements Reviewer {
  readonly name = 'interactive';

  constructor(
    private readonly prompter: Prompter,
    private readonly defaultOutcome: ReviewOutcome,
    private readonly logger?: Logger
  ) {}

  async review(context: ProductionContext, round: number): Promise<Result<ReviewVerdict, StageFailure>> {
    if (!this.prompter.isInteractive()) {
      return ok({ outcome: this.defaultOutcome, source: 'default' });
    }

    const shotCount = listShots(context).length;
    const answer = await this.prompter.select({
      message: `Review round ${round}: ${shotCount} shot(s) rendered. What next?`,
      choices: CHOICES,
      default: this.defaultOutcome,
    });

    if (!answer.ok) {
      // Ctrl+C and terminal errors end the review with the default
      this.logger?.warn(`Review prompt ended (${answer.error.code}); using "${this.defaultOutcome}"`);
      return ok({ outcome: this.defaultOutcome, source: 'default', notes: answer.error.message });
    }
    return ok({ outcome: answer.value, source: 'user' });
  }
}
