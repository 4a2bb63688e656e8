/**
 * Reviewers decide what happens to a rendered production
 */

import type { ProductionContext } from '../types/production';
import type { ReviewOutcome } from '../types/routing';
import type { Result } from '../types/result';
import { ok } from '../types/result';
import type { StageFailure } from '../core/errors';

export type ReviewSource = 'static' | 'user' | 'model' | 'default';

export interface ReviewVerdict {
  outcome: ReviewOutcome;
  source: ReviewSource;
  notes?: string;
}

export interface Reviewer {
  readonly name: string;
  /**
   * @param round - 1 for the first review of a run
   */
  review(context: ProductionContext, round: number): Promise<Result<ReviewVerdict, StageFailure>>;
}

/**
 * Always answers with the same outcome
 */
export class StaticReviewer implements Reviewer {
  readonly name = 'static';

  constructor(private readonly outcome: ReviewOutcome = 'accept') {}

  async review(): Promise<Result<ReviewVerdict, StageFailure>> {
    return ok({ outcome: this.outcome, source: 'static' });
  }
}

/**
 * Answers with each outcome in turn, then repeats the last one. For tests
 * and scripted runs.
 */
export class ScriptedReviewer implements Reviewer {
  readonly name = 'scripted';
  private index = 0;

  constructor(private readonly outcomes: [ReviewOutcome, ...ReviewOutcome[]]) {}

  async review(): Promise<Result<ReviewVerdict, StageFailure>> {
    const outcome = this.outcomes[Math.min(this.index, this.outcomes.length - 1)];
    this.index++;
    return ok({ outcome, source: 'static' });
  }
}
