/**
 * Planning stage: brief → ordered scenes
 */

import type { ProductionContext } from '../types/production';
import type { Result } from '../types/result';
import { ok } from '../types/result';
import type { StageFailure } from '../core/errors';
import { buildPromptContext } from '../core/production-context';
import { planningPayloadSchema, type PlanningPayload } from '../schemas/stage-payloads';
import { planningTemplate } from '../templates/planning.template';
import { GenerativeStage } from './stage';

const NO_BRIEF = '(no brief given)';

export class PlanningStage extends GenerativeStage<PlanningPayload> {
  readonly name = 'planning';
  protected readonly template = planningTemplate;
  protected readonly schema = planningPayloadSchema;

  protected templateVariables(context: ProductionContext): Record<string, string> {
    return {
      context: buildPromptContext(context),
      brief: context.brief?.trim() || NO_BRIEF,
    };
  }

  /**
   * Appends every planned scene in payload order. Scenes sharing an id are
   * kept as separate entries.
   */
  protected apply(context: ProductionContext, payload: PlanningPayload): Result<ProductionContext, StageFailure> {
    for (const scene of payload.scenes) {
      context.timeline.scenes.push({ id: scene.id, description: scene.description, shots: [] });
    }
    return ok(context);
  }
}
