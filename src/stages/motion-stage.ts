/**
 * Motion stage: fills in start pose, action and end pose per shot
 */

import type { ProductionContext } from '../types/production';
import type { Result } from '../types/result';
import { ok } from '../types/result';
import type { StageFailure } from '../core/errors';
import { buildPromptContext, describeShots } from '../core/production-context';
import { motionPayloadSchema, type MotionPayload } from '../schemas/stage-payloads';
import { motionTemplate } from '../templates/motion.template';
import { GenerativeStage } from './stage';

export class MotionStage extends GenerativeStage<MotionPayload> {
  readonly name = 'motion';
  protected readonly template = motionTemplate;
  protected readonly schema = motionPayloadSchema;

  protected templateVariables(context: ProductionContext): Record<string, string> {
    return {
      context: buildPromptContext(context),
      shots: describeShots(context),
    };
  }

  /**
   * Every shot takes the last entry naming its id. Shots with no entry keep
   * their placeholder motion; entries for unknown shots are ignored.
   */
  protected apply(context: ProductionContext, payload: MotionPayload): Result<ProductionContext, StageFailure> {
    const lastById = new Map<string, MotionPayload['motions'][number]>();
    for (const entry of payload.motions) {
      lastById.set(entry.shot_id, entry);
    }

    for (const scene of context.timeline.scenes) {
      for (const shot of scene.shots) {
        const entry = lastById.get(shot.id);
        if (entry) {
          shot.motion = { startPose: entry.start_pose, action: entry.action, endPose: entry.end_pose };
        }
      }
    }
    return ok(context);
  }
}
