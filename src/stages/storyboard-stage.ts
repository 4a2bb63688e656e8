/**
 * Storyboard stage: scenes → shots with camera direction
 */

import type { ExecutionWorkerKind } from '../types/routing';
import type { ProductionContext, Scene, Shot } from '../types/production';
import type { Result } from '../types/result';
import { err, ok } from '../types/result';
import type { StageFailure } from '../core/errors';
import { StageLookupError, StageParseError } from '../core/errors';
import { buildPromptContext, describeScenes, placeholderMotion } from '../core/production-context';
import { storyboardPayloadSchema, type StoryboardPayload } from '../schemas/stage-payloads';
import { DISCIPLINE_NOTES, storyboardTemplate } from '../templates/storyboard.template';
import { GenerativeStage, type GenerativeStageDependencies } from './stage';

export interface StoryboardStageOptions {
  /** Execution worker whose framing conventions the shots follow */
  discipline?: ExecutionWorkerKind;
}

export class StoryboardStage extends GenerativeStage<StoryboardPayload> {
  readonly name = 'storyboard';
  protected readonly template = storyboardTemplate;
  protected readonly schema = storyboardPayloadSchema;
  readonly discipline: ExecutionWorkerKind;

  constructor(deps: GenerativeStageDependencies, options: StoryboardStageOptions = {}) {
    super(deps);
    this.discipline = options.discipline ?? 'animation';
  }

  protected templateVariables(context: ProductionContext): Record<string, string> {
    const brief = context.brief?.trim();
    return {
      context: brief ? `${buildPromptContext(context)}\nBrief: ${brief}` : buildPromptContext(context),
      scenes: describeScenes(context),
      discipline: DISCIPLINE_NOTES[this.discipline],
    };
  }

  /**
   * Resolves every shot's scene before touching the timeline, so a bad
   * payload leaves no partial shots behind.
   */
  protected apply(context: ProductionContext, payload: StoryboardPayload): Result<ProductionContext, StageFailure> {
    const scenesById = new Map<string, Scene>();
    for (const scene of context.timeline.scenes) {
      scenesById.set(scene.id, scene);
    }

    const placements: Array<{ scene: Scene; shot: Shot }> = [];
    const claimed = new Map<Scene, Set<string>>();

    for (const [index, entry] of payload.shots.entries()) {
      const scene = scenesById.get(entry.scene_id);
      if (!scene) {
        return err(new StageLookupError(this.name, 'scene', entry.scene_id));
      }

      let ids = claimed.get(scene);
      if (!ids) {
        ids = new Set(scene.shots.map((shot) => shot.id));
        claimed.set(scene, ids);
      }
      if (ids.has(entry.shot_id)) {
        return err(
          new StageParseError(this.name, [
            `shots.${index}.shot_id: duplicate shot id "${entry.shot_id}" in scene "${scene.id}"`,
          ])
        );
      }
      ids.add(entry.shot_id);

      placements.push({
        scene,
        shot: {
          id: entry.shot_id,
          duration: entry.duration,
          subject: entry.subject,
          environment: entry.environment,
          camera: {
            shotType: entry.camera.shot_type,
            movement: entry.camera.movement,
            lens: entry.camera.lens,
            angle: entry.camera.angle,
          },
          motion: placeholderMotion(),
        },
      });
    }

    for (const { scene, shot } of placements) {
      scene.shots.push(shot);
    }
    return ok(context);
  }
}
