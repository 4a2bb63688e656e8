/**
 * Tests for Pipeline
 */

import { describe, it, expect } from 'vitest';
import { Pipeline, type StageRun } from './pipeline';
import { StageLookupError } from './errors';
import { PlanningStage } from '../stages/planning-stage';
import { StoryboardStage } from '../stages/storyboard-stage';
import { MotionStage } from '../stages/motion-stage';
import type { Stage } from '../stages/stage';
import { MockGenerationClient } from '../engines/mock-generation-client';
import { makeContext, makeStageDeps } from '../../tests/utils/production-builders';
import { ok } from '../types/result';

const PLAN = {
  scenes: [
    { id: 'scene_1', description: 'arrival' },
    { id: 'scene_2', description: 'duel' },
  ],
};

const SHOTS = {
  shots: [
    {
      scene_id: 'scene_1',
      shot_id: 'shot_1',
      duration: 3,
      subject: 'Mira',
      environment: 'gate',
      camera: { shot_type: 'wide', movement: 'static', lens: '24mm', angle: 'eye-level' },
    },
    {
      scene_id: 'scene_2',
      shot_id: 'shot_2',
      duration: 2,
      subject: 'Mira',
      environment: 'bridge',
      camera: { shot_type: 'medium', movement: 'pan', lens: '50mm', angle: 'low' },
    },
  ],
};

const MOTIONS = {
  motions: [
    { shot_id: 'shot_2', start_pose: 'crouched', action: 'jumps', end_pose: 'landed' },
    { shot_id: 'shot_2', start_pose: 'kneeling', action: 'rises', end_pose: 'standing' },
  ],
};

function buildPipeline(shots: unknown) {
  const client = new MockGenerationClient({
    rules: [
      { match: /animation director/, response: JSON.stringify(PLAN) },
      { match: /storyboard artist/, response: JSON.stringify(shots) },
      { match: /motion designer/, response: JSON.stringify(MOTIONS) },
    ],
  });
  const deps = makeStageDeps(client);
  const pipeline = new Pipeline([new PlanningStage(deps), new StoryboardStage(deps), new MotionStage(deps)], {
    logger: deps.logger,
    clock: deps.clock,
  });
  return { pipeline, ...deps };
}

describe('Pipeline', () => {
  it('should run planning, storyboard and motion with the later motion entry winning', async () => {
    const { pipeline } = buildPipeline(SHOTS);

    const context = await pipeline.run(makeContext());

    expect(context.timeline.scenes.map((s) => s.id)).toEqual(['scene_1', 'scene_2']);
    const shot = context.timeline.scenes[1].shots[0];
    expect(shot.id).toBe('shot_2');
    expect(shot.motion).toEqual({ startPose: 'kneeling', action: 'rises', endPose: 'standing' });
    expect(context.timeline.scenes[0].shots[0].motion.action).toBe('undefined');
  });

  it('should record one stage run per stage', async () => {
    const { pipeline, logger } = buildPipeline(SHOTS);

    const result = await pipeline.execute(makeContext());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.runs).toEqual([
      { stage: 'planning', status: 'completed', durationMs: 0 },
      { stage: 'storyboard', status: 'completed', durationMs: 0 },
      { stage: 'motion', status: 'completed', durationMs: 0 },
    ]);
    expect(logger.getEventsByType('stage_completed').map((e) => e.metadata.stage)).toEqual([
      'planning',
      'storyboard',
      'motion',
    ]);
  });

  it('should halt at an unknown scene id and leave no partial shot', async () => {
    const badShots = { shots: [{ ...SHOTS.shots[0] }, { ...SHOTS.shots[1], scene_id: 'scene_7' }] };
    const { pipeline, client } = buildPipeline(badShots);
    const context = makeContext();

    const result = await pipeline.execute(context);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.failure).toBeInstanceOf(StageLookupError);
    expect(result.error.runs.map((r) => [r.stage, r.status])).toEqual([
      ['planning', 'completed'],
      ['storyboard', 'failed'],
    ]);
    expect(result.error.runs[1].error).toBe('storyboard references unknown scene "scene_7"');
    expect(context.timeline.scenes.flatMap((s) => s.shots)).toEqual([]);
    // motion never ran
    expect(client.history).toHaveLength(2);
  });

  it('should throw the stage failure from run()', async () => {
    const badShots = { shots: [{ ...SHOTS.shots[0], scene_id: 'nowhere' }] };
    const { pipeline } = buildPipeline(badShots);

    await expect(pipeline.run(makeContext())).rejects.toBeInstanceOf(StageLookupError);
  });

  it('should pass the context each stage returns to the next', async () => {
    const replacement = makeContext('replacement');
    const swap: Stage = { name: 'swap', run: async () => ok(replacement) };
    const seen: string[] = [];
    const observe: Stage = {
      name: 'observe',
      run: async (context) => {
        seen.push(context.brief ?? '');
        return ok(context);
      },
    };
    const runs: StageRun[] = [];

    const final = await new Pipeline([swap, observe], { onStageRun: (run) => runs.push(run) }).run(makeContext());

    expect(final).toBe(replacement);
    expect(seen).toEqual(['replacement']);
    expect(runs.map((r) => r.stage)).toEqual(['swap', 'observe']);
  });
});
