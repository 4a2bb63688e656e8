/**
 * Tests for StoryboardStage
 */

import { describe, it, expect } from 'vitest';
import { StoryboardStage } from './storyboard-stage';
import { MockGenerationClient } from '../engines/mock-generation-client';
import { StageLookupError, StageParseError } from '../core/errors';
import { DISCIPLINE_NOTES } from '../templates/storyboard.template';
import { makeContext, makeScene, makeShot, makeStageDeps } from '../../tests/utils/production-builders';

function shotEntry(sceneId: string, shotId: string, duration = 2.5) {
  return {
    scene_id: sceneId,
    shot_id: shotId,
    duration,
    subject: 'Mira',
    environment: 'bridge',
    camera: { shot_type: 'close-up', movement: 'handheld', lens: '85mm', angle: 'low' },
  };
}

function stageAnswering(shots: unknown[], discipline?: 'animation' | 'film' | 'game') {
  const client = new MockGenerationClient({ defaultResponse: JSON.stringify({ shots }) });
  return new StoryboardStage(makeStageDeps(client), { discipline });
}

function twoSceneContext() {
  const context = makeContext();
  context.timeline.scenes.push(makeScene('scene_1'), makeScene('scene_2'));
  return context;
}

describe('StoryboardStage', () => {
  it('should append shots to their scenes with placeholder motion', async () => {
    const stage = stageAnswering([shotEntry('scene_2', 'shot_a'), shotEntry('scene_1', 'shot_b', 4)]);
    const context = twoSceneContext();

    const result = await stage.run(context);

    expect(result.ok).toBe(true);
    const [first, second] = context.timeline.scenes;
    expect(first.shots.map((s) => s.id)).toEqual(['shot_b']);
    expect(second.shots).toEqual([
      {
        id: 'shot_a',
        duration: 2.5,
        subject: 'Mira',
        environment: 'bridge',
        camera: { shotType: 'close-up', movement: 'handheld', lens: '85mm', angle: 'low' },
        motion: { startPose: 'undefined', action: 'undefined', endPose: 'undefined' },
      },
    ]);
  });

  it('should fail on an unknown scene id without adding any shot', async () => {
    const stage = stageAnswering([shotEntry('scene_1', 'shot_a'), shotEntry('scene_9', 'shot_b')]);
    const context = twoSceneContext();

    const result = await stage.run(context);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(StageLookupError);
    expect(result.error.message).toBe('storyboard references unknown scene "scene_9"');
    expect(result.error).toMatchObject({ entity: 'scene', missingId: 'scene_9' });
    expect(context.timeline.scenes.flatMap((s) => s.shots)).toEqual([]);
  });

  it('should give shots for a repeated scene id to the last scene with that id', async () => {
    const stage = stageAnswering([shotEntry('scene_1', 'shot_a')]);
    const context = makeContext();
    context.timeline.scenes.push(makeScene('scene_1', [], 'first'), makeScene('scene_1', [], 'second'));

    await stage.run(context);

    expect(context.timeline.scenes.map((s) => s.shots.length)).toEqual([0, 1]);
  });

  it('should reject a shot id repeated within one scene', async () => {
    const stage = stageAnswering([shotEntry('scene_1', 'shot_a'), shotEntry('scene_1', 'shot_a')]);
    const context = twoSceneContext();

    const result = await stage.run(context);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(StageParseError);
    expect(result.error).toMatchObject({
      details: ['shots.1.shot_id: duplicate shot id "shot_a" in scene "scene_1"'],
    });
    expect(context.timeline.scenes[0].shots).toEqual([]);
  });

  it('should reject a shot id the scene already holds', async () => {
    const stage = stageAnswering([shotEntry('scene_1', 'shot_a')]);
    const context = twoSceneContext();
    context.timeline.scenes[0].shots.push(makeShot('shot_a'));

    const result = await stage.run(context);

    expect(result.ok).toBe(false);
    expect(context.timeline.scenes[0].shots).toHaveLength(1);
  });

  it('should allow the same shot id in different scenes', async () => {
    const stage = stageAnswering([shotEntry('scene_1', 'shot_1'), shotEntry('scene_2', 'shot_1')]);
    const context = twoSceneContext();

    const result = await stage.run(context);

    expect(result.ok).toBe(true);
    expect(context.timeline.scenes.map((s) => s.shots.length)).toEqual([1, 1]);
  });

  it('should reject a non-positive duration', async () => {
    const stage = stageAnswering([shotEntry('scene_1', 'shot_a', 0)]);

    const result = await stage.run(twoSceneContext());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({ details: ['shots.0.duration: duration must be positive'] });
  });

  it('should list the scenes and the discipline note in the prompt', () => {
    const stage = stageAnswering([], 'game');
    const [, user] = stage.buildMessages(twoSceneContext());

    expect(user.content).toContain('Scenes:\nscene_1: scene_1 description\nscene_2: scene_2 description');
    expect(user.content).toContain(DISCIPLINE_NOTES.game);
    expect(user.content).toContain('Brief: A duel at dusk');
  });

  it('should frame shots for animation by default', () => {
    expect(stageAnswering([]).discipline).toBe('animation');
  });
});
