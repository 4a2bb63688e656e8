import { describe, it, expect } from 'vitest';
import {
  createProductionContext,
  buildPromptContext,
  describeShot,
  describeScenes,
  describeShots,
  listShots,
  placeholderMotion,
  serializeProductionContext,
} from './production-context';
import type { GlobalStyle, Shot } from '../types/production';

const style: GlobalStyle = {
  visualStyle: 'cel-shaded',
  lighting: 'dusk',
  colorPalette: 'teal and orange',
  fps: 24,
  resolution: '1280x720',
};

const shot: Shot = {
  id: 'shot_1',
  duration: 3,
  subject: 'Mira',
  environment: 'a rooftop',
  camera: { shotType: 'wide', movement: 'dolly in', lens: '35mm', angle: 'low' },
  motion: placeholderMotion(),
};

describe('production context', () => {
  it('should build the style and character prompt block', () => {
    const context = createProductionContext(style, [
      { name: 'Mira', appearance: 'tall', costume: 'a red coat', personality: 'bold' },
    ]);

    expect(buildPromptContext(context)).toBe(
      'Style: cel-shaded, Lighting: dusk, Color: teal and orange, FPS: 24\n' +
        'Character Mira: tall, wearing a red coat, personality: bold'
    );
  });

  it('should describe a shot with placeholder motion', () => {
    expect(describeShot(shot)).toBe(
      'Shot shot_1: Mira in a rooftop. Camera: wide, dolly in, 35mm, low. ' +
        'Motion from undefined, performing undefined, ending at undefined.'
    );
  });

  it('should snapshot scenes and shots', () => {
    const context = createProductionContext(style);
    context.timeline.scenes.push(
      { id: 'scene_1', description: 'Arrival', shots: [shot] },
      { id: 'scene_2', description: 'Duel', shots: [] }
    );

    expect(describeScenes(context)).toBe('scene_1: Arrival\nscene_2: Duel');
    expect(describeShots(context).split('\n')).toEqual([
      'Scene scene_1:',
      `  ${describeShot(shot)}`,
      'Scene scene_2:',
    ]);
    expect(listShots(context)).toEqual([{ sceneId: 'scene_1', shot }]);
  });

  it('should freeze the style', () => {
    const context = createProductionContext(style);
    expect(Object.isFrozen(context.style)).toBe(true);
  });

  it('should serialize characters as a list', () => {
    const context = createProductionContext(style, [], 'a brief');
    expect(serializeProductionContext(context)).toEqual({
      brief: 'a brief',
      style,
      characters: [],
      timeline: { scenes: [] },
    });
  });
});
