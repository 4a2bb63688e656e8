/**
 * Production context helpers: construction, prompt text and snapshots
 */

import type {
  GlobalStyle,
  CharacterProfile,
  Camera,
  Motion,
  Shot,
  ProductionContext,
} from '../types/production';

/** Motion value a shot carries until the motion stage fills it in */
export const PLACEHOLDER_MOTION_VALUE = 'undefined';

export function placeholderMotion(): Motion {
  return {
    startPose: PLACEHOLDER_MOTION_VALUE,
    action: PLACEHOLDER_MOTION_VALUE,
    endPose: PLACEHOLDER_MOTION_VALUE,
  };
}

export function createProductionContext(
  style: GlobalStyle,
  characters: Iterable<CharacterProfile> = [],
  brief?: string
): ProductionContext {
  const byName = new Map<string, CharacterProfile>();
  for (const character of characters) {
    byName.set(character.name, Object.freeze({ ...character }));
  }
  return {
    style: Object.freeze({ ...style }),
    characters: byName,
    timeline: { scenes: [] },
    brief,
  };
}

export function describeStyle(style: GlobalStyle): string {
  return `Style: ${style.visualStyle}, Lighting: ${style.lighting}, Color: ${style.colorPalette}, FPS: ${style.fps}`;
}

export function describeCharacter(character: CharacterProfile): string {
  return `Character ${character.name}: ${character.appearance}, wearing ${character.costume}, personality: ${character.personality}`;
}

export function describeCamera(camera: Camera): string {
  return `Camera: ${camera.shotType}, ${camera.movement}, ${camera.lens}, ${camera.angle}`;
}

export function describeMotion(motion: Motion): string {
  return `Motion from ${motion.startPose}, performing ${motion.action}, ending at ${motion.endPose}`;
}

export function describeShot(shot: Shot): string {
  return `Shot ${shot.id}: ${shot.subject} in ${shot.environment}. ${describeCamera(shot.camera)}. ${describeMotion(shot.motion)}.`;
}

/**
 * Style line followed by one line per character
 */
export function buildPromptContext(context: ProductionContext): string {
  const parts = [describeStyle(context.style)];
  for (const character of context.characters.values()) {
    parts.push(describeCharacter(character));
  }
  return parts.join('\n');
}

/**
 * One line per scene: "<id>: <description>"
 */
export function describeScenes(context: ProductionContext): string {
  return context.timeline.scenes.map((scene) => `${scene.id}: ${scene.description}`).join('\n');
}

/**
 * One line per shot, grouped under scene ids
 */
export function describeShots(context: ProductionContext): string {
  const lines: string[] = [];
  for (const scene of context.timeline.scenes) {
    lines.push(`Scene ${scene.id}:`);
    for (const shot of scene.shots) {
      lines.push(`  ${describeShot(shot)}`);
    }
  }
  return lines.join('\n');
}

/**
 * Every shot in timeline order with the id of its scene
 */
export function listShots(context: ProductionContext): Array<{ sceneId: string; shot: Shot }> {
  return context.timeline.scenes.flatMap((scene) => scene.shots.map((shot) => ({ sceneId: scene.id, shot })));
}

/**
 * Plain JSON form of a context, for artifacts
 */
export interface SerializedProductionContext {
  brief?: string;
  style: GlobalStyle;
  characters: CharacterProfile[];
  timeline: ProductionContext['timeline'];
}

export function serializeProductionContext(context: ProductionContext): SerializedProductionContext {
  return {
    brief: context.brief,
    style: context.style,
    characters: [...context.characters.values()],
    timeline: context.timeline,
  };
}
