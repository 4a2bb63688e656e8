/**
 * Production model
 * The shared context that pipeline stages build up over a run
 */

/**
 * Look shared by every shot in a run. Fixed once the run starts.
 */
export interface GlobalStyle {
  readonly visualStyle: string;
  readonly lighting: string;
  readonly colorPalette: string;
  readonly fps: number;
  /** WIDTHxHEIGHT, e.g. 1920x1080 */
  readonly resolution: string;
}

export interface CharacterProfile {
  readonly name: string;
  readonly appearance: string;
  readonly costume: string;
  readonly personality: string;
}

export interface Camera {
  shotType: string;
  movement: string;
  lens: string;
  angle: string;
}

export interface Motion {
  startPose: string;
  action: string;
  endPose: string;
}

/**
 * Atomic renderable unit. `id` is unique within its scene.
 */
export interface Shot {
  id: string;
  /** Seconds */
  duration: number;
  subject: string;
  environment: string;
  camera: Camera;
  motion: Motion;
  /** Locator returned by the renderer, once rendered */
  renderOutput?: string;
}

export interface Scene {
  id: string;
  description: string;
  shots: Shot[];
}

/**
 * Scenes in creation order
 */
export interface Timeline {
  scenes: Scene[];
}

/**
 * Aggregate pipeline state. A single run owns one context exclusively.
 */
export interface ProductionContext {
  readonly style: GlobalStyle;
  readonly characters: ReadonlyMap<string, CharacterProfile>;
  timeline: Timeline;
  /** The creative brief the run was started with */
  readonly brief?: string;
}
