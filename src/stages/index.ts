export { GenerativeStage } from './stage';
export type { Stage, GenerativeStageDependencies } from './stage';
export { PlanningStage } from './planning-stage';
export { StoryboardStage } from './storyboard-stage';
export type { StoryboardStageOptions } from './storyboard-stage';
export { MotionStage } from './motion-stage';
export { RenderStage } from './render-stage';
export type { RenderStageDependencies } from './render-stage';
