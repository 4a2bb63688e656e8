/**
 * Stage payload schemas and the JSON extraction used to read them
 */
export {
  planningPayloadSchema,
  storyboardPayloadSchema,
  motionPayloadSchema,
  reviewPayloadSchema,
  collectJsonCandidates,
  validatePayload,
  parseStagePayload,
} from './stage-payloads';
export type {
  ValidationResult,
  PlanningPayload,
  StoryboardPayload,
  MotionPayload,
  ReviewPayload,
} from './stage-payloads';
