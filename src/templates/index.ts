/**
 * Export all prompt templates
 */
export type { PromptTemplate, StagePromptTemplate } from './prompt-template';
export { interpolateTemplate } from './prompt-template';
export { planningTemplate } from './planning.template';
export { storyboardTemplate, DISCIPLINE_NOTES } from './storyboard.template';
export { motionTemplate } from './motion.template';
export { reviewTemplate } from './review.template';

// Re-export for convenience
export { interpolateTemplate as interpolate } from './prompt-template';
