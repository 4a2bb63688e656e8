export { StaticReviewer, ScriptedReviewer } from './reviewer';
export type { Reviewer, ReviewVerdict, ReviewSource } from './reviewer';
export { PrompterReviewer } from './prompter-reviewer';
export { ModelReviewer } from './model-reviewer';
export type { ModelReviewerDependencies } from './model-reviewer';
