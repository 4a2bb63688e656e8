/**
 * UI module - user interface utilities
 * Provides spinners and prompts
 */

// Spinner service
export { SpinnerService, createSpinnerService } from './spinner-service';
export type { SpinnerServiceConfig, SpinnerOptions, Spinner, SpinnerColor } from './spinner-service';
export { createSpinnerProgress } from './workflow-progress';

// Inquirer-based prompter
export { InquirerPrompter, createInquirerPrompter } from './inquirer-prompter';
export type { InquirerPrompterConfig } from './inquirer-prompter';
