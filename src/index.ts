/**
 * reelwright library entry point
 * The CLI lives in ./cli.ts
 */

export * from './types/index';
export * from './core/index';
export * from './schemas/index';
export * from './templates/index';
export * from './engines/index';
export * from './stages/index';
export * from './review/index';
export * from './config/index';
export * from './logging/index';
export * from './orchestration/index';
export * from './ui/index';

export { produce, RUN_LOG_FILE, PRODUCTION_FILE, RUN_SUMMARY_JSON_FILE, RUN_SUMMARY_MD_FILE } from './commands/produce';
export type { ProduceOptions, ProduceResult } from './commands/produce';
export { previewRoute, formatRoutePreview } from './commands/route-preview';
export type { RoutePreview } from './commands/route-preview';
export { exitCodeForFailure, exitCodeForOutcome } from './commands/exit-status';
