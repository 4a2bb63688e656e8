/**
 * Orchestration module - wires together core, stages, engines, review and logging
 * This module provides the high-level entry points for running a production
 */

export { ProductionWorkflow } from './production-workflow';
export type {
  RoutingStep,
  ReviewRecord,
  WorkflowOutcome,
  WorkflowReport,
  WorkflowFailure,
  WorkerPipelines,
  WorkflowProgress,
  ProductionWorkflowOptions,
} from './production-workflow';

export {
  createProduction,
  createRouter,
  createGenerationClient,
  createRenderClient,
  createReviewer,
} from './production-factory';
export type { Production, ProductionDependencies } from './production-factory';
