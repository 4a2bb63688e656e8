/**
 * Spinner display for workflow progress
 */

import type { WorkerKind } from '../types/routing';
import type { WorkflowProgress } from '../orchestration/production-workflow';
import type { Spinner, SpinnerService } from './spinner-service';

const WORKER_LABELS: Record<WorkerKind, string> = {
  planner: 'Planning scenes',
  director: 'Choosing a discipline',
  animation: 'Storyboarding animation shots',
  film: 'Storyboarding film shots',
  game: 'Storyboarding game shots',
  renderer: 'Rendering shots',
  terminal: 'Finishing',
};

export function createSpinnerProgress(spinners: SpinnerService): WorkflowProgress {
  let spinner: Spinner | null = null;

  return {
    workerStarted(worker, hop) {
      spinner = spinners.start(`[hop ${hop}] ${WORKER_LABELS[worker]}...`, 'cyan');
    },
    workerFinished(worker, succeeded) {
      if (succeeded) {
        spinner?.succeed(WORKER_LABELS[worker]);
      } else {
        spinner?.fail(`${WORKER_LABELS[worker]} failed`);
      }
      spinner = null;
    },
  };
}
