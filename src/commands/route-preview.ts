/**
 * Route preview (--route-only)
 *
 * Walks the router from entry for a brief without generating anything,
 * assuming every render is accepted.
 */

import type { EffectiveConfig } from '../types/effective-config';
import type { Logger } from '../types/logger';
import type { RouteResult, Task, WorkerKind } from '../types/routing';
import { createRouter } from '../orchestration/production-factory';
import type { RoutingStep } from '../orchestration/production-workflow';

export interface RoutePreview {
  brief: string;
  steps: RoutingStep[];
  /** Director scores from the first director decision */
  candidates: RouteResult[];
  /** Whether the walk reached terminal within the hop limit */
  reachedTerminal: boolean;
}

export function previewRoute(config: EffectiveConfig, logger?: Logger): RoutePreview {
  const router = createRouter(config, logger);
  const task: Task = { id: config.runId, kind: 'production', payload: { prompt: config.brief } };
  const steps: RoutingStep[] = [];
  let candidates: RouteResult[] = [];
  let current: WorkerKind | null = null;

  while (steps.length < config.routing.maxHops) {
    const decision = router.route(current, task, { reviewResult: 'accept' });
    const [next] = decision.next;
    steps.push({ hop: steps.length + 1, from: current, to: next, reason: decision.reason });
    if (decision.candidates && candidates.length === 0) {
      candidates = decision.candidates;
    }
    if (next === 'terminal') {
      return { brief: config.brief, steps, candidates, reachedTerminal: true };
    }
    current = next;
  }

  return { brief: config.brief, steps, candidates, reachedTerminal: false };
}

export function formatRoutePreview(preview: RoutePreview): string {
  const lines: string[] = [`Route for: ${preview.brief}`, ''];

  if (preview.candidates.length > 0) {
    lines.push('Director scores:');
    for (const candidate of preview.candidates) {
      const marker = candidate.fallback ? ' (below threshold)' : '';
      lines.push(`  ${candidate.worker.padEnd(10)} ${candidate.confidence.toFixed(2)}  ${candidate.reason}${marker}`);
    }
    lines.push('');
  }

  for (const step of preview.steps) {
    lines.push(`${String(step.hop).padStart(2)}. ${step.from ?? 'entry'} → ${step.to}: ${step.reason}`);
  }

  if (!preview.reachedTerminal) {
    lines.push('', `Stopped after ${preview.steps.length} hops without reaching terminal`);
  }
  return lines.join('\n');
}
