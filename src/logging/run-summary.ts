/**
 * Run Summary Generator
 * Structured summary artifacts for finished runs
 */

import type { EffectiveConfig } from '../types/effective-config';
import type { Clock } from '../types/clock';
import { getDefaultClock } from '../types/clock';
import type { StageRun } from '../core/pipeline';
import { listShots } from '../core/production-context';
import type { ProductionContext } from '../types/production';
import type { Result } from '../types/result';
import type {
  ReviewRecord,
  RoutingStep,
  WorkflowFailure,
  WorkflowReport,
} from '../orchestration/production-workflow';

export type RunOutcome = 'completed' | 'hop_limit' | 'failed';

export interface RenderedShotRecord {
  sceneId: string;
  shotId: string;
  output: string;
}

export interface RunSummary {
  schemaVersion: '1.0.0';
  runId: string;
  brief: string;
  outcome: RunOutcome;
  success: boolean;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  routing: RoutingStep[];
  stageRuns: StageRun[];
  reviews: ReviewRecord[];
  retries: number;
  sceneCount: number;
  shotCount: number;
  renderedShots: RenderedShotRecord[];
  /** Failure message when outcome is 'failed' */
  error?: string;
  config: {
    routing: EffectiveConfig['routing'];
    generation: { provider: string; model: string };
    render: { provider: string };
    reviewMode: EffectiveConfig['review']['mode'];
  };
}

/**
 * Collects the parts of a summary that accumulate during a run
 */
export class RunSummaryBuilder {
  private readonly startedAt: string;
  private readonly startMs: number;
  private retries = 0;

  constructor(
    private readonly config: EffectiveConfig,
    private readonly clock: Clock = getDefaultClock()
  ) {
    this.startedAt = clock.iso();
    this.startMs = clock.timestamp();
  }

  recordRetries(count: number): void {
    this.retries += count;
  }

  build(result: Result<WorkflowReport, WorkflowFailure>): RunSummary {
    const trace = result.ok ? result.value : result.error;
    const outcome: RunOutcome = result.ok ? result.value.outcome : 'failed';
    const context: ProductionContext = trace.context;
    const shots = listShots(context);

    return {
      schemaVersion: '1.0.0',
      runId: this.config.runId,
      brief: this.config.brief,
      outcome,
      success: outcome === 'completed',
      startedAt: this.startedAt,
      endedAt: this.clock.iso(),
      durationMs: this.clock.timestamp() - this.startMs,
      routing: trace.steps,
      stageRuns: trace.stageRuns,
      reviews: trace.reviews,
      retries: this.retries,
      sceneCount: context.timeline.scenes.length,
      shotCount: shots.length,
      renderedShots: shots.flatMap(({ sceneId, shot }) =>
        shot.renderOutput === undefined ? [] : [{ sceneId, shotId: shot.id, output: shot.renderOutput }]
      ),
      error: result.ok ? undefined : result.error.failure.message,
      config: {
        routing: this.config.routing,
        generation: { provider: this.config.generation.provider, model: this.config.generation.model },
        render: { provider: this.config.render.provider },
        reviewMode: this.config.review.mode,
      },
    };
  }
}

const OUTCOME_LABELS: Record<RunOutcome, string> = {
  completed: '✅ Completed',
  hop_limit: '⚠️ Stopped at hop limit',
  failed: '❌ Failed',
};

export function formatRunSummaryMarkdown(summary: RunSummary): string {
  const lines: string[] = [
    '# Run Summary',
    '',
    `**Run ID:** ${summary.runId}`,
    `**Status:** ${OUTCOME_LABELS[summary.outcome]}`,
    `**Duration:** ${formatDuration(summary.durationMs)}`,
    `**Brief:** ${summary.brief || '(none)'}`,
    '',
    '## Routing',
    '',
    '| Hop | From | To | Reason |',
    '|-----|------|----|--------|',
  ];

  for (const step of summary.routing) {
    lines.push(`| ${step.hop} | ${step.from ?? 'entry'} | ${step.to} | ${step.reason.replace(/\|/g, '\\|')} |`);
  }

  if (summary.stageRuns.length > 0) {
    lines.push('', '## Stages', '', '| Stage | Status | Duration |', '|-------|--------|----------|');
    for (const run of summary.stageRuns) {
      lines.push(`| ${run.stage} | ${run.status} | ${formatDuration(run.durationMs)} |`);
    }
  }

  if (summary.reviews.length > 0) {
    lines.push('', '## Reviews', '');
    for (const review of summary.reviews) {
      const notes = review.notes ? `: ${review.notes}` : '';
      lines.push(`- Round ${review.round}: ${review.outcome} (${review.forced ? 'revision limit' : review.source})${notes}`);
    }
  }

  lines.push('', '## Output', '');
  lines.push(`- Scenes: ${summary.sceneCount}`);
  lines.push(`- Shots: ${summary.shotCount}`);
  lines.push(`- Rendered: ${summary.renderedShots.length}`);
  lines.push(`- Retries: ${summary.retries}`);
  for (const shot of summary.renderedShots) {
    lines.push(`  - ${shot.sceneId}/${shot.shotId}: ${shot.output}`);
  }

  lines.push('', '## Configuration', '');
  lines.push(`- Confidence Threshold: ${summary.config.routing.confidenceThreshold}`);
  lines.push(`- Fallback Worker: ${summary.config.routing.fallbackWorker}`);
  lines.push(`- Max Hops: ${summary.config.routing.maxHops}`);
  lines.push(`- Generation: ${summary.config.generation.provider} (${summary.config.generation.model})`);
  lines.push(`- Render: ${summary.config.render.provider}`);
  lines.push(`- Review: ${summary.config.reviewMode}`);

  if (summary.error) {
    lines.push('', '## Error', '', '```', summary.error, '```');
  }

  lines.push('');
  return lines.join('\n');
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  return `${hours}h ${minutes % 60}m`;
}
