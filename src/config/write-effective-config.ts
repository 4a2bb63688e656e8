/**
 * Write Effective Config Artifact
 * Records the resolved configuration beside a run's other artifacts
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { redactConfigForLogging, type EffectiveConfig } from '../types/effective-config';

export const EFFECTIVE_CONFIG_FILE = 'effective-config.json';

export function writeEffectiveConfigArtifact(config: EffectiveConfig, runDirectory: string): string {
  const artifact = {
    schemaVersion: '1.0.0',
    artifactType: 'effective-config',
    runId: config.runId,
    config: redactConfigForLogging(config),
  };

  mkdirSync(runDirectory, { recursive: true });
  const artifactPath = join(runDirectory, EFFECTIVE_CONFIG_FILE);
  writeFileSync(artifactPath, JSON.stringify(artifact, null, 2), 'utf-8');
  return artifactPath;
}

/**
 * Boxed summary printed with --verbose
 */
export function formatEffectiveConfigForDisplay(config: EffectiveConfig): string {
  const { routing, retry, generation, render, review, style } = config;
  const lines: string[] = [];

  lines.push('═══════════════════════════════════════════════════════════════');
  lines.push('                    EFFECTIVE CONFIGURATION');
  lines.push('═══════════════════════════════════════════════════════════════');
  lines.push('');
  lines.push(`Run ID:              ${config.runId}`);
  lines.push(`Working Directory:   ${config.paths.workingDirectory}`);
  lines.push(`Artifacts:           ${config.paths.artifactBaseDir}`);
  lines.push('');

  lines.push('┌─ Routing ───────────────────────────────────────────────────┐');
  lines.push(`│ Confidence Threshold: ${routing.confidenceThreshold}`);
  lines.push(`│ Fallback Worker:      ${routing.fallbackWorker}`);
  lines.push(`│ Max Hops:             ${routing.maxHops}`);
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  lines.push('┌─ External Calls ────────────────────────────────────────────┐');
  lines.push(`│ Generation: ${generation.provider} (model: ${generation.model})`);
  lines.push(`│ Render:     ${render.provider}`);
  lines.push(
    retry.enabled
      ? `│ Retries:    ${retry.maxRetries} (backoff ${retry.initialDelayMs}ms × ${retry.exponentialBase}, max ${retry.maxDelayMs}ms${retry.transientOnly ? ', transient errors only' : ''})`
      : '│ Retries:    disabled'
  );
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  lines.push('┌─ Production ────────────────────────────────────────────────┐');
  lines.push(`│ Style:      ${style.visualStyle}, ${style.fps} fps, ${style.resolution}`);
  lines.push(`│ Characters: ${config.characters.map((c) => c.name).join(', ') || 'none'}`);
  lines.push(`│ Review:     ${review.mode} (default ${review.defaultOutcome}, ${review.maxRevisions} revision(s))`);
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');
  lines.push('═══════════════════════════════════════════════════════════════');

  return lines.join('\n');
}
