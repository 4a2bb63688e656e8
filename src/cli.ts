/**
 * reelwright CLI entry point
 */

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { parseArgs, toCliFlags, getUsageText, printUsage } from './cli/index';
import { produce } from './commands/produce';
import { formatRoutePreview } from './commands/route-preview';
import { formatEffectiveConfigForDisplay } from './config/write-effective-config';
import { describeError } from './core/errors';
import { formatDuration, type RunSummary } from './logging/run-summary';
import { createSpinnerService } from './ui/spinner-service';
import { createSpinnerProgress } from './ui/workflow-progress';
import { ExitCode } from './types/exit-codes';

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

function formatSummaryForTerminal(summary: RunSummary, runDirectory: string | undefined): string {
  const lines = [''];
  switch (summary.outcome) {
    case 'completed':
      lines.push(`✅ Production completed in ${formatDuration(summary.durationMs)}`);
      break;
    case 'hop_limit':
      lines.push(`⚠️  Routing stopped after ${summary.routing.length} hops without finishing`);
      break;
    case 'failed':
      lines.push(`❌ Production failed: ${summary.error ?? 'unknown error'}`);
      break;
  }
  lines.push(`   Scenes: ${summary.sceneCount}  Shots: ${summary.shotCount}  Rendered: ${summary.renderedShots.length}`);
  if (summary.retries > 0) {
    lines.push(`   Retries: ${summary.retries}`);
  }
  for (const shot of summary.renderedShots) {
    lines.push(`   ${shot.sceneId}/${shot.shotId} → ${shot.output}`);
  }
  if (runDirectory) {
    lines.push(`   Artifacts: ${runDirectory}`);
  }
  return lines.join('\n');
}

async function main(): Promise<ExitCode> {
  const parsed = parseArgs(process.argv);
  if (!parsed.success) {
    console.error(parsed.error);
    console.error('');
    printUsage();
    return ExitCode.USAGE_ERROR;
  }

  const args = parsed.args;
  if (args.help) {
    console.log(getUsageText());
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    console.log(readVersion());
    return ExitCode.SUCCESS;
  }
  if (!args.brief.trim()) {
    console.error('Error: No brief provided');
    console.error('');
    printUsage();
    return ExitCode.USAGE_ERROR;
  }

  const spinners = createSpinnerService({ quiet: args.jsonOutput });
  try {
    const result = await produce(toCliFlags(args), {
      onConfigResolved: (config) => {
        if (config.verbosity.verbose && !config.verbosity.jsonOutput) {
          console.log(formatEffectiveConfigForDisplay(config));
        }
      },
      dependencies: { progress: createSpinnerProgress(spinners) },
    });

    if (result.preview) {
      console.log(args.jsonOutput ? JSON.stringify(result.preview, null, 2) : formatRoutePreview(result.preview));
    } else if (result.summary) {
      console.log(
        args.jsonOutput
          ? JSON.stringify(result.summary, null, 2)
          : formatSummaryForTerminal(result.summary, result.runDirectory)
      );
    } else if (args.jsonOutput && result.error) {
      console.log(JSON.stringify({ success: false, exitCode: result.exitCode, error: result.error }, null, 2));
    }
    return result.exitCode;
  } finally {
    spinners.stopAll();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Error:', describeError(error));
    process.exitCode = ExitCode.UNEXPECTED_ERROR;
  }
);
