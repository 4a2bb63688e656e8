/**
 * CLI Help Text
 *
 * Help and usage text for the CLI
 */

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: reelwright <brief...> [options]

Options:
  --threshold <0-1>                   Confidence the director needs to pick a worker (default: 0.6)
  --fallback <worker>                 Worker used when no scorer clears the threshold (default: planner)
  --max-hops <number>                 Routing hops allowed before the run stops (default: 20)
  --max-retries <number>              Retries per generation or render call (default: 3)
  --no-retry                          Disable retries
  --provider <provider>               Generation provider (anthropic|google|openai|mock)
  --model <model>                     Generation model
  --render-provider <provider>        Render provider (sora|runway|pika|mock)
  --mock                              Use mock generation and rendering (no API costs)
  --review <outcome>                  Fixed review outcome (accept|revise|redesign)
  --review-mode <mode>                Who reviews renders (static|interactive|model)
  --route-only                        Print the routing decisions for the brief and exit
  --output-dir <dir>                  Base directory for run artifacts (default: .reelwright)
  --no-interactive                    Disable interactive prompts; use defaults
  --verbose                           Enable verbose output with more progress details
  --debug                             Enable debug mode with full diagnostics
  --json                              Output machine-readable JSON summary
  -h, --help                          Show this help message
  -v, --version                       Show version number

Environment:
  ANTHROPIC_API_KEY                   Key for the anthropic provider
  GOOGLE_GENERATIVE_AI_API_KEY        Key for the google provider
  OPENAI_API_KEY                      Key for the openai provider
  RENDER_API_KEY                      Key for the sora, runway and pika render providers

Examples:
  reelwright "A fox animates a paper lantern festival"
  reelwright "A duel at dusk" --mock --review accept
  reelwright "A cinematic chase across rooftops" --route-only
  reelwright "A heist in the rain" --provider google --model gemini-2.5-flash
  reelwright "Two robots dance" --threshold 0.3 --max-hops 12`;
}

/** Print usage to stderr */
export function printUsage(): void {
  console.error(getUsageText());
}
