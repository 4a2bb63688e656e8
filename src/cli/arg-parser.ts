/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import type { ParsedArgs, ParseResult } from './types';
import { DEFAULT_ARGS } from './types';
import type { CliFlags } from '../config/resolve-config';
import { GENERATION_PROVIDERS, RENDER_PROVIDERS, REVIEW_MODES } from '../types/effective-config';
import { REVIEW_OUTCOMES, WORKER_KINDS } from '../types/routing';

type Parsed<T> = { value: T; error?: undefined } | { value?: undefined; error: string };

/**
 * Parse a positive integer from a string
 */
function parsePositiveInt(value: string, name: string): Parsed<number> {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return { error: `${name} must be a positive integer` };
  }
  return { value: parsed };
}

function parseNonNegativeInt(value: string, name: string): Parsed<number> {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    return { error: `${name} must be a non-negative integer` };
  }
  return { value: parsed };
}

/**
 * Parse a fraction (0-1) from a string
 */
function parseFraction(value: string, name: string): Parsed<number> {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed) || parsed < 0 || parsed > 1) {
    return { error: `${name} must be a number between 0 and 1` };
  }
  return { value: parsed };
}

/**
 * Parse one of a fixed set of names
 */
function parseChoice<T extends string>(value: string, name: string, choices: readonly T[]): Parsed<T> {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    return { error: `${name} must be one of: ${choices.join(', ')}` };
  }
  return { value: match };
}

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(args: string[], index: number, argName: string): Parsed<string> & { skip: number } {
  const arg = args[index];

  // Check for --arg=value format
  const equals = arg.indexOf('=');
  if (equals !== -1) {
    const value = arg.slice(equals + 1);
    if (!value) {
      return { error: `${argName}= requires a value`, skip: 0 };
    }
    return { value, skip: 0 };
  }

  // Check for --arg value format
  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith('--')) {
    return { error: `${argName} requires a value`, skip: 0 };
  }
  return { value: nextArg, skip: 1 };
}

/**
 * Read an option's value and convert it
 * @returns the converted value and how many extra arguments it consumed
 */
function readOption<T>(
  args: string[],
  index: number,
  argName: string,
  convert: (value: string, name: string) => Parsed<T>
): Parsed<T> & { skip: number } {
  const raw = getArgValue(args, index, argName);
  if (raw.error !== undefined) {
    return { error: raw.error, skip: 0 };
  }
  const converted = convert(raw.value, argName);
  if (converted.error !== undefined) {
    return { error: converted.error, skip: 0 };
  }
  return { value: converted.value, skip: raw.skip };
}

const asString = (value: string): Parsed<string> => ({ value });

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const argBase = arg.split('=')[0]; // Get the base argument name

    // Options that take a value set `option`; flags are handled inline
    let option: (Parsed<unknown> & { skip: number }) | undefined;

    switch (argBase) {
      case '--help':
      case '-h':
        result.help = true;
        break;

      case '--version':
      case '-v':
        result.version = true;
        break;

      case '--threshold': {
        const parsed = readOption(args, i, argBase, parseFraction);
        if (parsed.value !== undefined) result.threshold = parsed.value;
        option = parsed;
        break;
      }

      case '--fallback': {
        const parsed = readOption(args, i, argBase, (v, n) => parseChoice(v, n, WORKER_KINDS));
        if (parsed.value !== undefined) result.fallback = parsed.value;
        option = parsed;
        break;
      }

      case '--max-hops': {
        const parsed = readOption(args, i, argBase, parsePositiveInt);
        if (parsed.value !== undefined) result.maxHops = parsed.value;
        option = parsed;
        break;
      }

      case '--max-retries': {
        const parsed = readOption(args, i, argBase, parseNonNegativeInt);
        if (parsed.value !== undefined) result.maxRetries = parsed.value;
        option = parsed;
        break;
      }

      case '--provider': {
        const parsed = readOption(args, i, argBase, (v, n) => parseChoice(v, n, GENERATION_PROVIDERS));
        if (parsed.value !== undefined) result.provider = parsed.value;
        option = parsed;
        break;
      }

      case '--model': {
        const parsed = readOption(args, i, argBase, asString);
        if (parsed.value !== undefined) result.model = parsed.value;
        option = parsed;
        break;
      }

      case '--render-provider': {
        const parsed = readOption(args, i, argBase, (v, n) => parseChoice(v, n, RENDER_PROVIDERS));
        if (parsed.value !== undefined) result.renderProvider = parsed.value;
        option = parsed;
        break;
      }

      case '--review': {
        const parsed = readOption(args, i, argBase, (v, n) => parseChoice(v, n, REVIEW_OUTCOMES));
        if (parsed.value !== undefined) result.review = parsed.value;
        option = parsed;
        break;
      }

      case '--review-mode': {
        const parsed = readOption(args, i, argBase, (v, n) => parseChoice(v, n, REVIEW_MODES));
        if (parsed.value !== undefined) result.reviewMode = parsed.value;
        option = parsed;
        break;
      }

      case '--output-dir': {
        const parsed = readOption(args, i, argBase, asString);
        if (parsed.value !== undefined) result.outputDir = parsed.value;
        option = parsed;
        break;
      }

      case '--no-retry':
        result.noRetry = true;
        break;

      case '--mock':
        result.mockMode = true;
        break;

      case '--route-only':
        result.routeOnly = true;
        break;

      case '--no-interactive':
        result.noInteractive = true;
        break;

      case '--verbose':
        result.verbose = true;
        break;

      case '--debug':
        result.debug = true;
        break;

      case '--json':
        result.jsonOutput = true;
        break;

      default: {
        // Check for unknown flags
        if (arg.startsWith('-') && arg !== '-') {
          return { success: false, error: `Error: Unknown option: ${argBase}` };
        }
        // It's part of the brief
        result.brief = result.brief ? `${result.brief} ${arg}` : arg;
      }
    }

    if (option) {
      if (option.error !== undefined) {
        return { success: false, error: `Error: ${option.error}` };
      }
      i += option.skip;
    }
  }

  return { success: true, args: result };
}

/**
 * The flags resolveConfig takes from parsed arguments
 */
export function toCliFlags(args: ParsedArgs): CliFlags {
  return {
    brief: args.brief || undefined,
    confidenceThreshold: args.threshold ?? undefined,
    fallbackWorker: args.fallback ?? undefined,
    maxHops: args.maxHops ?? undefined,
    maxRetries: args.maxRetries ?? undefined,
    noRetry: args.noRetry || undefined,
    provider: args.provider ?? undefined,
    model: args.model ?? undefined,
    renderProvider: args.renderProvider ?? undefined,
    mock: args.mockMode || undefined,
    review: args.review ?? undefined,
    reviewMode: args.reviewMode ?? undefined,
    routeOnly: args.routeOnly || undefined,
    outputDir: args.outputDir ?? undefined,
    noInteractive: args.noInteractive || undefined,
    verbose: args.verbose || undefined,
    debug: args.debug || undefined,
    jsonOutput: args.jsonOutput || undefined,
  };
}
