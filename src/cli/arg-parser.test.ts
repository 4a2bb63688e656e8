/**
 * Tests for CLI Argument Parser
 */

import { describe, it, expect } from 'vitest';
import { parseArgs, toCliFlags } from './arg-parser';
import { DEFAULT_ARGS, type ParsedArgs } from './types';

function parsed(...argv: string[]): ParsedArgs {
  const result = parseArgs(['node', 'reelwright', ...argv]);
  if (!result.success) {
    throw new Error(`expected success, got: ${result.error}`);
  }
  return result.args;
}

function parseError(...argv: string[]): string {
  const result = parseArgs(['node', 'reelwright', ...argv]);
  if (result.success) {
    throw new Error('expected a parse error');
  }
  return result.error;
}

describe('parseArgs', () => {
  describe('basic functionality', () => {
    it('should parse a simple brief', () => {
      expect(parsed('A duel at dusk').brief).toBe('A duel at dusk');
    });

    it('should join multi-word briefs', () => {
      expect(parsed('A', 'duel', 'at', 'dusk').brief).toBe('A duel at dusk');
    });

    it('should return the defaults with no arguments', () => {
      expect(parsed()).toEqual(DEFAULT_ARGS);
    });

    it('should set help flag with --help and -h', () => {
      expect(parsed('--help').help).toBe(true);
      expect(parsed('-h').help).toBe(true);
    });

    it('should set version flag with --version and -v', () => {
      expect(parsed('--version').version).toBe(true);
      expect(parsed('-v').version).toBe(true);
    });
  });

  describe('routing options', () => {
    it('should parse --threshold with space and equals', () => {
      expect(parsed('brief', '--threshold', '0.35').threshold).toBe(0.35);
      expect(parsed('brief', '--threshold=0.35').threshold).toBe(0.35);
    });

    it('should reject a threshold outside 0-1', () => {
      expect(parseError('brief', '--threshold', '1.5')).toBe('Error: --threshold must be a number between 0 and 1');
      expect(parseError('brief', '--threshold=abc')).toBe('Error: --threshold must be a number between 0 and 1');
    });

    it('should parse --fallback as a worker kind', () => {
      expect(parsed('brief', '--fallback', 'film').fallback).toBe('film');
    });

    it('should reject an unknown fallback worker', () => {
      expect(parseError('brief', '--fallback', 'editor')).toBe(
        'Error: --fallback must be one of: planner, director, animation, film, game, renderer, terminal'
      );
    });

    it('should parse --max-hops', () => {
      expect(parsed('brief', '--max-hops', '8').maxHops).toBe(8);
    });

    it('should reject a zero hop limit', () => {
      expect(parseError('brief', '--max-hops', '0')).toBe('Error: --max-hops must be a positive integer');
    });
  });

  describe('retry options', () => {
    it('should accept zero retries', () => {
      expect(parsed('brief', '--max-retries', '0').maxRetries).toBe(0);
    });

    it('should reject fractional retries', () => {
      expect(parseError('brief', '--max-retries', '1.5')).toBe('Error: --max-retries must be a non-negative integer');
    });

    it('should set --no-retry', () => {
      expect(parsed('brief', '--no-retry').noRetry).toBe(true);
    });
  });

  describe('provider options', () => {
    it('should parse generation and render providers', () => {
      const args = parsed('brief', '--provider', 'google', '--model=gemini-2.5-flash', '--render-provider', 'runway');
      expect(args.provider).toBe('google');
      expect(args.model).toBe('gemini-2.5-flash');
      expect(args.renderProvider).toBe('runway');
    });

    it('should accept the openai provider', () => {
      expect(parsed('brief', '--provider=openai').provider).toBe('openai');
    });

    it('should reject an unknown provider', () => {
      expect(parseError('brief', '--provider', 'mistral')).toBe(
        'Error: --provider must be one of: anthropic, google, openai, mock'
      );
    });

    it('should set --mock', () => {
      expect(parsed('brief', '--mock').mockMode).toBe(true);
    });
  });

  describe('review options', () => {
    it('should parse --review and --review-mode', () => {
      const args = parsed('brief', '--review', 'revise', '--review-mode', 'model');
      expect(args.review).toBe('revise');
      expect(args.reviewMode).toBe('model');
    });

    it('should reject an unknown review outcome', () => {
      expect(parseError('brief', '--review', 'maybe')).toBe(
        'Error: --review must be one of: accept, revise, redesign'
      );
    });
  });

  describe('value handling', () => {
    it('should require a value', () => {
      expect(parseError('brief', '--model')).toBe('Error: --model requires a value');
    });

    it('should not take the next flag as a value', () => {
      expect(parseError('brief', '--output-dir', '--json')).toBe('Error: --output-dir requires a value');
    });

    it('should reject an empty equals value', () => {
      expect(parseError('brief', '--model=')).toBe('Error: --model= requires a value');
    });

    it('should keep everything after the first equals sign', () => {
      expect(parsed('brief', '--output-dir=out/a=b').outputDir).toBe('out/a=b');
    });

    it('should keep brief words around options', () => {
      const args = parsed('A', '--max-hops', '4', 'duel', '--mock', 'at', 'dusk');
      expect(args.brief).toBe('A duel at dusk');
      expect(args.maxHops).toBe(4);
    });
  });

  describe('unknown options', () => {
    it('should reject unknown flags', () => {
      expect(parseError('brief', '--frobnicate')).toBe('Error: Unknown option: --frobnicate');
    });

    it('should reject unknown flags given with a value', () => {
      expect(parseError('brief', '--frobnicate=1')).toBe('Error: Unknown option: --frobnicate');
    });
  });

  describe('output flags', () => {
    it('should set the output flags', () => {
      const args = parsed('brief', '--route-only', '--no-interactive', '--verbose', '--debug', '--json');
      expect(args.routeOnly).toBe(true);
      expect(args.noInteractive).toBe(true);
      expect(args.verbose).toBe(true);
      expect(args.debug).toBe(true);
      expect(args.jsonOutput).toBe(true);
    });
  });
});

describe('toCliFlags', () => {
  it('should leave unset options undefined', () => {
    expect(toCliFlags(DEFAULT_ARGS)).toEqual({});
  });

  it('should carry set options across', () => {
    const flags = toCliFlags(parsed('A duel', '--threshold', '0.4', '--mock', '--review', 'accept'));
    expect(flags).toEqual({ brief: 'A duel', confidenceThreshold: 0.4, mock: true, review: 'accept' });
  });
});
