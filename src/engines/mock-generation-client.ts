/**
 * Mock Generation Client
 * Scripted responses for tests and --mock runs
 */

import type { GenerationClient, GenerationResponse, PromptMessage } from './generation-client';

/**
 * Answers prompts whose text matches `match` (substring or RegExp)
 */
export interface MockGenerationRule {
  match: RegExp | string;
  response: string | ((messages: PromptMessage[]) => string);
}

export interface MockGenerationClientOptions {
  /** Tried in order; the first match answers */
  rules?: MockGenerationRule[];
  /** Used when no rule matches; without it an unmatched prompt throws */
  defaultResponse?: string;
  /** Errors thrown by the first calls, one per call, before any rule is used */
  failures?: unknown[];
}

export interface MockGenerationCall {
  messages: PromptMessage[];
  response?: GenerationResponse;
  error?: unknown;
}

export class MockGenerationClient implements GenerationClient {
  readonly name = 'mock';
  private readonly rules: MockGenerationRule[];
  private readonly defaultResponse?: string;
  private readonly pendingFailures: unknown[];

  /** History of all calls for test assertions */
  readonly history: MockGenerationCall[] = [];

  constructor(options: MockGenerationClientOptions = {}) {
    this.rules = [...(options.rules ?? [])];
    this.defaultResponse = options.defaultResponse;
    this.pendingFailures = [...(options.failures ?? [])];
  }

  /**
   * Add a rule ahead of the existing ones
   */
  respondTo(match: RegExp | string, response: MockGenerationRule['response']): this {
    this.rules.unshift({ match, response });
    return this;
  }

  /**
   * Make the next calls throw these errors, in order
   */
  failNext(...errors: unknown[]): this {
    this.pendingFailures.push(...errors);
    return this;
  }

  async generate(messages: PromptMessage[]): Promise<GenerationResponse> {
    const call: MockGenerationCall = { messages };
    this.history.push(call);

    if (this.pendingFailures.length > 0) {
      call.error = this.pendingFailures.shift();
      throw call.error;
    }

    const content = this.findResponse(messages);
    if (content === undefined) {
      call.error = new Error('No mock response matches the prompt');
      throw call.error;
    }

    call.response = { content, finishReason: 'stop', model: 'mock' };
    return call.response;
  }

  private findResponse(messages: PromptMessage[]): string | undefined {
    const text = messages.map((m) => m.content).join('\n');
    for (const rule of this.rules) {
      const matched = typeof rule.match === 'string' ? text.includes(rule.match) : rule.match.test(text);
      if (matched) {
        return typeof rule.response === 'function' ? rule.response(messages) : rule.response;
      }
    }
    return this.defaultResponse;
  }
}

/**
 * Canned payloads that form a consistent two-scene production
 */
export const DEMO_PAYLOADS = {
  planning: {
    scenes: [
      { id: 'scene_1', description: 'The hero arrives at the ruined city at dusk' },
      { id: 'scene_2', description: 'A duel erupts on the collapsing bridge' },
    ],
  },
  storyboard: {
    shots: [
      {
        scene_id: 'scene_1',
        shot_id: 'shot_1',
        duration: 4,
        subject: 'Hero',
        environment: 'ruined city gates',
        camera: { shot_type: 'wide', movement: 'slow push in', lens: '24mm', angle: 'eye-level' },
      },
      {
        scene_id: 'scene_2',
        shot_id: 'shot_2',
        duration: 3,
        subject: 'Hero and rival',
        environment: 'collapsing bridge',
        camera: { shot_type: 'medium', movement: 'handheld', lens: '50mm', angle: 'low' },
      },
    ],
  },
  motion: {
    motions: [
      { shot_id: 'shot_1', start_pose: 'standing still', action: 'walks forward', end_pose: 'hand on sword' },
      { shot_id: 'shot_2', start_pose: 'guard stance', action: 'parries and lunges', end_pose: 'kneeling' },
    ],
  },
  review: { review: 'accept', notes: 'Shots cover every scene.' },
} as const;

/**
 * Mock client answering the planning, storyboard, motion and review prompts
 * with DEMO_PAYLOADS
 */
export function createDemoGenerationClient(): MockGenerationClient {
  return new MockGenerationClient({
    rules: [
      { match: /professional animation director/, response: JSON.stringify(DEMO_PAYLOADS.planning) },
      { match: /storyboard artist/, response: JSON.stringify(DEMO_PAYLOADS.storyboard) },
      { match: /motion designer/, response: JSON.stringify(DEMO_PAYLOADS.motion) },
      { match: /strict reviewer/, response: JSON.stringify(DEMO_PAYLOADS.review) },
    ],
  });
}
