import { describe, it, expect } from 'vitest';
import { StaticReviewer, ScriptedReviewer } from './reviewer';
import { PrompterReviewer } from './prompter-reviewer';
import { ModelReviewer } from './model-reviewer';
import { StageExecutionError } from '../core/errors';
import { MockGenerationClient } from '../engines/mock-generation-client';
import { BufferLogger } from '../logging/buffer-logger';
import { err, ok, type Result } from '../types/result';
import { createPrompterError, type Prompter, type PrompterError, type SelectOptions } from '../types/prompter';
import { makeContext, makeScene, makeShot, makeStageDeps } from '../../tests/utils/production-builders';

function contextWithShots() {
  const context = makeContext();
  context.timeline.scenes.push(
    makeScene('scene_1', [makeShot('shot_1', { renderOutput: 'mock://render/shot_1.mp4' }), makeShot('shot_2')])
  );
  return context;
}

class FakePrompter implements Prompter {
  readonly asked: string[] = [];

  constructor(
    private readonly answer: Result<string, PrompterError>,
    private readonly interactive = true
  ) {}

  isInteractive(): boolean {
    return this.interactive;
  }

  async select<T>(options: SelectOptions<T>): Promise<Result<T, PrompterError>> {
    this.asked.push(options.message);
    const answer = this.answer;
    if (!answer.ok) {
      return answer;
    }
    const choice = options.choices.find((c) => c.value === answer.value);
    return choice ? ok(choice.value) : err(createPrompterError('IO_ERROR', 'no such choice'));
  }
}

describe('StaticReviewer', () => {
  it('should always answer with its outcome', async () => {
    const reviewer = new StaticReviewer('revise');

    expect(await reviewer.review()).toEqual(ok({ outcome: 'revise', source: 'static' }));
    expect(await reviewer.review()).toEqual(ok({ outcome: 'revise', source: 'static' }));
  });
});

describe('ScriptedReviewer', () => {
  it('should play its outcomes in order and then repeat the last', async () => {
    const reviewer = new ScriptedReviewer(['redesign', 'accept']);
    const outcomes: string[] = [];
    for (let i = 0; i < 3; i++) {
      const verdict = await reviewer.review();
      if (verdict.ok) outcomes.push(verdict.value.outcome);
    }

    expect(outcomes).toEqual(['redesign', 'accept', 'accept']);
  });
});

describe('PrompterReviewer', () => {
  it('should return the chosen outcome from the user', async () => {
    const prompter = new FakePrompter(ok('revise'));
    const reviewer = new PrompterReviewer(prompter, 'accept');

    const verdict = await reviewer.review(contextWithShots(), 2);

    expect(verdict).toEqual(ok({ outcome: 'revise', source: 'user' }));
    expect(prompter.asked).toEqual(['Review round 2: 2 shot(s) rendered. What next?']);
  });

  it('should use the default without asking when not interactive', async () => {
    const prompter = new FakePrompter(ok('redesign'), false);
    const reviewer = new PrompterReviewer(prompter, 'accept');

    const verdict = await reviewer.review(contextWithShots(), 1);

    expect(verdict).toEqual(ok({ outcome: 'accept', source: 'default' }));
    expect(prompter.asked).toEqual([]);
  });

  it('should fall back to the default when the prompt is cancelled', async () => {
    const logger = new BufferLogger();
    const reviewer = new PrompterReviewer(new FakePrompter(err(createPrompterError('CANCELLED'))), 'revise', logger);

    const verdict = await reviewer.review(contextWithShots(), 1);

    expect(verdict).toEqual(ok({ outcome: 'revise', source: 'default', notes: 'User cancelled the prompt' }));
    expect(logger.getEventsMatching(/Review prompt ended \(CANCELLED\)/)).toHaveLength(1);
  });
});

describe('ModelReviewer', () => {
  it('should read the verdict and notes from the model answer', async () => {
    const client = new MockGenerationClient({
      defaultResponse: '```json\n{"review": "redesign", "notes": "The second scene is missing."}\n```',
    });
    const { retryPolicy } = makeStageDeps(client);
    const reviewer = new ModelReviewer({ client, retryPolicy }, 'accept');

    const verdict = await reviewer.review(contextWithShots());

    expect(verdict).toEqual(ok({ outcome: 'redesign', source: 'model', notes: 'The second scene is missing.' }));
  });

  it('should list each shot with its render output in the prompt', async () => {
    const client = new MockGenerationClient({ defaultResponse: '{"review": "accept"}' });
    const { retryPolicy } = makeStageDeps(client);
    const reviewer = new ModelReviewer({ client, retryPolicy }, 'accept');

    const [system, user] = reviewer.buildMessages(contextWithShots());

    expect(system.role).toBe('system');
    expect(user.content).toContain('Output: mock://render/shot_1.mp4');
    expect(user.content).toContain('Output: not rendered');
    expect(user.content).toContain('A duel at dusk');
  });

  it('should fall back to the default outcome when the answer is not a verdict', async () => {
    const client = new MockGenerationClient({ defaultResponse: 'Looks great to me!' });
    const { retryPolicy, logger } = makeStageDeps(client);
    const reviewer = new ModelReviewer({ client, retryPolicy, logger }, 'revise');

    const verdict = await reviewer.review(contextWithShots());

    expect(verdict).toEqual(ok({ outcome: 'revise', source: 'default' }));
    expect(logger.getEventsMatching(/Review answer could not be parsed/)).toHaveLength(1);
  });

  it('should fail when generation keeps failing', async () => {
    const client = new MockGenerationClient().failNext(new Error('down'), new Error('down'), new Error('down'));
    const { retryPolicy } = makeStageDeps(client, 2);
    const reviewer = new ModelReviewer({ client, retryPolicy }, 'accept');

    const verdict = await reviewer.review(contextWithShots());

    expect(verdict.ok).toBe(false);
    if (!verdict.ok) {
      expect(verdict.error).toBeInstanceOf(StageExecutionError);
      expect(verdict.error.stage).toBe('review');
    }
    expect(client.history).toHaveLength(3);
  });
});
