/**
 * Tests for the Router
 */

import { describe, it, expect } from 'vitest';
import { Router } from './router';
import { createDefaultScorers, createKeywordScorer } from './scorers';
import { RouteMisconfigurationError } from './errors';
import { BufferLogger } from '../logging/buffer-logger';
import type { Task } from '../types/routing';

function makeTask(prompt: string, id = 'task-1'): Task {
  return { id, kind: 'production', payload: { prompt } };
}

describe('Router', () => {
  describe('fixed transitions', () => {
    const router = new Router({ scorers: createDefaultScorers() });

    it('should send a new task to the planner', () => {
      const decision = router.route(null, makeTask('anything'), {});
      expect(decision.next).toEqual(['planner']);
      expect(decision.reason).toContain('new task entry');
    });

    it('should send planner output to the director', () => {
      const decision = router.route('planner', makeTask('anything'), {});
      expect(decision.next).toEqual(['director']);
      expect(decision.reason).toContain('planner output ready');
    });

    it.each(['animation', 'film', 'game'] as const)('sends %s output to the renderer', (worker) => {
      const decision = router.route(worker, makeTask('anything'));
      expect(decision.next).toEqual(['renderer']);
      expect(decision.reason).toContain('execution output requires rendering');
    });

    it('should keep terminal tasks at terminal', () => {
      const decision = router.route('terminal', makeTask('anything'));
      expect(decision.next).toEqual(['terminal']);
      expect(decision.reason).toBe('no matching rule');
    });
  });

  describe('review outcomes at the renderer', () => {
    const router = new Router();
    const task = makeTask('anything');

    it('should default to accept when no review result is given', () => {
      expect(router.route('renderer', task, {}).next).toEqual(['terminal']);
    });

    it('should map accept, revise and redesign', () => {
      expect(router.route('renderer', task, { reviewResult: 'accept' }).next).toEqual(['terminal']);
      expect(router.route('renderer', task, { reviewResult: 'revise' }).next).toEqual(['director']);
      expect(router.route('renderer', task, { reviewResult: 'redesign' }).next).toEqual(['planner']);
    });

    it('should terminate on an unknown review result', () => {
      const decision = router.route('renderer', task, { reviewResult: 'bogus' });
      expect(decision.next).toEqual(['terminal']);
      expect(decision.reason).toBe('unknown review result "bogus" → terminal');
    });
  });

  describe('director selection', () => {
    it('should fall back to the planner when the best score is below threshold', () => {
      const router = new Router({ confidenceThreshold: 0.65, scorers: createDefaultScorers() });

      const decision = router.route('director', makeTask('Create a cinematic sword fight animation'), {});

      expect(decision.next).toEqual(['planner']);
      expect(decision.reason).toBe(
        "confidence 0.13 below threshold 0.65. Fallback to 'planner'. Original reason: Animation-related intent detected"
      );
      expect(decision.candidates?.map((c) => [c.worker, c.confidence])).toEqual([
        ['animation', 0.125],
        ['film', 0.125],
        ['game', 0],
      ]);
      expect(decision.candidates?.[0].fallback).toBe(true);
    });

    it('should select the best worker when it clears the threshold', () => {
      const router = new Router({ confidenceThreshold: 0.25, scorers: createDefaultScorers() });

      const decision = router.route('director', makeTask('A cinematic film scene with camera moves'));

      // film: film, cinematic, camera, scene = 4/8
      expect(decision.next).toEqual(['film']);
      expect(decision.reason).toBe('director selected film | Cinematic / film language detected');
    });

    it('should break ties by registration order', () => {
      const router = new Router({ confidenceThreshold: 0.5 })
        .register('game', () => ({ confidence: 0.8, reason: 'game' }))
        .register('animation', () => ({ confidence: 0.8, reason: 'animation' }));

      expect(router.route('director', makeTask('x')).next).toEqual(['game']);
    });

    it('should keep the original position when a scorer is replaced', () => {
      const router = new Router({ confidenceThreshold: 0.5 })
        .register('film', () => ({ confidence: 0.7, reason: 'first film' }))
        .register('animation', () => ({ confidence: 0.7, reason: 'animation' }))
        .register('film', () => ({ confidence: 0.7, reason: 'second film' }));

      const decision = router.route('director', makeTask('x'));
      expect(decision.reason).toBe('director selected film | second film');
    });

    it('should treat a throwing scorer as zero confidence', () => {
      const logger = new BufferLogger();
      const router = new Router({ confidenceThreshold: 0.5, logger })
        .register('animation', () => {
          throw new Error('model offline');
        })
        .register('film', () => ({ confidence: 0.9, reason: 'film fits' }));

      const decision = router.route('director', makeTask('x'));

      expect(decision.next).toEqual(['film']);
      expect(decision.candidates?.[1]).toEqual({
        worker: 'animation',
        confidence: 0,
        reason: 'scoring error: model offline',
        fallback: false,
      });
      expect(logger.getEventsByType('scorer_failed')).toHaveLength(1);
    });

    it('should report a failing top scorer in the fallback reason', () => {
      const router = new Router({ confidenceThreshold: 0.5 }).register('game', () => {
        throw new Error('boom');
      });

      const decision = router.route('director', makeTask('x'));

      expect(decision.next).toEqual(['planner']);
      expect(decision.reason).toBe(
        "confidence 0.00 below threshold 0.50. Fallback to 'planner'. Original reason: scoring error: boom"
      );
    });

    it('should treat a non-finite confidence as a scoring failure', () => {
      const router = new Router({ confidenceThreshold: 0.5 }).register('game', () => ({
        confidence: Number.NaN,
        reason: 'broken',
      }));

      const [result] = router.score(makeTask('x'));
      expect(result.confidence).toBe(0);
      expect(result.reason).toBe('scoring error: non-finite confidence NaN');
    });

    it('should clamp confidences into [0, 1]', () => {
      const router = new Router()
        .register('animation', () => ({ confidence: 3, reason: 'too sure' }))
        .register('film', () => ({ confidence: -1, reason: 'negative' }));

      expect(router.score(makeTask('x')).map((r) => r.confidence)).toEqual([1, 0]);
    });

    it('should fall back when no workers are registered', () => {
      const router = new Router({ fallbackWorker: 'director' });

      const decision = router.route('director', makeTask('x'));

      expect(decision.next).toEqual(['director']);
      expect(decision.reason).toBe("no workers registered → fallback to 'director'");
    });

    it('should ignore scorers registered for control-only workers', () => {
      let plannerCalls = 0;
      const router = new Router().register('planner', () => {
        plannerCalls++;
        return { confidence: 1, reason: 'planner always fits' };
      });

      const decision = router.route('director', makeTask('x'));

      expect(plannerCalls).toBe(0);
      expect(decision.next).toEqual(['planner']);
      expect(decision.reason).toContain('no workers registered');
    });

    it('should call scorers in registration order with the task and side context', () => {
      const seen: string[] = [];
      const router = new Router()
        .register('film', (task, side) => {
          seen.push(`film:${task.id}:${String(side.note)}`);
          return { confidence: 0, reason: '' };
        })
        .register('animation', (task, side) => {
          seen.push(`animation:${task.id}:${String(side.note)}`);
          return { confidence: 0, reason: '' };
        });

      router.route('director', makeTask('x', 't-9'), { note: 'hi' });

      expect(seen).toEqual(['film:t-9:hi', 'animation:t-9:hi']);
    });

    it('should accept scorer objects as well as functions', () => {
      const router = new Router({ confidenceThreshold: 0.1 }).register(
        'game',
        createKeywordScorer({ keywords: ['quest'], reason: 'quest found' })
      );

      expect(router.route('director', makeTask('A QUEST for the crown')).next).toEqual(['game']);
    });
  });

  describe('configuration', () => {
    it('should use 0.6 and planner by default', () => {
      const router = new Router();
      expect(router.confidenceThreshold).toBe(0.6);
      expect(router.fallbackWorker).toBe('planner');
    });

    it('should reject a threshold outside [0, 1]', () => {
      expect(() => new Router({ confidenceThreshold: 1.5 })).toThrow(RouteMisconfigurationError);
    });

    it('should reject terminal as the fallback', () => {
      expect(() => new Router({ fallbackWorker: 'terminal' })).toThrow("Fallback worker cannot be 'terminal'");
    });

    it('should reject an execution fallback without a registered scorer', () => {
      expect(() => new Router({ fallbackWorker: 'film' })).toThrow(
        "Fallback worker 'film' has no registered scorer"
      );
    });

    it('should accept an execution fallback registered at construction', () => {
      const router = new Router({ fallbackWorker: 'film', scorers: createDefaultScorers() });
      expect(router.registeredWorkers()).toEqual(['animation', 'film', 'game']);
    });

    it('should log every decision', () => {
      const logger = new BufferLogger();
      const router = new Router({ logger });

      router.route(null, makeTask('x'));
      router.route('planner', makeTask('x'));

      expect(logger.getEventsByType('route_decided').map((e) => e.message)).toEqual([
        'entry → planner: new task entry → planner',
        'planner → director: planner output ready → director',
      ]);
    });
  });
});
