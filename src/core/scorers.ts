/**
 * Keyword scorers for the execution workers
 */

import type { ExecutionWorkerKind, Task } from '../types/routing';
import type { Scorer } from './router';

export interface KeywordScorerDefinition {
  keywords: readonly string[];
  /** Reason reported with the score */
  reason: string;
}

export const DEFAULT_KEYWORD_SETS: Readonly<Record<ExecutionWorkerKind, KeywordScorerDefinition>> = {
  animation: {
    keywords: ['animation', 'animated', 'character', 'motion', 'pose', 'rig', 'keyframe', 'movement'],
    reason: 'Animation-related intent detected',
  },
  film: {
    keywords: ['film', 'cinematic', 'camera', 'shot', 'lighting', 'scene', 'storyboard', 'montage'],
    reason: 'Cinematic / film language detected',
  },
  game: {
    keywords: ['game', 'npc', 'quest', 'combat', 'level', 'interaction', 'player', 'skill'],
    reason: 'Game mechanics and interaction detected',
  },
};

/**
 * The task prompt, lower-cased; empty when the payload has none
 */
export function taskPrompt(task: Task): string {
  const prompt = task.payload.prompt;
  return typeof prompt === 'string' ? prompt.toLowerCase() : '';
}

/**
 * Fraction of keywords that occur (as substrings) in the task prompt
 */
export function createKeywordScorer(definition: KeywordScorerDefinition): Scorer {
  const keywords = definition.keywords.map((k) => k.toLowerCase());
  return {
    score(task) {
      if (keywords.length === 0) {
        return { confidence: 0, reason: definition.reason };
      }
      const prompt = taskPrompt(task);
      const hits = keywords.filter((keyword) => prompt.includes(keyword)).length;
      return { confidence: hits / keywords.length, reason: definition.reason };
    },
  };
}

/**
 * Built-in scorers in registration order: animation, film, game
 */
export function createDefaultScorers(): Array<[ExecutionWorkerKind, Scorer]> {
  return [
    ['animation', createKeywordScorer(DEFAULT_KEYWORD_SETS.animation)],
    ['film', createKeywordScorer(DEFAULT_KEYWORD_SETS.film)],
    ['game', createKeywordScorer(DEFAULT_KEYWORD_SETS.game)],
  ];
}
