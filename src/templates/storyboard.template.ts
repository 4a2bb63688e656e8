import type { ExecutionWorkerKind } from '../types/routing';
import type { StagePromptTemplate } from './prompt-template';

/**
 * How each execution worker wants its shots framed
 */
export const DISCIPLINE_NOTES: Readonly<Record<ExecutionWorkerKind, string>> = {
  animation: 'Frame the shots for character animation: readable silhouettes and clear key poses.',
  film: 'Frame the shots as live-action cinematography: motivated camera moves and coverage.',
  game: 'Frame the shots as in-engine game cinematics: player-readable staging and gameplay beats.',
};

export const storyboardTemplate: StagePromptTemplate = {
  description: 'Breaks each planned scene into camera shots',
  requiredVariables: ['context', 'scenes', 'discipline'],
  system: 'You are a storyboard artist specialized in cinematic animation.',
  template: `Context:
{{context}}

Scenes:
{{scenes}}

{{discipline}}

For each scene, generate shot breakdowns. Every scene_id must be one of the scene ids above.

Output JSON only:
{
  "shots": [
    {
      "scene_id": "scene_1",
      "shot_id": "shot_1",
      "duration": 3.0,
      "subject": "Hero",
      "environment": "ruined city",
      "camera": {
        "shot_type": "wide",
        "movement": "dolly in",
        "lens": "35mm",
        "angle": "eye-level"
      }
    }
  ]
}`,
};
