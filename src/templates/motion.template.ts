import type { StagePromptTemplate } from './prompt-template';

export const motionTemplate: StagePromptTemplate = {
  description: 'Designs start pose, action and end pose for every shot',
  requiredVariables: ['context', 'shots'],
  system: 'You are an animation motion designer. Design physically plausible character motion.',
  template: `Context:
{{context}}

Shots:
{{shots}}

Generate motion for each shot.

Output JSON only:
{
  "motions": [
    {
      "shot_id": "shot_1",
      "start_pose": "...",
      "action": "...",
      "end_pose": "..."
    }
  ]
}`,
};
