import type { StagePromptTemplate } from './prompt-template';

export const planningTemplate: StagePromptTemplate = {
  description: 'Turns the brief, style and cast into an ordered scene plan',
  requiredVariables: ['context', 'brief'],
  system: 'You are a professional animation director. Your job is to plan animation scenes.',
  template: `Given the following production context:

{{context}}

Creative brief:
{{brief}}

Generate a high-level scene plan.

Output JSON only in the following format:
{
  "scenes": [
    {
      "id": "scene_1",
      "description": "..."
    }
  ]
}`,
};
