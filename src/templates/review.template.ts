import type { StagePromptTemplate } from './prompt-template';

export const reviewTemplate: StagePromptTemplate = {
  description: 'Asks the model to judge a rendered production against its brief',
  requiredVariables: ['brief', 'shots'],
  system:
    'You are a strict reviewer of animated productions. Judge whether the shots fully deliver the brief.',
  template: `Creative brief:
{{brief}}

Rendered shots:
{{shots}}

Answer "accept" if the shots deliver the brief, "revise" if the scenes are right but the shots need rework,
or "redesign" if the scene plan itself is wrong.

Output JSON only:
{
  "review": "accept",
  "notes": "..."
}`,
};
