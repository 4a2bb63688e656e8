/**
 * Prompt templates with {{variable}} placeholders
 */

export interface PromptTemplate {
  /**
   * The template string with placeholders (e.g., "{{variable}}")
   */
  template: string;

  /**
   * Description of what this template is used for
   */
  description?: string;

  /**
   * Variables that must be supplied
   */
  requiredVariables?: string[];
}

/**
 * Template for a generative stage: a fixed system message plus a user message
 */
export interface StagePromptTemplate extends PromptTemplate {
  system: string;
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

/**
 * Fill in every {{name}} placeholder in one pass, so substituted values are
 * never scanned for placeholders themselves.
 * @throws Error if a required variable is missing or a placeholder has no value
 */
export function interpolateTemplate(template: PromptTemplate, variables: Record<string, string>): string {
  const missing = (template.requiredVariables ?? []).filter((name) => variables[name] === undefined);
  if (missing.length > 0) {
    throw new Error(`Missing required variables: ${missing.join(', ')}`);
  }

  const unfilled = new Set<string>();
  const result = template.template.replace(PLACEHOLDER, (placeholder, name: string) => {
    const value = variables[name];
    if (value === undefined) {
      unfilled.add(name);
      return placeholder;
    }
    return value;
  });

  if (unfilled.size > 0) {
    throw new Error(`Template contains placeholders without values: ${[...unfilled].join(', ')}`);
  }

  return result;
}
