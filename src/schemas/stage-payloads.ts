/**
 * Stage payload schemas
 * Runtime validation for the JSON that generation returns to each stage.
 * Wire keys stay snake_case because that is the format the prompts request.
 */

import { z, type ZodSchema } from 'zod';

/**
 * Validation result type
 */
export type ValidationResult<T> = { success: true; data: T } | { success: false; errors: string[] };

// =============================================================================
// Planning
// =============================================================================

export const planningPayloadSchema = z.object({
  scenes: z.array(
    z.object({
      id: z.string().min(1, 'Scene id cannot be empty'),
      description: z.string(),
    })
  ),
});

export type PlanningPayload = z.infer<typeof planningPayloadSchema>;

// =============================================================================
// Storyboard
// =============================================================================

const cameraSchema = z.object({
  shot_type: z.string(),
  movement: z.string(),
  lens: z.string(),
  angle: z.string(),
});

export const storyboardPayloadSchema = z.object({
  shots: z.array(
    z.object({
      scene_id: z.string().min(1, 'scene_id cannot be empty'),
      shot_id: z.string().min(1, 'shot_id cannot be empty'),
      duration: z.number().positive('duration must be positive'),
      subject: z.string(),
      environment: z.string(),
      camera: cameraSchema,
    })
  ),
});

export type StoryboardPayload = z.infer<typeof storyboardPayloadSchema>;

// =============================================================================
// Motion
// =============================================================================

export const motionPayloadSchema = z.object({
  motions: z.array(
    z.object({
      shot_id: z.string().min(1, 'shot_id cannot be empty'),
      start_pose: z.string(),
      action: z.string(),
      end_pose: z.string(),
    })
  ),
});

export type MotionPayload = z.infer<typeof motionPayloadSchema>;

// =============================================================================
// Review
// =============================================================================

export const reviewPayloadSchema = z.object({
  review: z.enum(['accept', 'revise', 'redesign']),
  notes: z.string().optional(),
});

export type ReviewPayload = z.infer<typeof reviewPayloadSchema>;

// =============================================================================
// Extraction
// =============================================================================

/**
 * JSON candidates in the order they are tried: the whole text, fenced
 * blocks, then the outermost {...} span.
 */
export function collectJsonCandidates(text: string): string[] {
  const trimmed = text.trim();
  const candidates = [trimmed];

  const fencedPattern = /```(?:json)?\s*\n([\s\S]*?)```/g;
  let match: RegExpExecArray | null;
  while ((match = fencedPattern.exec(text)) !== null) {
    const block = match[1]?.trim();
    if (block) {
      candidates.push(block);
    }
  }

  const braceMatch = trimmed.match(/\{[\s\S]*\}/);
  if (braceMatch && braceMatch[0] !== trimmed) {
    candidates.push(braceMatch[0]);
  }

  return candidates;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate already-parsed data against a schema
 */
export function validatePayload<T>(data: unknown, schema: ZodSchema<T>): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Extract JSON from generated text and validate it. When no candidate
 * validates, the errors describe the first candidate that was valid JSON,
 * or the JSON syntax error of the whole text when none was.
 */
export function parseStagePayload<T>(content: string, schema: ZodSchema<T>): ValidationResult<T> {
  let schemaErrors: string[] | undefined;
  let syntaxError: string | undefined;

  for (const candidate of collectJsonCandidates(content)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch (e) {
      syntaxError ??= `Invalid JSON: ${e instanceof Error ? e.message : String(e)}`;
      continue;
    }

    const validated = validatePayload(parsed, schema);
    if (validated.success) {
      return validated;
    }
    schemaErrors ??= validated.errors;
  }

  return {
    success: false,
    errors: schemaErrors ?? [syntaxError ?? 'No JSON content found'],
  };
}
