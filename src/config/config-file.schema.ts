/**
 * Schema of .reelwright/config.json and ~/.config/reelwright/config.json
 * Every section and key is optional; unknown keys are rejected.
 */

import { z } from 'zod';
import { WORKER_KINDS } from '../types/routing';

const reviewOutcomeSchema = z.enum(['accept', 'revise', 'redesign']);

export const characterProfileSchema = z
  .object({
    name: z.string().min(1, 'Character name cannot be empty'),
    appearance: z.string(),
    costume: z.string(),
    personality: z.string(),
  })
  .strict();

export const configFileSchema = z
  .object({
    routing: z
      .object({
        confidenceThreshold: z.number().min(0).max(1),
        fallbackWorker: z.enum(WORKER_KINDS),
        maxHops: z.number().int().positive(),
      })
      .partial()
      .strict(),
    retry: z
      .object({
        enabled: z.boolean(),
        maxRetries: z.number().int().min(0),
        initialDelayMs: z.number().min(0),
        maxDelayMs: z.number().min(0),
        exponentialBase: z.number().min(1),
        transientOnly: z.boolean(),
      })
      .partial()
      .strict(),
    generation: z
      .object({
        provider: z.enum(['anthropic', 'google', 'openai', 'mock']),
        model: z.string().min(1),
        apiBase: z.string().url(),
        timeoutMs: z.number().int().positive(),
      })
      .partial()
      .strict(),
    render: z
      .object({
        provider: z.enum(['sora', 'runway', 'pika', 'mock']),
        apiBase: z.string().url(),
        timeoutMs: z.number().int().positive(),
      })
      .partial()
      .strict(),
    style: z
      .object({
        visualStyle: z.string(),
        lighting: z.string(),
        colorPalette: z.string(),
        fps: z.number().int().positive(),
        resolution: z.string().regex(/^\d+x\d+$/, 'resolution must look like 1920x1080'),
      })
      .partial()
      .strict(),
    characters: z.array(characterProfileSchema),
    review: z
      .object({
        defaultOutcome: reviewOutcomeSchema,
        mode: z.enum(['static', 'interactive', 'model']),
        maxRevisions: z.number().int().min(0),
      })
      .partial()
      .strict(),
    paths: z
      .object({
        artifactBaseDir: z.string().min(1),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
