import { z } from 'zod';

import {
  errorDetailSchema,
  executionMethodSchema,
  scriptOutcomeSchema,
} from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  task: z.string(),
  target: z.string(),
  fingerprint: z.string().min(1),
  success: z.boolean(),
  method: executionMethodSchema,
  scriptOutcome: scriptOutcomeSchema,
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  summary: z.string(),
  url: z.string(),
  data: z.record(z.string(), z.string()),
  error: errorDetailSchema.nullable(),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
