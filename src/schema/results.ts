import { z } from 'zod';

// ── RepeatabilityScore ────────────────────────────────────────

export const verdictSchema = z.enum(['SCRIPTABLE', 'NOT_SCRIPTABLE']);

export type Verdict = z.infer<typeof verdictSchema>;

export const repeatabilityScoreSchema = z.object({
  determinism: z.number().min(0).max(1),
  obstaclePredictability: z.number().min(0).max(1),
  decisionComplexity: z.number().min(0).max(1),
  verdict: verdictSchema,
  reasons: z.array(z.string()),
});

export type RepeatabilityScore = z.infer<typeof repeatabilityScoreSchema>;

// ── ExecutionResult ───────────────────────────────────────────

export const executionMethodSchema = z.enum(['SCRIPT', 'EXPLORATION']);

export type ExecutionMethod = z.infer<typeof executionMethodSchema>;

export const scriptOutcomeSchema = z.enum([
  'executed',
  'fallback',
  'generated',
  'validation_failed',
  'not_scriptable',
  'stale',
  'exploration_failed',
]);

export type ScriptOutcome = z.infer<typeof scriptOutcomeSchema>;

export const errorCodeSchema = z.enum([
  'EXPLORATION_FAILED',
  'VALIDATION_FAILED',
  'EXECUTION_FAILED',
  'PERSISTENCE_FAILED',
]);

export type ErrorCode = z.infer<typeof errorCodeSchema>;

export const errorDetailSchema = z.object({
  code: errorCodeSchema,
  message: z.string().min(1),
});

export type ErrorDetail = z.infer<typeof errorDetailSchema>;

export const payloadSchema = z.object({
  summary: z.string().optional(),
  url: z.string().optional(),
  data: z.record(z.string(), z.string()),
});

export type Payload = z.infer<typeof payloadSchema>;

export const executionResultSchema = z.object({
  success: z.boolean(),
  method: executionMethodSchema,
  fingerprint: z.string().min(1),
  payload: payloadSchema,
  error: errorDetailSchema.optional(),
  scriptOutcome: scriptOutcomeSchema,
  durationMs: z.number().int().nonnegative(),
});

export type ExecutionResult = z.infer<typeof executionResultSchema>;
