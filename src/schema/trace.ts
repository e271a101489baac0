import { z } from 'zod';

import { agentActionSchema, selectorHintSchema } from './step.js';

// ── Decision basis ──────────────────────────────────────────
// structural:     action follows from the observed page alone
// lookahead:      action depends on planning several steps ahead
// interpretation: action required reading page content for meaning

export const decisionBasisSchema = z.enum(['structural', 'lookahead', 'interpretation']);

export type DecisionBasis = z.infer<typeof decisionBasisSchema>;

// ── Obstacles ───────────────────────────────────────────────

export const obstacleKindSchema = z.enum([
  'cookie_banner',
  'modal',
  'ad',
  'newsletter',
  'notification_prompt',
  'login_wall',
  'captcha',
  'bot_detection',
  'random_redirect',
  'unknown',
]);

export type ObstacleKind = z.infer<typeof obstacleKindSchema>;

export const obstacleSchema = z.object({
  kind: obstacleKindSchema,
  selector: selectorHintSchema.optional(),
});

export type Obstacle = z.infer<typeof obstacleSchema>;

// ── Trace step ──────────────────────────────────────────────

export const stepOutcomeSchema = z.enum(['success', 'obstacle', 'failed']);

export type StepOutcome = z.infer<typeof stepOutcomeSchema>;

export const observationSchema = z.object({
  url: z.string(),
  title: z.string(),
  summary: z.string(),
});

export type Observation = z.infer<typeof observationSchema>;

export const traceStepSchema = z.object({
  index: z.number().int().nonnegative(),
  observation: observationSchema,
  action: agentActionSchema,
  outcome: stepOutcomeSchema,
  rationale: z.string(),
  basis: decisionBasisSchema,
  obstacle: obstacleSchema.optional(),
  error: z.string().optional(),
});

export type TraceStep = z.infer<typeof traceStepSchema>;

// ── Completion (terminal success condition) ─────────────────

export const completionSchema = z.object({
  summary: z.string().min(1),
  url: z.string(),
  evidence: z.string().min(1).optional(),
  data: z.record(z.string(), z.string()).default({}),
});

export type Completion = z.infer<typeof completionSchema>;

// ── ExplorationTrace ────────────────────────────────────────

export const explorationTraceSchema = z.object({
  traceId: z.string().min(1),
  fingerprint: z.string().min(1),
  target: z.string().url(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  steps: z.array(traceStepSchema),
  completion: completionSchema,
});

export type ExplorationTrace = z.infer<typeof explorationTraceSchema>;
