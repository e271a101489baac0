import { z } from 'zod';

import { LIBRARY, LIMITS, THRESHOLDS, TIMEOUTS } from '../config/defaults.js';
import { constraintsSchema } from './task.js';

// ── Task entry ──────────────────────────────────────────────

export const taskEntrySchema = z.object({
  name: z.string().min(1),
  instructions: z.string().min(1),
  target: z.string().url().optional(),
  constraints: constraintsSchema.optional().default({}),
});

export type TaskEntry = z.infer<typeof taskEntrySchema>;

// ── Analyzer thresholds ─────────────────────────────────────

export const thresholdsSchema = z.object({
  minDeterminism: z.number().min(0).max(1).optional().default(THRESHOLDS.MIN_DETERMINISM),
  minObstaclePredictability: z.number().min(0).max(1).optional().default(THRESHOLDS.MIN_OBSTACLE_PREDICTABILITY),
  maxDecisionComplexity: z.number().min(0).max(1).optional().default(THRESHOLDS.MAX_DECISION_COMPLEXITY),
  maxScriptableSteps: z.number().int().positive().optional().default(THRESHOLDS.MAX_SCRIPTABLE_STEPS),
});

export type Thresholds = z.infer<typeof thresholdsSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  maxSteps: z.number().int().positive().optional().default(LIMITS.MAX_STEPS),
  headless: z.boolean().optional().default(true),
  timeout: z.number().positive().optional().default(TIMEOUTS.INVOCATION_TIMEOUT / 1000),
  provider: z.enum(['anthropic', 'openai', 'mock']).optional(),
  model: z.string().min(1).optional(),
  llmMaxAttempts: z.number().int().positive().optional(),
  thresholds: thresholdsSchema.optional().default({}),
  library: z
    .object({
      dir: z.string().min(1).optional().default(LIBRARY.DIR),
      maxScriptAgeDays: z.number().positive().optional().default(LIBRARY.MAX_SCRIPT_AGE_DAYS),
    })
    .optional()
    .default({}),
  tasks: z.array(taskEntrySchema).optional().default([]),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
