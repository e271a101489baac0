import { z } from 'zod';

import { agentActionSchema } from './step.js';
import { decisionBasisSchema, obstacleSchema } from './trace.js';

// ── Agent step response (done OR action) ────────────────────

const agentDoneSchema = z.object({
  done: z.literal(true),
  summary: z.string().min(1),
  evidence: z.string().min(1).optional(),
  data: z.record(z.string(), z.string()).optional(),
});

const agentNextActionSchema = z.object({
  done: z.literal(false),
  action: agentActionSchema,
  rationale: z.string().min(1),
  basis: decisionBasisSchema,
  obstacle: obstacleSchema.optional(),
});

export const agentStepResponseSchema = z.discriminatedUnion('done', [
  agentDoneSchema,
  agentNextActionSchema,
]);

export type AgentStepResponse = z.infer<typeof agentStepResponseSchema>;
export type AgentDoneResponse = z.infer<typeof agentDoneSchema>;
export type AgentNextAction = z.infer<typeof agentNextActionSchema>;

// ── Action history entry ────────────────────────────────────

export interface ActionHistoryEntry {
  stepIndex: number;
  action: string;
  description: string;
  success: boolean;
  observation: string;
}
