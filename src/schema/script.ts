import { z } from 'zod';

import { selectorHintSchema } from './step.js';
import { explorationTraceSchema, obstacleKindSchema } from './trace.js';

// ── Instructions ────────────────────────────────────────────
// String fields may carry `{{param}}` placeholders, bound from the
// TaskSpec at run time.

const navigateInstructionSchema = z.object({
  op: z.literal('navigate'),
  url: z.string().min(1),
});

const locateInstructionSchema = z.object({
  op: z.literal('locate'),
  selector: selectorHintSchema,
  timeout: z.number().int().positive().optional(),
});

export const elementActionSchema = z.enum(['click', 'fill', 'select', 'press']);

export type ElementAction = z.infer<typeof elementActionSchema>;

const actInstructionSchema = z.object({
  op: z.literal('act'),
  action: elementActionSchema,
  selector: selectorHintSchema.optional(),
  value: z.string().optional(),
});

export const waitConditionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('selector'), selector: selectorHintSchema }),
  z.object({ kind: z.literal('text'), value: z.string().min(1) }),
  z.object({ kind: z.literal('delay'), ms: z.number().int().nonnegative() }),
  z.object({ kind: z.literal('load') }),
]);

export type WaitCondition = z.infer<typeof waitConditionSchema>;

const waitForInstructionSchema = z.object({
  op: z.literal('wait_for'),
  condition: waitConditionSchema,
});

const scrollInstructionSchema = z.object({
  op: z.literal('scroll'),
  direction: z.enum(['up', 'down']),
});

const extractInstructionSchema = z.object({
  op: z.literal('extract'),
  selector: selectorHintSchema,
  name: z.string().min(1),
});

export const scriptInstructionSchema = z.discriminatedUnion('op', [
  navigateInstructionSchema,
  locateInstructionSchema,
  actInstructionSchema,
  waitForInstructionSchema,
  scrollInstructionSchema,
  extractInstructionSchema,
]);

export type ScriptInstruction = z.infer<typeof scriptInstructionSchema>;

// ── Obstacle handlers ───────────────────────────────────────

export const obstacleHandlerSchema = z.object({
  kind: obstacleKindSchema,
  selector: selectorHintSchema,
});

export type ObstacleHandler = z.infer<typeof obstacleHandlerSchema>;

// ── Program ─────────────────────────────────────────────────

export const SCRIPT_PROGRAM_VERSION = 1 as const;

export const successConditionSchema = z.object({
  url: z.string().min(1).optional(),
  text: z.string().min(1).optional(),
});

export type SuccessCondition = z.infer<typeof successConditionSchema>;

export const scriptProgramSchema = z.object({
  version: z.literal(SCRIPT_PROGRAM_VERSION),
  instructions: z.array(scriptInstructionSchema).min(1),
  obstacleHandlers: z.array(obstacleHandlerSchema),
  successCondition: successConditionSchema,
});

export type ScriptProgram = z.infer<typeof scriptProgramSchema>;

// ── GeneratedScript ─────────────────────────────────────────

export const validationStatusSchema = z.enum(['UNVALIDATED', 'PASSED', 'FAILED']);

export type ValidationStatus = z.infer<typeof validationStatusSchema>;

export const generatedScriptSchema = z.object({
  fingerprint: z.string().min(1),
  body: z.string().min(1),
  requiredParameters: z.array(z.string()),
  validation: validationStatusSchema,
  createdAt: z.string().datetime(),
  sourceTrace: explorationTraceSchema,
});

export type GeneratedScript = z.infer<typeof generatedScriptSchema>;

// ── Parsers ─────────────────────────────────────────────────

export function serializeProgram(program: ScriptProgram): string {
  return JSON.stringify(program, null, 2);
}

export function parseProgram(body: string): ScriptProgram {
  const parsed: unknown = JSON.parse(body);
  return scriptProgramSchema.parse(parsed);
}

export function parseGeneratedScript(data: unknown): GeneratedScript {
  return generatedScriptSchema.parse(data);
}
