import { z } from 'zod';

// ── SelectorHint ──────────────────────────────────────────────

export const selectorStrategySchema = z.enum(['testid', 'role', 'text', 'css']);

export type SelectorStrategy = z.infer<typeof selectorStrategySchema>;

export const selectorHintSchema = z.object({
  strategy: selectorStrategySchema,
  value: z.string().min(1),
  role: z.string().optional(),
  name: z.string().optional(),
});

export type SelectorHint = z.infer<typeof selectorHintSchema>;

// ── Action type discriminator ─────────────────────────────────

export const actionTypeSchema = z.enum([
  'navigate',
  'click',
  'type',
  'select',
  'press_key',
  'wait',
  'scroll',
  'extract',
]);

export type ActionType = z.infer<typeof actionTypeSchema>;

// ── Individual action schemas ─────────────────────────────────

const baseFields = {
  description: z.string().min(1),
  timeout: z.number().int().positive().optional(),
};

export const navigateActionSchema = z.object({
  ...baseFields,
  type: z.literal('navigate'),
  value: z.string().min(1),
});

export const clickActionSchema = z.object({
  ...baseFields,
  type: z.literal('click'),
  selector: selectorHintSchema,
});

export const typeActionSchema = z.object({
  ...baseFields,
  type: z.literal('type'),
  selector: selectorHintSchema,
  value: z.string(),
});

export const selectActionSchema = z.object({
  ...baseFields,
  type: z.literal('select'),
  selector: selectorHintSchema,
  value: z.string(),
});

export const pressKeyActionSchema = z.object({
  ...baseFields,
  type: z.literal('press_key'),
  selector: selectorHintSchema.optional(),
  value: z.string().min(1),
});

export const waitActionSchema = z.object({
  ...baseFields,
  type: z.literal('wait'),
  selector: selectorHintSchema.optional(),
  value: z.string().optional(),
});

export const scrollActionSchema = z.object({
  ...baseFields,
  type: z.literal('scroll'),
  value: z.enum(['up', 'down']).optional(),
});

export const extractActionSchema = z.object({
  ...baseFields,
  type: z.literal('extract'),
  selector: selectorHintSchema,
  name: z.string().min(1),
});

// ── Union schema ──────────────────────────────────────────────

export const agentActionSchema = z.discriminatedUnion('type', [
  navigateActionSchema,
  clickActionSchema,
  typeActionSchema,
  selectActionSchema,
  pressKeyActionSchema,
  waitActionSchema,
  scrollActionSchema,
  extractActionSchema,
]);

export type AgentAction = z.infer<typeof agentActionSchema>;

export type NavigateAction = z.infer<typeof navigateActionSchema>;
export type ClickAction = z.infer<typeof clickActionSchema>;
export type TypeAction = z.infer<typeof typeActionSchema>;
export type SelectAction = z.infer<typeof selectActionSchema>;
export type PressKeyAction = z.infer<typeof pressKeyActionSchema>;
export type WaitAction = z.infer<typeof waitActionSchema>;
export type ScrollAction = z.infer<typeof scrollActionSchema>;
export type ExtractAction = z.infer<typeof extractActionSchema>;

// ── Action outcome ────────────────────────────────────────────

export type ActionOutcome =
  | { ok: true; text?: string | undefined }
  | { ok: false; error: string };
