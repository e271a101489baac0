import { z } from 'zod';

// ── Constraint values ───────────────────────────────────────

export const constraintValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export type ConstraintValue = z.infer<typeof constraintValueSchema>;

// Records are rebuilt by assignment, which would turn this key into a
// prototype change and drop it from the task's identity.
export const constraintKeySchema = z
  .string()
  .min(1)
  .refine((key) => key !== '__proto__', { message: 'Constraint key __proto__ is not allowed' });

export const constraintsSchema = z.record(constraintKeySchema, constraintValueSchema);

// ── TaskSpec ────────────────────────────────────────────────
// `name` is display-only and never part of the task's identity.

export const taskSpecSchema = z.object({
  name: z.string().min(1).optional(),
  target: z.string().url(),
  instructions: z.string().min(1),
  constraints: constraintsSchema.default({}),
});

export type TaskSpecInput = z.input<typeof taskSpecSchema>;

export type TaskSpec = Readonly<{
  name?: string | undefined;
  target: string;
  instructions: string;
  constraints: Readonly<Record<string, ConstraintValue>>;
}>;

// ── Factory ─────────────────────────────────────────────────

/**
 * Validate caller input and freeze it into an immutable TaskSpec.
 */
export function createTask(input: TaskSpecInput): TaskSpec {
  const parsed = taskSpecSchema.parse(input);

  return Object.freeze({
    ...parsed,
    constraints: Object.freeze({ ...parsed.constraints }),
  });
}
