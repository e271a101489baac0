import { createHash } from 'node:crypto';

import type { TaskSpec } from '../schema/index.js';

const FINGERPRINT_LENGTH = 16;

// ── Canonical form ───────────────────────────────────────────
// Keys sorted at every level so that constraint insertion order never
// changes identity.

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value === null || typeof value !== 'object') return value;

  const sorted: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sorted[key] = canonicalize(inner);
  }
  return sorted;
}

export function canonicalTaskJSON(task: TaskSpec): string {
  return JSON.stringify(
    canonicalize({
      target: task.target,
      instructions: task.instructions,
      constraints: task.constraints,
    }),
  );
}

// ── Public API ───────────────────────────────────────────────

/**
 * Deterministic identity of a task: target + instructions + constraints.
 * The display name is deliberately excluded.
 */
export function fingerprint(task: TaskSpec): string {
  return createHash('sha256')
    .update(canonicalTaskJSON(task))
    .digest('hex')
    .slice(0, FINGERPRINT_LENGTH);
}
