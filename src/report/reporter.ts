import type { ExecutionResult, ScriptOutcome, TaskSpec } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput } from '../schema/jsonOutput.js';


// ── JSON generator ───────────────────────────────────────────

export function generateJSON(
  result: ExecutionResult,
  task: TaskSpec,
  exitCode: number,
): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    task: task.name ?? result.fingerprint,
    target: task.target,
    fingerprint: result.fingerprint,
    success: result.success,
    method: result.method,
    scriptOutcome: result.scriptOutcome,
    durationMs: result.durationMs,
    exitCode,
    summary: result.payload.summary ?? '',
    url: result.payload.url ?? '',
    data: result.payload.data,
    error: result.error ?? null,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: unknown): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (!isPlainObject(value)) return value;

  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(value).sort()) {
    sorted[k] = value[k];
  }
  return sorted;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(result: ExecutionResult, task: TaskSpec): string {
  const lines: string[] = [];

  lines.push(`# Task Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  if (task.name !== undefined) {
    lines.push(`| **Task** | ${escapeMarkdownCell(task.name)} |`);
  }
  lines.push(`| **Target** | ${task.target} |`);
  lines.push(`| **Instructions** | ${escapeMarkdownCell(task.instructions)} |`);
  lines.push(`| **Fingerprint** | \`${result.fingerprint}\` |`);
  lines.push(`| **Method** | ${result.method} |`);
  lines.push(`| **Script** | ${describeOutcome(result.scriptOutcome)} |`);
  lines.push(`| **Duration** | ${formatDuration(result.durationMs)} |`);
  lines.push(`| **Result** | **${result.success ? 'SUCCESS' : 'FAILED'}** |`);
  lines.push('');

  const constraints = Object.entries(task.constraints);
  if (constraints.length > 0) {
    lines.push(`## Constraints`);
    lines.push('');
    for (const [key, value] of constraints) {
      lines.push(`- \`${key}\`: ${String(value)}`);
    }
    lines.push('');
  }

  if (result.payload.summary !== undefined || result.payload.url !== undefined) {
    lines.push(`## Outcome`);
    lines.push('');
    if (result.payload.summary !== undefined) lines.push(result.payload.summary);
    if (result.payload.url !== undefined) {
      lines.push('');
      lines.push(`Final page: ${result.payload.url}`);
    }
    lines.push('');
  }

  const data = Object.entries(result.payload.data);
  if (data.length > 0) {
    lines.push(`## Extracted Data`);
    lines.push('');
    lines.push(`| Name | Value |`);
    lines.push(`|------|-------|`);
    for (const [name, value] of data) {
      lines.push(`| ${escapeMarkdownCell(name)} | ${escapeMarkdownCell(value)} |`);
    }
    lines.push('');
  }

  if (result.error) {
    lines.push(`## Error`);
    lines.push('');
    lines.push(`**${result.error.code}**: ${result.error.message}`);
    lines.push('');
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function describeOutcome(outcome: ScriptOutcome): string {
  switch (outcome) {
    case 'executed':
      return 'stored script executed';
    case 'fallback':
      return 'stored script failed, explored instead';
    case 'generated':
      return 'new script generated and stored';
    case 'validation_failed':
      return 'generated script failed validation';
    case 'not_scriptable':
      return 'task not scriptable';
    case 'stale':
      return 'stored script too old, not replaced';
    case 'exploration_failed':
      return 'exploration failed';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
