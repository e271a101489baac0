import type { TaskSpec } from '../schema/index.js';

// ── Placeholders ─────────────────────────────────────────────
// Script text refers to task values as `{{name}}`. `target` is always
// bound; every other name is a constraint key.

const PLACEHOLDER_PATTERN = /\{\{([A-Za-z0-9_.-]+)\}\}/g;

export const TARGET_PARAMETER = 'target';

/** Shortest literal worth turning into a placeholder. */
const MIN_LITERAL_LENGTH = 3;

export function placeholder(name: string): string {
  return `{{${name}}}`;
}

/** Distinct placeholder names in `text`, in order of first appearance. */
export function placeholdersIn(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined) names.add(name);
  }
  return [...names];
}

// ── Binding ──────────────────────────────────────────────────

export function taskParameters(task: TaskSpec): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(task.constraints)) {
    params[key] = String(value);
  }
  params[TARGET_PARAMETER] = task.target;
  return params;
}

export class MissingParameterError extends Error {
  readonly parameter: string;

  constructor(parameter: string) {
    super(`No value bound for parameter "${parameter}"`);
    this.name = 'MissingParameterError';
    this.parameter = parameter;
  }
}

export function bindTemplate(text: string, params: Readonly<Record<string, string>>): string {
  return text.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) throw new MissingParameterError(name);
    return value;
  });
}

// ── Parameterization ────────────────────────────────────────

export type Parameterizer = (text: string) => string;

/**
 * Build a function that swaps trace-time literals for placeholders:
 * a leading task target becomes `{{target}}`, and every constraint value
 * (string form, long enough to be unambiguous) becomes `{{key}}`.
 * Longer literals are replaced first so that overlapping values keep the
 * most specific name.
 */
export function createParameterizer(task: TaskSpec): Parameterizer {
  const literals = Object.entries(task.constraints)
    .map(([key, value]): [string, string] => [key, String(value)])
    .filter(([, literal]) => literal.length >= MIN_LITERAL_LENGTH)
    .sort(([, a], [, b]) => b.length - a.length);

  return (text: string): string => {
    let out = text.startsWith(task.target)
      ? placeholder(TARGET_PARAMETER) + text.slice(task.target.length)
      : text;

    for (const [key, literal] of literals) {
      out = replaceOutsidePlaceholders(out, literal, placeholder(key));
    }
    return out;
  };
}

function replaceOutsidePlaceholders(text: string, literal: string, replacement: string): string {
  return text
    .split(/(\{\{[A-Za-z0-9_.-]+\}\})/)
    .map((part) => (part.startsWith('{{') && part.endsWith('}}') ? part : part.split(literal).join(replacement)))
    .join('');
}
