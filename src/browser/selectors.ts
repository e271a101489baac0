import type { Locator, Page } from 'playwright';

import type { SelectorHint } from '../schema/step.js';

type AriaRole = Parameters<Page['getByRole']>[0];

/** Role hints may carry the role in `role` or, from terser agents, in `value`. */
function roleOf(hint: SelectorHint): string {
  return hint.role ?? hint.value;
}

// ── Locators ─────────────────────────────────────────────────

/**
 * Turns a recorded selector hint into a Playwright locator. The same hint is
 * used during exploration and on every replay, so resolution stays literal:
 * no guessing a second strategy when the first matches nothing.
 */
export function resolveSelector(page: Page, hint: SelectorHint): Locator {
  switch (hint.strategy) {
    case 'testid':
      return page.getByTestId(hint.value);
    case 'text':
      return page.getByText(hint.value);
    case 'css':
      return page.locator(hint.value);
    case 'role': {
      // getByRole takes any ARIA role string at runtime.
      const role = roleOf(hint) as AriaRole;
      return hint.name ? page.getByRole(role, { name: hint.name }) : page.getByRole(role);
    }
  }
}

// ── Labels ───────────────────────────────────────────────────

/** Short form used in logs, agent history and execution errors. */
export function describeSelector(hint: SelectorHint): string {
  if (hint.strategy === 'testid') return `[data-testid="${hint.value}"]`;
  if (hint.strategy === 'text') return `text="${hint.value}"`;
  if (hint.strategy === 'css') return hint.value;

  const role = `role=${roleOf(hint)}`;
  return hint.name ? `${role}[name="${hint.name}"]` : role;
}

// ── Identity ─────────────────────────────────────────────────

/** Two hints with the same key address the same element; used to dedupe obstacle handlers. */
export function selectorKey(hint: SelectorHint): string {
  return [hint.strategy, hint.value, hint.role ?? '', hint.name ?? ''].join('|');
}
