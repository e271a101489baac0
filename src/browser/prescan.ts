import type { Page } from 'playwright';

import type { InteractiveElement, PageSnapshot } from '../schema/index.js';
import { TOKEN_GUARDS } from '../config/defaults.js';

// ── Public API ───────────────────────────────────────────────

/**
 * Reads what the explorer needs to pick its next action: visible text, the
 * interactive elements it could address with a selector hint, and any open
 * overlay that may have to be dismissed first.
 */
export async function observePage(page: Page): Promise<PageSnapshot> {
  const [title, visibleText, scan] = await Promise.all([
    page.title(),
    page
      .innerText('body')
      .then((t) => t.slice(0, TOKEN_GUARDS.MAX_VISIBLE_TEXT_CHARS), () => ''),
    page.evaluate(scanDocument),
  ]);

  const snapshot: PageSnapshot = {
    url: page.url(),
    title,
    visibleText,
    elements: scan.elements.slice(0, TOKEN_GUARDS.MAX_ELEMENTS),
  };

  if (scan.overlays.length > 0) snapshot.overlays = scan.overlays;
  return snapshot;
}

// ── In-page scan ─────────────────────────────────────────────
// Serialized into the page by page.evaluate: no outer-scope references.

function scanDocument(): { elements: InteractiveElement[]; overlays: string[] } {
  const OVERLAY_TEXT_CHARS = 120;

  function visible(el: Element): boolean {
    if (el.getClientRects().length === 0) return false;
    const style = window.getComputedStyle(el);
    return style.visibility !== 'hidden' && style.display !== 'none';
  }

  function clean(value: string | null | undefined): string | undefined {
    const text = value?.replace(/\s+/g, ' ').trim();
    return text || undefined;
  }

  function labelFor(el: Element): string | undefined {
    const aria = clean(el.getAttribute('aria-label'));
    if (aria) return aria;
    if (el.id) {
      const label = document.querySelector(`label[for="${CSS.escape(el.id)}"]`);
      if (label) return clean(label.textContent);
    }
    return clean(el.closest('label')?.textContent);
  }

  function describe(el: Element): InteractiveElement {
    const tag = el.tagName.toLowerCase();
    const field = tag === 'input' || tag === 'select' || tag === 'textarea';
    const entry: InteractiveElement = {
      tag,
      text: field ? labelFor(el) : clean(el.textContent) ?? labelFor(el),
      testId: clean(el.getAttribute('data-testid')),
      id: clean(el.id),
      role: clean(el.getAttribute('role')),
      name: clean(el.getAttribute('name')),
      placeholder: clean(el.getAttribute('placeholder')),
      href: clean(el.getAttribute('href')),
    };
    if (el instanceof HTMLInputElement) entry.type = el.type;
    if (el instanceof HTMLSelectElement) {
      entry.options = Array.from(el.options).map((o) => o.text.trim() || o.value);
    }
    return entry;
  }

  const elements: InteractiveElement[] = [];
  const query = 'button, [role="button"], a[href], input:not([type="hidden"]), select, textarea';
  for (const el of Array.from(document.querySelectorAll(query))) {
    if (visible(el)) elements.push(describe(el));
  }

  // Dialogs and fixed layers covering content are the usual obstacles.
  const overlays: string[] = [];
  const candidates = document.querySelectorAll('dialog[open], [role="dialog"], [aria-modal="true"], body *');
  for (const el of Array.from(candidates)) {
    if (!visible(el)) continue;
    const dialog = el.matches('dialog, [role="dialog"], [aria-modal="true"]');
    if (!dialog && window.getComputedStyle(el).position !== 'fixed') continue;
    const text = clean(el.textContent);
    if (!text) continue;
    const label = el.id ? `#${el.id}: ` : '';
    const entry = `${label}${text.slice(0, OVERLAY_TEXT_CHARS)}`;
    if (!overlays.includes(entry)) overlays.push(entry);
  }

  return { elements, overlays };
}
