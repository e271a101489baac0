import { z } from 'zod';

// ── InteractiveElement ───────────────────────────────────────

export const interactiveElementSchema = z.object({
  tag: z.string().min(1),
  type: z.string().optional(),
  text: z.string().optional(),
  testId: z.string().optional(),
  id: z.string().optional(),
  role: z.string().optional(),
  name: z.string().optional(),
  placeholder: z.string().optional(),
  href: z.string().optional(),
  options: z.array(z.string()).optional(),
});

export type InteractiveElement = z.infer<typeof interactiveElementSchema>;

// ── PageSnapshot ─────────────────────────────────────────────

export const pageSnapshotSchema = z.object({
  url: z.string(),
  title: z.string(),
  visibleText: z.string(),
  elements: z.array(interactiveElementSchema),
  /** Open dialogs and fixed layers, as `#id: text` lines. */
  overlays: z.array(z.string()).optional(),
});

export type PageSnapshot = z.infer<typeof pageSnapshotSchema>;

// ── Summaries ────────────────────────────────────────────────

const SUMMARY_TEXT_CHARS = 160;

/** One-line description of a snapshot, recorded in trace observations. */
export function summarizeSnapshot(snapshot: PageSnapshot): string {
  const text = snapshot.visibleText.replace(/\s+/g, ' ').trim();
  const head = text.length > SUMMARY_TEXT_CHARS
    ? `${text.slice(0, SUMMARY_TEXT_CHARS)}...`
    : text;
  return `${String(snapshot.elements.length)} interactive elements; ${head || '(no visible text)'}`;
}
