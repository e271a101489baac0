/**
 * Live progress logger for taskpilot.
 *
 * Writes to stderr so stdout carries only the `--json` result. Each line
 * starts with an emoji naming the pipeline stage it comes from.
 */

export type LogLevel = 'info' | 'quiet';

let level: LogLevel = 'info';

/** `quiet` keeps warnings and errors only. */
export function setLevel(next: LogLevel): void {
  level = next;
}

function write(message: string): void {
  process.stderr.write(message + '\n');
}

function progress(message: string): void {
  if (level === 'info') write(message);
}

function counter(index: number, total: number): string {
  return `[${String(index + 1)}/${String(total)}]`;
}

// ── General ─────────────────────────────────────────────────

export function info(message: string): void {
  progress(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  progress(`   ${message}`);
}

export function section(title: string): void {
  const rule = '─'.repeat(50);
  progress(`\n${rule}\n▶  ${title}\n${rule}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

// ── Pipeline stages ─────────────────────────────────────────

/** A numbered explorer or script step is about to run. */
export function step(index: number, total: number, description: string): void {
  progress(`🧭 ${counter(index, total)} ${description}`);
}

/** How that step went. */
export function stepResult(index: number, total: number, success: boolean, description: string): void {
  progress(`${success ? '✅' : '❌'} ${counter(index, total)} ${description}`);
}

export function llm(message: string): void {
  progress(`🧠 ${message}`);
}

export function library(message: string): void {
  progress(`📚 ${message}`);
}

export function analysis(message: string): void {
  progress(`📊 ${message}`);
}

export function script(message: string): void {
  progress(`⚙️  ${message}`);
}

export function obstacle(message: string): void {
  progress(`🚧 ${message}`);
}
