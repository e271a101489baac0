import type { GeneratedScript } from '../schema/index.js';
import type { ScriptStore } from './store.js';

export interface MemoryScriptStore extends ScriptStore {
  readonly size: number;
}

/** In-process store; entries are copied in and out so callers cannot alias them. */
export function createMemoryScriptStore(
  initial: readonly GeneratedScript[] = [],
): MemoryScriptStore {
  const entries = new Map<string, GeneratedScript>(
    initial.map((script) => [script.fingerprint, structuredClone(script)]),
  );

  return {
    get size(): number {
      return entries.size;
    },

    async open(): Promise<void> {},

    async get(fingerprint: string): Promise<GeneratedScript | undefined> {
      const script = entries.get(fingerprint);
      return script && structuredClone(script);
    },

    async put(fingerprint: string, script: GeneratedScript): Promise<void> {
      entries.set(fingerprint, structuredClone(script));
    },

    async list(): Promise<GeneratedScript[]> {
      return [...entries.values()].map((script) => structuredClone(script));
    },

    async close(): Promise<void> {},
  };
}
