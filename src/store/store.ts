import type { GeneratedScript } from '../schema/index.js';

// ── ScriptStore interface ────────────────────────────────────
// Persistence collaborator behind the Script Library. Implementations
// replace an entry atomically on `put`; readers never see half a write.

export interface ScriptStore {
  open(): Promise<void>;
  get(fingerprint: string): Promise<GeneratedScript | undefined>;
  put(fingerprint: string, script: GeneratedScript): Promise<void>;
  list(): Promise<GeneratedScript[]>;
  close(): Promise<void>;
}
