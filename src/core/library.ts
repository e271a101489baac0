import type { GeneratedScript } from '../schema/index.js';
import type { ScriptStore } from '../store/store.js';
import * as log from '../utils/logger.js';
import { PersistenceError, ScriptLibraryError, errorMessage } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface ScriptLibrary {
  /** True once a store failure has turned the library into a no-op cache. */
  readonly degraded: boolean;
  open(): Promise<void>;
  get(fingerprint: string): Promise<GeneratedScript | undefined>;
  /** Replace the entry for `fingerprint`. Only PASSED scripts are accepted. */
  put(fingerprint: string, script: GeneratedScript): Promise<void>;
  list(): Promise<GeneratedScript[]>;
  close(): Promise<void>;
}

// ── Per-key write lock ───────────────────────────────────────

type KeyedLock = <T>(key: string, fn: () => Promise<T>) => Promise<T>;

/**
 * Serializes calls that share a key; calls on different keys run freely.
 */
export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  return async <T>(key: string, fn: () => Promise<T>): Promise<T> => {
    const previous = tails.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (tails.get(key) === tail) tails.delete(key);
    }
  };
}

// ── Library ──────────────────────────────────────────────────

export function createScriptLibrary(store: ScriptStore): ScriptLibrary {
  const withLock = createKeyedLock();
  let degraded = false;

  function degrade(operation: string, err: unknown): void {
    const failure = err instanceof PersistenceError
      ? err
      : new PersistenceError(`Script library ${operation} failed: ${errorMessage(err)}`, { cause: err });

    if (!degraded) {
      log.warn(`${failure.message}; every lookup will miss from now on`);
    }
    degraded = true;
  }

  return {
    get degraded(): boolean {
      return degraded;
    },

    async open(): Promise<void> {
      try {
        await store.open();
      } catch (err) {
        degrade('open', err);
      }
    },

    async get(fingerprint: string): Promise<GeneratedScript | undefined> {
      if (degraded) return undefined;

      try {
        const script = await store.get(fingerprint);
        if (script && script.validation !== 'PASSED') {
          throw new PersistenceError(`Stored script ${fingerprint} is not validated`);
        }
        return script;
      } catch (err) {
        degrade('read', err);
        return undefined;
      }
    },

    async put(fingerprint: string, script: GeneratedScript): Promise<void> {
      if (script.validation !== 'PASSED') {
        throw new ScriptLibraryError(
          `Refusing to store script with validation status ${script.validation}`,
        );
      }
      if (script.fingerprint !== fingerprint) {
        throw new ScriptLibraryError(
          `Script fingerprint ${script.fingerprint} does not match key ${fingerprint}`,
        );
      }
      if (degraded) return;

      await withLock(fingerprint, async () => {
        try {
          await store.put(fingerprint, script);
          log.library(`Stored script ${fingerprint}`);
        } catch (err) {
          degrade('write', err);
        }
      });
    },

    async list(): Promise<GeneratedScript[]> {
      if (degraded) return [];

      try {
        return await store.list();
      } catch (err) {
        degrade('list', err);
        return [];
      }
    },

    async close(): Promise<void> {
      try {
        await store.close();
      } catch (err) {
        log.warn(`Script store close failed: ${errorMessage(err)}`);
      }
    },
  };
}
