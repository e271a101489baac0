import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';

import type { GeneratedScript } from '../schema/index.js';
import { parseGeneratedScript } from '../schema/index.js';
import type { ScriptStore } from './store.js';

const FINGERPRINT_PATTERN = /^[A-Za-z0-9_-]+$/;
const EXTENSION = '.json';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * One JSON file per fingerprint under `dir`. Writes go to a temporary
 * file first and are renamed into place.
 */
export function createFileScriptStore(dir: string): ScriptStore {
  function fileFor(fingerprint: string): string {
    if (!FINGERPRINT_PATTERN.test(fingerprint)) {
      throw new Error(`Invalid fingerprint for file store: "${fingerprint}"`);
    }
    return path.join(dir, `${fingerprint}${EXTENSION}`);
  }

  async function readScript(filePath: string): Promise<GeneratedScript> {
    const raw = await readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    return parseGeneratedScript(parsed);
  }

  return {
    async open(): Promise<void> {
      await mkdir(dir, { recursive: true });
    },

    async get(fingerprint: string): Promise<GeneratedScript | undefined> {
      try {
        return await readScript(fileFor(fingerprint));
      } catch (err) {
        if (isNotFound(err)) return undefined;
        throw err;
      }
    },

    async put(fingerprint: string, script: GeneratedScript): Promise<void> {
      const target = fileFor(fingerprint);
      const temp = `${target}.${randomUUID()}.tmp`;

      try {
        await writeFile(temp, JSON.stringify(script, null, 2) + '\n', 'utf-8');
        await rename(temp, target);
      } catch (err) {
        await rm(temp, { force: true });
        throw err;
      }
    },

    async list(): Promise<GeneratedScript[]> {
      const entries = await readdir(dir);
      const files = entries.filter((name) => name.endsWith(EXTENSION)).sort();
      return Promise.all(files.map((name) => readScript(path.join(dir, name))));
    },

    async close(): Promise<void> {
      // Nothing held open between calls.
    },
  };
}
