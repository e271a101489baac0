import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { storedScript } from '../__tests__/fixtures.js';
import { createFileScriptStore } from './fileStore.js';

describe('createFileScriptStore', () => {
  let root: string;
  let dir: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'taskpilot-store-'));
    dir = path.join(root, 'scripts');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('creates its directory on open and misses on an unknown key', async () => {
    const store = createFileScriptStore(dir);
    await store.open();

    expect(await readdir(dir)).toEqual([]);
    expect(await store.get('abc123')).toBeUndefined();
  });

  it('writes one JSON file per fingerprint and reads it back', async () => {
    const store = createFileScriptStore(dir);
    await store.open();
    const script = storedScript();

    await store.put(script.fingerprint, script);

    expect(await readdir(dir)).toEqual([`${script.fingerprint}.json`]);
    expect(await store.get(script.fingerprint)).toEqual(script);
  });

  it('lists entries in fingerprint order', async () => {
    const store = createFileScriptStore(dir);
    await store.open();

    await store.put('bbbb', storedScript({ fingerprint: 'bbbb' }));
    await store.put('aaaa', storedScript({ fingerprint: 'aaaa' }));

    expect((await store.list()).map((s) => s.fingerprint)).toEqual(['aaaa', 'bbbb']);
  });

  it('rejects a corrupt entry', async () => {
    const store = createFileScriptStore(dir);
    await store.open();
    await writeFile(path.join(dir, 'broken.json'), '{"fingerprint":"broken"}', 'utf-8');

    await expect(store.get('broken')).rejects.toThrow();
  });

  it('refuses fingerprints that are not plain file names', async () => {
    const store = createFileScriptStore(dir);
    await store.open();

    await expect(store.get('../escape')).rejects.toThrow('Invalid fingerprint for file store: "../escape"');
  });
});
