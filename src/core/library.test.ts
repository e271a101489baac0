import { describe, expect, it, vi } from 'vitest';

import type { GeneratedScript } from '../schema/index.js';
import type { ScriptStore } from '../store/index.js';
import { createMemoryScriptStore } from '../store/index.js';
import { storedScript } from '../__tests__/fixtures.js';
import { ScriptLibraryError } from './errors.js';
import { createKeyedLock, createScriptLibrary } from './library.js';

function failingStore(failOn: keyof ScriptStore): ScriptStore & { puts: number } {
  const inner = createMemoryScriptStore();
  const store = {
    puts: 0,
    open: () => (failOn === 'open' ? Promise.reject(new Error('EACCES: permission denied')) : inner.open()),
    get: (key: string) => (failOn === 'get' ? Promise.reject(new Error('EIO: read failed')) : inner.get(key)),
    put: (key: string, script: GeneratedScript) => {
      store.puts++;
      return failOn === 'put' ? Promise.reject(new Error('ENOSPC: disk full')) : inner.put(key, script);
    },
    list: () => inner.list(),
    close: () => inner.close(),
  };
  return store;
}

describe('createScriptLibrary', () => {
  it('stores and returns PASSED scripts', async () => {
    const library = createScriptLibrary(createMemoryScriptStore());
    await library.open();
    const script = storedScript();

    await library.put(script.fingerprint, script);

    expect(await library.get(script.fingerprint)).toEqual(script);
    expect(await library.list()).toEqual([script]);
  });

  it('replaces the entry on a second put', async () => {
    const store = createMemoryScriptStore();
    const library = createScriptLibrary(store);
    const first = storedScript();
    const second = storedScript({ createdAt: '2026-10-20T12:00:00.000Z' });

    await library.put(first.fingerprint, first);
    await library.put(second.fingerprint, second);

    expect(store.size).toBe(1);
    expect((await library.get(first.fingerprint))?.createdAt).toBe('2026-10-20T12:00:00.000Z');
  });

  it('refuses scripts that did not pass validation', async () => {
    const library = createScriptLibrary(createMemoryScriptStore());
    const script = storedScript({ validation: 'FAILED' });

    await expect(library.put(script.fingerprint, script)).rejects.toThrow(ScriptLibraryError);
  });

  it('refuses a script filed under another fingerprint', async () => {
    const library = createScriptLibrary(createMemoryScriptStore());

    await expect(library.put('other', storedScript())).rejects.toThrow(
      /does not match key other/,
    );
  });

  it('degrades to a miss on a read failure and drops later writes', async () => {
    const store = failingStore('get');
    const library = createScriptLibrary(store);
    const script = storedScript();

    expect(await library.get(script.fingerprint)).toBeUndefined();
    expect(library.degraded).toBe(true);

    await library.put(script.fingerprint, script);
    expect(store.puts).toBe(0);
    expect(await library.list()).toEqual([]);
  });

  it('swallows a write failure into degraded mode', async () => {
    const library = createScriptLibrary(failingStore('put'));
    const script = storedScript();

    await expect(library.put(script.fingerprint, script)).resolves.toBeUndefined();
    expect(library.degraded).toBe(true);
  });

  it('degrades when the store cannot be opened', async () => {
    const library = createScriptLibrary(failingStore('open'));

    await library.open();

    expect(library.degraded).toBe(true);
    expect(await library.get(storedScript().fingerprint)).toBeUndefined();
  });
});

describe('createKeyedLock', () => {
  it('serializes calls on the same key', async () => {
    const withLock = createKeyedLock();
    const events: string[] = [];
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = withLock('a', async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
    });
    const second = withLock('a', async () => {
      events.push('second:start');
    });

    await vi.waitFor(() => {
      expect(events).toEqual(['first:start']);
    });
    release();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('lets different keys run concurrently', async () => {
    const withLock = createKeyedLock();
    const events: string[] = [];
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = withLock('a', async () => {
      await gate;
      events.push('a');
    });
    await withLock('b', async () => {
      events.push('b');
    });
    release();
    await first;

    expect(events).toEqual(['b', 'a']);
  });

  it('keeps the queue moving after a failure', async () => {
    const withLock = createKeyedLock();

    await expect(withLock('a', () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(withLock('a', async () => 'next')).resolves.toBe('next');
  });
});
