import { afterEach, describe, expect, it, vi } from 'vitest';

import * as log from './logger.js';

function captureStderr() {
  return vi.spyOn(process.stderr, 'write').mockReturnValue(true);
}

describe('logger', () => {
  afterEach(() => {
    log.setLevel('info');
    vi.restoreAllMocks();
  });

  it('numbers steps from one', () => {
    const stderr = captureStderr();

    log.step(0, 25, 'click #submit');

    expect(stderr).toHaveBeenCalledWith('🧭 [1/25] click #submit\n');
  });

  it('keeps only warnings and errors when quiet', () => {
    const stderr = captureStderr();

    log.setLevel('quiet');
    log.info('hidden');
    log.library('hidden');
    log.warn('shown');
    log.error('also shown');

    expect(stderr.mock.calls.map((call) => call[0])).toEqual(['⚠️  shown\n', '💥 also shown\n']);
  });
});
