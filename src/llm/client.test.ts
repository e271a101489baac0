import { afterEach, describe, expect, it, vi } from 'vitest';

import { ConfigError } from '../core/errors.js';
import {
  RateLimitedError,
  createLLMClient,
  createMockClient,
  createOpenAIClient,
  loadLLMConfig,
  withRateLimitRetry,
} from './index.js';

const NO_WAIT = { maxAttempts: 3, backoffMs: 0 };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('loadLLMConfig', () => {
  it('defaults to anthropic and reads its key', () => {
    expect(loadLLMConfig({ ANTHROPIC_API_KEY: 'test-secret' })).toEqual({
      provider: 'anthropic',
      apiKey: 'test-secret',
    });
  });

  it('rejects an unknown provider', () => {
    expect(() => loadLLMConfig({ LLM_PROVIDER: 'carrier-pigeon' })).toThrow();
  });
});

describe('createLLMClient', () => {
  it('requires an API key for hosted providers', () => {
    expect(() => createLLMClient({ provider: 'anthropic' })).toThrow(ConfigError);
    expect(() => createLLMClient({ provider: 'openai' })).toThrow(ConfigError);
  });
});

describe('createMockClient', () => {
  it('replays canned replies then the default completion', async () => {
    const client = createMockClient(['first']);

    expect(await client.generate('system', 'user')).toBe('first');
    expect(await client.generate('system', 'again')).toBe('{"done":true,"summary":"mock run complete"}');
    expect(client.calls.map((c) => c.userPrompt)).toEqual(['user', 'again']);
  });

  it('rejects once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(createMockClient().generate('s', 'u', { signal: controller.signal })).rejects.toThrow();
  });
});

describe('withRateLimitRetry', () => {
  it('retries rate-limited calls until one succeeds', async () => {
    const call = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitedError('Test'))
      .mockResolvedValueOnce('ok');

    await expect(withRateLimitRetry(call, undefined, NO_WAIT)).resolves.toBe('ok');
    expect(call).toHaveBeenCalledTimes(2);
  });

  it('gives up after the last attempt', async () => {
    const call = vi.fn<() => Promise<string>>().mockRejectedValue(new RateLimitedError('Test', 0));

    await expect(withRateLimitRetry(call, undefined, NO_WAIT)).rejects.toThrow('Test API rate limit reached');
    expect(call).toHaveBeenCalledTimes(3);
  });

  it('does not retry other failures', async () => {
    const call = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('bad request'));

    await expect(withRateLimitRetry(call, undefined, NO_WAIT)).rejects.toThrow('bad request');
    expect(call).toHaveBeenCalledTimes(1);
  });
});

describe('createOpenAIClient', () => {
  function completion(content: string): Response {
    return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
  }

  it('asks for a JSON reply and returns the message content', async () => {
    const fetchMock = vi.fn().mockResolvedValue(completion('{"done":true,"summary":"ok"}'));
    vi.stubGlobal('fetch', fetchMock);

    const reply = await createOpenAIClient('test-secret', 'test-model', NO_WAIT).generate('system', 'user');

    expect(reply).toBe('{"done":true,"summary":"ok"}');
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body).toMatchObject({
      model: 'test-model',
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: 'system' },
        { role: 'user', content: 'user' },
      ],
    });
  });

  it('waits out a 429 and tries again', async () => {
    const fetchMock = vi.fn()
      .mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'retry-after': '0' } }))
      .mockResolvedValueOnce(completion('second'));
    vi.stubGlobal('fetch', fetchMock);

    await expect(createOpenAIClient('test-secret', undefined, NO_WAIT).generate('s', 'u')).resolves.toBe('second');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('reports other HTTP errors with the response body', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('invalid model', { status: 400 })));

    await expect(createOpenAIClient('test-secret', undefined, NO_WAIT).generate('s', 'u')).rejects.toThrow(
      'OpenAI API error (400): invalid model',
    );
  });
});
