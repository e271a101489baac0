import Anthropic from '@anthropic-ai/sdk';

import { RateLimitedError, withRateLimitRetry } from './client.js';
import type { GenerateOptions, LLMClient, RetryPolicy } from './client.js';

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_TOKENS = 4096;

function retryAfterMs(err: InstanceType<typeof Anthropic.APIError>): number | undefined {
  const header = err.headers?.['retry-after'];
  const seconds = header ? Number.parseFloat(header) : Number.NaN;
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

export function createAnthropicClient(
  apiKey: string,
  model?: string,
  retry?: RetryPolicy,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  // The SDK's own retries would stack with ours.
  const client = new Anthropic({ apiKey, maxRetries: 0 });

  async function createMessage(systemPrompt: string, userPrompt: string, signal: AbortSignal | undefined) {
    try {
      return await client.messages.create(
        {
          model: resolvedModel,
          max_tokens: MAX_TOKENS,
          system: systemPrompt,
          messages: [{ role: 'user', content: userPrompt }],
          temperature: 0,
        },
        { signal },
      );
    } catch (err) {
      if (err instanceof Anthropic.RateLimitError) {
        throw new RateLimitedError('Anthropic', retryAfterMs(err));
      }
      throw err;
    }
  }

  return {
    async generate(
      systemPrompt: string,
      userPrompt: string,
      options?: GenerateOptions,
    ): Promise<string> {
      const signal = options?.signal;
      const response = await withRateLimitRetry(
        () => createMessage(systemPrompt, userPrompt, signal),
        signal,
        retry,
      );

      const text = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('');
      if (!text) throw new Error('Anthropic API returned no text content');
      return text;
    },
  };
}
