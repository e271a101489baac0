import { z } from 'zod';

import { RateLimitedError, withRateLimitRetry } from './client.js';
import type { GenerateOptions, LLMClient, RetryPolicy } from './client.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

const chatResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .nonempty(),
});

function retryAfterMs(response: Response): number | undefined {
  const header = response.headers.get('retry-after');
  const seconds = header ? Number.parseFloat(header) : Number.NaN;
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

/**
 * Chat completions over plain fetch. Replies are requested in JSON mode:
 * every prompt the explorer sends asks for a single JSON object.
 */
export function createOpenAIClient(
  apiKey: string,
  model?: string,
  retry?: RetryPolicy,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;

  async function complete(systemPrompt: string, userPrompt: string, signal: AbortSignal | undefined): Promise<string> {
    const response = await fetch(COMPLETIONS_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model: resolvedModel,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: 0,
        response_format: { type: 'json_object' },
      }),
      signal: signal ?? null,
    });

    if (response.status === 429) throw new RateLimitedError('OpenAI', retryAfterMs(response));
    if (!response.ok) {
      throw new Error(`OpenAI API error (${String(response.status)}): ${await response.text()}`);
    }

    const body: unknown = await response.json();
    return chatResponseSchema.parse(body).choices[0].message.content;
  }

  return {
    generate(systemPrompt: string, userPrompt: string, options?: GenerateOptions): Promise<string> {
      const signal = options?.signal;
      return withRateLimitRetry(() => complete(systemPrompt, userPrompt, signal), signal, retry);
    },
  };
}
