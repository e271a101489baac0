import type { GenerateOptions, LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"done":true,"summary":"mock run complete"}';

export interface MockLLMClient extends LLMClient {
  /** User prompts received so far, in call order. */
  readonly calls: readonly { systemPrompt: string; userPrompt: string }[];
}

/**
 * Mock LLM provider for testing.
 * Cycles through provided canned responses, falling back to a default.
 */
export function createMockClient(
  responses?: readonly string[],
): MockLLMClient {
  let callIndex = 0;
  const calls: { systemPrompt: string; userPrompt: string }[] = [];

  return {
    calls,

    async generate(
      systemPrompt: string,
      userPrompt: string,
      options?: GenerateOptions,
    ): Promise<string> {
      options?.signal?.throwIfAborted();
      calls.push({ systemPrompt, userPrompt });
      const response = responses?.[callIndex] ?? DEFAULT_RESPONSE;
      callIndex++;
      return response;
    },
  };
}
