/**
 * LLM abstraction module.
 * Provider-agnostic interface for the explorer; the only place that talks
 * to a model API.
 */

import { DEFAULT_RETRY_POLICY } from './client.js';
import type { LLMClient, LLMConfig, RetryPolicy } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';
import { ConfigError } from '../core/errors.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockLLMClient } from './mock.js';

// ── Provider factory ─────────────────────────────────────────

function requireKey(config: LLMConfig, variable: string): string {
  if (!config.apiKey) {
    throw new ConfigError(`${variable} is required when using the ${config.provider} provider`);
  }
  return config.apiKey;
}

export function createLLMClient(config: LLMConfig): LLMClient {
  const retry: RetryPolicy = {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: config.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
  };

  switch (config.provider) {
    case 'anthropic':
      return createAnthropicClient(requireKey(config, 'ANTHROPIC_API_KEY'), config.model, retry);
    case 'openai':
      return createOpenAIClient(requireKey(config, 'OPENAI_API_KEY'), config.model, retry);
    case 'mock':
      return createMockClient();
  }
}
