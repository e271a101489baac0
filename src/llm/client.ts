import { setTimeout as sleep } from 'node:timers/promises';

import { z } from 'zod';

import { RATE_LIMIT } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── LLMClient interface ──────────────────────────────────────

export interface GenerateOptions {
  signal?: AbortSignal | undefined;
}

export interface LLMClient {
  generate(
    systemPrompt: string,
    userPrompt: string,
    options?: GenerateOptions,
  ): Promise<string>;
}

// ── Rate limiting ────────────────────────────────────────────

export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: RATE_LIMIT.MAX_ATTEMPTS,
  backoffMs: RATE_LIMIT.BACKOFF_MS,
};

/** Thrown by a provider call that the server refused for rate limiting. */
export class RateLimitedError extends Error {
  /** Server-suggested wait, when it sent one. */
  readonly retryAfterMs: number | undefined;

  constructor(provider: string, retryAfterMs?: number) {
    super(`${provider} API rate limit reached`);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Runs a provider call, waiting and retrying while it throws
 * RateLimitedError. Waits grow linearly unless the server names one.
 * The wait itself is cut short by the signal.
 */
export async function withRateLimitRetry<T>(
  call: () => Promise<T>,
  signal: AbortSignal | undefined,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await call();
    } catch (err) {
      if (!(err instanceof RateLimitedError) || attempt >= policy.maxAttempts) throw err;

      const waitMs = err.retryAfterMs ?? attempt * policy.backoffMs;
      log.warn(`[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s (attempt ${String(attempt)}/${String(policy.maxAttempts)})`);
      await sleep(waitMs, undefined, { signal });
    }
  }
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  /** Attempts per call while the provider keeps rate limiting. */
  maxAttempts: z.number().int().positive().optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

const API_KEY_VARS: Record<LLMProvider, string | undefined> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  mock: undefined,
};

// ── Env loader ───────────────────────────────────────────────

/**
 * Reads provider, key and model from the environment. Values in `overrides`
 * (from the config file) win, and the key is read for the final provider.
 */
export function loadLLMConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Omit<LLMConfig, 'apiKey'>> = {},
): LLMConfig {
  const provider = llmProviderSchema.parse(overrides.provider ?? env['LLM_PROVIDER'] ?? 'anthropic');
  const keyVar = API_KEY_VARS[provider];

  return llmConfigSchema.parse({
    provider,
    apiKey: keyVar ? env[keyVar] : undefined,
    model: overrides.model ?? env['TASKPILOT_MODEL'] ?? env['LLM_MODEL'],
    maxAttempts: overrides.maxAttempts,
  });
}
