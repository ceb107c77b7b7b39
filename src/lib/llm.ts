import { AnthropicProvider, OpenAICompatibleProvider } from './llm-provider.js';
import type { LLMProvider } from './llm-provider.js';

export type ProviderName = 'openai' | 'anthropic';

export const PROVIDER_NAMES = ['openai', 'anthropic'] as const satisfies readonly ProviderName[];

// ─── Model constants ─────────────────────────────────────────────────

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: process.env.OPENAI_MODEL ?? 'gpt-4o-mini',
  anthropic: process.env.ANTHROPIC_MODEL ?? 'claude-3-5-haiku-latest',
};

export const API_KEY_ENV: Record<ProviderName, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

/** Per-attempt ceiling for a single model call. */
export const LLM_TIMEOUT_MS = parseInt(process.env.LLM_TIMEOUT_MS ?? '60000', 10);

/** Minimum spacing between the starts of two outbound model calls. */
export const LLM_MIN_INTERVAL_MS = parseInt(process.env.LLM_MIN_INTERVAL_MS ?? '1000', 10);

export function isProviderName(value: string): value is ProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(value);
}

/**
 * Provider named by LLM_PROVIDER, or the one whose API key is present.
 * OpenAI wins when both keys are set.
 */
export function defaultProviderName(): ProviderName {
  const configured = process.env.LLM_PROVIDER?.toLowerCase();
  if (configured && isProviderName(configured)) return configured;
  if (!process.env.OPENAI_API_KEY && process.env.ANTHROPIC_API_KEY) return 'anthropic';
  return 'openai';
}

export function apiKeyFromEnv(provider: ProviderName): string | undefined {
  const value = process.env[API_KEY_ENV[provider]];
  return value && value.trim() ? value : undefined;
}

// ─── Provider factory ────────────────────────────────────────────────

export function createProvider(provider: ProviderName, apiKey: string): LLMProvider {
  if (provider === 'anthropic') {
    return new AnthropicProvider({ apiKey });
  }
  const baseUrl = process.env.OPENAI_BASE_URL ?? 'https://api.openai.com/v1';
  return new OpenAICompatibleProvider({ apiKey, baseUrl });
}
