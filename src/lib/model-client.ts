import type { LLMProvider } from './llm-provider.js';
import { createCombinedAbortSignal } from './llm-provider.js';
import { withRetry, isRateLimitError } from './retry.js';
import { RequestThrottle } from './throttle.js';
import { LLM_MIN_INTERVAL_MS, LLM_TIMEOUT_MS } from './llm.js';
import logger from './logger.js';

export interface GenerateOptions {
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

/**
 * The single model-call seam. Generators, the analyzer and the reflector
 * depend on this, never on a provider.
 */
export interface TextGenerator {
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export interface ModelClientOptions {
  provider: LLMProvider;
  model: string;
  system?: string;
  maxAttempts?: number;
  timeoutMs?: number;
  baseDelayMs?: number;
  rateLimitBaseDelayMs?: number;
  /** Pass one instance to several clients to space their calls jointly. */
  throttle?: RequestThrottle;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_SYSTEM_PROMPT =
  'You generate realistic synthetic personal data. Respond with a single JSON object and nothing else.';

export class ModelClient implements TextGenerator {
  private readonly provider: LLMProvider;
  private readonly model: string;
  private readonly system: string;
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly baseDelayMs: number;
  private readonly rateLimitBaseDelayMs: number;
  private readonly throttle: RequestThrottle;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: ModelClientOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.system = options.system ?? DEFAULT_SYSTEM_PROMPT;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.timeoutMs = options.timeoutMs ?? LLM_TIMEOUT_MS;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.rateLimitBaseDelayMs = options.rateLimitBaseDelayMs ?? 60_000;
    this.throttle = options.throttle ?? new RequestThrottle({ minIntervalMs: LLM_MIN_INTERVAL_MS });
    this.sleep = options.sleep;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    return withRetry(
      async (attempt) => {
        await this.throttle.acquire();
        const { signal, cleanup } = createCombinedAbortSignal(options.signal, this.timeoutMs);
        try {
          const response = await this.provider.complete({
            model: this.model,
            system: this.system,
            prompt,
            temperature: options.temperature,
            max_tokens: options.maxTokens,
            signal,
          });
          const text = response.text.trim();
          if (!text) {
            throw new Error('Empty response from model');
          }
          logger.debug(
            { provider: this.provider.name, model: this.model, attempt, usage: response.usage },
            'Model call completed',
          );
          return text;
        } finally {
          cleanup();
        }
      },
      {
        maxAttempts: this.maxAttempts,
        baseDelay: this.baseDelayMs,
        rateLimitBaseDelay: this.rateLimitBaseDelayMs,
        sleep: this.sleep,
        onRetry: (attempt, error, delayMs) => {
          logger.warn(
            {
              provider: this.provider.name,
              attempt,
              maxAttempts: this.maxAttempts,
              delayMs,
              rateLimited: isRateLimitError(error),
              error: error.message,
            },
            'Model call failed, retrying',
          );
        },
      },
    );
  }
}
