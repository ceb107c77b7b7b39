import Anthropic from '@anthropic-ai/sdk';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface CompletionParams {
  model: string;
  system: string;
  prompt: string;
  temperature: number;
  max_tokens: number;
  signal?: AbortSignal;
}

export interface CompletionResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const timeoutController = new AbortController();
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    timeoutController.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const abortCombined = (reason?: unknown) => {
    if (combinedController.signal.aborted) return;
    combinedController.abort(reason);
  };

  const onCallerAbort = () => abortCombined(callerSignal?.reason);
  const onTimeoutAbort = () => abortCombined(timeoutController.signal.reason);

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }
  timeoutController.signal.addEventListener('abort', onTimeoutAbort, { once: true });

  const cleanup = () => {
    clearTimeout(timeout);
    if (callerSignal) {
      callerSignal.removeEventListener('abort', onCallerAbort);
    }
    timeoutController.signal.removeEventListener('abort', onTimeoutAbort);
    if (!timeoutController.signal.aborted) {
      timeoutController.abort();
    }
  };

  return { signal: combinedController.signal, cleanup };
}

// ─── Provider interface ──────────────────────────────────────────────

export interface LLMProvider {
  readonly name: string;
  complete(params: CompletionParams): Promise<CompletionResponse>;
}

// ─── Anthropic provider ──────────────────────────────────────────────

interface AnthropicConfig {
  apiKey: string;
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic;

  constructor(config: AnthropicConfig) {
    // Retries are owned by withRetry; the SDK must not add its own.
    this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
  }

  async complete(params: CompletionParams): Promise<CompletionResponse> {
    const response = await this.client.messages.create(
      {
        model: params.model,
        max_tokens: params.max_tokens,
        temperature: params.temperature,
        system: params.system,
        messages: [{ role: 'user', content: params.prompt }],
      },
      { signal: params.signal },
    );

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    return {
      text,
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

interface OpenAICompatibleConfig {
  apiKey: string;
  baseUrl: string;
  name?: string;
}

/** Status-carrying error so withRetry can classify upstream failures. */
export class ProviderHttpError extends Error {
  readonly status: number;
  readonly headers: Headers;

  constructor(provider: string, status: number, body: string, headers: Headers) {
    super(`${provider} API error ${status}: ${body}`);
    this.name = 'ProviderHttpError';
    this.status = status;
    this.headers = headers;
  }
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name: string;
  private apiKey: string;
  private baseUrl: string;

  constructor(config: OpenAICompatibleConfig) {
    this.name = config.name ?? 'openai';
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async complete(params: CompletionParams): Promise<CompletionResponse> {
    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: params.model,
        max_tokens: params.max_tokens,
        temperature: params.temperature,
        messages: [
          { role: 'system', content: params.system },
          { role: 'user', content: params.prompt },
        ],
      }),
      signal: params.signal,
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw new ProviderHttpError('OpenAI', response.status, errText, response.headers);
    }

    const data = await response.json() as OpenAIChatResponse;
    return {
      text: data.choices?.[0]?.message?.content ?? '',
      usage: {
        input_tokens: data.usage?.prompt_tokens ?? 0,
        output_tokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible type definitions (internal) ───────────────────

interface OpenAIChatResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
  };
}
