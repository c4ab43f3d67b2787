import { z } from 'zod';
import { getAnthropicClient } from './anthropic.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  signal?: AbortSignal;
  /** Provider-side ceiling; callers usually bound tighter through `signal`. */
  timeout_ms?: number;
}

export interface ChatResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

const DEFAULT_PROVIDER_TIMEOUT_MS = 180_000;

/** Largest delay setTimeout honours; longer delays fire immediately. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * One signal that aborts when the caller aborts or `timeoutMs` elapses,
 * whichever comes first. `cleanup` must run once the call settles.
 */
export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const timeoutController = new AbortController();
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    timeoutController.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, Math.min(Math.max(0, timeoutMs), MAX_TIMER_DELAY_MS));
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

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = getAnthropicClient();
    const { signal, cleanup } = createCombinedAbortSignal(
      params.signal,
      params.timeout_ms ?? DEFAULT_PROVIDER_TIMEOUT_MS,
    );

    try {
      const response = await anthropic.messages.create(
        {
          model: params.model,
          max_tokens: params.max_tokens,
          system: params.system,
          messages: params.messages,
        },
        { signal },
      );

      let text = '';
      for (const block of response.content) {
        if (block.type === 'text') text += block.text;
      }

      return {
        text,
        usage: {
          input_tokens: response.usage?.input_tokens ?? 0,
          output_tokens: response.usage?.output_tokens ?? 0,
        },
      };
    } finally {
      cleanup();
    }
  }
}

// ─── ZAI provider (OpenAI-compatible) ────────────────────────────────

const OpenAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullish(),
    }),
  })).default([]),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).nullish(),
});

interface ZAIConfig {
  apiKey: string;
  baseUrl: string;
}

export class ZAIProvider implements LLMProvider {
  readonly name = 'zai';
  private apiKey: string;
  private baseUrl: string;

  constructor(config: ZAIConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const { signal, cleanup } = createCombinedAbortSignal(
      params.signal,
      params.timeout_ms ?? DEFAULT_PROVIDER_TIMEOUT_MS,
    );

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: params.model,
          max_tokens: params.max_tokens,
          messages: [{ role: 'system', content: params.system }, ...params.messages],
          stream: false,
        }),
        signal,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        throw Object.assign(new Error(`ZAI API error ${response.status}: ${errText}`), { status: response.status });
      }

      const parsed = OpenAIChatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`ZAI API returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
      }

      const data = parsed.data;
      return {
        text: data.choices[0]?.message.content ?? '',
        usage: {
          input_tokens: data.usage?.prompt_tokens ?? 0,
          output_tokens: data.usage?.completion_tokens ?? 0,
        },
      };
    } finally {
      cleanup();
    }
  }
}
