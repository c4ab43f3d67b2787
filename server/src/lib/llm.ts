import { AnthropicProvider, ZAIProvider, type LLMProvider } from './llm-provider.js';
import { MODEL as ANTHROPIC_MODEL, MODEL_LIGHT as ANTHROPIC_MODEL_LIGHT } from './anthropic.js';
import { parsePositiveInt } from './http-body-guard.js';

// ─── Provider selection ──────────────────────────────────────────────

type ProviderName = 'zai' | 'anthropic';

function resolveProviderName(): ProviderName {
  const configured = process.env.LLM_PROVIDER?.toLowerCase();
  if (configured === 'zai' || configured === 'anthropic') return configured;
  return process.env.ZAI_API_KEY ? 'zai' : 'anthropic';
}

const providerName = resolveProviderName();

// ─── Model constants ─────────────────────────────────────────────────

/** Theme extraction: short structured output */
export const MODEL_LIGHT = providerName === 'zai'
  ? (process.env.ZAI_MODEL_LIGHT ?? 'glm-4.7-flash')
  : ANTHROPIC_MODEL_LIGHT;

/** Narrative prose */
export const MODEL_MID = providerName === 'zai'
  ? (process.env.ZAI_MODEL_MID ?? 'glm-4.5-air')
  : ANTHROPIC_MODEL;

export const MAX_TOKENS = parsePositiveInt(process.env.MAX_TOKENS, 2048);

// ─── Provider factory ────────────────────────────────────────────────

function createProvider(): LLMProvider {
  if (providerName === 'zai') {
    const apiKey = process.env.ZAI_API_KEY;
    if (!apiKey) {
      throw new Error('ZAI_API_KEY environment variable is required when LLM_PROVIDER=zai');
    }
    const baseUrl = process.env.ZAI_BASE_URL ?? 'https://api.z.ai/api/paas/v4';
    return new ZAIProvider({ apiKey, baseUrl });
  }

  // Anthropic lazily initializes its client on first use.
  return new AnthropicProvider();
}

/** Active LLM provider instance based on LLM_PROVIDER env var */
export const llm: LLMProvider = createProvider();
