import { parsePositiveInt } from './http-body-guard.js';
import { MAX_TIMER_DELAY_MS } from './llm-provider.js';

function envBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return fallback;
  return val === '1' || val.toLowerCase() === 'true';
}

/**
 * FF_LLM_THEME_TAGGING - Tag untagged responses through the LLM provider.
 *
 * Default: false (keyword tagging from the catalogue file). When enabled,
 * provider failures, timeouts and unparseable replies still fall back to
 * keyword tagging for the affected response.
 */
export const FF_LLM_THEME_TAGGING = envBool('FF_LLM_THEME_TAGGING', false);

/**
 * FF_LLM_NARRATIVE - Write executive summaries and framework narratives
 * through the LLM provider. Default: false (template prose).
 */
export const FF_LLM_NARRATIVE = envBool('FF_LLM_NARRATIVE', false);

/** Upper bound on a single collaborator call, retries included. Capped at the timer maximum. */
export const SYNTHESIS_COLLABORATOR_TIMEOUT_MS = Math.min(
  parsePositiveInt(process.env.SYNTHESIS_COLLABORATOR_TIMEOUT_MS, 30_000),
  MAX_TIMER_DELAY_MS,
);

/** Theme tagging calls one synthesis run keeps in flight at once. */
export const SYNTHESIS_TAGGING_CONCURRENCY = parsePositiveInt(process.env.SYNTHESIS_TAGGING_CONCURRENCY, 4);
