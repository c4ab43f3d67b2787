/**
 * Theme Tagger
 *
 * Reads one question/answer pair and returns up to five short theme tags in
 * lower snake case (`problem_solving`, `leadership`). Used only for
 * responses that arrive without tags.
 *
 * Uses MODEL_LIGHT (short structured extraction).
 *
 * Output handling: repaired JSON validated with zod, then a best-effort
 * line/comma split of the raw text. Nothing usable → ParseError, and the
 * engine falls back to keyword tagging for that response.
 */

import { llm, MODEL_LIGHT } from '../lib/llm.js';
import { repairJSON } from '../lib/json-repair.js';
import logger from '../lib/logger.js';
import { normalizeTheme, unique } from '../synthesis/helpers.js';
import { ParseError } from '../synthesis/errors.js';
import type { ThemeTagger } from '../synthesis/theme-tagging.js';
import { ThemesOutputSchema } from './schemas/collaborator-schemas.js';

export const MAX_THEMES = 5;
const MAX_TAG_WORDS = 4;
const MAX_TAG_LENGTH = 40;

const SYSTEM_PROMPT = `You tag career-reflection answers with professional themes. A theme is a short noun phrase naming a strength, value, interest or working style (for example: leadership, problem solving, attention to detail, helping others). Return at most ${MAX_THEMES} themes, most prominent first. Never invent themes the answer does not support.`;

function normalizeTags(raw: readonly string[]): string[] {
  return unique(
    raw
      .map((t) => t.trim())
      .filter((t) => t.length > 0 && t.length <= MAX_TAG_LENGTH && t.split(/[\s_-]+/).length <= MAX_TAG_WORDS)
      .map(normalizeTheme)
      .filter((t) => t.length > 0),
  ).slice(0, MAX_THEMES);
}

/**
 * Salvage tags from a reply that is not JSON: one tag per line or per
 * comma, with list markers and quotes stripped.
 */
export function parseThemesBestEffort(text: string): string[] {
  const pieces = text
    .replace(/```[a-z]*|```/gi, '')
    .split(/[\n,;]+/)
    .map((piece) => piece
      .replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '')
      .replace(/["'`[\]{}]/g, '')
      .replace(/^themes?\s*:\s*/i, '')
      .trim());
  return normalizeTags(pieces);
}

export function parseThemesReply(text: string): string[] {
  const parsed = ThemesOutputSchema.safeParse(repairJSON(text));
  if (parsed.success) {
    const tags = normalizeTags(parsed.data.themes);
    if (tags.length > 0) return tags;
  }

  const salvaged = parseThemesBestEffort(text);
  if (salvaged.length > 0) {
    logger.warn({ rawSnippet: text.substring(0, 200) }, 'Theme tagger: JSON unusable, salvaged tags from text');
    return salvaged;
  }

  throw new ParseError('Theme tagger returned no usable themes', {
    context: { collaborator: 'theme_tagger', rawSnippet: text.substring(0, 200) },
  });
}

export class LlmThemeTagger implements ThemeTagger {
  async extractThemes(question: string, answer: string, signal?: AbortSignal): Promise<string[]> {
    const response = await llm.chat({
      model: MODEL_LIGHT,
      max_tokens: 256,
      system: SYSTEM_PROMPT,
      signal,
      messages: [{
        role: 'user',
        content: `QUESTION:
${question}

ANSWER:
${answer}

Return ONLY valid JSON:
{ "themes": ["theme one", "theme two"] }`,
      }],
    });

    return parseThemesReply(response.text);
  }
}
