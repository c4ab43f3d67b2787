/**
 * Narrative Writer
 *
 * Rewrites the template draft for one narrative section (executive summary,
 * five-insights summary, truths, tensions, experiment) into warmer prose.
 * The draft carries every fact; the model may rephrase but not add claims.
 *
 * Uses MODEL_MID (longer-form writing).
 *
 * Output handling: repaired JSON `{ "narrative": "..." }`, then plain prose
 * when the reply is not JSON at all. Empty or structural-only replies throw
 * ParseError and the engine keeps the template text.
 */

import { llm, MODEL_MID, MAX_TOKENS } from '../lib/llm.js';
import { repairJSON } from '../lib/json-repair.js';
import logger from '../lib/logger.js';
import { ParseError } from '../synthesis/errors.js';
import {
  renderNarrative,
  type NarrativeGenerator,
  type NarrativeKind,
  type NarrativeRequest,
} from '../synthesis/narrative.js';
import { NarrativeOutputSchema } from './schemas/collaborator-schemas.js';

const SYSTEM_PROMPT = `You are a career coach writing for the person being coached. You receive a factual DRAFT produced from their self-assessment and their advisors' feedback. Rewrite it in a warm, direct, second-person voice. Keep every fact, number and theme from the draft. Do not add achievements, employers, or claims the draft does not contain. Keep markdown headings when the draft has them.`;

const SECTION_GUIDANCE: Record<NarrativeKind, string> = {
  executive_summary: 'An executive summary of at most three short paragraphs.',
  five_insights_summary: 'A summary of the five strength categories, keeping one entry per item in the draft.',
  truths: 'The core truths, one heading per truth.',
  tensions: 'The creative tensions, one heading per tension.',
  experiment: 'The recommended career experiment, ending with its success criteria as a list.',
};

export function parseNarrativeReply(text: string, kind: NarrativeKind): string {
  const parsed = NarrativeOutputSchema.safeParse(repairJSON(text));
  if (parsed.success) {
    const narrative = parsed.data.narrative.trim();
    if (narrative.length > 0) return narrative;
  }

  const trimmed = text.trim();
  if (trimmed.length > 0 && !/^[[{]/.test(trimmed)) {
    logger.warn({ kind, rawSnippet: trimmed.substring(0, 200) }, 'Narrative writer: reply was not JSON, using raw prose');
    return trimmed;
  }

  throw new ParseError('Narrative writer returned no usable narrative', {
    context: { collaborator: 'narrative_generator', kind, rawSnippet: trimmed.substring(0, 200) },
  });
}

export class LlmNarrativeWriter implements NarrativeGenerator {
  async generateNarrative(request: NarrativeRequest, signal?: AbortSignal): Promise<string> {
    const draft = renderNarrative(request);

    const response = await llm.chat({
      model: MODEL_MID,
      max_tokens: MAX_TOKENS,
      system: SYSTEM_PROMPT,
      signal,
      messages: [{
        role: 'user',
        content: `SECTION: ${SECTION_GUIDANCE[request.kind]}

DRAFT:
${draft}

Return ONLY valid JSON:
{ "narrative": "the rewritten section" }`,
      }],
    });

    return parseNarrativeReply(response.text, request.kind);
  }
}
