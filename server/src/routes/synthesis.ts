import { Hono } from 'hono';
import { parseJsonBodyWithLimit, parsePositiveInt } from '../lib/http-body-guard.js';
import { recordSynthesisOutcome, type SynthesisOutcome } from '../lib/request-metrics.js';
import { validateRequest } from '../lib/validate.js';
import { FF_LLM_THEME_TAGGING, SYNTHESIS_COLLABORATOR_TIMEOUT_MS } from '../lib/feature-flags.js';
import { LlmThemeTagger } from '../agents/theme-tagger.js';
import { loadCatalogues, type Catalogues } from '../synthesis/catalogues.js';
import { tagAnswer } from '../synthesis/collaborators.js';
import { createDefaultEngine } from '../synthesis/default-engine.js';
import type { SynthesisEngine, SynthesisResult } from '../synthesis/engine.js';
import {
  ExperimentsRequestSchema,
  SynthesisRequestSchema,
  ThemesRequestSchema,
} from '../synthesis/schemas.js';
import { extractKeywordThemes, type ThemeTagger } from '../synthesis/theme-tagging.js';

const MAX_SYNTHESIS_BODY_BYTES = parsePositiveInt(process.env.SYNTHESIS_MAX_BODY_BYTES, 1_048_576);

export interface SynthesisRouteDeps {
  engine?: SynthesisEngine;
  /** Collaborator for /themes; keyword scan only when null. */
  themeTagger?: ThemeTagger | null;
  catalogues?: Catalogues;
}

function outcomeOf(result: SynthesisResult): SynthesisOutcome {
  if (!result.ok) return 'fallback';
  return result.synthesis.metadata.degradedCollaborators.length > 0 ? 'degraded' : 'completed';
}

export function createSynthesisRoutes(deps: SynthesisRouteDeps = {}) {
  const engine = deps.engine ?? createDefaultEngine();
  const catalogues = deps.catalogues ?? loadCatalogues();
  const themeTagger = deps.themeTagger === undefined
    ? (FF_LLM_THEME_TAGGING ? new LlmThemeTagger() : null)
    : deps.themeTagger;

  const routes = new Hono();

  // POST /synthesis - full synthesis for one session
  routes.post('/', async (c) => {
    const parsedBody = await parseJsonBodyWithLimit(c, MAX_SYNTHESIS_BODY_BYTES);
    if (!parsedBody.ok) return parsedBody.response;

    const parsed = validateRequest(c, SynthesisRequestSchema, parsedBody.data);
    if (!parsed.ok) {
      c.get('logger').debug({ fields: parsed.error.context.fields }, 'Rejected request body');
      return parsed.response;
    }

    const { sessionId, selfResponses, advisorResponses, additionalContext } = parsed.data;
    const result = await engine.run(sessionId, selfResponses, advisorResponses, {
      additionalContext,
      signal: c.req.raw.signal,
    });

    const outcome = outcomeOf(result);
    recordSynthesisOutcome(outcome);
    c.get('logger').info({ sessionId, outcome }, 'Synthesis request served');

    if (!result.ok) {
      return c.json({ synthesis: result.synthesis, degraded: true, error: result.error.toJSON() });
    }
    return c.json({ synthesis: result.synthesis, degraded: outcome === 'degraded' });
  });

  // POST /synthesis/experiments - micro-experiments from the same run
  routes.post('/experiments', async (c) => {
    const parsedBody = await parseJsonBodyWithLimit(c, MAX_SYNTHESIS_BODY_BYTES);
    if (!parsedBody.ok) return parsedBody.response;

    const parsed = validateRequest(c, ExperimentsRequestSchema, parsedBody.data);
    if (!parsed.ok) {
      c.get('logger').debug({ fields: parsed.error.context.fields }, 'Rejected request body');
      return parsed.response;
    }

    const { sessionId, selfResponses, advisorResponses, additionalContext, max } = parsed.data;
    const result = await engine.run(sessionId, selfResponses, advisorResponses, {
      additionalContext,
      maxExperiments: max,
      signal: c.req.raw.signal,
    });
    recordSynthesisOutcome(outcomeOf(result));

    return c.json({ experiments: result.ok ? result.microExperiments : [] });
  });

  // POST /synthesis/themes - tag a single answer
  routes.post('/themes', async (c) => {
    const parsedBody = await parseJsonBodyWithLimit(c, MAX_SYNTHESIS_BODY_BYTES);
    if (!parsedBody.ok) return parsedBody.response;

    const parsed = validateRequest(c, ThemesRequestSchema, parsedBody.data);
    if (!parsed.ok) {
      c.get('logger').debug({ fields: parsed.error.context.fields }, 'Rejected request body');
      return parsed.response;
    }

    const { question, answer } = parsed.data;
    if (!themeTagger) {
      return c.json({ themes: extractKeywordThemes(answer, catalogues), source: 'keyword' });
    }

    const outcome = await tagAnswer(themeTagger, question, answer, 'extract_themes:request', catalogues, {
      timeoutMs: SYNTHESIS_COLLABORATOR_TIMEOUT_MS,
      signal: c.req.raw.signal,
      logger: c.get('logger'),
      maxAttempts: 3,
      retryBaseDelayMs: 1000,
    });
    return c.json({ themes: outcome.value, source: outcome.degraded ? 'keyword' : 'collaborator' });
  });

  return routes;
}
