import { LlmNarrativeWriter } from '../agents/narrative-writer.js';
import { LlmThemeTagger } from '../agents/theme-tagger.js';
import {
  FF_LLM_NARRATIVE,
  FF_LLM_THEME_TAGGING,
  SYNTHESIS_COLLABORATOR_TIMEOUT_MS,
  SYNTHESIS_TAGGING_CONCURRENCY,
} from '../lib/feature-flags.js';
import type { Logger } from '../lib/logger.js';
import { loadCatalogues } from './catalogues.js';
import { SynthesisEngine } from './engine.js';
import { TemplateNarrativeGenerator } from './narrative.js';
import { KeywordThemeTagger } from './theme-tagging.js';

/**
 * Engine wired from the environment: LLM collaborators only behind their
 * feature flags, keyword tagging and templates otherwise.
 */
export function createDefaultEngine(logger?: Logger): SynthesisEngine {
  const catalogues = loadCatalogues();
  return new SynthesisEngine({
    catalogues,
    logger,
    themeTagger: FF_LLM_THEME_TAGGING ? new LlmThemeTagger() : new KeywordThemeTagger(catalogues),
    narrativeGenerator: FF_LLM_NARRATIVE ? new LlmNarrativeWriter() : new TemplateNarrativeGenerator(),
    collaboratorTimeoutMs: SYNTHESIS_COLLABORATOR_TIMEOUT_MS,
    taggingConcurrency: SYNTHESIS_TAGGING_CONCURRENCY,
  });
}
