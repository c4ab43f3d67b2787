/**
 * Synthesis Engine
 *
 * Assembles a CareerSynthesis from one session's self responses and advisor
 * responses. Phases run validating → computing → assembling → done; any
 * failure (or a cancelled signal) moves to failed → fallback_assembled.
 *
 * `run` never throws: the fallback is an ordinary `{ ok: false }` result
 * that still carries a well-formed synthesis. Collaborator failures do not
 * fail the run at all; they degrade locally and are listed in
 * `metadata.degradedCollaborators`.
 */

import { randomUUID } from 'node:crypto';
import { createConcurrencyLimiter, type ConcurrencyLimiter } from '../lib/concurrency.js';
import rootLogger, { type Logger } from '../lib/logger.js';
import { loadCatalogues, type Catalogues } from './catalogues.js';
import {
  tagResponse,
  writeNarrative,
  type CollaboratorOutcome,
  type CollaboratorSettings,
} from './collaborators.js';
import {
  SynthesisCancelledError,
  ValidationError,
  toSynthesisError,
  type SynthesisError,
} from './errors.js';
import { generateMicroExperiments } from './experiments.js';
import {
  buildFiveInsightsModel,
  dominantCategory,
  isWellBalanced,
  priorityActions,
  totalInsights,
} from './five-insights.js';
import { composeFramework, withNarratives } from './framework.js';
import { categorizeInsights } from './insight-categorizer.js';
import { buildJohariWindow } from './johari-window.js';
import {
  buildStrategicRecommendations,
  TemplateNarrativeGenerator,
  type NarrativeGenerator,
} from './narrative.js';
import {
  calculateAlignmentScore,
  calculateConfidenceScore,
  calculateSynthesisComplexity,
  confidenceLevelFor,
} from './scoring.js';
import { reconcileThemes } from './theme-reconciler.js';
import { KeywordThemeTagger, type ThemeTagger } from './theme-tagging.js';
import type {
  AdvisorResponse,
  CareerExperiment,
  CareerResponse,
  CareerSynthesis,
  CategorizedInsights,
  DegradedCollaborator,
  FiveInsightsModel,
  JohariWindow,
  SelfResponse,
  TruthsTensionsExperiment,
} from './types.js';

export const SYNTHESIS_VERSION = '2.0.0';
export const DEFAULT_COLLABORATOR_TIMEOUT_MS = 30_000;
export const DEFAULT_TAGGING_CONCURRENCY = 4;
export const MIN_DOMAIN_COVERAGE = 2;

export const FALLBACK_EXECUTIVE_SUMMARY =
  'Career synthesis is being processed. Please check back shortly for detailed insights.';
export const FALLBACK_RECOMMENDATIONS = [
  'Continue career exploration',
  'Gather more feedback',
  'Reflect on current responses',
] as const;
export const FALLBACK_ALIGNMENT_SCORE = 0.5;

export type SynthesisPhase =
  | 'validating'
  | 'computing'
  | 'assembling'
  | 'done'
  | 'failed'
  | 'fallback_assembled';

export interface SynthesisEngineDeps {
  themeTagger?: ThemeTagger;
  narrativeGenerator?: NarrativeGenerator;
  logger?: Logger;
  clock?: () => Date;
  idGenerator?: () => string;
  catalogues?: Catalogues;
  collaboratorTimeoutMs?: number;
  /** Attempts per collaborator call, including the first. */
  collaboratorMaxAttempts?: number;
  collaboratorRetryBaseDelayMs?: number;
  /** Theme tagging calls in flight at once, per run. */
  taggingConcurrency?: number;
}

export interface SynthesisOptions {
  additionalContext?: Record<string, unknown>;
  signal?: AbortSignal;
  maxExperiments?: number;
}

export type SynthesisResult =
  | {
    ok: true;
    synthesis: CareerSynthesis;
    fiveInsights: FiveInsightsModel;
    johariWindow: JohariWindow;
    framework: TruthsTensionsExperiment;
    microExperiments: CareerExperiment[];
    /** Elapsed time by the engine clock. Not part of the synthesis record. */
    durationMs: number;
  }
  | { ok: false; error: SynthesisError; synthesis: CareerSynthesis };

interface RunContext {
  sessionId: string;
  log: Logger;
  signal?: AbortSignal;
  degraded: DegradedCollaborator[];
}

const EMPTY_INSIGHTS: CategorizedInsights = {
  alignmentAreas: [],
  hiddenStrengths: [],
  overestimatedAreas: [],
  developmentOpportunities: [],
  repositioningPotential: [],
};

export class SynthesisEngine {
  private readonly themeTagger: ThemeTagger;
  private readonly narrativeGenerator: NarrativeGenerator;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;
  private readonly catalogues: Catalogues;
  private readonly collaboratorTimeoutMs: number;
  private readonly collaboratorMaxAttempts: number;
  private readonly collaboratorRetryBaseDelayMs: number;
  private readonly taggingConcurrency: number;

  constructor(deps: SynthesisEngineDeps = {}) {
    this.catalogues = deps.catalogues ?? loadCatalogues();
    this.themeTagger = deps.themeTagger ?? new KeywordThemeTagger(this.catalogues);
    this.narrativeGenerator = deps.narrativeGenerator ?? new TemplateNarrativeGenerator();
    this.logger = deps.logger ?? rootLogger;
    this.clock = deps.clock ?? (() => new Date());
    this.idGenerator = deps.idGenerator ?? randomUUID;
    this.collaboratorTimeoutMs = deps.collaboratorTimeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS;
    this.collaboratorMaxAttempts = deps.collaboratorMaxAttempts ?? 3;
    this.collaboratorRetryBaseDelayMs = deps.collaboratorRetryBaseDelayMs ?? 1000;
    this.taggingConcurrency = deps.taggingConcurrency ?? DEFAULT_TAGGING_CONCURRENCY;
  }

  async generateSynthesis(
    sessionId: string,
    selfResponses: readonly SelfResponse[],
    advisorResponses: readonly AdvisorResponse[],
    options: SynthesisOptions = {},
  ): Promise<CareerSynthesis> {
    const result = await this.run(sessionId, selfResponses, advisorResponses, options);
    return result.synthesis;
  }

  async run(
    sessionId: string,
    selfResponses: readonly SelfResponse[],
    advisorResponses: readonly AdvisorResponse[],
    options: SynthesisOptions = {},
  ): Promise<SynthesisResult> {
    const ctx: RunContext = {
      sessionId,
      log: this.logger.child({ sessionId }),
      signal: options.signal,
      degraded: [],
    };

    this.transition(ctx, 'validating');
    const invalid = this.validate(ctx, selfResponses, advisorResponses);
    if (invalid) {
      return this.fail(ctx, invalid, selfResponses, advisorResponses, options);
    }

    try {
      const result = await this.compute(ctx, selfResponses, advisorResponses, options);
      this.transition(ctx, 'done');
      ctx.log.info({
        alignmentScore: result.synthesis.alignmentScore,
        confidenceLevel: result.synthesis.confidenceLevel,
        degraded: ctx.degraded.length,
        durationMs: result.ok ? result.durationMs : undefined,
      }, 'Synthesis complete');
      return result;
    } catch (err) {
      const error = options.signal?.aborted && !(err instanceof SynthesisCancelledError)
        ? new SynthesisCancelledError({ sessionId })
        : toSynthesisError(err, { sessionId });
      return this.fail(ctx, error, selfResponses, advisorResponses, options);
    }
  }

  // ─── Phases ──────────────────────────────────────────────────────────

  private transition(ctx: RunContext, phase: SynthesisPhase): void {
    ctx.log.debug({ phase }, 'Synthesis phase');
  }

  private validate(
    ctx: RunContext,
    selfResponses: readonly SelfResponse[],
    advisorResponses: readonly AdvisorResponse[],
  ): ValidationError | null {
    if (selfResponses.length === 0 || advisorResponses.length === 0) {
      return new ValidationError('Both self and advisor responses are required', {
        sessionId: ctx.sessionId,
        selfCount: selfResponses.length,
        advisorCount: advisorResponses.length,
      });
    }

    const selfDomains = new Set(selfResponses.map((r) => r.domain)).size;
    const advisorDomains = new Set(advisorResponses.map((r) => r.domain)).size;
    if (selfDomains < MIN_DOMAIN_COVERAGE || advisorDomains < MIN_DOMAIN_COVERAGE) {
      ctx.log.warn({ selfDomains, advisorDomains }, 'Limited domain coverage; insights may be narrow');
    }
    return null;
  }

  private async compute(
    ctx: RunContext,
    rawSelf: readonly SelfResponse[],
    rawAdvisor: readonly AdvisorResponse[],
    options: SynthesisOptions,
  ): Promise<SynthesisResult> {
    this.transition(ctx, 'computing');
    const startedAt = this.clock();
    const generatedAt = startedAt.toISOString();
    const id = this.idGenerator();
    this.throwIfCancelled(ctx);

    const runLimited = createConcurrencyLimiter(this.taggingConcurrency);
    const [selfResponses, advisorResponses] = await Promise.all([
      this.tagMissingThemes(ctx, rawSelf, runLimited),
      this.tagMissingThemes(ctx, rawAdvisor, runLimited),
    ]);
    this.throwIfCancelled(ctx);

    const catalogues = this.catalogues;
    const profile = reconcileThemes(selfResponses, advisorResponses);
    const insights = categorizeInsights({ selfResponses, advisorResponses, profile, catalogues });
    const fiveInsightsDraft = buildFiveInsightsModel({
      id: `${id}-five-insights`,
      sessionId: ctx.sessionId,
      generatedAt,
      insights,
      selfResponses,
      advisorResponses,
      catalogues,
    });
    const johariWindow = buildJohariWindow(profile, catalogues);
    const frameworkDraft = composeFramework({
      selfResponses,
      advisorResponses,
      profile,
      fiveInsights: fiveInsightsDraft,
      catalogues,
    });
    const microExperiments = generateMicroExperiments(fiveInsightsDraft, johariWindow, options.maxExperiments);
    const alignmentScore = calculateAlignmentScore(profile);
    const confidenceLevel = confidenceLevelFor(calculateConfidenceScore(selfResponses, advisorResponses));
    this.throwIfCancelled(ctx);

    this.transition(ctx, 'assembling');
    const settings = this.collaboratorSettings(ctx);
    const [executiveSummary, fiveInsightsSummary, truthsNarrative, tensionsNarrative, experimentNarrative] =
      await Promise.all([
        writeNarrative(this.narrativeGenerator, {
          kind: 'executive_summary',
          alignmentScore,
          selfResponseCount: selfResponses.length,
          advisorResponseCount: advisorResponses.length,
          fiveInsights: fiveInsightsDraft,
        }, settings),
        writeNarrative(this.narrativeGenerator, { kind: 'five_insights_summary', fiveInsights: fiveInsightsDraft }, settings),
        writeNarrative(this.narrativeGenerator, { kind: 'truths', truths: frameworkDraft.truths }, settings),
        writeNarrative(this.narrativeGenerator, { kind: 'tensions', tensions: frameworkDraft.tensions }, settings),
        writeNarrative(this.narrativeGenerator, {
          kind: 'experiment',
          experiment: frameworkDraft.experiment,
          feasibilityScore: frameworkDraft.feasibilityScore,
        }, settings),
      ]);
    this.collectDegraded(ctx, [executiveSummary, fiveInsightsSummary, truthsNarrative, tensionsNarrative, experimentNarrative]);
    this.throwIfCancelled(ctx);

    const fiveInsights: FiveInsightsModel = { ...fiveInsightsDraft, executiveSummary: fiveInsightsSummary.value };
    const framework = withNarratives(frameworkDraft, {
      truths: truthsNarrative.value,
      tensions: tensionsNarrative.value,
      experiment: experimentNarrative.value,
    });
    const insightCount = totalInsights(fiveInsights);

    const synthesis: CareerSynthesis = {
      id,
      sessionId: ctx.sessionId,
      generatedAt,
      selfResponseIds: selfResponses.map((r) => r.id),
      advisorResponseIds: advisorResponses.map((r) => r.id),
      ...insights,
      executiveSummary: executiveSummary.value,
      strategicRecommendations: buildStrategicRecommendations(fiveInsights, johariWindow),
      alignmentScore,
      confidenceLevel,
      metadata: {
        version: SYNTHESIS_VERSION,
        fiveInsights: {
          totalInsights: insightCount,
          balanceScore: fiveInsights.balanceScore,
          dominantCategory: dominantCategory(fiveInsights),
          isWellBalanced: isWellBalanced(fiveInsights),
          keyRecommendations: fiveInsights.keyRecommendations,
          priorityActions: priorityActions(fiveInsights),
        },
        johariWindow,
        truthsTensionsExperiment: framework,
        microExperiments,
        processingStats: {
          themesAnalyzed: profile.allThemes.length,
          evidencePoints: countEvidence(insights),
          synthesisComplexity: calculateSynthesisComplexity(insightCount, johariWindow),
        },
        degradedCollaborators: ctx.degraded,
        additionalContext: { ...options.additionalContext },
      },
    };

    const durationMs = Math.max(0, this.clock().getTime() - startedAt.getTime());
    return { ok: true, synthesis, fiveInsights, johariWindow, framework, microExperiments, durationMs };
  }

  private fail(
    ctx: RunContext,
    error: SynthesisError,
    selfResponses: readonly SelfResponse[],
    advisorResponses: readonly AdvisorResponse[],
    options: SynthesisOptions,
  ): SynthesisResult {
    this.transition(ctx, 'failed');
    ctx.log.warn({ code: error.code, error: error.message, context: error.context }, 'Synthesis failed, assembling fallback');

    const synthesis: CareerSynthesis = {
      id: this.idGenerator(),
      sessionId: ctx.sessionId,
      generatedAt: this.clock().toISOString(),
      selfResponseIds: selfResponses.map((r) => r.id),
      advisorResponseIds: advisorResponses.map((r) => r.id),
      ...EMPTY_INSIGHTS,
      executiveSummary: FALLBACK_EXECUTIVE_SUMMARY,
      strategicRecommendations: [...FALLBACK_RECOMMENDATIONS],
      alignmentScore: FALLBACK_ALIGNMENT_SCORE,
      confidenceLevel: 'low',
      metadata: {
        version: SYNTHESIS_VERSION,
        degradedCollaborators: [],
        fallback: { reason: error.code, message: error.message },
        additionalContext: { ...options.additionalContext },
      },
    };

    this.transition(ctx, 'fallback_assembled');
    return { ok: false, error, synthesis };
  }

  // ─── Collaborators ───────────────────────────────────────────────────

  private collaboratorSettings(ctx: RunContext): CollaboratorSettings {
    return {
      timeoutMs: this.collaboratorTimeoutMs,
      signal: ctx.signal,
      logger: ctx.log,
      maxAttempts: this.collaboratorMaxAttempts,
      retryBaseDelayMs: this.collaboratorRetryBaseDelayMs,
    };
  }

  /** Responses that arrive tagged are left alone. */
  private async tagMissingThemes<T extends CareerResponse>(
    ctx: RunContext,
    responses: readonly T[],
    runLimited: ConcurrencyLimiter,
  ): Promise<T[]> {
    const settings = this.collaboratorSettings(ctx);
    const tagged = await Promise.all(responses.map(async (response) => {
      if (response.keyThemes.length > 0) return { response, outcome: null };
      const outcome = await runLimited(() => tagResponse(this.themeTagger, response, this.catalogues, settings));
      return { response: { ...response, keyThemes: outcome.value }, outcome };
    }));

    this.collectDegraded(ctx, tagged.flatMap((t) => (t.outcome ? [t.outcome] : [])));
    return tagged.map((t) => t.response);
  }

  private collectDegraded(ctx: RunContext, outcomes: readonly CollaboratorOutcome<unknown>[]): void {
    for (const outcome of outcomes) {
      if (outcome.degraded) ctx.degraded.push(outcome.degraded);
    }
  }

  private throwIfCancelled(ctx: RunContext): void {
    if (ctx.signal?.aborted) {
      throw new SynthesisCancelledError({ sessionId: ctx.sessionId });
    }
  }
}

function countEvidence(insights: CategorizedInsights): number {
  return [
    ...insights.alignmentAreas,
    ...insights.hiddenStrengths,
    ...insights.overestimatedAreas,
    ...insights.developmentOpportunities,
    ...insights.repositioningPotential,
  ].reduce((sum, insight) => sum + insight.supportingEvidence.length, 0);
}
