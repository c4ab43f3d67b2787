/**
 * Insight Categorizer
 *
 * Five independent frequency-threshold scans over the same theme evidence.
 * A theme may surface in several categories at once (an energising strength
 * can also be a positioning opportunity); nothing here deduplicates across
 * categories.
 *
 * Every insight names exactly the input theme it was derived from in
 * `relatedThemes`, and ids are `<category>_<theme>` so reruns are stable.
 */

import type { Catalogues } from './catalogues.js';
import {
  advisorQuote,
  clamp,
  formatThemeTitle,
  mean,
  normalizeTitle,
  responsesWithTheme,
  selfQuote,
  tokenize,
} from './helpers.js';
import { containsAnyKeyword } from './keyword-scoring.js';
import type {
  AdvisorResponse,
  CategorizedInsights,
  SelfResponse,
  SynthesisInsight,
  ThemeProfile,
} from './types.js';

export interface CategorizerInput {
  selfResponses: readonly SelfResponse[];
  advisorResponses: readonly AdvisorResponse[];
  profile: ThemeProfile;
  catalogues: Catalogues;
}

export const CATEGORY_LIMITS = {
  alignment: 5,
  hidden: 4,
  overestimation: 3,
  development: 5,
  positioningCandidates: 3,
} as const;

const DEFAULT_SELF_CONFIDENCE = 3;

// ─── Scoring rules ───────────────────────────────────────────────────

export function alignmentConfidence(selfCount: number, advisorCount: number): number {
  const base = Math.min(1, 0.5 + 0.05 * (selfCount + advisorCount));
  const balanceBonus = selfCount > 0 && advisorCount > 0 ? 0.2 : 0;
  return clamp(base + balanceBonus);
}

export function strategicImportance(theme: string, evidenceCount: number, highValueThemes: readonly string[]): number {
  let importance = 3;
  if (evidenceCount >= 5) importance = 5;
  else if (evidenceCount >= 3) importance = 4;

  const lower = theme.toLowerCase();
  if (highValueThemes.some((hv) => lower.includes(hv))) {
    importance = Math.min(5, importance + 1);
  }
  return importance;
}

export function hiddenStrengthImportance(advisorCount: number, credibility: number): number {
  if (advisorCount >= 5 && credibility >= 0.8) return 5;
  if (advisorCount >= 4 && credibility >= 0.7) return 4;
  if (advisorCount >= 3 && credibility >= 0.6) return 3;
  return 2;
}

export function developmentImportance(response: AdvisorResponse, urgencyKeywords: readonly string[]): number {
  let importance = 3;
  if (response.qualityScore >= 0.8 && response.credibilityWeight >= 0.8) {
    importance = 5;
  } else if (response.qualityScore >= 0.6 && response.credibilityWeight >= 0.6) {
    importance = 4;
  }
  if (containsAnyKeyword(response.text, urgencyKeywords)) {
    importance = Math.min(5, importance + 1);
  }
  return importance;
}

/** Mean credibility of the advisor responses citing the theme. */
export function evidenceCredibility(advisorResponses: readonly AdvisorResponse[], theme: string): number {
  const citing = responsesWithTheme(advisorResponses, theme);
  if (citing.length === 0) return 0;
  return mean(citing.map((r) => r.credibilityWeight));
}

/** Mean self-rated confidence (normalised to 0-1) of the self responses citing the theme. */
export function selfConfidence(selfResponses: readonly SelfResponse[], theme: string): number {
  const citing = responsesWithTheme(selfResponses, theme);
  if (citing.length === 0) return 0;
  return mean(citing.map((r) => (r.confidenceLevel ?? DEFAULT_SELF_CONFIDENCE) / 5));
}

// ─── Category scans ──────────────────────────────────────────────────

/** Themes both sides name at least twice, with quotes from each side. */
export function identifyAlignmentAreas(input: CategorizerInput): SynthesisInsight[] {
  const { profile, selfResponses, advisorResponses, catalogues } = input;
  const insights: SynthesisInsight[] = [];

  for (const theme of profile.commonThemes) {
    const selfCount = profile.selfCounts.get(theme) ?? 0;
    const advisorCount = profile.advisorCounts.get(theme) ?? 0;
    if (selfCount < 2 || advisorCount < 2) continue;

    const selfEvidence = responsesWithTheme(selfResponses, theme).map(selfQuote);
    const advisorEvidence = responsesWithTheme(advisorResponses, theme).map(advisorQuote);
    if (selfEvidence.length < 2 || advisorEvidence.length < 2) continue;

    insights.push({
      id: `strength_${theme}`,
      title: `Confirmed Strength: ${formatThemeTitle(theme)}`,
      description: `Both your self-assessment and advisor feedback consistently highlight your capability in ${theme}. This represents a reliable strength for career positioning.`,
      category: 'strength',
      supportingEvidence: [...selfEvidence.slice(0, 2), ...advisorEvidence.slice(0, 2)],
      strategicImportance: strategicImportance(theme, selfCount + advisorCount, catalogues.highValueThemes),
      actionableAdvice: `Leverage this confirmed strength by seeking opportunities that require ${theme} capabilities and highlighting it in professional communications.`,
      relatedThemes: [theme],
      confidence: alignmentConfidence(selfCount, advisorCount),
    });
    if (insights.length >= CATEGORY_LIMITS.alignment) break;
  }

  return insights;
}

/** Advisors name it three or more times; the person barely mentions it. */
export function identifyHiddenStrengths(input: CategorizerInput): SynthesisInsight[] {
  const { profile, advisorResponses } = input;
  const insights: SynthesisInsight[] = [];

  for (const [theme, advisorCount] of profile.advisorCounts) {
    const selfCount = profile.selfCounts.get(theme) ?? 0;
    if (advisorCount < 3 || selfCount > 1) continue;

    const credibility = evidenceCredibility(advisorResponses, theme);
    if (credibility < 0.6) continue;

    insights.push({
      id: `blindspot_${theme}`,
      title: `Hidden Strength: ${formatThemeTitle(theme)}`,
      description: `Your advisors consistently recognise your capability in ${theme}, though you may not fully appreciate this strength yourself. This represents significant untapped potential.`,
      category: 'blindspot',
      supportingEvidence: responsesWithTheme(advisorResponses, theme).slice(0, 3).map(advisorQuote),
      strategicImportance: hiddenStrengthImportance(advisorCount, credibility),
      actionableAdvice: `Explore this strength through feedback conversations and look for opportunities to develop and showcase ${theme} capabilities.`,
      relatedThemes: [theme],
      confidence: clamp(credibility),
    });
    if (insights.length >= CATEGORY_LIMITS.hidden) break;
  }

  return insights;
}

/** The person names it three or more times with high certainty; advisors rarely do. */
export function identifyOverestimatedAreas(input: CategorizerInput): SynthesisInsight[] {
  const { profile, selfResponses } = input;
  const insights: SynthesisInsight[] = [];

  for (const [theme, selfCount] of profile.selfCounts) {
    const advisorCount = profile.advisorCounts.get(theme) ?? 0;
    if (selfCount < 3 || advisorCount > 1) continue;
    if (selfConfidence(selfResponses, theme) < 0.7) continue;

    insights.push({
      id: `overestimation_${theme}`,
      title: `Validation Opportunity: ${formatThemeTitle(theme)}`,
      description: `You frequently mention ${theme} as a strength, but it appears less prominently in advisor feedback. This may indicate an opportunity to gather more external validation or better demonstrate this capability.`,
      category: 'overestimation',
      supportingEvidence: responsesWithTheme(selfResponses, theme).slice(0, 2).map(selfQuote),
      strategicImportance: 3,
      actionableAdvice: `Seek specific feedback about your ${theme} capabilities and look for opportunities to demonstrate this strength more visibly.`,
      relatedThemes: [theme],
      confidence: 0.6,
    });
    if (insights.length >= CATEGORY_LIMITS.overestimation) break;
  }

  return insights;
}

/**
 * Advisor responses suggesting growth (development vocabulary, quality ≥ 0.6).
 * One candidate per (response, theme); duplicates by title keep the first,
 * then a stable sort by importance.
 */
export function identifyDevelopmentOpportunities(input: CategorizerInput): SynthesisInsight[] {
  const { advisorResponses, catalogues } = input;
  const candidates: SynthesisInsight[] = [];

  for (const response of advisorResponses) {
    if (response.qualityScore < 0.6) continue;
    if (!containsAnyKeyword(response.text, catalogues.developmentKeywords)) continue;

    const importance = developmentImportance(response, catalogues.urgencyKeywords);
    for (const theme of response.keyThemes) {
      candidates.push({
        id: `development_${theme}`,
        title: `Development Opportunity: ${formatThemeTitle(theme)}`,
        description: `Advisor feedback suggests growth potential in ${theme}. This represents a strategic development opportunity aligned with external perceptions of your potential.`,
        category: 'development',
        supportingEvidence: [advisorQuote(response)],
        strategicImportance: importance,
        actionableAdvice: `Create a specific development plan for ${theme}, including learning resources, practice opportunities, and progress measures.`,
        relatedThemes: [theme],
        confidence: clamp(response.credibilityWeight),
      });
    }
  }

  const seen = new Set<string>();
  const deduped = candidates.filter((insight) => {
    const key = normalizeTitle(insight.title);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  return deduped
    .map((insight, index) => ({ insight, index }))
    .sort((a, b) => b.insight.strategicImportance - a.insight.strategicImportance || a.index - b.index)
    .slice(0, CATEGORY_LIMITS.development)
    .map(({ insight }) => insight);
}

function strategicTerms(texts: readonly string[], vocabulary: readonly string[]): string[] {
  const allowed = new Set(vocabulary);
  return texts.flatMap((text) => tokenize(text).filter((token) => allowed.has(token)));
}

/**
 * For shared themes, compare the strategic vocabulary advisors use against
 * the person's own. More strategic advisor language → positioning insight.
 */
export function identifyRepositioningPotential(input: CategorizerInput): SynthesisInsight[] {
  const { profile, selfResponses, advisorResponses, catalogues } = input;
  const insights: SynthesisInsight[] = [];

  for (const theme of profile.commonThemes.slice(0, CATEGORY_LIMITS.positioningCandidates)) {
    const selfCiting = responsesWithTheme(selfResponses, theme);
    const advisorCiting = responsesWithTheme(advisorResponses, theme);

    const selfTerms = strategicTerms(selfCiting.map((r) => r.text), catalogues.strategicLanguage);
    const advisorTerms = strategicTerms(advisorCiting.map((r) => r.text), catalogues.strategicLanguage);
    if (advisorTerms.length === 0 || advisorTerms.length <= selfTerms.length) continue;

    const quoted = advisorCiting
      .filter((r) => strategicTerms([r.text], catalogues.strategicLanguage).length > 0)
      .slice(0, 2)
      .map(advisorQuote);

    insights.push({
      id: `positioning_${theme}`,
      title: `Positioning Enhancement: ${formatThemeTitle(theme)}`,
      description: `Advisors describe your ${theme} capabilities using more strategic language than you do. This suggests an opportunity to reframe how you communicate this strength.`,
      category: 'positioning',
      supportingEvidence: quoted,
      strategicImportance: 4,
      actionableAdvice: `Adopt more strategic language when describing your ${theme} capabilities. Use terms like "${advisorTerms[0]}" to better position your impact.`,
      relatedThemes: [theme],
      confidence: 0.7,
    });
  }

  return insights;
}

export function categorizeInsights(input: CategorizerInput): CategorizedInsights {
  return {
    alignmentAreas: identifyAlignmentAreas(input),
    hiddenStrengths: identifyHiddenStrengths(input),
    overestimatedAreas: identifyOverestimatedAreas(input),
    developmentOpportunities: identifyDevelopmentOpportunities(input),
    repositioningPotential: identifyRepositioningPotential(input),
  };
}
