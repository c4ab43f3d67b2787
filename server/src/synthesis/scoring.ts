/**
 * Alignment & confidence scorer. Pure numbers from the raw response lists
 * and the theme profile.
 */

import { clamp, mean } from './helpers.js';
import {
  CAREER_DOMAINS,
  type AdvisorResponse,
  type JohariWindow,
  type SelfResponse,
  type SynthesisConfidence,
  type ThemeProfile,
} from './types.js';

export const CONFIDENCE_WEIGHTS = {
  selfQuality: 0.2,
  advisorQuality: 0.3,
  advisorCredibility: 0.3,
  dataSufficiency: 0.1,
  domainCoverage: 0.1,
} as const;

/** Responses needed for full data sufficiency. */
export const SUFFICIENT_RESPONSE_COUNT = 20;

/** |common| / |self ∪ advisor| over distinct themes; 0 when either side has none. */
export function calculateAlignmentScore(profile: ThemeProfile): number {
  if (profile.selfThemes.length === 0 || profile.advisorThemes.length === 0) return 0;
  const union = profile.allThemes.length;
  if (union === 0) return 0;
  return clamp(profile.commonThemes.length / union);
}

export function calculateConfidenceScore(
  selfResponses: readonly SelfResponse[],
  advisorResponses: readonly AdvisorResponse[],
): number {
  const avgSelfQuality = mean(selfResponses.map((r) => r.qualityScore));
  const avgAdvisorQuality = mean(advisorResponses.map((r) => r.qualityScore));
  const avgCredibility = mean(advisorResponses.map((r) => r.credibilityWeight));
  const dataSufficiency = clamp((selfResponses.length + advisorResponses.length) / SUFFICIENT_RESPONSE_COUNT);

  const selfDomains = new Set(selfResponses.map((r) => r.domain)).size;
  const advisorDomains = new Set(advisorResponses.map((r) => r.domain)).size;
  const domainCoverage = clamp((selfDomains + advisorDomains) / CAREER_DOMAINS.length);

  return clamp(
    CONFIDENCE_WEIGHTS.selfQuality * avgSelfQuality
      + CONFIDENCE_WEIGHTS.advisorQuality * avgAdvisorQuality
      + CONFIDENCE_WEIGHTS.advisorCredibility * avgCredibility
      + CONFIDENCE_WEIGHTS.dataSufficiency * dataSufficiency
      + CONFIDENCE_WEIGHTS.domainCoverage * domainCoverage,
  );
}

export function confidenceLevelFor(score: number): SynthesisConfidence {
  if (score >= 0.75) return 'high';
  if (score >= 0.55) return 'medium';
  return 'low';
}

export function calculateSynthesisComplexity(totalInsights: number, johari: JohariWindow): number {
  const quadrants = [johari.openArena, johari.blindSpot, johari.hiddenArena, johari.unknownArena];
  const nonEmpty = quadrants.filter((q) => q.count > 0).length;
  return clamp(0.5 + Math.min(0.3, totalInsights / 20) + 0.2 * (nonEmpty / 4));
}
