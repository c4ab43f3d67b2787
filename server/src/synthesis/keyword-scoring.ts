import type { Catalogues, KeywordScale } from './catalogues.js';
import { clamp } from './helpers.js';

/** Number of distinct keywords present (substring match, case-insensitive). */
export function countKeywords(content: string, keywords: readonly string[]): number {
  const lower = content.toLowerCase();
  let count = 0;
  for (const keyword of keywords) {
    if (lower.includes(keyword.toLowerCase())) count++;
  }
  return count;
}

export function containsAnyKeyword(content: string, keywords: readonly string[]): boolean {
  return countKeywords(content, keywords) > 0;
}

/** Keywords from the list that appear in the content, in list order. */
export function matchedKeywords(content: string, keywords: readonly string[]): string[] {
  const lower = content.toLowerCase();
  return keywords.filter((k) => lower.includes(k.toLowerCase()));
}

/**
 * Score text on a 1-5 scale: baseline plus `weight` for every distinct
 * keyword of each tier found in the text.
 */
export function scoreOnScale(content: string, scale: KeywordScale): number {
  let score = scale.baseline;
  for (const tier of scale.tiers) {
    score += countKeywords(content, tier.keywords) * tier.weight;
  }
  return clamp(score, 1, 5);
}

/**
 * "I'm good at X but it wears me down": competence keywords earn their tier
 * weight, and co-occurring contrast words add a flat bonus.
 */
export function scoreCompetenceDespiteDrain(content: string, catalogues: Catalogues): number {
  const scale = catalogues.scales.competenceDespiteDrain;
  let score = scoreOnScale(content, scale);
  const competenceKeywords = scale.tiers.flatMap((t) => t.keywords);
  if (
    containsAnyKeyword(content, competenceKeywords)
    && containsAnyKeyword(content, catalogues.contrastKeywords)
  ) {
    score += catalogues.contrastBonus;
  }
  return clamp(score, 1, 5);
}
