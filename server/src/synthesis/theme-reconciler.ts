/**
 * Theme Reconciler
 *
 * Builds the theme multisets for both response groups and the set views the
 * rest of the engine reads. Tag equality is exact and case-sensitive: the
 * tagging collaborator owns normalisation, this stage never fuzzy-matches.
 *
 * Ordering is deterministic: distinct lists follow first appearance, self
 * side first for shared themes.
 */

import { unique } from './helpers.js';
import type { AdvisorResponse, SelfResponse, ThemeProfile } from './types.js';

export function countThemes(themes: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const theme of themes) {
    counts.set(theme, (counts.get(theme) ?? 0) + 1);
  }
  return counts;
}

export function reconcileThemes(
  selfResponses: readonly SelfResponse[],
  advisorResponses: readonly AdvisorResponse[],
): ThemeProfile {
  const selfThemes = selfResponses.flatMap((r) => r.keyThemes);
  const advisorThemes = advisorResponses.flatMap((r) => r.keyThemes);

  const selfCounts = countThemes(selfThemes);
  const advisorCounts = countThemes(advisorThemes);

  const selfDistinct = unique(selfThemes);
  const advisorDistinct = unique(advisorThemes);

  const commonThemes = selfDistinct.filter((t) => advisorCounts.has(t));
  const uniqueToSelf = selfDistinct.filter((t) => !advisorCounts.has(t));
  const uniqueToAdvisor = advisorDistinct.filter((t) => !selfCounts.has(t));

  return {
    selfThemes,
    advisorThemes,
    selfCounts,
    advisorCounts,
    commonThemes,
    uniqueToAdvisor,
    uniqueToSelf,
    allThemes: [...selfDistinct, ...uniqueToAdvisor],
  };
}

/**
 * The most frequent theme by combined count, restricted to `candidates`.
 * Ties keep the earlier candidate.
 */
export function mostFrequentTheme(profile: ThemeProfile, candidates: readonly string[]): string | null {
  let best: string | null = null;
  let bestCount = 0;
  for (const theme of candidates) {
    const count = (profile.selfCounts.get(theme) ?? 0) + (profile.advisorCounts.get(theme) ?? 0);
    if (count > bestCount) {
      best = theme;
      bestCount = count;
    }
  }
  return best;
}
