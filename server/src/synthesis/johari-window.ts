/**
 * Johari Window Builder
 *
 * Four quadrants straight from the theme profile: open = shared,
 * blind = advisor-only, hidden = self-only, unknown = catalogue candidates
 * whose root word nobody mentioned.
 */

import type { Catalogues } from './catalogues.js';
import { clamp, formatThemeTitle } from './helpers.js';
import {
  JOHARI_QUADRANTS,
  type JohariQuadrant,
  type JohariQuadrantName,
  type JohariWindow,
  type ThemeProfile,
} from './types.js';

export const MAX_UNKNOWN_THEMES = 4;
export const MAX_QUADRANT_INSIGHTS = 3;

const QUADRANT_DESCRIPTIONS: Record<JohariQuadrantName, string> = {
  openArena: 'Strengths and qualities both you and others recognise',
  blindSpot: 'Strengths others see that you may not fully recognise',
  hiddenArena: 'Strengths you recognise but others may not see',
  unknownArena: 'Potential areas for exploration and development',
};

const QUADRANT_INSIGHT_TEMPLATES: Record<JohariQuadrantName, (title: string) => string> = {
  openArena: (t) => `Continue building on your recognised strength in ${t}`,
  blindSpot: (t) => `Explore feedback opportunities to understand your impact in ${t}`,
  hiddenArena: (t) => `Create visibility around your capabilities in ${t}`,
  unknownArena: (t) => `Consider developing or testing capabilities in ${t}`,
};

/** `cross_cultural_communication` → `cross` */
export function rootWord(theme: string): string {
  const index = theme.indexOf('_');
  return index === -1 ? theme : theme.substring(0, index);
}

/**
 * Catalogue candidates whose root word does not appear inside any mentioned
 * theme. Catalogue order is kept.
 */
export function identifyUnknownArena(mentioned: readonly string[], candidates: readonly string[]): string[] {
  const lowered = mentioned.map((t) => t.toLowerCase());
  return candidates
    .filter((candidate) => {
      const root = rootWord(candidate).toLowerCase();
      return !lowered.some((theme) => theme.includes(root));
    })
    .slice(0, MAX_UNKNOWN_THEMES);
}

function buildQuadrant(name: JohariQuadrantName, themes: string[]): JohariQuadrant {
  return {
    themes,
    description: QUADRANT_DESCRIPTIONS[name],
    count: themes.length,
    actionableInsights: themes
      .slice(0, MAX_QUADRANT_INSIGHTS)
      .map((theme) => QUADRANT_INSIGHT_TEMPLATES[name](formatThemeTitle(theme))),
  };
}

/** Largest quadrant; ties keep declaration order (open, blind, hidden, unknown). */
export function dominantQuadrant(counts: Record<JohariQuadrantName, number>): JohariQuadrantName {
  let best: JohariQuadrantName = JOHARI_QUADRANTS[0];
  for (const name of JOHARI_QUADRANTS) {
    if (counts[name] > counts[best]) best = name;
  }
  return best;
}

export function calculateSelfAwarenessScore(open: number, blind: number, hidden: number): number {
  const total = open + blind + hidden;
  if (total === 0) return 0.5;
  return clamp((open - 0.5 * blind) / total);
}

export function calculateDevelopmentPriority(blind: number, hidden: number): number {
  return clamp((0.7 * blind + 0.5 * hidden) / 10);
}

export function buildJohariWindow(profile: ThemeProfile, catalogues: Catalogues): JohariWindow {
  const unknown = identifyUnknownArena(profile.allThemes, catalogues.unknownArenaCandidates);

  const window: Omit<JohariWindow, 'dominantQuadrant' | 'developmentPriority' | 'selfAwarenessScore'> = {
    openArena: buildQuadrant('openArena', [...profile.commonThemes]),
    blindSpot: buildQuadrant('blindSpot', [...profile.uniqueToAdvisor]),
    hiddenArena: buildQuadrant('hiddenArena', [...profile.uniqueToSelf]),
    unknownArena: buildQuadrant('unknownArena', unknown),
  };

  return {
    ...window,
    dominantQuadrant: dominantQuadrant({
      openArena: window.openArena.count,
      blindSpot: window.blindSpot.count,
      hiddenArena: window.hiddenArena.count,
      unknownArena: window.unknownArena.count,
    }),
    developmentPriority: calculateDevelopmentPriority(window.blindSpot.count, window.hiddenArena.count),
    selfAwarenessScore: calculateSelfAwarenessScore(
      window.openArena.count,
      window.blindSpot.count,
      window.hiddenArena.count,
    ),
  };
}
