/**
 * Three Truths / Two Tensions / One Experiment composer.
 *
 * `composeFramework` picks the records; narratives are attached afterwards
 * by the engine through the narrative collaborator (`withNarratives`).
 */

import type { Catalogues } from './catalogues.js';
import {
  createDevelopmentExperiment,
  createGeneralVisibilityExperiment,
  createVisibilityExperiment,
  calculateFeasibility,
} from './experiments.js';
import { developmentPriority } from './five-insights.js';
import {
  advisorQuote,
  formatThemeTitle,
  mean,
  responsesWithTheme,
  selfQuote,
} from './helpers.js';
import { countThemes, mostFrequentTheme } from './theme-reconciler.js';
import type {
  AdvisorResponse,
  CareerExperiment,
  FiveInsightsModel,
  SelfResponse,
  Tension,
  ThemeProfile,
  Truth,
  TruthsTensionsExperiment,
} from './types.js';

export const DEFAULT_CORE_VALUE = 'meaningful_work';

export interface FrameworkInput {
  selfResponses: readonly SelfResponse[];
  advisorResponses: readonly AdvisorResponse[];
  profile: ThemeProfile;
  fiveInsights: FiveInsightsModel;
  catalogues: Catalogues;
}

export interface FrameworkDraft {
  truths: Truth[];
  truthsConfidence: number;
  tensions: Tension[];
  opportunityScore: number;
  experiment: CareerExperiment;
  feasibilityScore: number;
}

export interface FrameworkNarratives {
  truths: string;
  tensions: string;
  experiment: string;
}

// ─── Truths ──────────────────────────────────────────────────────────

/**
 * Most common core value across the given responses, counting text
 * mentions and theme tags. Ties keep catalogue order.
 */
export function extractTopValue(responses: readonly SelfResponse[], coreValues: readonly string[]): string {
  const frequency = new Map<string, number>();
  for (const response of responses) {
    const content = response.text.toLowerCase();
    for (const value of coreValues) {
      if (content.includes(value)) frequency.set(value, (frequency.get(value) ?? 0) + 1);
    }
    for (const theme of response.keyThemes) {
      const lower = theme.toLowerCase();
      if (coreValues.includes(lower)) frequency.set(lower, (frequency.get(lower) ?? 0) + 1);
    }
  }

  let best = DEFAULT_CORE_VALUE;
  let bestCount = 0;
  for (const value of coreValues) {
    const count = frequency.get(value) ?? 0;
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

export function identifyThreeTruths(input: FrameworkInput): Truth[] {
  const { selfResponses, advisorResponses, profile, fiveInsights, catalogues } = input;
  const truths: Truth[] = [];

  const topStrength = fiveInsights.energisingStrengths[0];
  if (topStrength) {
    truths.push({
      kind: 'energising_strength',
      title: `Your Core Energising Strength: ${topStrength.title}`,
      description: 'This is where your natural ability, energy and external recognition align most strongly.',
      confidence: topStrength.confidence,
      supportingEvidence: [...topStrength.evidenceFromSelf.slice(0, 1), ...topStrength.evidenceFromOthers.slice(0, 1)],
      relatedThemes: [topStrength.theme],
    });
  }

  const identityTheme = mostFrequentTheme(profile, profile.commonThemes);
  if (identityTheme) {
    truths.push({
      kind: 'identity_alignment',
      title: `Your Consistent Professional Identity: ${formatThemeTitle(identityTheme)}`,
      description: "This theme appears consistently across both your self-reflection and others' observations.",
      confidence: 0.85,
      supportingEvidence: [
        ...responsesWithTheme(selfResponses, identityTheme).slice(0, 1).map(selfQuote),
        ...responsesWithTheme(advisorResponses, identityTheme).slice(0, 1).map(advisorQuote),
      ],
      relatedThemes: [identityTheme],
    });
  }

  const triggers = new Set(catalogues.valueThemeTriggers);
  const valueResponses = selfResponses.filter((r) => r.keyThemes.some((t) => triggers.has(t.toLowerCase())));
  if (valueResponses.length > 0) {
    const topValue = extractTopValue(valueResponses, catalogues.coreValues);
    const triggered = valueResponses.flatMap((r) => r.keyThemes.filter((t) => triggers.has(t.toLowerCase())));
    truths.push({
      kind: 'values_driven',
      title: `Your Core Professional Driver: ${formatThemeTitle(topValue)}`,
      description: 'This value consistently motivates your career choices and professional satisfaction.',
      confidence: 0.75,
      supportingEvidence: valueResponses.slice(0, 2).map(selfQuote),
      relatedThemes: Array.from(new Set(triggered)),
    });
  }

  return truths.slice(0, 3);
}

// ─── Tensions ────────────────────────────────────────────────────────

export function identifyTwoTensions(fiveInsights: FiveInsightsModel): Tension[] {
  const tensions: Tension[] = [];

  const topHidden = fiveInsights.hiddenStrengths[0];
  if (topHidden) {
    tensions.push({
      kind: 'recognition_gap',
      title: `Recognition Gap: ${topHidden.title}`,
      description: 'There is a meaningful difference between how you see this capability and how others experience it.',
      selfPerspective: 'You may undervalue or not fully recognise this strength',
      othersPerspective: 'Others consistently observe and value this capability in you',
      opportunity: 'Increased self-awareness and strategic positioning of this strength',
      opportunityScore: topHidden.potentialImpact / 5,
      relatedThemes: [topHidden.theme],
    });
  }

  const topAspirational = fiveInsights.aspirationalStrengths[0];
  if (topAspirational) {
    tensions.push({
      kind: 'development_tension',
      title: `Development Tension: ${topAspirational.title}`,
      description: 'There is creative tension between your aspirations and your current reality in this area.',
      selfPerspective: 'High interest and belief in your potential to develop this area',
      othersPerspective: 'Others may not yet see evidence of this capability or its priority',
      opportunity: 'Strategic development investment to close the aspiration-reality gap',
      opportunityScore: developmentPriority(topAspirational) / 5,
      relatedThemes: [topAspirational.theme],
    });
  }

  return tensions;
}

// ─── Experiment ──────────────────────────────────────────────────────

/** Hidden strength first, then aspiration, then general visibility. */
export function selectExperiment(
  fiveInsights: FiveInsightsModel,
  selfResponses: readonly SelfResponse[],
): CareerExperiment {
  const topHidden = fiveInsights.hiddenStrengths[0];
  if (topHidden) return createVisibilityExperiment(topHidden);

  const topAspirational = fiveInsights.aspirationalStrengths[0];
  if (topAspirational) return createDevelopmentExperiment(topAspirational);

  const selfThemes = selfResponses.flatMap((r) => r.keyThemes);
  const counts = countThemes(selfThemes);
  let topTheme: string | null = null;
  let topCount = 0;
  for (const [theme, count] of counts) {
    if (count > topCount) {
      topTheme = theme;
      topCount = count;
    }
  }
  return createGeneralVisibilityExperiment(topTheme);
}

// ─── Composition ─────────────────────────────────────────────────────

function meanOr(values: number[], fallback: number): number {
  return values.length === 0 ? fallback : mean(values);
}

export function composeFramework(input: FrameworkInput): FrameworkDraft {
  const truths = identifyThreeTruths(input);
  const tensions = identifyTwoTensions(input.fiveInsights);
  const experiment = selectExperiment(input.fiveInsights, input.selfResponses);

  return {
    truths,
    truthsConfidence: meanOr(truths.map((t) => t.confidence), 0.5),
    tensions,
    opportunityScore: meanOr(tensions.map((t) => t.opportunityScore), 0.5),
    experiment,
    feasibilityScore: calculateFeasibility(experiment),
  };
}

export function withNarratives(draft: FrameworkDraft, narratives: FrameworkNarratives): TruthsTensionsExperiment {
  return {
    threeTruths: {
      truths: draft.truths,
      confidenceScore: draft.truthsConfidence,
      narrative: narratives.truths,
    },
    twoTensions: {
      tensions: draft.tensions,
      opportunityScore: draft.opportunityScore,
      narrative: narratives.tensions,
    },
    oneExperiment: {
      experiment: draft.experiment,
      feasibilityScore: draft.feasibilityScore,
      narrative: narratives.experiment,
    },
  };
}
