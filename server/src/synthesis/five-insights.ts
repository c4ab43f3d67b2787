/**
 * Five Insights Model
 *
 * Re-reads the categorized insights through keyword scales to produce the
 * five strength subtypes (energising, hidden, overused, aspirational,
 * misaligned), then derives balance, recommendations and priority actions.
 *
 * Levels are integers 1-5, rounded from the mean of per-response scale
 * scores. Misaligned energies are the only subtype built straight from the
 * responses rather than from a categorized insight.
 */

import type { Catalogues, KeywordScale } from './catalogues.js';
import {
  advisorQuote,
  clamp,
  formatThemeTitle,
  mean,
  responsesWithTheme,
  selfQuote,
  toLevel,
  unique,
  weightedMean,
} from './helpers.js';
import { matchedKeywords, scoreCompetenceDespiteDrain, scoreOnScale } from './keyword-scoring.js';
import {
  CAREER_DOMAIN_LABELS,
  INSIGHT_CATEGORIES,
  type AdvisorResponse,
  type AspirationalStrength,
  type CareerResponse,
  type CategorizedInsights,
  type EnergisingStrength,
  type FiveInsightsModel,
  type HiddenStrength,
  type InsightCategory,
  type MisalignedEnergy,
  type OverusedTalent,
  type SelfResponse,
  type SynthesisInsight,
} from './types.js';

export const MAX_MISALIGNED_ENERGIES = 3;
export const MAX_PRIORITY_ACTIONS = 8;

export const KEY_RECOMMENDATIONS: Record<InsightCategory, string> = {
  energising: 'Leverage your top energising strengths in strategic career moves',
  hidden: 'Increase visibility of your hidden strengths through targeted showcasing',
  overused: 'Create balance to prevent burnout from overused talents',
  aspirational: 'Invest in developing your most promising aspirational areas',
  misaligned: 'Address energy-draining activities through delegation or process improvement',
};

export interface FiveInsightsInput {
  id: string;
  sessionId: string;
  generatedAt: string;
  insights: CategorizedInsights;
  selfResponses: readonly SelfResponse[];
  advisorResponses: readonly AdvisorResponse[];
  catalogues: Catalogues;
}

// ─── Scale helpers ───────────────────────────────────────────────────

function meanScale(responses: readonly CareerResponse[], scale: KeywordScale): number | null {
  if (responses.length === 0) return null;
  return mean(responses.map((r) => scoreOnScale(r.text, scale)));
}

/** Credibility-weighted mean over advisor responses. */
function weightedScale(responses: readonly AdvisorResponse[], scale: KeywordScale): number | null {
  if (responses.length === 0) return null;
  return weightedMean(
    responses.map((r) => scoreOnScale(r.text, scale)),
    responses.map((r) => r.credibilityWeight),
  );
}

function domainLabels(responses: readonly CareerResponse[]): string[] {
  return unique(responses.map((r) => CAREER_DOMAIN_LABELS[r.domain]));
}

function primaryTheme(insight: SynthesisInsight): string {
  return insight.relatedThemes[0] ?? '';
}

// ─── Subtype builders ────────────────────────────────────────────────

export function buildEnergisingStrength(
  insight: SynthesisInsight,
  selfResponses: readonly SelfResponse[],
  advisorResponses: readonly AdvisorResponse[],
  catalogues: Catalogues,
): EnergisingStrength {
  const theme = primaryTheme(insight);
  const selfCiting = responsesWithTheme(selfResponses, theme);
  const advisorCiting = responsesWithTheme(advisorResponses, theme);
  const { scales } = catalogues;

  return {
    id: `energising_${theme}`,
    theme,
    title: formatThemeTitle(theme),
    description: insight.description,
    confidence: insight.confidence,
    skillLevel: toLevel(meanScale(selfCiting, scales.skill) ?? 3),
    energyLevel: toLevel(meanScale(selfCiting, scales.energy) ?? 3),
    recognitionLevel: toLevel(weightedScale(advisorCiting, scales.recognition) ?? 3),
    leverageability: insight.strategicImportance,
    evidenceFromSelf: selfCiting.slice(0, 2).map(selfQuote),
    evidenceFromOthers: advisorCiting.slice(0, 2).map(advisorQuote),
    actionableAdvice: insight.actionableAdvice,
    applicationAreas: domainLabels([...selfCiting, ...advisorCiting]),
  };
}

export function buildHiddenStrength(
  insight: SynthesisInsight,
  selfResponses: readonly SelfResponse[],
  advisorResponses: readonly AdvisorResponse[],
  catalogues: Catalogues,
): HiddenStrength {
  const theme = primaryTheme(insight);
  const selfCiting = responsesWithTheme(selfResponses, theme);
  const advisorCiting = responsesWithTheme(advisorResponses, theme);
  const { scales } = catalogues;

  return {
    id: `hidden_${theme}`,
    theme,
    title: formatThemeTitle(theme),
    description: insight.description,
    confidence: insight.confidence,
    competenceLevel: toLevel(weightedScale(advisorCiting, scales.competence) ?? 3),
    currentRecognition: selfCiting.length > 0 ? toLevel(meanScale(selfCiting, scales.skill) ?? 1) : 1,
    potentialImpact: insight.strategicImportance,
    hiddenFactors: [
      `Cited in ${advisorCiting.length} advisor responses`,
      selfCiting.length === 0
        ? 'Not mentioned in your self-assessment'
        : `Mentioned in only ${selfCiting.length} of your own responses`,
    ],
    developmentStrategy: insight.actionableAdvice,
    visibilityOpportunities: domainLabels(advisorCiting),
  };
}

export function buildOverusedTalent(
  insight: SynthesisInsight,
  selfResponses: readonly SelfResponse[],
  catalogues: Catalogues,
): OverusedTalent {
  const theme = primaryTheme(insight);
  const title = formatThemeTitle(theme);
  const selfCiting = responsesWithTheme(selfResponses, theme);
  const { scales } = catalogues;

  return {
    id: `overused_${theme}`,
    theme,
    title,
    description: insight.description,
    confidence: 0.6,
    talentLevel: toLevel(meanScale(selfCiting, scales.skill) ?? 3),
    usageFrequency: toLevel(meanScale(selfCiting, scales.usage) ?? 3),
    burnoutRisk: toLevel(meanScale(selfCiting, scales.drain) ?? 3),
    overuseIndicators: [
      `You name ${theme} in ${selfCiting.length} responses`,
      'Advisors rarely mention it',
    ],
    rebalancingStrategy: `Balance your reliance on ${theme} by deliberately drawing on complementary strengths.`,
    alternativeApplications: domainLabels(selfCiting),
  };
}

export function timeframeForPotential(potential: number): number {
  if (potential >= 5) return 3;
  if (potential >= 4) return 6;
  return 12;
}

export function buildAspirationalStrength(
  insight: SynthesisInsight,
  selfResponses: readonly SelfResponse[],
  catalogues: Catalogues,
): AspirationalStrength {
  const theme = primaryTheme(insight);
  const title = formatThemeTitle(theme);
  const selfCiting = responsesWithTheme(selfResponses, theme);
  const { scales } = catalogues;

  return {
    id: `aspirational_${theme}`,
    theme,
    title,
    description: insight.description,
    confidence: insight.confidence,
    interestLevel: toLevel(meanScale(selfCiting, scales.interest) ?? 3),
    currentLevel: toLevel(meanScale(selfCiting, scales.currentLevel) ?? 2),
    developmentPotential: insight.strategicImportance,
    developmentPlan: insight.actionableAdvice,
    requiredResources: [
      `Learning resources focused on ${title}`,
      'Practice opportunities in your current role',
      'A mentor with relevant expertise',
    ],
    timeframeMonths: timeframeForPotential(insight.strategicImportance),
  };
}

/**
 * Self responses that report draining work, grouped per theme. A theme is
 * misaligned when the drain is heavy, frequent and the person is still good
 * at it; advisor competence, where advisors cite the theme, must agree.
 */
export function identifyMisalignedEnergies(
  selfResponses: readonly SelfResponse[],
  advisorResponses: readonly AdvisorResponse[],
  catalogues: Catalogues,
): MisalignedEnergy[] {
  const { scales } = catalogues;
  const groups = new Map<string, SelfResponse[]>();

  for (const response of selfResponses) {
    if (scoreOnScale(response.text, scales.drain) < 3) continue;
    for (const theme of response.keyThemes) {
      const group = groups.get(theme) ?? [];
      group.push(response);
      groups.set(theme, group);
    }
  }

  const drainKeywords = scales.drain.tiers.filter((t) => t.weight > 0).flatMap((t) => t.keywords);
  const energies: MisalignedEnergy[] = [];

  for (const [theme, responses] of groups) {
    const drain = mean(responses.map((r) => scoreOnScale(r.text, scales.drain)));
    const frequency = mean(responses.map((r) => scoreOnScale(r.text, scales.usage)));
    const competence = mean(responses.map((r) => scoreCompetenceDespiteDrain(r.text, catalogues)));
    if (drain < 3.5 || frequency < 3 || competence < 3) continue;

    const advisorCompetence = weightedScale(responsesWithTheme(advisorResponses, theme), scales.competence);
    if (advisorCompetence !== null && advisorCompetence < 3) continue;

    const factors = unique(responses.flatMap((r) => matchedKeywords(r.text, drainKeywords)));
    const title = formatThemeTitle(theme);

    energies.push({
      id: `misaligned_${theme}`,
      theme,
      title,
      description: `You are capable at ${theme}, but it regularly drains your energy.`,
      confidence: clamp(0.5 + 0.1 * responses.length),
      competenceLevel: toLevel(competence),
      energyDrainLevel: toLevel(drain),
      frequency: toLevel(frequency),
      drainFactors: factors.length > 0 ? factors : ['Recurring energy drain reported in your responses'],
      mitigationStrategy: `Reduce the time spent on ${theme} through delegation, automation or process changes.`,
      alternativeApproaches: [
        `Pair ${title} work with energising tasks`,
        `Share ${title} responsibilities across the team`,
      ],
    });
    if (energies.length >= MAX_MISALIGNED_ENERGIES) break;
  }

  return energies;
}

// ─── Model-level calculations ────────────────────────────────────────

export function categoryCounts(model: FiveInsightsModel): Record<InsightCategory, number> {
  return {
    energising: model.energisingStrengths.length,
    hidden: model.hiddenStrengths.length,
    overused: model.overusedTalents.length,
    aspirational: model.aspirationalStrengths.length,
    misaligned: model.misalignedEnergies.length,
  };
}

export function totalInsights(model: FiveInsightsModel): number {
  return Object.values(categoryCounts(model)).reduce((sum, n) => sum + n, 0);
}

/** 1 − coefficient of variation over the category counts. */
export function calculateBalanceScore(counts: readonly number[]): number {
  const total = counts.reduce((sum, n) => sum + n, 0);
  if (total === 0 || counts.length === 0) return 1;
  const avg = total / counts.length;
  const variance = mean(counts.map((n) => (n - avg) ** 2));
  return clamp(1 - Math.sqrt(variance) / avg);
}

export function dominantCategory(model: FiveInsightsModel): InsightCategory {
  const counts = categoryCounts(model);
  let best: InsightCategory = INSIGHT_CATEGORIES[0];
  for (const category of INSIGHT_CATEGORIES) {
    if (counts[category] > counts[best]) best = category;
  }
  return best;
}

export function isWellBalanced(model: FiveInsightsModel): boolean {
  const counts = Object.values(categoryCounts(model));
  return Math.max(...counts) - Math.min(...counts) <= 2 && model.balanceScore >= 0.6;
}

export function overallScore(strength: EnergisingStrength): number {
  return (strength.skillLevel + strength.energyLevel + strength.recognitionLevel + strength.leverageability) / 4;
}

export function recognitionGap(strength: HiddenStrength): number {
  return strength.competenceLevel - strength.currentRecognition;
}

export function isHighPriority(strength: HiddenStrength): boolean {
  return strength.competenceLevel >= 4 && recognitionGap(strength) >= 2 && strength.potentialImpact >= 4;
}

export function requiresImmediateAttention(talent: OverusedTalent): boolean {
  return talent.burnoutRisk >= 4 && talent.usageFrequency >= 4;
}

export function developmentPriority(strength: AspirationalStrength): number {
  return (strength.interestLevel + strength.developmentPotential) / 2;
}

export function isWorthInvesting(strength: AspirationalStrength): boolean {
  return strength.interestLevel >= 4 && strength.developmentPotential >= 3;
}

export function impactPriority(energy: MisalignedEnergy): number {
  return (energy.energyDrainLevel + energy.frequency) / 2;
}

export function requiresUrgentAttention(energy: MisalignedEnergy): boolean {
  return energy.energyDrainLevel >= 4 && energy.frequency >= 4;
}

export function keyRecommendations(model: Omit<FiveInsightsModel, 'keyRecommendations'>): string[] {
  const counts: Record<InsightCategory, number> = {
    energising: model.energisingStrengths.length,
    hidden: model.hiddenStrengths.length,
    overused: model.overusedTalents.length,
    aspirational: model.aspirationalStrengths.length,
    misaligned: model.misalignedEnergies.length,
  };
  return INSIGHT_CATEGORIES.filter((c) => counts[c] > 0).map((c) => KEY_RECOMMENDATIONS[c]);
}

export function priorityActions(model: FiveInsightsModel): string[] {
  const actions = [
    ...model.energisingStrengths.filter((s) => s.leverageability >= 4).slice(0, 2)
      .map((s) => `Leverage: ${s.actionableAdvice}`),
    ...model.hiddenStrengths.filter((s) => s.potentialImpact >= 4).slice(0, 2)
      .map((s) => `Develop: ${s.developmentStrategy}`),
    ...model.overusedTalents.filter((t) => t.burnoutRisk >= 4).slice(0, 1)
      .map((t) => `Rebalance: ${t.rebalancingStrategy}`),
    ...model.aspirationalStrengths.filter((s) => s.developmentPotential >= 4).slice(0, 2)
      .map((s) => `Build: ${s.developmentPlan}`),
    ...model.misalignedEnergies.filter((e) => e.energyDrainLevel >= 4).slice(0, 1)
      .map((e) => `Address: ${e.mitigationStrategy}`),
  ];
  return actions.slice(0, MAX_PRIORITY_ACTIONS);
}

// ─── Builder ─────────────────────────────────────────────────────────

export function buildFiveInsightsModel(input: FiveInsightsInput): FiveInsightsModel {
  const { insights, selfResponses, advisorResponses, catalogues } = input;

  const base = {
    id: input.id,
    sessionId: input.sessionId,
    generatedAt: input.generatedAt,
    energisingStrengths: insights.alignmentAreas
      .map((i) => buildEnergisingStrength(i, selfResponses, advisorResponses, catalogues)),
    hiddenStrengths: insights.hiddenStrengths
      .map((i) => buildHiddenStrength(i, selfResponses, advisorResponses, catalogues)),
    overusedTalents: insights.overestimatedAreas
      .map((i) => buildOverusedTalent(i, selfResponses, catalogues)),
    aspirationalStrengths: insights.developmentOpportunities
      .map((i) => buildAspirationalStrength(i, selfResponses, catalogues)),
    misalignedEnergies: identifyMisalignedEnergies(selfResponses, advisorResponses, catalogues),
    balanceScore: 1,
  };

  base.balanceScore = calculateBalanceScore([
    base.energisingStrengths.length,
    base.hiddenStrengths.length,
    base.overusedTalents.length,
    base.aspirationalStrengths.length,
    base.misalignedEnergies.length,
  ]);

  return { ...base, keyRecommendations: keyRecommendations(base) };
}
