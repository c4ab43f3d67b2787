/**
 * Narrative templates.
 *
 * Prose comes from a `NarrativeGenerator`. The template generator here is
 * deterministic and always available; the LLM writer in agents/ falls back
 * to it. Strategic recommendations are template-only.
 */

import {
  isWorthInvesting,
  recognitionGap,
  requiresImmediateAttention,
  developmentPriority,
  requiresUrgentAttention,
} from './five-insights.js';
import type {
  CareerExperiment,
  FiveInsightsModel,
  JohariWindow,
  Tension,
  Truth,
} from './types.js';

export const MAX_STRATEGIC_RECOMMENDATIONS = 8;

export type NarrativeRequest =
  | {
    kind: 'executive_summary';
    alignmentScore: number;
    selfResponseCount: number;
    advisorResponseCount: number;
    fiveInsights: FiveInsightsModel;
  }
  | { kind: 'five_insights_summary'; fiveInsights: FiveInsightsModel }
  | { kind: 'truths'; truths: Truth[] }
  | { kind: 'tensions'; tensions: Tension[] }
  | { kind: 'experiment'; experiment: CareerExperiment; feasibilityScore: number };

export type NarrativeKind = NarrativeRequest['kind'];

export interface NarrativeGenerator {
  generateNarrative(request: NarrativeRequest, signal?: AbortSignal): Promise<string>;
}

// ─── Templates ───────────────────────────────────────────────────────

export function alignmentOpening(alignmentScore: number): string {
  if (alignmentScore >= 0.8) {
    return 'Your self-perception strongly aligns with external feedback, indicating excellent self-awareness and a solid foundation for strategic career decisions.';
  }
  if (alignmentScore >= 0.6) {
    return 'Your self-perception shows good alignment with external feedback, with some valuable differences that represent growth opportunities.';
  }
  return 'Your self-perception and external feedback reveal significant differences, highlighting substantial opportunities for development and better positioning.';
}

function renderExecutiveSummary(request: Extract<NarrativeRequest, { kind: 'executive_summary' }>): string {
  const { fiveInsights } = request;
  const lines = [alignmentOpening(request.alignmentScore), ''];

  const topEnergising = fiveInsights.energisingStrengths[0];
  if (topEnergising) {
    lines.push(`Your strongest energising capability is ${topEnergising.title.toLowerCase()}, where high skill meets high energy and strong external recognition.`);
  }
  const topHidden = fiveInsights.hiddenStrengths[0];
  if (topHidden) {
    lines.push(`A key opportunity lies in better leveraging your ${topHidden.title.toLowerCase()}, which others recognise more than you might appreciate.`);
  }
  const topOverused = fiveInsights.overusedTalents[0];
  if (topOverused && requiresImmediateAttention(topOverused)) {
    lines.push(`Attention is needed to rebalance your ${topOverused.title.toLowerCase()} to prevent burnout while maintaining effectiveness.`);
  }

  const total = request.selfResponseCount + request.advisorResponseCount;
  lines.push(
    '',
    `This analysis synthesises ${total} total responses (${request.selfResponseCount} self-assessment, ${request.advisorResponseCount} advisor feedback) to create a comprehensive view of your career profile.`,
  );
  return lines.join('\n');
}

function renderFiveInsightsSummary(model: FiveInsightsModel): string {
  const lines = ['Your Career Profile: A Balanced Perspective', ''];

  if (model.energisingStrengths.length > 0) {
    lines.push('**Your Energising Strengths**');
    model.energisingStrengths.slice(0, 3).forEach((s, i) => {
      lines.push(`${i + 1}. ${s.title}: ${s.description}`);
      if (s.evidenceFromSelf[0]) lines.push(`   Your reflection: ${s.evidenceFromSelf[0]}`);
      if (s.evidenceFromOthers[0]) lines.push(`   Others observe: ${s.evidenceFromOthers[0]}`);
    });
    lines.push('');
  }

  if (model.hiddenStrengths.length > 0) {
    lines.push('**Your Hidden Strengths**');
    model.hiddenStrengths.slice(0, 3).forEach((s, i) => {
      const gap = recognitionGap(s);
      lines.push(`${i + 1}. ${s.title}: recognition gap of ${gap} point${gap === 1 ? '' : 's'}. ${s.developmentStrategy}`);
    });
    lines.push('');
  }

  if (model.overusedTalents.length > 0) {
    lines.push('**Areas of Potential Overuse**');
    for (const t of model.overusedTalents.slice(0, 2)) {
      const urgency = requiresImmediateAttention(t) ? ' Needs immediate attention.' : '';
      lines.push(`- ${t.title}: ${t.rebalancingStrategy}${urgency}`);
    }
    lines.push('');
  }

  if (model.aspirationalStrengths.length > 0) {
    lines.push('**Your Aspirational Strengths**');
    for (const a of model.aspirationalStrengths.slice(0, 3)) {
      lines.push(`- ${a.title}: development priority ${developmentPriority(a).toFixed(1)}/5.0. ${a.developmentPlan}`);
    }
    lines.push('');
  }

  if (model.misalignedEnergies.length > 0) {
    lines.push('**Energy Misalignments**');
    for (const e of model.misalignedEnergies.slice(0, 2)) {
      const urgency = requiresUrgentAttention(e) ? ' High priority.' : '';
      lines.push(`- ${e.title}: ${e.mitigationStrategy}${urgency}`);
    }
    lines.push('');
  }

  if (lines.length === 2) {
    lines.push('Not enough evidence yet to identify distinct strength patterns.');
  }
  return lines.join('\n').trimEnd();
}

function renderTruths(truths: readonly Truth[]): string {
  if (truths.length === 0) {
    return 'No clear truths emerged yet. More responses will sharpen the picture.';
  }
  const lines = ['## Three Core Truths About Your Career Profile', ''];
  truths.slice(0, 3).forEach((truth, i) => {
    lines.push(`### Truth ${i + 1}: ${truth.title}`, truth.description, `Confidence level: ${Math.round(truth.confidence * 100)}%`);
    for (const evidence of truth.supportingEvidence.slice(0, 2)) {
      lines.push(`> ${evidence}`);
    }
    lines.push('');
  });
  return lines.join('\n').trimEnd();
}

function renderTensions(tensions: readonly Tension[]): string {
  if (tensions.length === 0) {
    return 'No significant tensions between your view and your advisors\' view were found.';
  }
  const lines = ['## Two Creative Tensions for Growth', ''];
  tensions.slice(0, 2).forEach((tension, i) => {
    lines.push(
      `### Tension ${i + 1}: ${tension.title}`,
      tension.description,
      `Your perspective: ${tension.selfPerspective}`,
      `Others' perspective: ${tension.othersPerspective}`,
      `The opportunity: ${tension.opportunity} (growth potential ${Math.round(tension.opportunityScore * 100)}%)`,
      '',
    );
  });
  return lines.join('\n').trimEnd();
}

function renderExperiment(experiment: CareerExperiment, feasibilityScore: number): string {
  return [
    '## Your Strategic Career Experiment',
    '',
    `### ${experiment.title}`,
    experiment.description,
    `The hypothesis: ${experiment.hypothesis}`,
    `Duration: ${experiment.estimatedDurationDays} days. Feasibility: ${Math.round(feasibilityScore * 100)}%.`,
    'Success looks like:',
    ...experiment.successCriteria.map((c) => `- ${c}`),
  ].join('\n');
}

export function renderNarrative(request: NarrativeRequest): string {
  switch (request.kind) {
    case 'executive_summary':
      return renderExecutiveSummary(request);
    case 'five_insights_summary':
      return renderFiveInsightsSummary(request.fiveInsights);
    case 'truths':
      return renderTruths(request.truths);
    case 'tensions':
      return renderTensions(request.tensions);
    case 'experiment':
      return renderExperiment(request.experiment, request.feasibilityScore);
  }
}

export class TemplateNarrativeGenerator implements NarrativeGenerator {
  async generateNarrative(request: NarrativeRequest): Promise<string> {
    return renderNarrative(request);
  }
}

// ─── Strategic recommendations ───────────────────────────────────────

export function buildStrategicRecommendations(model: FiveInsightsModel, johari: JohariWindow): string[] {
  const recommendations: string[] = [];

  const topEnergising = model.energisingStrengths[0];
  if (topEnergising) {
    recommendations.push(`Prioritise roles and projects that leverage your ${topEnergising.title.toLowerCase()}; this is where you reach peak performance with sustained energy.`);
  }

  const topHidden = model.hiddenStrengths[0];
  if (topHidden) {
    recommendations.push(`Increase visibility of your ${topHidden.title.toLowerCase()} through strategic projects, presentations, or mentoring opportunities.`);
  }

  const urgentOveruse = model.overusedTalents.find(requiresImmediateAttention);
  if (urgentOveruse) {
    recommendations.push(`Set boundaries around ${urgentOveruse.title.toLowerCase()} to prevent burnout: delegate, automate, or redesign how you apply this strength.`);
  }

  const aspiration = model.aspirationalStrengths.find(isWorthInvesting);
  if (aspiration) {
    recommendations.push(`Invest in developing ${aspiration.title.toLowerCase()} through structured learning and practice over the next ${aspiration.timeframeMonths} months.`);
  }

  if (johari.blindSpot.count > 0) {
    recommendations.push('Schedule regular feedback conversations to explore blind spot areas and increase self-awareness.');
  }
  if (johari.hiddenArena.count > 0) {
    recommendations.push("Create more opportunities to showcase capabilities that others aren't yet aware of.");
  }

  recommendations.push('Seek mentoring relationships and cross-functional project opportunities to broaden how others experience your work.');

  if (recommendations.length < 3) {
    recommendations.push(
      'Build a strong professional network to amplify your career opportunities.',
      'Consider how your unique combination of strengths can meet the evolving needs of your workplace.',
    );
  }

  return recommendations.slice(0, MAX_STRATEGIC_RECOMMENDATIONS);
}
