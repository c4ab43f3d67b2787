/**
 * Career experiment factories and feasibility scoring.
 *
 * Each factory is deterministic: same insight in, same experiment out,
 * including the id.
 */

import { clamp, formatThemeTitle, slugify } from './helpers.js';
import {
  isHighPriority,
  isWorthInvesting,
  requiresImmediateAttention,
} from './five-insights.js';
import type {
  AspirationalStrength,
  CareerExperiment,
  ExperimentPriority,
  FiveInsightsModel,
  HiddenStrength,
  JohariWindow,
  OverusedTalent,
} from './types.js';

export const DEFAULT_MAX_EXPERIMENTS = 5;
export const DEFAULT_TOP_THEME = 'professional_development';

const PRIORITY_ADJUSTMENT: Record<ExperimentPriority, number> = {
  urgent: 0.2,
  high: 0.1,
  medium: 0,
  low: -0.1,
};

/** Short, low-friction, high-priority experiments score highest. */
export function calculateFeasibility(experiment: CareerExperiment): number {
  let score = 0.5;

  if (experiment.estimatedDurationDays <= 7) score += 0.3;
  else if (experiment.estimatedDurationDays <= 30) score += 0.1;
  else score -= 0.1;

  const barriers = experiment.potentialBarriers.length;
  if (barriers === 0) score += 0.2;
  else if (barriers <= 2) score += 0.1;
  else score -= 0.1;

  score += PRIORITY_ADJUSTMENT[experiment.priority];
  return clamp(score);
}

// ─── Factories ───────────────────────────────────────────────────────

export function createVisibilityExperiment(strength: HiddenStrength): CareerExperiment {
  const { title } = strength;
  return {
    id: `experiment_visibility_${slugify(strength.theme)}`,
    title: `Showcase Hidden Strength: ${title}`,
    description: `A 30-day experiment to increase visibility and recognition of your ${title} capabilities.`,
    type: 'visibilityBuilding',
    hypothesis: `By strategically showcasing my ${title} capabilities, I can increase recognition and create new opportunities.`,
    relatedInsightIds: [strength.id],
    scope: 'team',
    estimatedDurationDays: 30,
    successCriteria: [
      `Receive specific feedback about ${title} from at least 2 colleagues`,
      `Create 1 visible deliverable that demonstrates ${title}`,
      `Have 1 conversation with your manager about leveraging ${title}`,
    ],
    metrics: [
      {
        name: 'Recognition Feedback',
        description: `Specific comments about ${title} capabilities`,
        type: 'feedback',
        measurementMethod: 'Direct feedback collection',
        frequency: 'weekly',
      },
      {
        name: 'Visibility Actions',
        description: 'Concrete actions taken to showcase capability',
        type: 'quantitative',
        measurementMethod: 'Count of visibility activities',
        targetValue: '8',
        frequency: 'weekly',
      },
    ],
    requiredResources: [
      'Time for visibility activities (2-3 hours/week)',
      `Opportunities to demonstrate ${title}`,
      'Feedback collection mechanism',
    ],
    potentialBarriers: [
      'Discomfort with self-promotion',
      'Limited opportunities to showcase this skill',
      'Team too busy to provide feedback',
    ],
    priority: isHighPriority(strength) ? 'high' : 'medium',
    tags: ['hidden_strength', 'visibility', strength.theme],
  };
}

export function createDevelopmentExperiment(strength: AspirationalStrength): CareerExperiment {
  const { title } = strength;
  const days = strength.timeframeMonths > 6 ? 60 : 30;
  return {
    id: `experiment_development_${slugify(strength.theme)}`,
    title: `Develop Aspirational Strength: ${title}`,
    description: `A focused ${days}-day experiment to develop your ${title} capabilities.`,
    type: 'skillBuilding',
    hypothesis: `By investing focused effort in ${title}, I can make measurable progress toward my aspirational goal.`,
    relatedInsightIds: [strength.id],
    scope: 'personal',
    estimatedDurationDays: days,
    successCriteria: [
      `Complete at least 1 significant ${title} project or activity`,
      'Demonstrate improved capability through specific examples',
      'Receive feedback on progress from a mentor or colleague',
    ],
    metrics: [
      {
        name: 'Skill Development Activities',
        description: 'Learning and practice activities completed',
        type: 'quantitative',
        measurementMethod: 'Activity log',
        targetValue: '12',
        frequency: 'weekly',
      },
      {
        name: 'Progress Assessment',
        description: 'Self and external assessment of progress',
        type: 'feedback',
        measurementMethod: 'Structured feedback',
        frequency: 'biweekly',
      },
    ],
    requiredResources: [...strength.requiredResources],
    potentialBarriers: [
      'Time constraints for development activities',
      'Limited access to learning opportunities',
      'Difficulty measuring progress',
    ],
    priority: isWorthInvesting(strength) ? 'high' : 'medium',
    tags: ['aspirational', 'development', strength.theme],
  };
}

export function createRebalancingExperiment(talent: OverusedTalent): CareerExperiment {
  const { title } = talent;
  return {
    id: `experiment_rebalancing_${slugify(talent.theme)}`,
    title: `Rebalance Overused Talent: ${title}`,
    description: `A 21-day experiment to create healthier boundaries and delegation around your ${title} strength.`,
    type: 'workEnvironment',
    hypothesis: `By strategically rebalancing my use of ${title}, I can stay effective while reducing burnout risk.`,
    relatedInsightIds: [talent.id],
    scope: 'team',
    estimatedDurationDays: 21,
    successCriteria: [
      `Delegate or decline at least 2 ${title}-related requests`,
      `Identify alternative approaches for 1 regular ${title} activity`,
      'Report improved energy levels in weekly check-ins',
    ],
    metrics: [
      {
        name: 'Energy Level',
        description: 'Daily energy rating (1-5 scale)',
        type: 'quantitative',
        measurementMethod: 'Daily self-assessment',
        frequency: 'daily',
      },
      {
        name: 'Rebalancing Actions',
        description: 'Specific actions taken to reduce overuse',
        type: 'behavioral',
        measurementMethod: 'Action log',
        targetValue: '10',
        frequency: 'weekly',
      },
    ],
    requiredResources: [
      'Support from your manager for delegation decisions',
      'Clear communication of boundaries',
      'Alternative approaches or team members',
    ],
    potentialBarriers: [
      'Reluctance to delegate important work',
      'Team capacity constraints',
      'Habitual patterns that are hard to change',
    ],
    priority: requiresImmediateAttention(talent) ? 'urgent' : 'high',
    tags: ['overuse', 'rebalancing', talent.theme],
  };
}

export function createBlindSpotExperiment(theme: string): CareerExperiment {
  const readable = theme.replace(/_/g, ' ');
  return {
    id: `experiment_blind_spot_${slugify(theme)}`,
    title: `Explore Blind Spot: ${readable.toUpperCase()}`,
    description: `A 14-day experiment to understand and explore the ${readable} capability that others see in you.`,
    type: 'roleExploration',
    hypothesis: `By actively seeking feedback and examples about my ${readable} capabilities, I can better understand this strength.`,
    relatedInsightIds: [],
    scope: 'personal',
    estimatedDurationDays: 14,
    successCriteria: [
      `Collect specific examples of ${readable} from 3 different people`,
      `Identify concrete situations where ${readable} was demonstrated`,
      `Reflect on how to leverage ${readable} more strategically`,
    ],
    metrics: [
      {
        name: 'Feedback Collection',
        description: `Number of specific ${readable} examples gathered`,
        type: 'quantitative',
        measurementMethod: 'Feedback log',
        targetValue: '5',
        frequency: 'weekly',
      },
    ],
    requiredResources: [
      'List of people to approach for feedback',
      `Structured questions about ${readable}`,
      'Time for reflection and analysis',
    ],
    potentialBarriers: [
      'Discomfort asking for specific feedback',
      'Difficulty getting detailed examples',
      'Challenge interpreting feedback patterns',
    ],
    priority: 'medium',
    tags: ['blind_spot', 'feedback', theme],
  };
}

export function createGeneralVisibilityExperiment(topSelfTheme: string | null): CareerExperiment {
  const focus = topSelfTheme ?? DEFAULT_TOP_THEME;
  return {
    id: `experiment_general_visibility_${slugify(focus)}`,
    title: 'Strategic Visibility Building',
    description: `A 30-day experiment to increase overall professional visibility, anchored in your ${formatThemeTitle(focus)} strength.`,
    type: 'visibilityBuilding',
    hypothesis: 'By systematically increasing my professional visibility, I can create new opportunities and better recognition.',
    relatedInsightIds: [],
    scope: 'organisational',
    estimatedDurationDays: 30,
    successCriteria: [
      'Share expertise through 2 different channels (presentation, article, etc.)',
      'Engage in 3 strategic networking conversations',
      'Receive recognition or feedback on contributions',
    ],
    metrics: [
      {
        name: 'Visibility Activities',
        description: 'Number of visibility-building activities completed',
        type: 'quantitative',
        measurementMethod: 'Activity tracking',
        targetValue: '8',
        frequency: 'weekly',
      },
    ],
    requiredResources: [
      'Time for visibility activities (3-4 hours/week)',
      'Platform or opportunity to share expertise',
      'Network of professional contacts',
    ],
    potentialBarriers: [
      'Time constraints',
      'Comfort with self-promotion',
      'Limited platforms for sharing expertise',
    ],
    priority: 'medium',
    tags: ['visibility', 'networking', 'general', focus],
  };
}

// ─── Batch generation ────────────────────────────────────────────────

/**
 * Visibility experiments for up to two high-priority hidden strengths,
 * development experiments for up to two worth-investing aspirations, one
 * rebalancing experiment for an overuse needing immediate attention, and
 * one blind-spot exploration. Truncated to `max`.
 */
export function generateMicroExperiments(
  model: FiveInsightsModel,
  johari: JohariWindow,
  max = DEFAULT_MAX_EXPERIMENTS,
): CareerExperiment[] {
  const experiments: CareerExperiment[] = [
    ...model.hiddenStrengths.filter(isHighPriority).slice(0, 2).map(createVisibilityExperiment),
    ...model.aspirationalStrengths.filter(isWorthInvesting).slice(0, 2).map(createDevelopmentExperiment),
    ...model.overusedTalents.filter(requiresImmediateAttention).slice(0, 1).map(createRebalancingExperiment),
    ...johari.blindSpot.themes.slice(0, 1).map(createBlindSpotExperiment),
  ];
  return experiments.slice(0, Math.max(0, max));
}
