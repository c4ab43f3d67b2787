import { z } from 'zod';
import { unique } from './helpers.js';
import {
  CAREER_DOMAINS,
  CONFIDENCE_LEVELS,
  INSIGHT_CATEGORIES,
  JOHARI_QUADRANTS,
  SYNTHESIS_CATEGORIES,
  type AdvisorResponse,
  type CareerExperiment,
  type CareerSynthesis,
  type FiveInsightsModel,
  type JohariWindow,
  type SelfResponse,
  type SynthesisInsight,
  type TruthsTensionsExperiment,
} from './types.js';

// Every schema is pinned to its domain type so drift between the two
// fails the type-check.

const unit = z.number().min(0).max(1);
const level = z.number().int().min(1).max(5);
const isoTimestamp = z.string().datetime({ offset: true });
const strings = z.array(z.string());

// ─── Responses ───────────────────────────────────────────────────────

const keyThemes = z.array(z.string().min(1)).default([]).transform((themes) => unique(themes));

const responseBase = {
  id: z.string().min(1),
  questionId: z.string().min(1),
  questionText: z.string(),
  domain: z.enum(CAREER_DOMAINS),
  text: z.string(),
  answeredAt: isoTimestamp,
  keyThemes,
  qualityScore: unit,
};

export const SelfResponseSchema: z.ZodType<SelfResponse, z.ZodTypeDef, unknown> = z.object({
  ...responseBase,
  confidenceLevel: level.optional(),
});

export const AdvisorResponseSchema: z.ZodType<AdvisorResponse, z.ZodTypeDef, unknown> = z.object({
  ...responseBase,
  advisorId: z.string().min(1).optional(),
  credibilityWeight: unit,
  specificExamples: strings.default([]),
});

// ─── Insights ────────────────────────────────────────────────────────

export const SynthesisInsightSchema: z.ZodType<SynthesisInsight, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  category: z.enum(SYNTHESIS_CATEGORIES),
  supportingEvidence: strings,
  strategicImportance: level,
  actionableAdvice: z.string(),
  relatedThemes: strings,
  confidence: unit,
});

const fiveInsightBase = {
  id: z.string(),
  theme: z.string(),
  title: z.string(),
  description: z.string(),
  confidence: unit,
};

export const FiveInsightsModelSchema: z.ZodType<FiveInsightsModel, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  sessionId: z.string(),
  generatedAt: isoTimestamp,
  energisingStrengths: z.array(z.object({
    ...fiveInsightBase,
    skillLevel: level,
    energyLevel: level,
    recognitionLevel: level,
    leverageability: level,
    evidenceFromSelf: strings,
    evidenceFromOthers: strings,
    actionableAdvice: z.string(),
    applicationAreas: strings,
  })),
  hiddenStrengths: z.array(z.object({
    ...fiveInsightBase,
    competenceLevel: level,
    currentRecognition: level,
    potentialImpact: level,
    hiddenFactors: strings,
    developmentStrategy: z.string(),
    visibilityOpportunities: strings,
  })),
  overusedTalents: z.array(z.object({
    ...fiveInsightBase,
    talentLevel: level,
    usageFrequency: level,
    burnoutRisk: level,
    overuseIndicators: strings,
    rebalancingStrategy: z.string(),
    alternativeApplications: strings,
  })),
  aspirationalStrengths: z.array(z.object({
    ...fiveInsightBase,
    currentLevel: level,
    interestLevel: level,
    developmentPotential: level,
    developmentPlan: z.string(),
    requiredResources: strings,
    timeframeMonths: z.number().int().positive(),
  })),
  misalignedEnergies: z.array(z.object({
    ...fiveInsightBase,
    competenceLevel: level,
    energyDrainLevel: level,
    frequency: level,
    drainFactors: strings,
    mitigationStrategy: z.string(),
    alternativeApproaches: strings,
  })),
  executiveSummary: z.string().optional(),
  balanceScore: unit,
  keyRecommendations: strings,
});

// ─── Johari Window ───────────────────────────────────────────────────

const JohariQuadrantSchema = z.object({
  themes: strings,
  description: z.string(),
  count: z.number().int().min(0),
  actionableInsights: strings,
});

export const JohariWindowSchema: z.ZodType<JohariWindow, z.ZodTypeDef, unknown> = z.object({
  openArena: JohariQuadrantSchema,
  blindSpot: JohariQuadrantSchema,
  hiddenArena: JohariQuadrantSchema,
  unknownArena: JohariQuadrantSchema,
  dominantQuadrant: z.enum(JOHARI_QUADRANTS),
  developmentPriority: unit,
  selfAwarenessScore: unit,
});

// ─── Experiments & framework ─────────────────────────────────────────

export const CareerExperimentSchema: z.ZodType<CareerExperiment, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  type: z.enum([
    'skillBuilding',
    'roleExploration',
    'networking',
    'visibilityBuilding',
    'leadershipDevelopment',
    'workEnvironment',
    'industryExploration',
    'valueAlignment',
    'creativityExpression',
    'mentoring',
  ]),
  hypothesis: z.string(),
  relatedInsightIds: strings,
  scope: z.enum(['personal', 'team', 'organisational', 'external']),
  estimatedDurationDays: z.number().int().positive(),
  successCriteria: strings,
  metrics: z.array(z.object({
    name: z.string(),
    description: z.string(),
    type: z.enum(['quantitative', 'qualitative', 'behavioral', 'feedback', 'outcome']),
    measurementMethod: z.string(),
    targetValue: z.string().optional(),
    frequency: z.enum(['daily', 'weekly', 'biweekly', 'monthly']),
  })),
  requiredResources: strings,
  potentialBarriers: strings,
  priority: z.enum(['low', 'medium', 'high', 'urgent']),
  tags: strings,
});

export const TruthsTensionsExperimentSchema: z.ZodType<TruthsTensionsExperiment, z.ZodTypeDef, unknown> = z.object({
  threeTruths: z.object({
    truths: z.array(z.object({
      kind: z.enum(['energising_strength', 'identity_alignment', 'values_driven']),
      title: z.string(),
      description: z.string(),
      confidence: unit,
      supportingEvidence: strings,
      relatedThemes: strings,
    })),
    confidenceScore: unit,
    narrative: z.string(),
  }),
  twoTensions: z.object({
    tensions: z.array(z.object({
      kind: z.enum(['recognition_gap', 'development_tension']),
      title: z.string(),
      description: z.string(),
      selfPerspective: z.string(),
      othersPerspective: z.string(),
      opportunity: z.string(),
      opportunityScore: unit,
      relatedThemes: strings,
    })),
    opportunityScore: unit,
    narrative: z.string(),
  }),
  oneExperiment: z.object({
    experiment: CareerExperimentSchema.nullable(),
    feasibilityScore: unit,
    narrative: z.string(),
  }),
});

// ─── Aggregate root ──────────────────────────────────────────────────

const insightList = z.array(SynthesisInsightSchema);

export const CareerSynthesisSchema: z.ZodType<CareerSynthesis, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  sessionId: z.string(),
  generatedAt: isoTimestamp,
  selfResponseIds: strings,
  advisorResponseIds: strings,
  alignmentAreas: insightList,
  hiddenStrengths: insightList,
  overestimatedAreas: insightList,
  developmentOpportunities: insightList,
  repositioningPotential: insightList,
  executiveSummary: z.string(),
  strategicRecommendations: strings,
  alignmentScore: unit,
  confidenceLevel: z.enum(CONFIDENCE_LEVELS),
  metadata: z.object({
    version: z.string(),
    fiveInsights: z.object({
      totalInsights: z.number().int().min(0),
      balanceScore: unit,
      dominantCategory: z.enum(INSIGHT_CATEGORIES),
      isWellBalanced: z.boolean(),
      keyRecommendations: strings,
      priorityActions: strings,
    }).optional(),
    johariWindow: JohariWindowSchema.optional(),
    truthsTensionsExperiment: TruthsTensionsExperimentSchema.optional(),
    microExperiments: z.array(CareerExperimentSchema).optional(),
    processingStats: z.object({
      themesAnalyzed: z.number().int().min(0),
      evidencePoints: z.number().int().min(0),
      synthesisComplexity: unit,
    }).optional(),
    degradedCollaborators: z.array(z.object({
      collaborator: z.enum(['theme_tagger', 'narrative_generator']),
      operation: z.string(),
      reason: z.string(),
    })),
    fallback: z.object({ reason: z.string(), message: z.string() }).optional(),
    additionalContext: z.record(z.string(), z.unknown()),
  }),
});

// ─── HTTP request bodies ─────────────────────────────────────────────

export const SynthesisRequestSchema = z.object({
  sessionId: z.string().min(1).max(200),
  selfResponses: z.array(SelfResponseSchema).max(500),
  advisorResponses: z.array(AdvisorResponseSchema).max(500),
  additionalContext: z.record(z.string(), z.unknown()).optional(),
});

export type SynthesisRequest = z.infer<typeof SynthesisRequestSchema>;

export const ExperimentsRequestSchema = SynthesisRequestSchema.extend({
  max: z.number().int().min(0).max(20).optional(),
});

export const ThemesRequestSchema = z.object({
  question: z.string().max(2000).default(''),
  answer: z.string().min(1).max(20000),
});
