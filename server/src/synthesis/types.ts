/**
 * Shared type definitions for the synthesis engine.
 *
 * Every stage is a pure function: typed input → typed output. Records are
 * treated as immutable once built; a repeat run builds new ones.
 * Field names are the JSON wire names (see ./schemas.ts).
 */

// ─── Enumerations ────────────────────────────────────────────────────

export const CAREER_DOMAINS = [
  'technical',
  'leadership',
  'creative',
  'analytical',
  'social',
  'entrepreneurial',
  'traditional',
  'investigative',
] as const;

export type CareerDomain = typeof CAREER_DOMAINS[number];

export const CAREER_DOMAIN_LABELS: Record<CareerDomain, string> = {
  technical: 'Technical & Engineering',
  leadership: 'Leadership & Management',
  creative: 'Creative & Design',
  analytical: 'Analytical & Research',
  social: 'Social & Communication',
  entrepreneurial: 'Entrepreneurial & Business',
  traditional: 'Traditional & Service',
  investigative: 'Investigative & Academic',
};

export const SYNTHESIS_CATEGORIES = [
  'strength',
  'blindspot',
  'overestimation',
  'development',
  'positioning',
] as const;

export type SynthesisCategory = typeof SYNTHESIS_CATEGORIES[number];

export const CONFIDENCE_LEVELS = ['low', 'medium', 'high'] as const;
export type SynthesisConfidence = typeof CONFIDENCE_LEVELS[number];

export const INSIGHT_CATEGORIES = [
  'energising',
  'hidden',
  'overused',
  'aspirational',
  'misaligned',
] as const;

export type InsightCategory = typeof INSIGHT_CATEGORIES[number];

export const INSIGHT_CATEGORY_LABELS: Record<InsightCategory, string> = {
  energising: 'Energising Strength',
  hidden: 'Hidden Strength',
  overused: 'Overused Talent',
  aspirational: 'Aspirational Strength',
  misaligned: 'Misaligned Energy',
};

// ─── Responses ───────────────────────────────────────────────────────

interface ResponseBase {
  id: string;
  questionId: string;
  questionText: string;
  domain: CareerDomain;
  text: string;
  /** ISO-8601 timestamp */
  answeredAt: string;
  /** Distinct theme tags, first-occurrence order */
  keyThemes: string[];
  qualityScore: number;
}

export interface SelfResponse extends ResponseBase {
  /** Self-rated certainty, 1-5. Treated as 3 when absent. */
  confidenceLevel?: number;
}

export interface AdvisorResponse extends ResponseBase {
  advisorId?: string;
  credibilityWeight: number;
  specificExamples: string[];
}

export type CareerResponse = SelfResponse | AdvisorResponse;

// ─── Theme reconciliation ────────────────────────────────────────────

export interface ThemeProfile {
  /** Multiset: every tag of every self response, in response order */
  selfThemes: string[];
  advisorThemes: string[];
  selfCounts: ReadonlyMap<string, number>;
  advisorCounts: ReadonlyMap<string, number>;
  commonThemes: string[];
  uniqueToAdvisor: string[];
  uniqueToSelf: string[];
  /** Distinct themes across both sides */
  allThemes: string[];
}

// ─── Insights ────────────────────────────────────────────────────────

export interface SynthesisInsight {
  id: string;
  title: string;
  description: string;
  category: SynthesisCategory;
  supportingEvidence: string[];
  /** 1-5 */
  strategicImportance: number;
  actionableAdvice: string;
  relatedThemes: string[];
  /** 0-1 */
  confidence: number;
}

export interface CategorizedInsights {
  alignmentAreas: SynthesisInsight[];
  hiddenStrengths: SynthesisInsight[];
  overestimatedAreas: SynthesisInsight[];
  developmentOpportunities: SynthesisInsight[];
  repositioningPotential: SynthesisInsight[];
}

// ─── Five Insights Model ─────────────────────────────────────────────
// Levels are integers on a 1-5 scale.

interface FiveInsightBase {
  id: string;
  theme: string;
  title: string;
  description: string;
  confidence: number;
}

export interface EnergisingStrength extends FiveInsightBase {
  skillLevel: number;
  energyLevel: number;
  recognitionLevel: number;
  leverageability: number;
  evidenceFromSelf: string[];
  evidenceFromOthers: string[];
  actionableAdvice: string;
  applicationAreas: string[];
}

export interface HiddenStrength extends FiveInsightBase {
  competenceLevel: number;
  currentRecognition: number;
  potentialImpact: number;
  hiddenFactors: string[];
  developmentStrategy: string;
  visibilityOpportunities: string[];
}

export interface OverusedTalent extends FiveInsightBase {
  talentLevel: number;
  usageFrequency: number;
  burnoutRisk: number;
  overuseIndicators: string[];
  rebalancingStrategy: string;
  alternativeApplications: string[];
}

export interface AspirationalStrength extends FiveInsightBase {
  currentLevel: number;
  interestLevel: number;
  developmentPotential: number;
  developmentPlan: string;
  requiredResources: string[];
  timeframeMonths: number;
}

export interface MisalignedEnergy extends FiveInsightBase {
  competenceLevel: number;
  energyDrainLevel: number;
  frequency: number;
  drainFactors: string[];
  mitigationStrategy: string;
  alternativeApproaches: string[];
}

export interface FiveInsightsModel {
  id: string;
  sessionId: string;
  generatedAt: string;
  energisingStrengths: EnergisingStrength[];
  hiddenStrengths: HiddenStrength[];
  overusedTalents: OverusedTalent[];
  aspirationalStrengths: AspirationalStrength[];
  misalignedEnergies: MisalignedEnergy[];
  executiveSummary?: string;
  balanceScore: number;
  keyRecommendations: string[];
}

// ─── Johari Window ───────────────────────────────────────────────────

export const JOHARI_QUADRANTS = ['openArena', 'blindSpot', 'hiddenArena', 'unknownArena'] as const;
export type JohariQuadrantName = typeof JOHARI_QUADRANTS[number];

export interface JohariQuadrant {
  themes: string[];
  description: string;
  count: number;
  actionableInsights: string[];
}

export interface JohariWindow {
  openArena: JohariQuadrant;
  blindSpot: JohariQuadrant;
  hiddenArena: JohariQuadrant;
  unknownArena: JohariQuadrant;
  dominantQuadrant: JohariQuadrantName;
  developmentPriority: number;
  selfAwarenessScore: number;
}

// ─── Experiments ─────────────────────────────────────────────────────

export type ExperimentType =
  | 'skillBuilding'
  | 'roleExploration'
  | 'networking'
  | 'visibilityBuilding'
  | 'leadershipDevelopment'
  | 'workEnvironment'
  | 'industryExploration'
  | 'valueAlignment'
  | 'creativityExpression'
  | 'mentoring';

export type ExperimentScope = 'personal' | 'team' | 'organisational' | 'external';
export type ExperimentPriority = 'low' | 'medium' | 'high' | 'urgent';
export type MetricType = 'quantitative' | 'qualitative' | 'behavioral' | 'feedback' | 'outcome';
export type MetricFrequency = 'daily' | 'weekly' | 'biweekly' | 'monthly';

export interface ExperimentMetric {
  name: string;
  description: string;
  type: MetricType;
  measurementMethod: string;
  targetValue?: string;
  frequency: MetricFrequency;
}

export interface CareerExperiment {
  id: string;
  title: string;
  description: string;
  type: ExperimentType;
  hypothesis: string;
  relatedInsightIds: string[];
  scope: ExperimentScope;
  estimatedDurationDays: number;
  successCriteria: string[];
  metrics: ExperimentMetric[];
  requiredResources: string[];
  potentialBarriers: string[];
  priority: ExperimentPriority;
  tags: string[];
}

// ─── Three Truths / Two Tensions / One Experiment ────────────────────

export type TruthKind = 'energising_strength' | 'identity_alignment' | 'values_driven';

export interface Truth {
  kind: TruthKind;
  title: string;
  description: string;
  confidence: number;
  supportingEvidence: string[];
  relatedThemes: string[];
}

export type TensionKind = 'recognition_gap' | 'development_tension';

export interface Tension {
  kind: TensionKind;
  title: string;
  description: string;
  selfPerspective: string;
  othersPerspective: string;
  opportunity: string;
  opportunityScore: number;
  relatedThemes: string[];
}

export interface ExperimentSelection {
  experiment: CareerExperiment | null;
  feasibilityScore: number;
  narrative: string;
}

export interface TruthsTensionsExperiment {
  threeTruths: { truths: Truth[]; confidenceScore: number; narrative: string };
  twoTensions: { tensions: Tension[]; opportunityScore: number; narrative: string };
  oneExperiment: ExperimentSelection;
}

// ─── Aggregate root ──────────────────────────────────────────────────

export interface FiveInsightsSummary {
  totalInsights: number;
  balanceScore: number;
  dominantCategory: InsightCategory;
  isWellBalanced: boolean;
  keyRecommendations: string[];
  priorityActions: string[];
}

export interface ProcessingStats {
  themesAnalyzed: number;
  evidencePoints: number;
  synthesisComplexity: number;
}

export interface DegradedCollaborator {
  collaborator: 'theme_tagger' | 'narrative_generator';
  operation: string;
  reason: string;
}

export interface SynthesisMetadata {
  version: string;
  fiveInsights?: FiveInsightsSummary;
  johariWindow?: JohariWindow;
  truthsTensionsExperiment?: TruthsTensionsExperiment;
  microExperiments?: CareerExperiment[];
  processingStats?: ProcessingStats;
  degradedCollaborators: DegradedCollaborator[];
  fallback?: { reason: string; message: string };
  additionalContext: Record<string, unknown>;
}

export interface CareerSynthesis extends CategorizedInsights {
  id: string;
  sessionId: string;
  generatedAt: string;
  selfResponseIds: string[];
  advisorResponseIds: string[];
  executiveSummary: string;
  strategicRecommendations: string[];
  alignmentScore: number;
  confidenceLevel: SynthesisConfidence;
  metadata: SynthesisMetadata;
}
