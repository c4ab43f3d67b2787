import type {
  AspirationalStrength,
  EnergisingStrength,
  FiveInsightsModel,
  HiddenStrength,
  MisalignedEnergy,
  OverusedTalent,
} from '../../synthesis/types.js';

export function makeEnergising(overrides: Partial<EnergisingStrength> = {}): EnergisingStrength {
  return {
    id: 'energising_leadership',
    theme: 'leadership',
    title: 'Leadership',
    description: 'Shared strength.',
    confidence: 0.9,
    skillLevel: 4,
    energyLevel: 4,
    recognitionLevel: 4,
    leverageability: 4,
    evidenceFromSelf: ['Self: "I lead."'],
    evidenceFromOthers: ['Advisor: "They lead."'],
    actionableAdvice: 'Seek roles that need leadership.',
    applicationAreas: ['Leadership & Management'],
    ...overrides,
  };
}

export function makeHidden(overrides: Partial<HiddenStrength> = {}): HiddenStrength {
  return {
    id: 'hidden_coaching',
    theme: 'coaching',
    title: 'Coaching',
    description: 'Others see it.',
    confidence: 0.8,
    competenceLevel: 4,
    currentRecognition: 2,
    potentialImpact: 4,
    hiddenFactors: [],
    developmentStrategy: 'Ask for coaching feedback.',
    visibilityOpportunities: [],
    ...overrides,
  };
}

export function makeOverused(overrides: Partial<OverusedTalent> = {}): OverusedTalent {
  return {
    id: 'overused_planning',
    theme: 'planning',
    title: 'Planning',
    description: 'Used a lot.',
    confidence: 0.6,
    talentLevel: 4,
    usageFrequency: 4,
    burnoutRisk: 4,
    overuseIndicators: [],
    rebalancingStrategy: 'Share the planning load.',
    alternativeApplications: [],
    ...overrides,
  };
}

export function makeAspirational(overrides: Partial<AspirationalStrength> = {}): AspirationalStrength {
  return {
    id: 'aspirational_negotiation',
    theme: 'negotiation',
    title: 'Negotiation',
    description: 'Room to grow.',
    confidence: 0.7,
    currentLevel: 2,
    interestLevel: 4,
    developmentPotential: 3,
    developmentPlan: 'Practise negotiation weekly.',
    requiredResources: ['A negotiation course'],
    timeframeMonths: 12,
    ...overrides,
  };
}

export function makeMisaligned(overrides: Partial<MisalignedEnergy> = {}): MisalignedEnergy {
  return {
    id: 'misaligned_reporting',
    theme: 'reporting',
    title: 'Reporting',
    description: 'Capable but drained.',
    confidence: 0.6,
    competenceLevel: 4,
    energyDrainLevel: 4,
    frequency: 4,
    drainFactors: ['exhaust'],
    mitigationStrategy: 'Automate the weekly report.',
    alternativeApproaches: [],
    ...overrides,
  };
}

export function makeModel(overrides: Partial<FiveInsightsModel> = {}): FiveInsightsModel {
  return {
    id: 'model-1',
    sessionId: 'session-1',
    generatedAt: '2026-03-02T09:30:00.000Z',
    energisingStrengths: [],
    hiddenStrengths: [],
    overusedTalents: [],
    aspirationalStrengths: [],
    misalignedEnergies: [],
    balanceScore: 1,
    keyRecommendations: [],
    ...overrides,
  };
}
