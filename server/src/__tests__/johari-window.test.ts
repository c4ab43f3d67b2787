import { describe, it, expect } from 'vitest';
import { loadCatalogues } from '../synthesis/catalogues.js';
import {
  buildJohariWindow,
  calculateDevelopmentPriority,
  calculateSelfAwarenessScore,
  dominantQuadrant,
  identifyUnknownArena,
  rootWord,
} from '../synthesis/johari-window.js';
import { reconcileThemes } from '../synthesis/theme-reconciler.js';
import { makeWorkedExample } from './helpers/synthesis-fixtures.js';

const catalogues = loadCatalogues();

describe('buildJohariWindow', () => {
  it('fills the quadrants from the theme profile', () => {
    const { selfResponses, advisorResponses } = makeWorkedExample();
    const johari = buildJohariWindow(reconcileThemes(selfResponses, advisorResponses), catalogues);

    expect(johari.openArena).toEqual({
      themes: ['leadership'],
      description: 'Strengths and qualities both you and others recognise',
      count: 1,
      actionableInsights: ['Continue building on your recognised strength in Leadership'],
    });
    expect(johari.blindSpot.actionableInsights).toEqual([
      'Explore feedback opportunities to understand your impact in Mentoring',
    ]);
    expect(johari.hiddenArena.actionableInsights).toEqual([
      'Create visibility around your capabilities in Creativity',
    ]);
    expect(johari.unknownArena.count).toBe(4);
    expect(johari.unknownArena.actionableInsights).toEqual([
      'Consider developing or testing capabilities in Strategic Thinking',
      'Consider developing or testing capabilities in Innovation',
      'Consider developing or testing capabilities in Change Management',
    ]);
  });
});

describe('identifyUnknownArena', () => {
  it('drops candidates whose root word appears inside a mentioned theme', () => {
    const unknown = identifyUnknownArena(['strategic_planning', 'Innovation'], catalogues.unknownArenaCandidates);
    expect(unknown).toEqual([
      'change_management',
      'cross_cultural_communication',
      'digital_transformation',
      'sustainability_leadership',
    ]);
  });

  it('returns nothing when every candidate is covered', () => {
    expect(identifyUnknownArena(['a_b'], ['a'])).toEqual([]);
  });
});

describe('rootWord', () => {
  it('takes the text before the first underscore', () => {
    expect(rootWord('cross_cultural_communication')).toBe('cross');
    expect(rootWord('innovation')).toBe('innovation');
  });
});

describe('scores', () => {
  it('defaults self-awareness to 0.5 with nothing to compare', () => {
    expect(calculateSelfAwarenessScore(0, 0, 0)).toBe(0.5);
  });

  it('clamps a negative self-awareness score to 0', () => {
    expect(calculateSelfAwarenessScore(1, 3, 0)).toBe(0);
  });

  it('weights blind spots above hidden themes for development priority', () => {
    expect(calculateDevelopmentPriority(2, 2)).toBeCloseTo(0.24);
    expect(calculateDevelopmentPriority(20, 0)).toBe(1);
  });

  it('breaks quadrant ties in open, blind, hidden, unknown order', () => {
    expect(dominantQuadrant({ openArena: 2, blindSpot: 2, hiddenArena: 2, unknownArena: 2 })).toBe('openArena');
    expect(dominantQuadrant({ openArena: 0, blindSpot: 3, hiddenArena: 3, unknownArena: 1 })).toBe('blindSpot');
  });
});
