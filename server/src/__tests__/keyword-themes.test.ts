import { describe, it, expect } from 'vitest';
import { loadCatalogues } from '../synthesis/catalogues.js';
import {
  containsAnyKeyword,
  countKeywords,
  matchedKeywords,
  scoreCompetenceDespiteDrain,
  scoreOnScale,
} from '../synthesis/keyword-scoring.js';
import { KeywordThemeTagger, extractKeywordThemes } from '../synthesis/theme-tagging.js';

const catalogues = loadCatalogues();

describe('loadCatalogues', () => {
  it('loads the catalogue file once', () => {
    expect(loadCatalogues()).toBe(catalogues);
    expect(catalogues.unknownArenaCandidates.slice(0, 2)).toEqual(['strategic_thinking', 'innovation']);
    expect(catalogues.maxFallbackThemes).toBe(5);
  });
});

describe('keyword matching', () => {
  it('counts distinct keywords case-insensitively by substring', () => {
    expect(countKeywords('Lead, LEAD, leader', ['lead'])).toBe(1);
    expect(countKeywords('Mentor and guide', ['mentor', 'guide', 'coach'])).toBe(2);
    expect(containsAnyKeyword('nothing here', ['lead'])).toBe(false);
    expect(matchedKeywords('Guide and mentor', ['mentor', 'guide'])).toEqual(['mentor', 'guide']);
  });

  it('scores on a clamped 1-5 scale', () => {
    const scale = {
      baseline: 2,
      tiers: [
        { weight: 1, keywords: ['love', 'enjoy'] },
        { weight: -2, keywords: ['drain'] },
      ],
    };
    expect(scoreOnScale('I love and enjoy it', scale)).toBe(4);
    expect(scoreOnScale('It is a drain', scale)).toBe(1);
    expect(scoreOnScale('plain', scale)).toBe(2);
  });

  it('adds the contrast bonus when competence and contrast co-occur', () => {
    const custom = {
      ...catalogues,
      scales: { ...catalogues.scales, competenceDespiteDrain: { baseline: 1, tiers: [{ weight: 1, keywords: ['good at'] }] } },
    };
    expect(scoreCompetenceDespiteDrain('I am good at it but it wears me down', custom)).toBe(3);
    expect(scoreCompetenceDespiteDrain('I am good at it', custom)).toBe(2);
    expect(scoreCompetenceDespiteDrain('It wears me down but I cope', custom)).toBe(1);
  });
});

describe('extractKeywordThemes', () => {
  it('returns catalogue themes in catalogue order', () => {
    expect(extractKeywordThemes('I love to lead and help the team solve problems', catalogues)).toEqual([
      'leadership',
      'collaboration',
      'problem_solving',
      'passion',
      'helping',
    ]);
  });

  it('stops at the fallback limit', () => {
    expect(extractKeywordThemes('I love to lead and help the team solve problems and design tools', catalogues)).toEqual([
      'leadership',
      'collaboration',
      'problem_solving',
      'creativity',
      'passion',
    ]);
  });

  it('returns nothing for text without catalogue keywords', () => {
    expect(extractKeywordThemes('Weather was fine.', catalogues)).toEqual([]);
  });
});

describe('KeywordThemeTagger', () => {
  it('ignores the question and scans the answer', async () => {
    const tagger = new KeywordThemeTagger(catalogues);
    await expect(tagger.extractThemes('Do you lead?', 'I coordinate release planning.')).resolves.toEqual(['leadership']);
  });
});
