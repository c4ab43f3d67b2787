import type { Catalogues } from './catalogues.js';
import { containsAnyKeyword } from './keyword-scoring.js';

export interface ThemeTagger {
  extractThemes(question: string, answer: string, signal?: AbortSignal): Promise<string[]>;
}

/**
 * Keyword scan over the answer using the catalogue's theme map. Themes come
 * back in catalogue order, at most `maxFallbackThemes` of them.
 */
export function extractKeywordThemes(answer: string, catalogues: Catalogues): string[] {
  const themes: string[] = [];
  for (const [theme, keywords] of Object.entries(catalogues.themeKeywords)) {
    if (containsAnyKeyword(answer, keywords)) themes.push(theme);
    if (themes.length >= catalogues.maxFallbackThemes) break;
  }
  return themes;
}

export class KeywordThemeTagger implements ThemeTagger {
  constructor(private readonly catalogues: Catalogues) {}

  async extractThemes(_question: string, answer: string): Promise<string[]> {
    return extractKeywordThemes(answer, this.catalogues);
  }
}
