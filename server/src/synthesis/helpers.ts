import type { AdvisorResponse, CareerResponse, SelfResponse } from './types.js';

const QUOTE_MAX_CHARS = 100;

export function clamp(value: number, min = 0, max = 1): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Weighted mean; falls back to the plain mean when every weight is zero. */
export function weightedMean(values: number[], weights: number[]): number {
  if (values.length === 0 || values.length !== weights.length) return 0;
  let total = 0;
  let weightSum = 0;
  for (let i = 0; i < values.length; i++) {
    total += values[i] * weights[i];
    weightSum += weights[i];
  }
  return weightSum > 0 ? total / weightSum : mean(values);
}

/** Round a 1-5 score to an integer level. */
export function toLevel(score: number): number {
  return Math.round(clamp(score, 1, 5));
}

export function truncateText(text: string, maxLength = QUOTE_MAX_CHARS): string {
  if (text.length <= maxLength) return text;
  return `${text.substring(0, maxLength)}...`;
}

export function selfQuote(response: SelfResponse): string {
  return `Self: "${truncateText(response.text)}"`;
}

export function advisorQuote(response: AdvisorResponse): string {
  return `Advisor: "${truncateText(response.text)}"`;
}

/** `problem_solving` → `Problem Solving` */
export function formatThemeTitle(theme: string): string {
  return theme
    .split('_')
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase() + word.substring(1))
    .join(' ');
}

/** Lowercase, drop everything but letters and digits. Used for dedupe keys. */
export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/** Free-form tag → lower snake case (`Problem Solving!` → `problem_solving`). */
export function normalizeTheme(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/[^a-z0-9\s_-]/g, '')
    .trim()
    .replace(/[\s-]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
}

/** Stable slug for deterministic ids. */
export function slugify(text: string): string {
  return normalizeTheme(text) || 'item';
}

export function hasTheme(response: CareerResponse, theme: string): boolean {
  return response.keyThemes.includes(theme);
}

export function responsesWithTheme<T extends CareerResponse>(responses: readonly T[], theme: string): T[] {
  return responses.filter((r) => hasTheme(r, theme));
}

/** Distinct values, first occurrence wins. */
export function unique<T>(values: readonly T[]): T[] {
  return Array.from(new Set(values));
}

/** Lowercased whole-word tokens. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9']+/).filter((t) => t.length > 0);
}
