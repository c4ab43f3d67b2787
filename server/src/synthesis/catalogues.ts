import { readFileSync } from 'node:fs';
import { z } from 'zod';

// Static keyword lists and candidate catalogues live in data/catalogues.json.
// They are English-language configuration, validated once at load.

const KeywordScaleSchema = z.object({
  baseline: z.number(),
  tiers: z.array(z.object({
    weight: z.number(),
    keywords: z.array(z.string().min(1)),
  })),
});

export type KeywordScale = z.infer<typeof KeywordScaleSchema>;

const CataloguesSchema = z.object({
  unknownArenaCandidates: z.array(z.string().min(1)),
  strategicLanguage: z.array(z.string().min(1)),
  highValueThemes: z.array(z.string().min(1)),
  developmentKeywords: z.array(z.string().min(1)),
  urgencyKeywords: z.array(z.string().min(1)),
  valueThemeTriggers: z.array(z.string().min(1)),
  coreValues: z.array(z.string().min(1)),
  themeKeywords: z.record(z.string(), z.array(z.string().min(1))),
  maxFallbackThemes: z.number().int().positive(),
  scales: z.object({
    energy: KeywordScaleSchema,
    skill: KeywordScaleSchema,
    recognition: KeywordScaleSchema,
    competence: KeywordScaleSchema,
    drain: KeywordScaleSchema,
    usage: KeywordScaleSchema,
    interest: KeywordScaleSchema,
    currentLevel: KeywordScaleSchema,
    competenceDespiteDrain: KeywordScaleSchema,
  }),
  contrastKeywords: z.array(z.string().min(1)),
  contrastBonus: z.number(),
});

export type Catalogues = z.infer<typeof CataloguesSchema>;

let cached: Catalogues | null = null;

/**
 * Load and validate the catalogue file beside this module.
 * Throws on a malformed file; that is a deployment error, not a run error.
 */
export function loadCatalogues(): Catalogues {
  if (cached) return cached;
  const raw = readFileSync(new URL('./data/catalogues.json', import.meta.url), 'utf8');
  const parsed = CataloguesSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid synthesis catalogue file: ${detail}`);
  }
  cached = parsed.data;
  return cached;
}
