/**
 * Zod schemas for the synthesis collaborators' LLM output.
 *
 * Permissive by intent: models add keys, wrap values, or return a bare array.
 * Objects use .passthrough() so extra keys never fail validation.
 *
 * Usage:
 *   const result = ThemesOutputSchema.safeParse(repairJSON(response.text));
 *   if (result.success) { use result.data.themes } else { best-effort parse }
 */

import { z } from 'zod';

// ─── theme tagging ───────────────────────────────────────────────────

export const ThemesOutputSchema = z.union([
  z.object({
    themes: z.array(z.string()),
  }).passthrough(),
  z.array(z.string()).transform((themes) => ({ themes })),
]);

export type ThemesOutput = z.infer<typeof ThemesOutputSchema>;

// ─── narrative writing ───────────────────────────────────────────────

export const NarrativeOutputSchema = z.object({
  narrative: z.string(),
}).passthrough();

export type NarrativeOutput = z.infer<typeof NarrativeOutputSchema>;
