import type { z } from 'zod';
import {
  CareerSynthesisSchema,
  FiveInsightsModelSchema,
  JohariWindowSchema,
} from './schemas.js';
import type { CareerSynthesis, FiveInsightsModel, JohariWindow } from './types.js';

export interface SerializationIssue {
  path: string;
  message: string;
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; issues: SerializationIssue[] };

function parseDocument<T>(json: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParseResult<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, issues: [{ path: '', message: `Invalid JSON: ${message}` }] };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    };
  }
  return { success: true, data: result.data };
}

export function serializeSynthesis(synthesis: CareerSynthesis): string {
  return JSON.stringify(synthesis);
}

export function parseSynthesis(json: string): ParseResult<CareerSynthesis> {
  return parseDocument(json, CareerSynthesisSchema);
}

export function serializeFiveInsights(model: FiveInsightsModel): string {
  return JSON.stringify(model);
}

export function parseFiveInsights(json: string): ParseResult<FiveInsightsModel> {
  return parseDocument(json, FiveInsightsModelSchema);
}

export function serializeJohariWindow(window: JohariWindow): string {
  return JSON.stringify(window);
}

export function parseJohariWindow(json: string): ParseResult<JohariWindow> {
  return parseDocument(json, JohariWindowSchema);
}
