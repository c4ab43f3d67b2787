import type { Context } from 'hono';
import type { z } from 'zod';
import { ValidationError } from '../synthesis/errors.js';

export interface RequestIssue {
  path: (string | number)[];
  message: string;
}

export type RequestValidationResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: ValidationError; response: Response };

/**
 * Validates a parsed request body against a Zod schema.
 *
 * A failure carries a synthesis ValidationError (fields listed in its
 * context) and the 400 response built from it.
 */
export function validateRequest<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
  body: unknown,
): RequestValidationResult<z.output<T>> {
  const result = schema.safeParse(body);
  if (result.success) {
    return { ok: true, data: result.data };
  }

  const issues: RequestIssue[] = result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }));
  const fields = issues.map((issue) => issue.path.join('.') || '(root)');
  const error = new ValidationError(`Invalid request body: ${fields.join(', ')}`, { fields });
  return {
    ok: false,
    error,
    response: c.json({ error: 'Invalid request', code: error.code, details: issues }, 400),
  };
}
