/**
 * Bounded, degradable calls into the theme tagger and narrative generator.
 *
 * Every call runs under one deadline (retries included). A failure other
 * than cancellation is recorded as a DegradedCollaborator and answered
 * locally: keyword tagging for themes, template prose for narratives.
 * Cancellation always propagates so the engine can discard the run.
 */

import { createCombinedAbortSignal } from '../lib/llm-provider.js';
import type { Logger } from '../lib/logger.js';
import { withRetry } from '../lib/retry.js';
import type { Catalogues } from './catalogues.js';
import {
  CollaboratorTimeoutError,
  ParseError,
  SynthesisCancelledError,
  toSynthesisError,
} from './errors.js';
import { unique } from './helpers.js';
import { renderNarrative, type NarrativeGenerator, type NarrativeRequest } from './narrative.js';
import { extractKeywordThemes, type ThemeTagger } from './theme-tagging.js';
import type { CareerResponse, DegradedCollaborator } from './types.js';

export interface CollaboratorSettings {
  timeoutMs: number;
  signal?: AbortSignal;
  logger: Logger;
  maxAttempts: number;
  retryBaseDelayMs: number;
}

export interface CollaboratorOutcome<T> {
  value: T;
  degraded: DegradedCollaborator | null;
}

/**
 * Run `fn` with a signal that aborts at `timeoutMs` or when the caller
 * aborts. Rejects with CollaboratorTimeoutError or SynthesisCancelledError
 * as soon as the deadline passes, even if `fn` ignores its signal.
 */
export function callWithTimeout<T>(
  operation: string,
  timeoutMs: number,
  callerSignal: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  if (callerSignal?.aborted) {
    return Promise.reject(new SynthesisCancelledError({ operation }));
  }

  const { signal, cleanup } = createCombinedAbortSignal(callerSignal, timeoutMs);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(callerSignal?.aborted
        ? new SynthesisCancelledError({ operation })
        : new CollaboratorTimeoutError(operation, timeoutMs));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    void Promise.resolve()
      .then(() => fn(signal))
      .then(resolve, reject)
      .finally(() => {
        signal.removeEventListener('abort', onAbort);
        cleanup();
      });
  });
}

function boundedCall<T>(
  operation: string,
  settings: CollaboratorSettings,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  return callWithTimeout(operation, settings.timeoutMs, settings.signal, (signal) =>
    withRetry(() => fn(signal), {
      maxAttempts: settings.maxAttempts,
      baseDelay: settings.retryBaseDelayMs,
      signal,
      onRetry: (attempt, error) => {
        settings.logger.warn({ operation, attempt, error: error.message }, 'Collaborator call failed, retrying');
      },
    }));
}

function degradation(
  collaborator: DegradedCollaborator['collaborator'],
  operation: string,
  err: unknown,
  logger: Logger,
): DegradedCollaborator {
  const error = toSynthesisError(err, { collaborator, operation });
  logger.warn({ collaborator, operation, code: error.code, error: error.message }, 'Collaborator degraded to local fallback');
  return { collaborator, operation, reason: `${error.code}: ${error.message}` };
}

// ─── Theme tagging ───────────────────────────────────────────────────

/**
 * Tags for one answer. Falls back to the keyword scan when the tagger
 * fails, times out or returns something unusable.
 */
export async function tagAnswer(
  tagger: ThemeTagger,
  question: string,
  answer: string,
  operation: string,
  catalogues: Catalogues,
  settings: CollaboratorSettings,
): Promise<CollaboratorOutcome<string[]>> {
  try {
    const raw = await boundedCall(operation, settings, (signal) =>
      tagger.extractThemes(question, answer, signal));
    const themes = unique(raw.map((t) => t.trim()).filter((t) => t.length > 0));
    return { value: themes, degraded: null };
  } catch (err) {
    if (err instanceof SynthesisCancelledError) throw err;
    return {
      value: extractKeywordThemes(answer, catalogues),
      degraded: degradation('theme_tagger', operation, err, settings.logger),
    };
  }
}

export function tagResponse(
  tagger: ThemeTagger,
  response: CareerResponse,
  catalogues: Catalogues,
  settings: CollaboratorSettings,
): Promise<CollaboratorOutcome<string[]>> {
  return tagAnswer(tagger, response.questionText, response.text, `extract_themes:${response.id}`, catalogues, settings);
}

// ─── Narrative ───────────────────────────────────────────────────────

/** Prose for one section; template text when the generator cannot deliver. */
export async function writeNarrative(
  generator: NarrativeGenerator,
  request: NarrativeRequest,
  settings: CollaboratorSettings,
): Promise<CollaboratorOutcome<string>> {
  const operation = `generate_narrative:${request.kind}`;
  try {
    const text = await boundedCall(operation, settings, async (signal) => {
      const narrative = (await generator.generateNarrative(request, signal)).trim();
      if (narrative.length === 0) {
        throw new ParseError('Narrative generator returned empty text', { context: { operation } });
      }
      return narrative;
    });
    return { value: text, degraded: null };
  } catch (err) {
    if (err instanceof SynthesisCancelledError) throw err;
    return {
      value: renderNarrative(request),
      degraded: degradation('narrative_generator', operation, err, settings.logger),
    };
  }
}
