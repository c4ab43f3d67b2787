/**
 * Synthesis error taxonomy.
 *
 * None of these reach the end user as thrown exceptions: the engine converts
 * them into a fallback synthesis or a local degradation. They exist so logs
 * and `SynthesisResult.error` say precisely what went wrong.
 */

export type SynthesisErrorCode =
  | 'validation'
  | 'collaborator_timeout'
  | 'parse'
  | 'internal'
  | 'cancelled';

export interface SynthesisErrorContext {
  sessionId?: string;
  collaborator?: string;
  operation?: string;
  [key: string]: unknown;
}

export class SynthesisError extends Error {
  readonly code: SynthesisErrorCode;
  readonly context: SynthesisErrorContext;

  constructor(
    code: SynthesisErrorCode,
    message: string,
    options: { context?: SynthesisErrorContext; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SynthesisError';
    this.code = code;
    this.context = options.context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): { code: SynthesisErrorCode; message: string; context: SynthesisErrorContext } {
    return { code: this.code, message: this.message, context: this.context };
  }
}

export class ValidationError extends SynthesisError {
  constructor(message: string, context?: SynthesisErrorContext) {
    super('validation', message, { context });
    this.name = 'ValidationError';
  }
}

export class CollaboratorTimeoutError extends SynthesisError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, context?: SynthesisErrorContext) {
    super('collaborator_timeout', `${operation} timed out after ${timeoutMs}ms`, {
      context: { ...context, operation },
    });
    this.name = 'CollaboratorTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ParseError extends SynthesisError {
  constructor(message: string, options: { context?: SynthesisErrorContext; cause?: unknown } = {}) {
    super('parse', message, options);
    this.name = 'ParseError';
  }
}

export class InternalComputationError extends SynthesisError {
  constructor(message: string, options: { context?: SynthesisErrorContext; cause?: unknown } = {}) {
    super('internal', message, options);
    this.name = 'InternalComputationError';
  }
}

export class SynthesisCancelledError extends SynthesisError {
  constructor(context?: SynthesisErrorContext) {
    super('cancelled', 'Synthesis run was cancelled', { context });
    this.name = 'SynthesisCancelledError';
  }
}

/** Wrap an unknown throwable; SynthesisErrors pass through untouched. */
export function toSynthesisError(err: unknown, context?: SynthesisErrorContext): SynthesisError {
  if (err instanceof SynthesisError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new InternalComputationError(message, { context, cause: err });
}
