/**
 * Error taxonomy and reporting.
 *
 * Per-call failures are AuthError or TransportError and never abort a run.
 * ConfigError is fatal and raised before any call is made.
 *
 * reportError / reportWarning write one JSON line to stderr so failures can
 * be grepped out of a long run.
 */

import { APICallError } from 'ai';

export class EvaluatorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EvaluatorError';
  }
}

export class AuthError extends EvaluatorError {
  constructor(
    message: string,
    public status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AuthError';
  }
}

export class TransportError extends EvaluatorError {
  constructor(
    message: string,
    public status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class ConfigError extends EvaluatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function statusOf(e: unknown): number | undefined {
  if (APICallError.isInstance(e)) return e.statusCode;
  // Gateway errors are not APICallErrors but carry the same field
  if (typeof e === 'object' && e !== null && 'statusCode' in e && typeof e.statusCode === 'number') {
    return e.statusCode;
  }
  return undefined;
}

/**
 * Map anything thrown by a model call onto the taxonomy.
 * 401/403 are credential problems; everything else is transport.
 */
export function classifyError(e: unknown): AuthError | TransportError {
  if (e instanceof AuthError || e instanceof TransportError) return e;

  const message = e instanceof Error ? e.message : String(e);
  const status = statusOf(e);

  if (status === 401 || status === 403) {
    return new AuthError(message, status, { cause: e });
  }
  return new TransportError(message, status, { cause: e });
}

/** Failures a ResponseClient raises on purpose; anything else is a bug and should surface. */
export function isCallFailure(e: unknown): e is AuthError | TransportError {
  return e instanceof AuthError || e instanceof TransportError;
}

interface ErrorContext {
  /** Where the error occurred (e.g. "evaluate", "catalog") */
  context: string;
  [key: string]: unknown;
}

export function reportError(error: unknown, meta: ErrorContext): void {
  try {
    const err = error instanceof Error ? error : new Error(String(error));
    console.error(
      JSON.stringify({
        level: 'error',
        timestamp: new Date().toISOString(),
        error: err.name,
        message: err.message,
        ...meta,
      }),
    );
  } catch (reportFailure) {
    console.error('Error reporter failed:', error, reportFailure);
  }
}

export function reportWarning(message: string, meta: ErrorContext): void {
  try {
    console.warn(
      JSON.stringify({
        level: 'warn',
        timestamp: new Date().toISOString(),
        message,
        ...meta,
      }),
    );
  } catch (reportFailure) {
    console.warn('Warning reporter failed:', message, reportFailure);
  }
}
