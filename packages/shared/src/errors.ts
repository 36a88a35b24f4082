/**
 * Error Taxonomy
 *
 * ExtractionError is the only fatal error: without text there is nothing to
 * fall back on. Model errors are routed by the orchestrator and never reach
 * the caller.
 */

export type ErrorCode =
  | 'extraction_failed'
  | 'model_unavailable'
  | 'safety_blocked'
  | 'response_invalid'
  | 'transport_error'
  | 'pattern_table_invalid';

export abstract class JobNoticeError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The document could not be converted to text. */
export class ExtractionError extends JobNoticeError {
  readonly code = 'extraction_failed';
}

/** No model credential is configured. */
export class ModelUnavailableError extends JobNoticeError {
  readonly code = 'model_unavailable';
}

/** The model refused or filtered the request. Retrying will not help. */
export class SafetyBlockedError extends JobNoticeError {
  readonly code = 'safety_blocked';

  constructor(readonly reason: string) {
    super(`Model request blocked: ${reason}`);
  }
}

/** The model replied, but not with a JSON object. */
export class ResponseInvalidError extends JobNoticeError {
  readonly code = 'response_invalid';
}

/** Network, timeout or non-2xx failure talking to the model. */
export class TransportError extends JobNoticeError {
  readonly code = 'transport_error';

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The configured pattern table failed validation or did not compile. */
export class PatternTableError extends JobNoticeError {
  readonly code = 'pattern_table_invalid';
}

export type ModelFailureKind = 'unavailable' | 'permanent' | 'transient';

/**
 * Map an error raised by the generative tier to the orchestrator transition it causes.
 * Anything not recognised is treated as transient.
 */
export function classifyModelFailure(error: unknown): ModelFailureKind {
  if (error instanceof ModelUnavailableError) return 'unavailable';
  if (error instanceof SafetyBlockedError) return 'permanent';
  return 'transient';
}
