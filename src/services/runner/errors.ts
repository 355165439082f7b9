/**
 * Runner error handling.
 *
 * Runners report trial failures only as ProbeError, so the probe can tell a
 * rejected parameter (catalog update) from a runner it cannot reach
 * (no catalog update, failure propagated).
 */

/**
 * Standardized error codes for trial requests.
 */
export type ProbeErrorCode =
  | 'PARAMETER_REJECTED' // Runner refused the request's parameters (400/422)
  | 'UNREACHABLE'        // Connection failure or server error
  | 'TIMEOUT'            // Trial exceeded its time budget
  | 'CANCELLED';         // Caller aborted

/**
 * Unified trial error.
 */
export class ProbeError extends Error {
  readonly code: ProbeErrorCode;
  readonly details?: unknown;

  constructor(code: ProbeErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'ProbeError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace in V8 environments
    Error.captureStackTrace?.(this, ProbeError);
  }

  static isProbeError(error: unknown): error is ProbeError {
    return error instanceof ProbeError;
  }

  static hasCode(error: unknown, code: ProbeErrorCode): boolean {
    return ProbeError.isProbeError(error) && error.code === code;
  }

  /**
   * Unreachable and timed-out runners are transient: they say nothing about
   * whether a parameter is supported.
   */
  get isTransient(): boolean {
    return this.code === 'UNREACHABLE' || this.code === 'TIMEOUT';
  }
}

/**
 * Raised to the caller only when the engine cannot produce any snapshot,
 * including the minimal fallback.
 */
export class IntrospectionError extends Error {
  readonly modelId: string;

  constructor(modelId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IntrospectionError';
    this.modelId = modelId;
  }
}

/**
 * Map HTTP status codes to ProbeErrorCode.
 */
export function httpStatusToCode(status: number): ProbeErrorCode {
  if (status === 400 || status === 422) return 'PARAMETER_REJECTED';
  if (status === 408 || status === 504) return 'TIMEOUT';
  return 'UNREACHABLE';
}

/**
 * Map a raw thrown value to ProbeError.
 */
export function mapProbeError(error: unknown): ProbeError {
  if (ProbeError.isProbeError(error)) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new ProbeError('CANCELLED', 'Trial request was aborted', error);
    }
    if (error.name === 'TimeoutError') {
      return new ProbeError('TIMEOUT', 'Trial request timed out', error);
    }
    // fetch rejects with TypeError on connection failures
    if (error.name === 'TypeError') {
      return new ProbeError('UNREACHABLE', `Runner unreachable: ${error.message}`, error);
    }
    return new ProbeError('UNREACHABLE', error.message, error);
  }

  if (typeof error === 'string') {
    return new ProbeError('UNREACHABLE', error);
  }

  return new ProbeError('UNREACHABLE', 'An unknown runner error occurred', error);
}

/**
 * Throw a CANCELLED ProbeError if the signal has fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ProbeError('CANCELLED', 'Introspection was cancelled', signal.reason);
  }
}
