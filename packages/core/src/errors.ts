/**
 * Error type for Beam runtime violations.
 */

/**
 * Deterministic error codes for all runtime violations.
 * These are surfaced as BeamError instances.
 */
export type BeamErrorCode =
  | "BEAM_UNKNOWN_PATTERN"
  | "BEAM_INVALID_COLOR"
  | "BEAM_INVALID_SURFACE"
  | "BEAM_INVALID_CONFIG"
  | "BEAM_DRIVER_ERROR";

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class BeamError extends Error {
  override readonly name = "BeamError";
  readonly code: BeamErrorCode;

  constructor(code: BeamErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BeamError);
    }
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
