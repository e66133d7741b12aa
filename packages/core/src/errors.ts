/**
 * Error types for railkit.
 */

/**
 * Deterministic error codes for construction-time and persistence violations.
 * Layout passes report through `LayoutResult` instead of throwing.
 */
export type RailErrorCode =
  | "RAIL_INVALID_PROPS"
  | "RAIL_INVALID_STATE"
  | "RAIL_DUPLICATE_KEY"
  | "RAIL_IO_ERROR";

/**
 * Error class for all deterministic railkit violations.
 * The `code` property identifies the specific violation.
 */
export class RailError extends Error {
  override readonly name = "RailError";
  readonly code: RailErrorCode;

  constructor(code: RailErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RailError);
    }
  }
}

export function isRailError(value: unknown): value is RailError {
  return value instanceof RailError;
}
