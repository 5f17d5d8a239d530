/**
 * packages/core/src/errors.ts — Grid layout error type.
 *
 * Why: Validation paths return `LayoutResult` values; the paths that can only
 * fail through a programming error (bad arguments passed directly, nested
 * passes) throw a `GridLayoutError` whose `code` identifies the violation.
 */

/**
 * Deterministic error codes for grid layout violations.
 */
export type GridLayoutErrorCode =
  | "GRID_INVALID_CONFIG"
  | "GRID_LENGTH_MISMATCH"
  | "GRID_REENTRANT_PASS";

export class GridLayoutError extends Error {
  override readonly name = "GridLayoutError";
  readonly code: GridLayoutErrorCode;

  constructor(code: GridLayoutErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GridLayoutError);
    }
  }
}
