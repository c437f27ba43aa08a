/**
 * Error types for engine and configuration violations.
 *
 * Caller mistakes around container nesting are never thrown; they are
 * reported as diagnostics (see diagnostics/types.ts). UiStackError covers
 * invalid configuration values, broken engine invariants, and backends
 * that fall out of sync with the calls they receive.
 */

/**
 * Deterministic error codes surfaced as UiStackError instances.
 */
export type UiStackErrorCode =
  | "PANELSTACK_INVALID_PROPS"
  | "PANELSTACK_INVALID_STATE"
  | "PANELSTACK_BACKEND_ERROR";

export class UiStackError extends Error {
  override readonly name = "UiStackError";
  readonly code: UiStackErrorCode;

  constructor(code: UiStackErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UiStackError);
    }
  }
}

export function invalidProps(detail: string): never {
  throw new UiStackError("PANELSTACK_INVALID_PROPS", detail);
}
