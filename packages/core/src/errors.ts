/**
 * packages/core/src/errors.ts — Error type for contract violations.
 *
 * Why: Cascade and layout are pure recomputations, so nothing they do is
 * retried. The conditions below are programming or packaging errors and are
 * surfaced as TesseraError instances with a stable `code`.
 */

/**
 * Deterministic error codes.
 *
 * - TESSERA_FONT_LOAD_FAILED: the embedded default font could not be read or parsed.
 * - TESSERA_UNRESOLVED_ATTRIBUTES: layout visited an element the cascade never resolved.
 * - TESSERA_INVALID_STYLE: a style rule definition holds an out-of-range value.
 * - TESSERA_INVALID_CONFIG: layout engine configuration is out of range.
 */
export type TesseraErrorCode =
  | "TESSERA_FONT_LOAD_FAILED"
  | "TESSERA_UNRESOLVED_ATTRIBUTES"
  | "TESSERA_INVALID_STYLE"
  | "TESSERA_INVALID_CONFIG";

export class TesseraError extends Error {
  override readonly name = "TesseraError";
  readonly code: TesseraErrorCode;

  constructor(code: TesseraErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TesseraError);
    }
  }
}

export function isTesseraError(value: unknown): value is TesseraError {
  return value instanceof TesseraError;
}
