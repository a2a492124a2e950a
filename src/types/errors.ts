/**
 * Error Codes
 *
 * Adapters (catalog, tier store, run store) throw TieringError.
 * Services catch it and return a Result failure with the same code.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'SIZE_OUT_OF_RANGE'
  | 'CONFLICT'
  | 'STORAGE_UNAVAILABLE'
  | 'VERIFICATION_FAILED'
  | 'VALIDATION_ERROR'
  | 'INTERNAL_ERROR';

export class TieringError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TieringError';
    this.code = code;
  }
}

export function isTieringError(
  error: unknown,
  code?: ErrorCode
): error is TieringError {
  return (
    error instanceof TieringError && (code === undefined || error.code === code)
  );
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
