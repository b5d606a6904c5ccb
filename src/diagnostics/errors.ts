import { ErrorCode, formatErrorMessage, getErrorCategory, type ErrorCategory } from './error_codes.js';

/**
 * Thrown on API misuse: unbalanced builder calls, out-of-range offsets,
 * keys from a foreign interner. These indicate a defect in the caller and
 * are never recovered from internally.
 */
export class CstError extends Error {
  readonly code: ErrorCode;
  readonly params: Readonly<Record<string, string | number>>;

  constructor(code: ErrorCode, params: Readonly<Record<string, string | number>> = {}) {
    super(formatErrorMessage(code, params));
    this.code = code;
    this.params = params;
    this.name = 'CstError';
  }

  get category(): ErrorCategory {
    return getErrorCategory(this.code);
  }
}

export function isCstError(error: unknown): error is CstError {
  return error instanceof CstError;
}
