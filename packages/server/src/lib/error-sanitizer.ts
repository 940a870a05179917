/**
 * Error sanitization: maps thrown errors to client-facing responses without
 * leaking internal details.
 */

import { CreditLedgerError } from '@creditledger/core';

const GENERIC_5XX = 'Internal server error';

/**
 * Patterns that must never reach the client (database internals, file paths, stack traces).
 */
const SENSITIVE_PATTERNS = [
  /SQLITE_/i,
  /\/home\//,
  /\/usr\//,
  /\/tmp\//,
  /\\Users\\/,
  /at\s+\S+\s+\(.*:\d+:\d+\)/, // stack trace frames
  /node_modules/,
  /\.ts:\d+/,
  /\.js:\d+/,
];

/** Statuses the domain error taxonomy maps to */
export type ErrorStatus = 400 | 402 | 404 | 500 | 502 | 503;

export interface ErrorResponse {
  status: ErrorStatus;
  body: Record<string, unknown>;
}

/**
 * Returns a safe, client-facing error message.
 * - Domain errors: their own message, unless it matches a sensitive pattern.
 * - Everything else: generic "Internal server error".
 */
export function sanitizeErrorMessage(err: unknown): string {
  if (err instanceof CreditLedgerError) {
    const msg = err.message;
    if (SENSITIVE_PATTERNS.some((p) => p.test(msg))) {
      return err.status < 500 ? 'Bad request' : GENERIC_5XX;
    }
    return msg;
  }
  return GENERIC_5XX;
}

/**
 * Extract HTTP status code from an error, defaulting to 500.
 */
export function getErrorStatus(err: unknown): ErrorStatus {
  if (!(err instanceof CreditLedgerError)) return 500;
  switch (err.status) {
    case 400:
    case 402:
    case 404:
    case 502:
    case 503:
      return err.status;
    default:
      return 500;
  }
}

/**
 * Response for a thrown error: the domain error's JSON (code, retryable and
 * details such as `required`/`remaining`) with its status, or a bare 500.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  const status = getErrorStatus(err);
  if (err instanceof CreditLedgerError) {
    return { status, body: { ...err.toJSON(), error: sanitizeErrorMessage(err), status } };
  }
  return { status, body: { error: GENERIC_5XX, status } };
}
