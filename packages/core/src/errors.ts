/**
 * Error taxonomy shared by the credit service, the reconciler and the HTTP layer.
 *
 * Every error is scoped to a single request or a single provider event.
 */

export type ErrorCode =
  | 'validation_failed'
  | 'insufficient_credits'
  | 'provider_error'
  | 'lock_timeout'
  | 'not_found'
  | 'invalid_signature';

export class CreditLedgerError extends Error {
  readonly code: ErrorCode;
  /** HTTP status the error maps to */
  readonly status: number;
  readonly retryable: boolean;

  constructor(message: string, code: ErrorCode, status: number, retryable = false) {
    super(message);
    this.name = 'CreditLedgerError';
    this.code = code;
    this.status = status;
    this.retryable = retryable;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, code: this.code, retryable: this.retryable };
  }
}

/**
 * Bad plan, interval or unit count, or a transition the caller may not request.
 */
export class ValidationError extends CreditLedgerError {
  constructor(message: string) {
    super(message, 'validation_failed', 400);
    this.name = 'ValidationError';
  }
}

/**
 * Reservation (or a commit that lost a race) found less credit than required.
 */
export class InsufficientCreditsError extends CreditLedgerError {
  readonly required: number;
  readonly remaining: number;

  constructor(required: number, remaining: number) {
    super(
      `Not enough subscription credits. Need ${required}, have ${remaining}. ` +
        'Buy a one-time report or upgrade your plan.',
      'insufficient_credits',
      402,
    );
    this.name = 'InsufficientCreditsError';
    this.required = required;
    this.remaining = remaining;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), required: this.required, remaining: this.remaining };
  }
}

/**
 * Any failed call to the payment provider. Local state is untouched.
 */
export class ProviderError extends CreditLedgerError {
  readonly providerCode: string | undefined;

  constructor(message: string, providerCode?: string) {
    super(message, 'provider_error', 502, true);
    this.name = 'ProviderError';
    this.providerCode = providerCode;
  }
}

/**
 * A row lock (or the database busy wait) exceeded its bound.
 */
export class LockTimeoutError extends CreditLedgerError {
  constructor(message = 'Timed out waiting for a ledger row lock') {
    super(message, 'lock_timeout', 503, true);
    this.name = 'LockTimeoutError';
  }
}

export class NotFoundError extends CreditLedgerError {
  constructor(message: string) {
    super(message, 'not_found', 404);
    this.name = 'NotFoundError';
  }
}

export class WebhookSignatureError extends CreditLedgerError {
  constructor(message = 'Webhook signature verification failed') {
    super(message, 'invalid_signature', 400);
    this.name = 'WebhookSignatureError';
  }
}

/**
 * Why the reconciler acknowledged an event without applying it.
 */
export type ReconciliationSkip =
  | 'user_not_found'
  | 'duplicate'
  | 'stale_event'
  | 'subscription_mismatch'
  | 'missing_reference'
  | 'unhandled_type';

/**
 * Safely extract an error message from an unknown catch value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}
