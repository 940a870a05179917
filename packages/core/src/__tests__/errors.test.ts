import { describe, it, expect } from 'vitest';
import {
  getErrorMessage,
  InsufficientCreditsError,
  LockTimeoutError,
  ProviderError,
  ValidationError,
  CreditLedgerError,
} from '../errors.js';

describe('getErrorMessage', () => {
  it('returns message from Error instance', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('returns string as-is', () => {
    expect(getErrorMessage('something failed')).toBe('something failed');
  });

  it('returns Unknown error for anything else', () => {
    expect(getErrorMessage(42)).toBe('Unknown error');
    expect(getErrorMessage(null)).toBe('Unknown error');
    expect(getErrorMessage({ message: 'not an error' })).toBe('Unknown error');
  });
});

describe('error taxonomy', () => {
  it('states the exact shortfall', () => {
    const err = new InsufficientCreditsError(2, 1);
    expect(err.message).toBe(
      'Not enough subscription credits. Need 2, have 1. Buy a one-time report or upgrade your plan.',
    );
    expect(err.status).toBe(402);
    expect(err.toJSON()).toEqual({
      error: err.message,
      code: 'insufficient_credits',
      retryable: false,
      required: 2,
      remaining: 1,
    });
  });

  it('marks provider and lock failures retryable', () => {
    expect(new ProviderError('card network down').retryable).toBe(true);
    expect(new ProviderError('x').status).toBe(502);
    expect(new LockTimeoutError().retryable).toBe(true);
    expect(new LockTimeoutError().status).toBe(503);
  });

  it('keeps validation errors non-retryable', () => {
    const err = new ValidationError('bad units');
    expect(err).toBeInstanceOf(CreditLedgerError);
    expect(err.name).toBe('ValidationError');
    expect(err.retryable).toBe(false);
    expect(err.status).toBe(400);
  });
});
