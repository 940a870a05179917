import { describe, it, expect } from 'vitest';
import {
  InsufficientCreditsError,
  LockTimeoutError,
  NotFoundError,
  ProviderError,
  ValidationError,
} from '@creditledger/core';
import { getErrorStatus, sanitizeErrorMessage, toErrorResponse } from '../lib/error-sanitizer.js';

describe('error-sanitizer', () => {
  describe('sanitizeErrorMessage', () => {
    it('returns the message of a domain error', () => {
      expect(sanitizeErrorMessage(new ValidationError('units must be a positive integer, got 0'))).toBe(
        'units must be a positive integer, got 0',
      );
    });

    it('returns generic message for regular Error', () => {
      expect(sanitizeErrorMessage(new Error('SQLITE_CONSTRAINT: UNIQUE'))).toBe('Internal server error');
    });

    it('returns generic message for unknown values', () => {
      expect(sanitizeErrorMessage('something broke')).toBe('Internal server error');
      expect(sanitizeErrorMessage(null)).toBe('Internal server error');
      expect(sanitizeErrorMessage(undefined)).toBe('Internal server error');
    });

    it('strips sensitive details from domain errors', () => {
      expect(sanitizeErrorMessage(new ValidationError('SQLITE_ERROR: no such table'))).toBe('Bad request');
      expect(sanitizeErrorMessage(new ProviderError('ENOENT /home/app/key.pem'))).toBe('Internal server error');
    });
  });

  describe('getErrorStatus', () => {
    it('maps the taxonomy to HTTP statuses', () => {
      expect(getErrorStatus(new ValidationError('x'))).toBe(400);
      expect(getErrorStatus(new InsufficientCreditsError(1, 0))).toBe(402);
      expect(getErrorStatus(new NotFoundError('x'))).toBe(404);
      expect(getErrorStatus(new ProviderError('x'))).toBe(502);
      expect(getErrorStatus(new LockTimeoutError())).toBe(503);
    });

    it('defaults to 500', () => {
      expect(getErrorStatus(new Error('x'))).toBe(500);
      expect(getErrorStatus({ status: 418 })).toBe(500);
    });
  });

  describe('toErrorResponse', () => {
    it('carries the code and details of a domain error', () => {
      expect(toErrorResponse(new InsufficientCreditsError(2, 1))).toEqual({
        status: 402,
        body: {
          error: 'Not enough subscription credits. Need 2, have 1. Buy a one-time report or upgrade your plan.',
          code: 'insufficient_credits',
          retryable: false,
          required: 2,
          remaining: 1,
          status: 402,
        },
      });
    });

    it('marks provider failures retryable', () => {
      expect(toErrorResponse(new ProviderError('card_declined', 'card_declined')).body).toMatchObject({
        code: 'provider_error',
        retryable: true,
        status: 502,
      });
    });

    it('hides everything about unknown errors', () => {
      expect(toErrorResponse(new TypeError('cannot read x of undefined'))).toEqual({
        status: 500,
        body: { error: 'Internal server error', status: 500 },
      });
    });
  });
});
