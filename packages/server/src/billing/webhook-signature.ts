/**
 * Webhook signature scheme of the payment provider.
 *
 * Header format: `t=<unix seconds>,v1=<hex HMAC-SHA256 of "<t>.<payload>">`.
 * Several `v1` entries may appear while a secret is being rolled.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import { WebhookSignatureError } from '@creditledger/core';

/** Maximum age of a signed payload, in seconds */
export const DEFAULT_TOLERANCE_SECONDS = 300;

export interface VerifyOptions {
  toleranceSeconds?: number;
  /** Current time in unix seconds */
  now?: number;
}

export function computeSignature(payload: string, secret: string, timestamp: number): string {
  return createHmac('sha256', secret).update(`${timestamp}.${payload}`).digest('hex');
}

/**
 * Build a signature header for `payload`.
 */
export function signPayload(
  payload: string,
  secret: string,
  timestamp: number = Math.floor(Date.now() / 1000),
): string {
  return `t=${timestamp},v1=${computeSignature(payload, secret, timestamp)}`;
}

function parseHeader(header: string): { timestamp: number; signatures: string[] } | null {
  let timestamp: number | null = null;
  const signatures: string[] = [];
  for (const part of header.split(',')) {
    const separator = part.indexOf('=');
    if (separator <= 0) continue;
    const key = part.slice(0, separator).trim();
    const value = part.slice(separator + 1).trim();
    if (key === 't') {
      const parsed = Number(value);
      timestamp = Number.isInteger(parsed) ? parsed : null;
    } else if (key === 'v1' && value) {
      signatures.push(value);
    }
  }
  if (timestamp === null || signatures.length === 0) return null;
  return { timestamp, signatures };
}

function safeEqual(a: string, b: string): boolean {
  const aBuf = Buffer.from(a, 'utf8');
  const bBuf = Buffer.from(b, 'utf8');
  if (aBuf.length !== bBuf.length) return false;
  return timingSafeEqual(aBuf, bBuf);
}

/**
 * Verify a signature header against the raw payload, using timing-safe
 * comparison. Throws WebhookSignatureError on any mismatch.
 */
export function verifySignature(
  payload: string,
  header: string | undefined,
  secret: string,
  options: VerifyOptions = {},
): void {
  if (!header) {
    throw new WebhookSignatureError('Missing webhook signature header');
  }
  const parsed = parseHeader(header);
  if (!parsed) {
    throw new WebhookSignatureError('Invalid webhook signature format');
  }

  const tolerance = options.toleranceSeconds ?? DEFAULT_TOLERANCE_SECONDS;
  const now = options.now ?? Math.floor(Date.now() / 1000);
  if (tolerance > 0 && Math.abs(now - parsed.timestamp) > tolerance) {
    throw new WebhookSignatureError('Webhook timestamp outside the tolerance zone');
  }

  const expected = computeSignature(payload, secret, parsed.timestamp);
  if (!parsed.signatures.some((signature) => safeEqual(signature, expected))) {
    throw new WebhookSignatureError();
  }
}
