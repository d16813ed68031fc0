import { createHash, timingSafeEqual } from 'node:crypto';
import type { SignableFields } from './fields.js';

/**
 * `k1=v1&k2=v2&...&key=<secret>` with keys in ascending code-unit order.
 * The remote verifier rebuilds exactly this string, so neither the order nor
 * the literal `key` suffix may change.
 */
export function canonicalString(fields: SignableFields, secret: string): string {
  const pairs = Object.keys(fields)
    .sort()
    .map((key) => `${key}=${fields[key] ?? ''}`);
  pairs.push(`key=${secret}`);
  return pairs.join('&');
}

export function createCanonicalSignature(fields: SignableFields, secret: string): string {
  if (Object.hasOwn(fields, 'sign')) {
    throw new Error('Fields passed for signing must not already contain "sign".');
  }

  return createHash('md5').update(canonicalString(fields, secret), 'utf8').digest('hex').toUpperCase();
}

export function signFields(fields: SignableFields, secret: string): Record<string, string> {
  return { ...fields, sign: createCanonicalSignature(fields, secret) };
}

/** Check the `sign` a remote party attached to `fields`. */
export function verifyCanonicalSignature(fields: SignableFields, secret: string): boolean {
  const { sign: provided, ...unsigned } = fields;
  if (!provided) {
    return false;
  }

  const expected = Buffer.from(createCanonicalSignature(unsigned, secret), 'utf8');
  const received = Buffer.from(provided.toUpperCase(), 'utf8');

  return expected.length === received.length && timingSafeEqual(expected, received);
}

/** Signature the provider attaches when it calls the push endpoint. */
export function createPushSignature(token: string, timestamp: string, nonce: string): string {
  return createHash('sha1').update([token, timestamp, nonce].sort().join('')).digest('hex');
}

export function verifyPushSignature(params: {
  token: string;
  timestamp: string;
  nonce: string;
  signature: string;
}): boolean {
  const expected = Buffer.from(createPushSignature(params.token, params.timestamp, params.nonce), 'utf8');
  const received = Buffer.from(params.signature.toLowerCase(), 'utf8');

  return expected.length === received.length && timingSafeEqual(expected, received);
}
