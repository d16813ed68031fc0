import { randomInt } from 'node:crypto';

export const NONCE_ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const NONCE_LENGTH = 32;

/** Returns a uniformly distributed integer in `[0, maxExclusive)`. */
export type RandomIndexSource = (maxExclusive: number) => number;

export const cryptoRandomIndex: RandomIndexSource = (maxExclusive) => randomInt(maxExclusive);

export function generateNonce(random: RandomIndexSource = cryptoRandomIndex, length = NONCE_LENGTH): string {
  let nonce = '';
  for (let i = 0; i < length; i++) {
    nonce += NONCE_ALPHABET.charAt(random(NONCE_ALPHABET.length));
  }
  return nonce;
}
