/**
 * Address Derivation from Public Key
 *
 * Algorithm: SHA-256(publicKey DER) → first 20 bytes → hex → prefix "ve"
 * Result: 42-character string
 */

import * as crypto from 'crypto';

const ADDRESS_PREFIX = 've';
const HASH_BYTES = 20;

export function deriveAddress(publicKeyHex: string): string {
  const hash = crypto
    .createHash('sha256')
    .update(Buffer.from(publicKeyHex, 'hex'))
    .digest('hex');
  return ADDRESS_PREFIX + hash.slice(0, HASH_BYTES * 2);
}

export function isAddress(value: string): boolean {
  return /^ve[0-9a-f]{40}$/.test(value);
}
