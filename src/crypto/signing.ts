/**
 * Ed25519 Sign / Verify
 */

import * as crypto from 'crypto';

/**
 * Sign a message with a hex PKCS#8 secret key.
 *
 * @returns hex-encoded signature (64 bytes)
 */
export function sign(message: Uint8Array, secretKeyHex: string): string {
  const key = crypto.createPrivateKey({
    key: Buffer.from(secretKeyHex, 'hex'),
    format: 'der',
    type: 'pkcs8',
  });
  return crypto.sign(null, message, key).toString('hex');
}

/**
 * Verify a hex signature against a message and hex SPKI public key.
 * Malformed keys or signatures verify as false.
 */
export function verify(message: Uint8Array, signatureHex: string, publicKeyHex: string): boolean {
  let key: crypto.KeyObject;
  try {
    key = crypto.createPublicKey({
      key: Buffer.from(publicKeyHex, 'hex'),
      format: 'der',
      type: 'spki',
    });
  } catch {
    return false;
  }
  if (key.asymmetricKeyType !== 'ed25519') {
    return false;
  }
  try {
    return crypto.verify(null, message, key, Buffer.from(signatureHex, 'hex'));
  } catch {
    return false;
  }
}
