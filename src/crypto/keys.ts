/**
 * Ed25519 Keypair Generation
 *
 * Keys are exchanged as hex: the public key in SPKI DER form, the secret key
 * in PKCS#8 DER form, so they load straight back into node's KeyObject API.
 */

import * as crypto from 'crypto';

export interface KeyPair {
  publicKey: string; // hex, SPKI DER
  secretKey: string; // hex, PKCS#8 DER
}

/**
 * Generate an Ed25519 keypair. The secret key must be kept confidential.
 */
export function generateKeyPair(): KeyPair {
  const { publicKey, privateKey } = crypto.generateKeyPairSync('ed25519');
  return {
    publicKey: publicKey.export({ format: 'der', type: 'spki' }).toString('hex'),
    secretKey: privateKey.export({ format: 'der', type: 'pkcs8' }).toString('hex'),
  };
}

/**
 * True if `publicKeyHex` is a well-formed SPKI DER Ed25519 public key.
 */
export function isEd25519PublicKey(publicKeyHex: string): boolean {
  if (!/^[0-9a-f]+$/i.test(publicKeyHex)) return false;
  try {
    const key = crypto.createPublicKey({
      key: Buffer.from(publicKeyHex, 'hex'),
      format: 'der',
      type: 'spki',
    });
    return key.asymmetricKeyType === 'ed25519';
  } catch {
    return false;
  }
}
