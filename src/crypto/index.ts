/**
 * Crypto Module
 *
 * - Ed25519 keypair generation
 * - Digital signature sign / verify
 * - Address derivation from public key
 * - Canonical messages signed for delegation and request auth
 */

export { generateKeyPair, isEd25519PublicKey } from './keys';
export type { KeyPair } from './keys';
export { sign, verify } from './signing';
export { deriveAddress, isAddress } from './address';
export { buildDelegationMessage, buildRequestMessage } from './messages';
