import {
  buildDelegationMessage,
  buildRequestMessage,
  deriveAddress,
  generateKeyPair,
  isAddress,
  isEd25519PublicKey,
  sign,
  verify,
} from './index';

describe('crypto', () => {
  const keys = generateKeyPair();

  describe('sign / verify', () => {
    it('should verify a signature made with the matching key', () => {
      const message = buildRequestMessage('alice', '2026-01-28T12:00:00.000Z');
      const signature = sign(message, keys.secretKey);

      expect(signature).toHaveLength(128);
      expect(verify(message, signature, keys.publicKey)).toBe(true);
    });

    it('should reject a different message or key', () => {
      const signature = sign(buildDelegationMessage('bob', 0, 100), keys.secretKey);

      expect(verify(buildDelegationMessage('bob', 1, 100), signature, keys.publicKey)).toBe(false);
      expect(verify(buildDelegationMessage('bob', 0, 100), signature, generateKeyPair().publicKey)).toBe(
        false
      );
    });

    it('should treat malformed keys and signatures as invalid', () => {
      const message = buildRequestMessage('alice', 'now');
      expect(verify(message, 'zz', keys.publicKey)).toBe(false);
      expect(verify(message, sign(message, keys.secretKey), 'deadbeef')).toBe(false);
    });
  });

  describe('messages', () => {
    it('should use the domain-tagged formats', () => {
      expect(new TextDecoder().decode(buildRequestMessage('alice', 'ts'))).toBe('VE:v1:alice:ts');
      expect(new TextDecoder().decode(buildDelegationMessage('bob', 3, 99))).toBe(
        'VE:v1:delegate:bob:3:99'
      );
    });
  });

  describe('addresses', () => {
    it('should derive a stable 42-character address', () => {
      const address = deriveAddress(keys.publicKey);

      expect(address).toHaveLength(42);
      expect(isAddress(address)).toBe(true);
      expect(deriveAddress(keys.publicKey)).toBe(address);
      expect(isAddress('alice')).toBe(false);
    });

    it('should recognize Ed25519 public keys', () => {
      expect(isEd25519PublicKey(keys.publicKey)).toBe(true);
      expect(isEd25519PublicKey(keys.secretKey)).toBe(false);
      expect(isEd25519PublicKey('not-hex')).toBe(false);
    });
  });
});
