import { encryptSecret, decryptSecret } from '../crypto';

describe('Secret encryption', () => {
  const key = 'test-encryption-key';

  describe('encryptSecret', () => {
    it('should not return the secret in the clear', () => {
      const encrypted = encryptSecret('test-secret', key);

      expect(encrypted).not.toContain('test-secret');
      expect(encrypted.split(':')).toHaveLength(4);
    });

    it('should produce different output for the same secret', () => {
      expect(encryptSecret('test-secret', key)).not.toBe(encryptSecret('test-secret', key));
    });

    it('should fall back to ENCRYPTION_KEY from the environment', () => {
      const original = process.env.ENCRYPTION_KEY;
      process.env.ENCRYPTION_KEY = key;
      try {
        expect(decryptSecret(encryptSecret('test-secret'), key)).toBe('test-secret');
      } finally {
        if (original === undefined) {
          delete process.env.ENCRYPTION_KEY;
        } else {
          process.env.ENCRYPTION_KEY = original;
        }
      }
    });

    it('should refuse to run without a key', () => {
      expect(() => encryptSecret('test-secret', '')).toThrow('ENCRYPTION_KEY is not set');
    });
  });

  describe('decryptSecret', () => {
    it('should recover the original secret', () => {
      for (const secret of ['test-secret', 'pässwörd', 'tab\tand\nnewline', '']) {
        expect(decryptSecret(encryptSecret(secret, key), key)).toBe(secret);
      }
    });

    it('should reject data that is not in salt:iv:tag:ciphertext form', () => {
      expect(() => decryptSecret('only:three:parts', key)).toThrow('Invalid encrypted data format');
    });

    it('should fail with the wrong key', () => {
      const encrypted = encryptSecret('test-secret', key);
      expect(() => decryptSecret(encrypted, 'other-key')).toThrow('Failed to decrypt account secret');
    });

    it('should detect a modified auth tag', () => {
      const parts = encryptSecret('test-secret', key).split(':');
      const tag = Buffer.from(parts[2], 'base64');
      tag[0] = tag[0] ^ 0xff;
      parts[2] = tag.toString('base64');

      expect(() => decryptSecret(parts.join(':'), key)).toThrow('Failed to decrypt account secret');
    });

    it('should use the expected part lengths', () => {
      const [salt, iv, tag] = encryptSecret('test-secret', key).split(':');

      expect(Buffer.from(salt, 'base64')).toHaveLength(32);
      expect(Buffer.from(iv, 'base64')).toHaveLength(16);
      expect(Buffer.from(tag, 'base64')).toHaveLength(16);
    });
  });
});
