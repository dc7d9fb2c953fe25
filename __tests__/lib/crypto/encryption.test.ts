import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import {
  encryptAccessToken,
  decryptAccessToken,
  resolveEncryptionKey,
  CredentialError,
} from '@/lib/crypto/encryption';
import { resetSyncConfig } from '@/lib/config/env';

describe('access token encryption', () => {
  const testKey = Buffer.alloc(32, 7).toString('base64');
  const otherKey = Buffer.alloc(32, 9).toString('base64');
  const token = 'test-canvas-token';

  beforeEach(() => {
    resetSyncConfig();
    vi.stubEnv('ENCRYPTION_KEY', testKey);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetSyncConfig();
  });

  describe('encryptAccessToken', () => {
    it('produces iv:authTag:ciphertext with a 12 byte iv and 16 byte tag', () => {
      const [iv, authTag, ciphertext] = encryptAccessToken(token).split(':');

      expect(Buffer.from(iv, 'base64')).toHaveLength(12);
      expect(Buffer.from(authTag, 'base64')).toHaveLength(16);
      expect(Buffer.from(ciphertext, 'base64')).toHaveLength(token.length);
    });

    it('uses a fresh iv for every call', () => {
      expect(encryptAccessToken(token)).not.toBe(encryptAccessToken(token));
    });
  });

  describe('decryptAccessToken', () => {
    it('recovers the token encrypted with the environment key', () => {
      expect(decryptAccessToken(encryptAccessToken(token))).toBe(token);
    });

    it('accepts an explicit key instead of the environment', () => {
      const stored = encryptAccessToken(token, otherKey);
      expect(decryptAccessToken(stored, otherKey)).toBe(token);
    });

    it('rejects a value encrypted with another key', () => {
      const stored = encryptAccessToken(token, otherKey);

      expect(() => decryptAccessToken(stored)).toThrow(CredentialError);
    });

    it('rejects a tampered auth tag', () => {
      const [iv, authTag, ciphertext] = encryptAccessToken(token).split(':');
      const tag = Buffer.from(authTag, 'base64');
      tag[0] = tag[0] ^ 0xff;

      expect(() =>
        decryptAccessToken(`${iv}:${tag.toString('base64')}:${ciphertext}`)
      ).toThrow('Failed to decrypt Canvas access token');
    });

    it('rejects values without three parts', () => {
      let caught: unknown;
      try {
        decryptAccessToken('part1:part2');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(CredentialError);
      expect(caught).toMatchObject({ code: 'MALFORMED_TOKEN' });
    });
  });

  describe('resolveEncryptionKey', () => {
    it('throws MISSING_KEY when ENCRYPTION_KEY is unset', () => {
      vi.stubEnv('ENCRYPTION_KEY', '');
      resetSyncConfig();

      expect(() => resolveEncryptionKey()).toThrow(
        'ENCRYPTION_KEY environment variable is not set'
      );
    });

    it('throws when the key is not 32 bytes', () => {
      expect(() => resolveEncryptionKey('dG9vLXNob3J0')).toThrow(
        'Invalid ENCRYPTION_KEY length: expected 32 bytes, got 9'
      );
    });
  });
});
