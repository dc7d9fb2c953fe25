/**
 * Canvas access token encryption using AES-256-GCM.
 *
 * Stored format: iv:authTag:ciphertext (all base64).
 */
import {
  createCipheriv,
  createDecipheriv,
  randomBytes,
  type CipherGCMTypes,
} from 'crypto';

import { getSyncConfig } from '@/lib/config/env';

const ALGORITHM: CipherGCMTypes = 'aes-256-gcm';
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const KEY_LENGTH = 32;

/**
 * Error thrown when stored Canvas credentials are missing or unreadable.
 */
export class CredentialError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'CredentialError';
  }
}

/**
 * Decode a base64 key and check it is 32 bytes.
 * Falls back to ENCRYPTION_KEY from the environment.
 */
export function resolveEncryptionKey(keyBase64?: string): Buffer {
  const encoded = keyBase64 ?? getSyncConfig().encryptionKey;
  if (!encoded) {
    throw new CredentialError(
      'ENCRYPTION_KEY environment variable is not set',
      'MISSING_KEY'
    );
  }

  const key = Buffer.from(encoded, 'base64');
  if (key.length !== KEY_LENGTH) {
    throw new CredentialError(
      `Invalid ENCRYPTION_KEY length: expected ${KEY_LENGTH} bytes, got ${key.length}`,
      'INVALID_KEY'
    );
  }

  return key;
}

/**
 * Encrypt a Canvas access token for storage.
 *
 * @param token - Plaintext personal access token or OAuth token
 * @param keyBase64 - Override for ENCRYPTION_KEY
 */
export function encryptAccessToken(token: string, keyBase64?: string): string {
  const key = resolveEncryptionKey(keyBase64);
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, {
    authTagLength: AUTH_TAG_LENGTH,
  });

  const ciphertext = Buffer.concat([
    cipher.update(token, 'utf8'),
    cipher.final(),
  ]);

  return [
    iv.toString('base64'),
    cipher.getAuthTag().toString('base64'),
    ciphertext.toString('base64'),
  ].join(':');
}

/**
 * Decrypt a stored Canvas access token.
 *
 * @throws CredentialError when the value is malformed, tampered with or was
 * encrypted with another key
 */
export function decryptAccessToken(stored: string, keyBase64?: string): string {
  const key = resolveEncryptionKey(keyBase64);

  const parts = stored.split(':');
  if (parts.length !== 3) {
    throw new CredentialError(
      `Invalid encrypted token: expected 3 parts (iv:authTag:ciphertext), got ${parts.length}`,
      'MALFORMED_TOKEN'
    );
  }

  const [ivBase64, authTagBase64, ciphertextBase64] = parts;

  try {
    const decipher = createDecipheriv(
      ALGORITHM,
      key,
      Buffer.from(ivBase64, 'base64'),
      { authTagLength: AUTH_TAG_LENGTH }
    );
    decipher.setAuthTag(Buffer.from(authTagBase64, 'base64'));

    return Buffer.concat([
      decipher.update(Buffer.from(ciphertextBase64, 'base64')),
      decipher.final(),
    ]).toString('utf8');
  } catch (error) {
    throw new CredentialError(
      `Failed to decrypt Canvas access token: ${error instanceof Error ? error.message : 'Unknown error'}`,
      'DECRYPT_FAILED'
    );
  }
}
