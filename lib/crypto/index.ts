/**
 * Credential encryption for stored Canvas access tokens.
 */

export {
  encryptAccessToken,
  decryptAccessToken,
  resolveEncryptionKey,
  CredentialError,
} from './encryption';
