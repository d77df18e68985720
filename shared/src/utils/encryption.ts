/**
 * Encryption utilities for secrets at rest
 *
 * Uses AES-256-GCM for authenticated encryption providing:
 * - Confidentiality (encryption)
 * - Authenticity (authentication tag)
 * - Integrity (tamper detection)
 *
 * Format: version:iv:authTag:ciphertext (all base64 encoded)
 */

import { randomBytes, createCipheriv, createDecipheriv, pbkdf2Sync } from 'crypto';
import { logger } from './logging/logger.js';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12; // 96 bits for GCM
const AUTH_TAG_LENGTH = 16; // 128 bits
const SALT_LENGTH = 16; // 128 bits for key derivation
const KEY_LENGTH = 32; // 256 bits for AES-256
const PBKDF2_ITERATIONS = 100000;
const CURRENT_VERSION = 'v1';

const SEPARATOR = ':';

/**
 * Encrypted data format
 */
export interface EncryptedData {
  version: string;
  iv: string; // base64
  authTag: string; // base64
  ciphertext: string; // base64
}

/**
 * Random salt for key derivation, hex encoded.
 */
export function generateSalt(): string {
  return randomBytes(SALT_LENGTH).toString('hex');
}

/**
 * Derive a 256-bit key from a passphrase and hex salt with PBKDF2-SHA512.
 */
export function deriveKey(passphrase: string, salt: string): Buffer {
  if (!passphrase) {
    throw new Error('Encryption passphrase must not be empty');
  }
  if (!/^[0-9a-fA-F]{32,}$/.test(salt)) {
    throw new Error('Salt must be a valid hex string of at least 32 characters');
  }

  return pbkdf2Sync(passphrase, Buffer.from(salt, 'hex'), PBKDF2_ITERATIONS, KEY_LENGTH, 'sha512');
}

export function parseEncrypted(encryptedData: string): EncryptedData {
  const parts = encryptedData.split(SEPARATOR);
  if (parts.length !== 4) {
    throw new Error('Invalid encrypted data format');
  }

  const [version, iv, authTag, ciphertext] = parts;
  if (version !== CURRENT_VERSION) {
    throw new Error(`Unsupported encryption version: ${version}`);
  }

  return { version, iv, authTag, ciphertext };
}

/**
 * Encrypt a string value using AES-256-GCM
 * Returns the encrypted data in format: version:iv:authTag:ciphertext
 */
export function encrypt(plaintext: string, key: Buffer): string {
  try {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, key, iv, {
      authTagLength: AUTH_TAG_LENGTH,
    });

    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return [
      CURRENT_VERSION,
      iv.toString('base64'),
      authTag.toString('base64'),
      encrypted.toString('base64'),
    ].join(SEPARATOR);
  } catch (error) {
    logger.error('Encryption failed', error, { component: 'Encryption' });
    throw new Error('Failed to encrypt data', { cause: error });
  }
}

/**
 * Decrypt a string produced by `encrypt` with the same key.
 */
export function decrypt(encryptedData: string, key: Buffer): string {
  try {
    const parts = parseEncrypted(encryptedData);

    const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(parts.iv, 'base64'), {
      authTagLength: AUTH_TAG_LENGTH,
    });
    decipher.setAuthTag(Buffer.from(parts.authTag, 'base64'));

    const decrypted = Buffer.concat([
      decipher.update(Buffer.from(parts.ciphertext, 'base64')),
      decipher.final(),
    ]);

    return decrypted.toString('utf8');
  } catch (error) {
    logger.error('Decryption failed', error, { component: 'Encryption' });
    throw new Error('Failed to decrypt data - key may have changed or data is corrupted', { cause: error });
  }
}
