/**
 * API token storage.
 *
 * The token is kept encrypted in `<home>/credentials.json`. The encryption key
 * is derived from MNEMY_SECRET when set, otherwise from a random key file that
 * is created beside the credentials on first use.
 */
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { randomBytes } from 'crypto';
import { z } from 'zod';

import { AService } from '../services/abstracts/AService.js';
import { ConfigError, ErrorCode, fromNodeFsError } from '../utils/errors.js';
import { decrypt, deriveKey, encrypt, generateSalt } from '../utils/encryption.js';
import { logger } from '../utils/logging/logger.js';
import { MNEMY_API_TOKEN, MNEMY_SECRET } from '../config/env.js';

const CredentialsFileSchema = z.object({
  salt: z.string(),
  token: z.string(),
});

export type CredentialsFile = z.infer<typeof CredentialsFileSchema>;

export interface TokenStoreOptions {
  /** Passphrase for key derivation (MNEMY_SECRET) */
  secret?: string;
  /** Token that takes precedence over the stored one (MNEMY_API_TOKEN) */
  tokenOverride?: string;
}

export class TokenStore extends AService {
  private readonly secret: string | undefined;
  private readonly tokenOverride: string | undefined;

  constructor(
    private readonly credentialsFile: string,
    private readonly secretKeyFile: string,
    options: TokenStoreOptions = {}
  ) {
    super();
    this.secret = options.secret ?? MNEMY_SECRET;
    this.tokenOverride = options.tokenOverride ?? MNEMY_API_TOKEN;
  }

  saveToken(token: string): void {
    const trimmed = token.trim();
    if (!trimmed) {
      throw new ConfigError(ErrorCode.VALIDATION_FAILED, 'API token must not be empty');
    }

    const salt = generateSalt();
    const credentials: CredentialsFile = {
      salt,
      token: encrypt(trimmed, deriveKey(this.passphrase(true), salt)),
    };

    mkdirSync(dirname(this.credentialsFile), { recursive: true });
    writeFileSync(this.credentialsFile, JSON.stringify(credentials, null, 2) + '\n', { encoding: 'utf-8', mode: 0o600 });
    logger.info('API token saved', { component: 'TokenStore' });
  }

  /**
   * The API token, or undefined when none is stored.
   */
  getToken(): string | undefined {
    if (this.tokenOverride) {
      return this.tokenOverride;
    }

    const credentials = this.readCredentials();
    if (!credentials) {
      return undefined;
    }

    try {
      return decrypt(credentials.token, deriveKey(this.passphrase(false), credentials.salt));
    } catch (error) {
      throw new ConfigError(ErrorCode.CONFIG_INVALID, 'Stored API token cannot be decrypted', {
        cause: error,
        context: { path: this.credentialsFile },
        recoveryActions: [
          { description: 'Save the token again with: mnemy token set <token>', automatic: false },
          { description: 'If MNEMY_SECRET was changed, restore its previous value', automatic: false },
        ],
      });
    }
  }

  clearToken(): void {
    rmSync(this.credentialsFile, { force: true });
    logger.info('API token removed', { component: 'TokenStore' });
  }

  private readCredentials(): CredentialsFile | undefined {
    if (!existsSync(this.credentialsFile)) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.credentialsFile, 'utf-8'));
    } catch (error) {
      throw new ConfigError(ErrorCode.CONFIG_INVALID, `Credentials file is not valid JSON: ${this.credentialsFile}`, {
        cause: error,
        context: { path: this.credentialsFile },
      });
    }

    const parsed = CredentialsFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(ErrorCode.CONFIG_INVALID, `Credentials file has an unexpected format: ${this.credentialsFile}`, {
        context: { path: this.credentialsFile },
      });
    }
    return parsed.data;
  }

  /**
   * MNEMY_SECRET, or the contents of the key file. The key file is only
   * created when saving.
   */
  private passphrase(create: boolean): string {
    if (this.secret) {
      return this.secret;
    }

    if (existsSync(this.secretKeyFile)) {
      try {
        return readFileSync(this.secretKeyFile, 'utf-8').trim();
      } catch (error) {
        throw fromNodeFsError(error, this.secretKeyFile, 'readSecretKey');
      }
    }

    if (!create) {
      throw new ConfigError(ErrorCode.CONFIG_INVALID, `Secret key file is missing: ${this.secretKeyFile}`, {
        context: { path: this.secretKeyFile },
        recoveryActions: [{ description: 'Save the token again with: mnemy token set <token>', automatic: false }],
      });
    }

    const key = randomBytes(32).toString('hex');
    mkdirSync(dirname(this.secretKeyFile), { recursive: true });
    writeFileSync(this.secretKeyFile, key + '\n', { encoding: 'utf-8', mode: 0o600 });
    logger.debug('Created secret key file', { component: 'TokenStore', path: this.secretKeyFile });
    return key;
  }
}
