import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  createCipheriv,
  createDecipheriv,
  pbkdf2Sync,
  randomBytes,
} from 'crypto';
import {
  EncryptionError,
  describeError,
} from '../../common/errors/github-activity.errors';
import { GITHUB_ACTIVITY_OPTIONS } from '../../common/constants';
import { createLogger } from '../../common/utils/logger.factory';
import type { ResolvedGitHubActivityOptions } from '../../interfaces/module-options.interface';

const ALGORITHM = 'aes-256-gcm';
const KEY_DERIVATION_SALT = 'github-activity-token-salt';
const KEY_DERIVATION_ITERATIONS = 100_000;
const KEY_LENGTH = 32;
const IV_LENGTH = 16;
const AUTH_TAG_LENGTH = 16;
const ADDITIONAL_DATA = Buffer.from('github-access-token', 'utf8');

const HEX = /^(?:[0-9a-f]{2})*$/;

export type TokenCipherServiceOptions = Pick<
  ResolvedGitHubActivityOptions,
  'encryption' | 'logging'
>;

/**
 * Encrypts GitHub access tokens before they are written to the credential
 * store, using AES-256-GCM so that any tampering with a stored value is
 * detected on decryption.
 *
 * The key is derived once, when the service is constructed, from the operator
 * supplied secret with PBKDF2-SHA256. Stored values have the form
 * `iv:authTag:ciphertext`, all hex.
 */
@Injectable()
export class TokenCipherService {
  private readonly logger: Logger;
  private readonly encryptionKey?: Buffer;

  constructor(
    @Inject(GITHUB_ACTIVITY_OPTIONS) options: TokenCipherServiceOptions,
  ) {
    this.logger = createLogger(TokenCipherService.name, options.logging);

    const { secret } = options.encryption;
    if (!secret) {
      this.logger.warn(
        'No encryption secret provided. Storing or reading GitHub tokens will fail until ENCRYPTION_KEY is set.',
      );
      return;
    }

    this.encryptionKey = pbkdf2Sync(
      secret,
      KEY_DERIVATION_SALT,
      KEY_DERIVATION_ITERATIONS,
      KEY_LENGTH,
      'sha256',
    );
    this.logger.log(`Token encryption initialized with ${ALGORITHM}`);
  }

  get isConfigured(): boolean {
    return this.encryptionKey !== undefined;
  }

  /** Throws `EncryptionError` when no secret is set. */
  assertConfigured(): void {
    this.requireKey();
  }

  encrypt(plaintext: string): string {
    const key = this.requireKey();

    try {
      const iv = randomBytes(IV_LENGTH);
      const cipher = createCipheriv(ALGORITHM, key, iv, {
        authTagLength: AUTH_TAG_LENGTH,
      });
      cipher.setAAD(ADDITIONAL_DATA);

      let encrypted = cipher.update(plaintext, 'utf8', 'hex');
      encrypted += cipher.final('hex');

      const authTag = cipher.getAuthTag();

      return `${iv.toString('hex')}:${authTag.toString('hex')}:${encrypted}`;
    } catch (error) {
      this.logger.error(`Failed to encrypt token: ${describeError(error)}`);
      throw new EncryptionError('Failed to encrypt token', { cause: error });
    }
  }

  decrypt(ciphertext: string): string {
    const key = this.requireKey();
    const [iv, authTag, encrypted] = this.parse(ciphertext);

    try {
      const decipher = createDecipheriv(ALGORITHM, key, iv, {
        authTagLength: AUTH_TAG_LENGTH,
      });
      decipher.setAAD(ADDITIONAL_DATA);
      decipher.setAuthTag(authTag);

      let decrypted = decipher.update(encrypted, 'hex', 'utf8');
      decrypted += decipher.final('utf8');

      return decrypted;
    } catch (error) {
      this.logger.error(`Failed to decrypt token: ${describeError(error)}`);
      throw new EncryptionError('Failed to decrypt token', { cause: error });
    }
  }

  /**
   * Generate a random master secret (64 hex characters).
   */
  static generateSecret(): string {
    return randomBytes(32).toString('hex');
  }

  private requireKey(): Buffer {
    if (!this.encryptionKey) {
      throw new EncryptionError('ENCRYPTION_KEY is not configured');
    }
    return this.encryptionKey;
  }

  private parse(ciphertext: string): [Buffer, Buffer, string] {
    const parts = ciphertext.split(':');
    if (parts.length !== 3 || !parts.every((part) => HEX.test(part))) {
      throw new EncryptionError('Invalid ciphertext format');
    }

    const [iv, authTag, encrypted] = parts;
    if (iv.length !== IV_LENGTH * 2 || authTag.length !== AUTH_TAG_LENGTH * 2) {
      throw new EncryptionError('Invalid ciphertext format');
    }

    return [Buffer.from(iv, 'hex'), Buffer.from(authTag, 'hex'), encrypted];
  }
}
