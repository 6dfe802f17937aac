import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type { OAuthUserProfile } from '../../auth/interfaces/oauth-common.interface';
import { CREDENTIAL_STORE, GITHUB_ACTIVITY_OPTIONS } from '../../common/constants';
import { AccountNotFoundError } from '../../common/errors/github-activity.errors';
import { createLogger } from '../../common/utils/logger.factory';
import type { ResolvedGitHubActivityOptions } from '../../interfaces/module-options.interface';
import type { CredentialStore } from '../interfaces/credential-store.interface';
import {
  DEFAULT_PREFERENCES,
  NotificationPreferences,
  UserAccount,
  UserAccountInput,
} from '../interfaces/user-account.interface';

/** Token material as it is written: already encrypted. */
export interface EncryptedCredentials {
  encryptedAccessToken: string;
  tokenExpiresAt?: Date | null;
  encryptedRefreshToken?: string | null;
}

@Injectable()
export class UserAccountService {
  private readonly logger: Logger;

  constructor(
    @Inject(CREDENTIAL_STORE) private readonly store: CredentialStore,
    @Optional()
    @Inject(GITHUB_ACTIVITY_OPTIONS)
    options?: ResolvedGitHubActivityOptions,
  ) {
    this.logger = createLogger(UserAccountService.name, options?.logging);
  }

  /**
   * Create the account for an unseen GitHub user, or refresh the profile
   * fields and token of the existing one. Preferences survive re-login.
   */
  async upsertFromProfile(
    profile: OAuthUserProfile,
    credentials: EncryptedCredentials,
  ): Promise<{ account: UserAccount; created: boolean }> {
    const existing = await this.store.findBySubjectId(profile.githubId);

    const input: UserAccountInput = {
      ...profile,
      id: existing?.id,
      preferences: existing?.preferences ?? { ...DEFAULT_PREFERENCES },
      encryptedAccessToken: credentials.encryptedAccessToken,
      tokenExpiresAt: credentials.tokenExpiresAt ?? null,
      encryptedRefreshToken:
        credentials.encryptedRefreshToken ??
        existing?.encryptedRefreshToken ??
        null,
    };

    const account = await this.store.upsert(input);
    if (!existing) {
      this.logger.log(`Created account for GitHub user ${profile.username}`);
    }
    return { account, created: !existing };
  }

  async replaceToken(
    userId: string,
    credentials: EncryptedCredentials,
  ): Promise<UserAccount> {
    const account = await this.getById(userId);
    return this.store.upsert({
      ...withoutTimestamps(account),
      encryptedAccessToken: credentials.encryptedAccessToken,
      tokenExpiresAt:
        credentials.tokenExpiresAt === undefined
          ? account.tokenExpiresAt
          : credentials.tokenExpiresAt,
      encryptedRefreshToken:
        credentials.encryptedRefreshToken === undefined
          ? account.encryptedRefreshToken
          : credentials.encryptedRefreshToken,
    });
  }

  async updatePreferences(
    userId: string,
    changes: Partial<NotificationPreferences>,
  ): Promise<UserAccount> {
    const account = await this.getById(userId);
    return this.store.upsert({
      ...withoutTimestamps(account),
      preferences: { ...account.preferences, ...changes },
    });
  }

  async getById(userId: string): Promise<UserAccount> {
    const account = await this.store.findById(userId);
    if (!account) {
      throw new AccountNotFoundError(userId);
    }
    return account;
  }
}

function withoutTimestamps(account: UserAccount): UserAccountInput {
  const { createdAt: _createdAt, updatedAt: _updatedAt, ...rest } = account;
  return rest;
}
