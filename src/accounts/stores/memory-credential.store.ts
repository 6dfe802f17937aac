import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  AccountNotFoundError,
  DuplicateAccountError,
} from '../../common/errors/github-activity.errors';
import { createLogger, LoggingOptions } from '../../common/utils/logger.factory';
import type { CredentialStore } from '../interfaces/credential-store.interface';
import type {
  UserAccount,
  UserAccountInput,
} from '../interfaces/user-account.interface';

/**
 * In-memory credential store.
 * Suitable for development, tests and single-instance deployments.
 */
export class MemoryCredentialStore implements CredentialStore {
  private readonly logger: Logger;

  private accounts = new Map<string, UserAccount>();

  // githubId -> account id
  private subjectIndex = new Map<number, string>();

  constructor(logging?: LoggingOptions) {
    this.logger = createLogger(MemoryCredentialStore.name, logging);
  }

  async findBySubjectId(githubId: number): Promise<UserAccount | undefined> {
    const id = this.subjectIndex.get(githubId);
    return id ? this.findById(id) : undefined;
  }

  async findById(id: string): Promise<UserAccount | undefined> {
    const account = this.accounts.get(id);
    return account ? clone(account) : undefined;
  }

  async upsert(input: UserAccountInput): Promise<UserAccount> {
    const owner = this.subjectIndex.get(input.githubId);
    if (owner !== undefined && owner !== input.id) {
      throw new DuplicateAccountError('github_id');
    }

    const now = new Date();
    let stored: UserAccount;

    if (input.id) {
      const existing = this.accounts.get(input.id);
      if (!existing) {
        throw new AccountNotFoundError(input.id);
      }
      if (existing.githubId !== input.githubId) {
        this.subjectIndex.delete(existing.githubId);
      }
      stored = {
        ...input,
        id: existing.id,
        createdAt: existing.createdAt,
        updatedAt: now,
      };
    } else {
      stored = { ...input, id: randomUUID(), createdAt: now, updatedAt: now };
      this.logger.debug(`Created account ${stored.id} for ${stored.username}`);
    }

    this.accounts.set(stored.id, clone(stored));
    this.subjectIndex.set(stored.githubId, stored.id);
    return clone(stored);
  }
}

function clone(account: UserAccount): UserAccount {
  return {
    ...account,
    preferences: { ...account.preferences },
    tokenExpiresAt: account.tokenExpiresAt
      ? new Date(account.tokenExpiresAt.getTime())
      : null,
    createdAt: new Date(account.createdAt.getTime()),
    updatedAt: new Date(account.updatedAt.getTime()),
  };
}
