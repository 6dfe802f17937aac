import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { GITHUB_ACTIVITY_OPTIONS } from '../../../common/constants';
import {
  AccountNotFoundError,
  DuplicateAccountError,
} from '../../../common/errors/github-activity.errors';
import { createLogger } from '../../../common/utils/logger.factory';
import type { ResolvedGitHubActivityOptions } from '../../../interfaces/module-options.interface';
import type { CredentialStore } from '../../interfaces/credential-store.interface';
import type {
  UserAccount,
  UserAccountInput,
} from '../../interfaces/user-account.interface';
import { ACCOUNTS_TYPEORM_CONNECTION_NAME } from './constants';
import { UserAccountEntity } from './user-account.entity';

// Postgres unique_violation, SQLite constraint codes
const UNIQUE_VIOLATION_CODES = new Set([
  '23505',
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

/**
 * Relational credential store. Access and refresh tokens arrive already
 * encrypted and are written as-is.
 */
@Injectable()
export class TypeOrmCredentialStore implements CredentialStore {
  private readonly logger: Logger;

  constructor(
    @InjectRepository(UserAccountEntity, ACCOUNTS_TYPEORM_CONNECTION_NAME)
    private readonly repository: Repository<UserAccountEntity>,
    @Optional()
    @Inject(GITHUB_ACTIVITY_OPTIONS)
    options?: ResolvedGitHubActivityOptions,
  ) {
    this.logger = createLogger(TypeOrmCredentialStore.name, options?.logging);
  }

  async findBySubjectId(githubId: number): Promise<UserAccount | undefined> {
    const entity = await this.repository.findOneBy({ github_id: githubId });
    return entity ? toAccount(entity) : undefined;
  }

  async findById(id: string): Promise<UserAccount | undefined> {
    const entity = await this.repository.findOneBy({ id });
    return entity ? toAccount(entity) : undefined;
  }

  async upsert(input: UserAccountInput): Promise<UserAccount> {
    let entity: UserAccountEntity;

    if (input.id) {
      const existing = await this.repository.findOneBy({ id: input.id });
      if (!existing) {
        throw new AccountNotFoundError(input.id);
      }
      entity = Object.assign(existing, toColumns(input));
    } else {
      entity = this.repository.create(toColumns(input));
    }

    try {
      const saved = await this.repository.save(entity);
      const reloaded = await this.repository.findOneByOrFail({ id: saved.id });
      return toAccount(reloaded);
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.logger.warn(
          `Rejected duplicate account for GitHub user ${input.githubId}`,
        );
        throw new DuplicateAccountError('github_id', { cause: error });
      }
      throw error;
    }
  }
}

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) {
    return false;
  }
  return (
    'code' in driverError &&
    typeof driverError.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(driverError.code)
  );
}

function toColumns(input: UserAccountInput): Partial<UserAccountEntity> {
  return {
    github_id: input.githubId,
    username: input.username,
    email: input.email,
    name: input.name,
    avatar_url: input.avatarUrl,
    public_repos: input.publicRepos,
    private_repos: input.privateRepos,
    followers: input.followers,
    following: input.following,
    cadence: input.preferences.cadence,
    tone: input.preferences.tone,
    emojis: input.preferences.emojis,
    hashtags: input.preferences.hashtags,
    encrypted_access_token: input.encryptedAccessToken,
    token_expires_at: input.tokenExpiresAt,
    encrypted_refresh_token: input.encryptedRefreshToken,
  };
}

function toAccount(entity: UserAccountEntity): UserAccount {
  return {
    id: entity.id,
    githubId: entity.github_id,
    username: entity.username,
    email: entity.email,
    name: entity.name,
    avatarUrl: entity.avatar_url,
    publicRepos: entity.public_repos,
    privateRepos: entity.private_repos,
    followers: entity.followers,
    following: entity.following,
    preferences: {
      cadence: entity.cadence,
      tone: entity.tone,
      emojis: entity.emojis,
      hashtags: entity.hashtags,
    },
    encryptedAccessToken: entity.encrypted_access_token,
    tokenExpiresAt: entity.token_expires_at,
    encryptedRefreshToken: entity.encrypted_refresh_token,
    createdAt: entity.created_at,
    updatedAt: entity.updated_at,
  };
}
