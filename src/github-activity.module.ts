import { DynamicModule, Module, Provider } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AccountController } from './accounts/account.controller';
import type { CredentialStore } from './accounts/interfaces/credential-store.interface';
import { UserAccountService } from './accounts/services/user-account.service';
import { MemoryCredentialStore } from './accounts/stores/memory-credential.store';
import { ACCOUNTS_TYPEORM_CONNECTION_NAME } from './accounts/stores/typeorm/constants';
import { TypeOrmCredentialStore } from './accounts/stores/typeorm/typeorm-credential.store';
import { UserAccountEntity } from './accounts/stores/typeorm/user-account.entity';
import { ActivityController } from './activity/activity.controller';
import { ActivityAggregatorService } from './activity/services/activity-aggregator.service';
import { GitHubApiClient } from './activity/services/github-api.client';
import { GitHubAuthController } from './auth/github-auth.controller';
import { SessionAuthGuard } from './auth/guards/session-auth.guard';
import { GitHubOAuthProvider } from './auth/providers/github.provider';
import { OAuthFlowService } from './auth/services/oauth-flow.service';
import { SessionTokenService } from './auth/services/session-token.service';
import { TokenCipherService } from './auth/services/token-cipher.service';
import { MemoryOAuthStateStore } from './auth/stores/memory-oauth-state.store';
import type { OAuthStateStore } from './auth/stores/oauth-state-store.interface';
import {
  CREDENTIAL_STORE,
  FetchFn,
  GITHUB_ACTIVITY_OPTIONS,
  HTTP_FETCH,
  OAUTH_STATE_STORE,
  SLEEP,
  defaultSleep,
} from './common/constants';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';
import type {
  GitHubActivityModuleOptions,
  ResolvedGitHubActivityOptions,
} from './interfaces/module-options.interface';

// Default configuration values
export const DEFAULT_OPTIONS: ResolvedGitHubActivityOptions = {
  github: {
    scopes: [...GitHubOAuthProvider.scope],
    ...GitHubOAuthProvider.endpoints,
  },
  session: {
    algorithm: 'HS256',
    expiresInHours: 24,
  },
  encryption: {},
  storeConfiguration: { type: 'memory' },
  stateStoreConfiguration: { type: 'none' },
  aggregation: {
    fanOutConcurrency: 5,
    maxRepositories: 100,
  },
  timeouts: {
    identityMs: 10_000,
    dataMs: 30_000,
  },
  deviceFlow: {
    maxAttempts: 20,
    defaultIntervalSeconds: 5,
    slowDownIncrementSeconds: 5,
  },
};

@Module({})
export class GitHubActivityModule {
  static forRoot(options: GitHubActivityModuleOptions = {}): DynamicModule {
    const resolvedOptions = this.mergeAndValidateOptions(
      DEFAULT_OPTIONS,
      options,
    );

    const imports: DynamicModule[] = [JwtModule.register({})];

    const storeConfig = resolvedOptions.storeConfiguration;
    if (storeConfig.type === 'typeorm') {
      imports.push(
        TypeOrmModule.forRoot({
          ...storeConfig.options,
          // Own connection name so a host application's default connection is untouched
          name: ACCOUNTS_TYPEORM_CONNECTION_NAME,
          entities: [UserAccountEntity],
        }),
        TypeOrmModule.forFeature(
          [UserAccountEntity],
          ACCOUNTS_TYPEORM_CONNECTION_NAME,
        ),
      );
    }

    const providers: Provider[] = [
      {
        provide: GITHUB_ACTIVITY_OPTIONS,
        useValue: resolvedOptions,
      },
      {
        provide: HTTP_FETCH,
        useValue: ((input, init) => fetch(input, init)) satisfies FetchFn,
      },
      {
        provide: SLEEP,
        useValue: defaultSleep,
      },
      this.createStoreProvider(resolvedOptions),
      this.createStateStoreProvider(resolvedOptions),
      TokenCipherService,
      SessionTokenService,
      GitHubApiClient,
      ActivityAggregatorService,
      UserAccountService,
      OAuthFlowService,
      SessionAuthGuard,
      {
        provide: APP_FILTER,
        useClass: ApiExceptionFilter,
      },
    ];

    return {
      module: GitHubActivityModule,
      imports,
      controllers: [GitHubAuthController, AccountController, ActivityController],
      providers,
      exports: [
        GITHUB_ACTIVITY_OPTIONS,
        CREDENTIAL_STORE,
        OAUTH_STATE_STORE,
        TokenCipherService,
        SessionTokenService,
        GitHubApiClient,
        ActivityAggregatorService,
        UserAccountService,
        OAuthFlowService,
        SessionAuthGuard,
      ],
    };
  }

  private static mergeAndValidateOptions(
    defaults: ResolvedGitHubActivityOptions,
    options: GitHubActivityModuleOptions,
  ): ResolvedGitHubActivityOptions {
    const resolvedOptions: ResolvedGitHubActivityOptions = {
      github: { ...defaults.github, ...definedOnly(options.github) },
      session: { ...defaults.session, ...definedOnly(options.session) },
      encryption: { ...defaults.encryption, ...definedOnly(options.encryption) },
      storeConfiguration:
        options.storeConfiguration ?? defaults.storeConfiguration,
      stateStoreConfiguration:
        options.stateStoreConfiguration ?? defaults.stateStoreConfiguration,
      aggregation: {
        ...defaults.aggregation,
        ...definedOnly(options.aggregation),
      },
      timeouts: { ...defaults.timeouts, ...definedOnly(options.timeouts) },
      deviceFlow: {
        ...defaults.deviceFlow,
        ...definedOnly(options.deviceFlow),
      },
      logging: options.logging,
    };

    this.validateResolvedOptions(resolvedOptions);

    return resolvedOptions;
  }

  private static validateResolvedOptions(
    options: ResolvedGitHubActivityOptions,
  ): void {
    const positive: [string, number][] = [
      ['session.expiresInHours', options.session.expiresInHours],
      ['aggregation.fanOutConcurrency', options.aggregation.fanOutConcurrency],
      ['aggregation.maxRepositories', options.aggregation.maxRepositories],
      ['timeouts.identityMs', options.timeouts.identityMs],
      ['timeouts.dataMs', options.timeouts.dataMs],
      ['deviceFlow.maxAttempts', options.deviceFlow.maxAttempts],
      ['deviceFlow.defaultIntervalSeconds', options.deviceFlow.defaultIntervalSeconds],
    ];
    for (const [field, value] of positive) {
      if (!Number.isFinite(value) || value <= 0) {
        throw new Error(
          `GitHubActivityModuleOptions: ${field} must be a positive number`,
        );
      }
    }

    if (options.deviceFlow.slowDownIncrementSeconds < 0) {
      throw new Error(
        'GitHubActivityModuleOptions: deviceFlow.slowDownIncrementSeconds must not be negative',
      );
    }

    const { authorizeUrl, tokenUrl, deviceCodeUrl, apiBaseUrl } =
      options.github;
    try {
      new URL(authorizeUrl);
      new URL(tokenUrl);
      new URL(deviceCodeUrl);
      new URL(apiBaseUrl);
    } catch {
      throw new Error(
        'GitHubActivityModuleOptions: GitHub endpoints must be valid URLs',
      );
    }
  }

  private static createStoreProvider(
    options: ResolvedGitHubActivityOptions,
  ): Provider<CredentialStore> {
    const storeConfiguration = options.storeConfiguration;

    if (storeConfiguration.type === 'typeorm') {
      return {
        provide: CREDENTIAL_STORE,
        useClass: TypeOrmCredentialStore,
      };
    }

    if (storeConfiguration.type === 'custom') {
      return {
        provide: CREDENTIAL_STORE,
        useValue: storeConfiguration.store,
      };
    }

    return {
      provide: CREDENTIAL_STORE,
      useValue: new MemoryCredentialStore(options.logging),
    };
  }

  private static createStateStoreProvider(
    options: ResolvedGitHubActivityOptions,
  ): Provider<OAuthStateStore | null> {
    const stateStoreConfiguration = options.stateStoreConfiguration;

    if (stateStoreConfiguration.type === 'memory') {
      return {
        provide: OAUTH_STATE_STORE,
        useValue: new MemoryOAuthStateStore(Date.now, options.logging),
      };
    }

    if (stateStoreConfiguration.type === 'custom') {
      return {
        provide: OAUTH_STATE_STORE,
        useValue: stateStoreConfiguration.store,
      };
    }

    // Stateless flows
    return {
      provide: OAUTH_STATE_STORE,
      useValue: null,
    };
  }
}

/** Drops keys explicitly set to `undefined` so they don't shadow defaults. */
function definedOnly<T extends object>(value: T | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (value) {
    for (const key in value) {
      if (value[key] !== undefined) {
        result[key] = value[key];
      }
    }
  }
  return result;
}
