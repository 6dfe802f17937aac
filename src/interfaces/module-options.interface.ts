import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import type { CredentialStore } from '../accounts/interfaces/credential-store.interface';
import type { OAuthStateStore } from '../auth/stores/oauth-state-store.interface';
import type { LoggingOptions } from '../common/utils/logger.factory';

export type SessionAlgorithm = 'HS256' | 'HS384' | 'HS512';

export interface GitHubOAuthOptions {
  /** OAuth app client id used by the authorization-code flow. */
  clientId?: string;
  clientSecret?: string;
  redirectUri?: string;
  /** Client id used by the device flow (often a separate OAuth app). */
  deviceClientId?: string;
  scopes?: string[];
  authorizeUrl?: string;
  tokenUrl?: string;
  deviceCodeUrl?: string;
  apiBaseUrl?: string;
}

export interface SessionOptions {
  secret?: string;
  algorithm?: SessionAlgorithm;
  expiresInHours?: number;
}

export interface TokenCipherOptions {
  /**
   * Master secret the AES-256 key is derived from (PBKDF2-SHA256).
   * Without it every encrypt/decrypt call fails.
   */
  secret?: string;
}

export type CredentialStoreConfiguration =
  | { type: 'memory' }
  | { type: 'typeorm'; options: TypeOrmModuleOptions }
  | { type: 'custom'; store: CredentialStore };

/**
 * Where pending OAuth states and device codes are tracked.
 * `none` keeps both flows stateless.
 */
export type OAuthStateStoreConfiguration =
  | { type: 'none' }
  | { type: 'memory'; ttlMs?: number }
  | { type: 'custom'; store: OAuthStateStore; ttlMs?: number };

export interface AggregationOptions {
  /** Number of repositories fetched in parallel during fan-out. */
  fanOutConcurrency?: number;
  /** Upper bound on repositories considered by fan-out queries. */
  maxRepositories?: number;
}

export interface TimeoutOptions {
  /** Token exchange and profile calls. */
  identityMs?: number;
  /** Resource listing calls. */
  dataMs?: number;
}

export interface DeviceFlowOptions {
  maxAttempts?: number;
  defaultIntervalSeconds?: number;
  slowDownIncrementSeconds?: number;
}

export interface GitHubActivityModuleOptions {
  github?: GitHubOAuthOptions;
  session?: SessionOptions;
  encryption?: TokenCipherOptions;
  storeConfiguration?: CredentialStoreConfiguration;
  stateStoreConfiguration?: OAuthStateStoreConfiguration;
  aggregation?: AggregationOptions;
  timeouts?: TimeoutOptions;
  deviceFlow?: DeviceFlowOptions;
  logging?: LoggingOptions;
}

type WithDefaults<T, K extends keyof T> = Omit<T, K> & Required<Pick<T, K>>;

export type ResolvedGitHubOAuthOptions = WithDefaults<
  GitHubOAuthOptions,
  'scopes' | 'authorizeUrl' | 'tokenUrl' | 'deviceCodeUrl' | 'apiBaseUrl'
>;

export type ResolvedSessionOptions = WithDefaults<
  SessionOptions,
  'algorithm' | 'expiresInHours'
>;

export interface ResolvedGitHubActivityOptions {
  github: ResolvedGitHubOAuthOptions;
  session: ResolvedSessionOptions;
  encryption: TokenCipherOptions;
  storeConfiguration: CredentialStoreConfiguration;
  stateStoreConfiguration: OAuthStateStoreConfiguration;
  aggregation: Required<AggregationOptions>;
  timeouts: Required<TimeoutOptions>;
  deviceFlow: Required<DeviceFlowOptions>;
  logging?: LoggingOptions;
}
