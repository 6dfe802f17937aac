import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { randomBytes } from 'crypto';
import { UserAccountService } from '../../accounts/services/user-account.service';
import {
  PublicUserSummary,
  toPublicSummary,
} from '../../accounts/interfaces/user-account.interface';
import { GitHubApiClient } from '../../activity/services/github-api.client';
import {
  FetchFn,
  GITHUB_ACTIVITY_OPTIONS,
  HTTP_FETCH,
  OAUTH_STATE_STORE,
  SLEEP,
  Sleep,
} from '../../common/constants';
import {
  ConfigurationError,
  DeviceCodeExpiredError,
  DeviceFlowTimeoutError,
  InvalidOAuthStateError,
  UpstreamAuthError,
  UpstreamError,
  UpstreamUnavailableError,
  describeError,
} from '../../common/errors/github-activity.errors';
import { createLogger } from '../../common/utils/logger.factory';
import type { ResolvedGitHubActivityOptions } from '../../interfaces/module-options.interface';
import type {
  AuthorizationRequest,
  DeviceFlowHandle,
  ProviderTokenSet,
  SessionIssued,
} from '../interfaces/oauth-common.interface';
import {
  DEVICE_CODE_GRANT_TYPE,
  GitHubOAuthProvider,
  GitHubTokenSuccess,
} from '../providers/github.provider';
import type { OAuthStateStore } from '../stores/oauth-state-store.interface';
import { SessionTokenService } from './session-token.service';
import { TokenCipherService } from './token-cipher.service';

export type OAuthFlowOptions = Pick<
  ResolvedGitHubActivityOptions,
  'github' | 'deviceFlow' | 'stateStoreConfiguration' | 'logging'
> & {
  timeouts: Pick<ResolvedGitHubActivityOptions['timeouts'], 'identityMs'>;
};

export interface ProviderTokenUpdate {
  expiresAt?: Date;
  refreshToken?: string;
}

const STATE_BYTES = 32;

export const DEFAULT_STATE_TTL_MS = 10 * 60 * 1000; // 10 minutes

/**
 * Drives the two GitHub sign-in flows (authorization code and device) and
 * turns a GitHub access token into a local account plus a session token.
 *
 * A flow either completes fully or fails: the account is written only with
 * an encrypted token, and a session is only issued for a stored account.
 */
@Injectable()
export class OAuthFlowService {
  private readonly logger: Logger;

  constructor(
    @Inject(HTTP_FETCH) private readonly fetchFn: FetchFn,
    @Inject(SLEEP) private readonly sleep: Sleep,
    private readonly cipher: TokenCipherService,
    private readonly sessions: SessionTokenService,
    private readonly accounts: UserAccountService,
    private readonly githubApi: GitHubApiClient,
    @Inject(GITHUB_ACTIVITY_OPTIONS)
    private readonly options: OAuthFlowOptions,
    @Optional()
    @Inject(OAUTH_STATE_STORE)
    private readonly stateStore?: OAuthStateStore | null,
  ) {
    this.logger = createLogger(OAuthFlowService.name, options.logging);
  }

  /** Lifetime of a saved authorization state, when a state store is used. */
  private get stateTtlMs(): number {
    const configuration = this.options.stateStoreConfiguration;
    return configuration.type === 'none'
      ? DEFAULT_STATE_TTL_MS
      : configuration.ttlMs ?? DEFAULT_STATE_TTL_MS;
  }

  async initiateAuthorizationFlow(state?: string): Promise<AuthorizationRequest> {
    const { clientId, redirectUri, authorizeUrl, scopes } = this.options.github;
    if (!clientId) {
      throw new ConfigurationError('GitHub OAuth is not configured');
    }

    const resolvedState = state ?? randomBytes(STATE_BYTES).toString('base64url');
    const url = new URL(authorizeUrl);
    url.searchParams.set('client_id', clientId);
    if (redirectUri) {
      url.searchParams.set('redirect_uri', redirectUri);
    }
    url.searchParams.set('scope', scopes.join(' '));
    url.searchParams.set('state', resolvedState);

    await this.stateStore?.save('authorization', resolvedState, this.stateTtlMs);

    return { authorizationUrl: url.toString(), state: resolvedState };
  }

  async completeAuthorizationFlow(code: string, state?: string): Promise<SessionIssued> {
    const { clientId, clientSecret, redirectUri, tokenUrl } = this.options.github;
    if (!clientId || !clientSecret) {
      throw new ConfigurationError('GitHub OAuth is not configured');
    }
    this.assertCanSignIn();

    if (this.stateStore) {
      const valid = state !== undefined && (await this.stateStore.consume('authorization', state));
      if (!valid) {
        this.logger.warn('Rejected OAuth callback with unknown or reused state');
        throw new InvalidOAuthStateError();
      }
    }

    const body = await this.postForm(tokenUrl, {
      client_id: clientId,
      client_secret: clientSecret,
      code,
      redirect_uri: redirectUri,
    });

    const response = GitHubOAuthProvider.parseTokenResponse(body);
    if (response.kind === 'error') {
      this.logger.warn(`GitHub OAuth error during code exchange: ${response.error.error}`);
      throw new UpstreamAuthError(
        `Failed to exchange code for token: ${response.error.error}`,
        response.error.error,
      );
    }
    if (response.kind === 'unknown') {
      throw new UpstreamAuthError('No access token received from GitHub');
    }

    return this.signIn(toTokenSet(response.token));
  }

  async initiateDeviceFlow(): Promise<DeviceFlowHandle> {
    const { deviceClientId, deviceCodeUrl, scopes } = this.options.github;
    if (!deviceClientId) {
      throw new ConfigurationError('GitHub device flow is not configured');
    }

    const body = await this.postForm(deviceCodeUrl, {
      client_id: deviceClientId,
      scope: scopes.join(' '),
    });

    const deviceCode = GitHubOAuthProvider.parseDeviceCode(body);
    if (!deviceCode) {
      const response = GitHubOAuthProvider.parseTokenResponse(body);
      if (response.kind === 'error') {
        throw new UpstreamAuthError(
          `Failed to initiate device flow: ${response.error.error}`,
          response.error.error,
        );
      }
      this.logger.error('GitHub device code response is missing fields');
      throw new UpstreamError('Failed to initiate device flow', 200);
    }

    await this.stateStore?.save('device', deviceCode.device_code, deviceCode.expires_in * 1000);

    return {
      deviceCode: deviceCode.device_code,
      userCode: deviceCode.user_code,
      verificationUri: deviceCode.verification_uri,
      verificationUriComplete:
        deviceCode.verification_uri_complete ?? deviceCode.verification_uri,
      expiresIn: deviceCode.expires_in,
      interval: deviceCode.interval ?? this.options.deviceFlow.defaultIntervalSeconds,
      message: `Visit ${deviceCode.verification_uri} and enter code ${deviceCode.user_code}`,
    };
  }

  /**
   * Poll until the user approves the device, GitHub reports a terminal
   * error, or the attempt cap is reached. `interval` is in seconds and grows
   * on every `slow_down`. GitHub only needs the device code; `userCode` is
   * used for logging.
   */
  async completeDeviceFlow(
    deviceCode: string,
    userCode: string,
    interval: number = this.options.deviceFlow.defaultIntervalSeconds,
  ): Promise<SessionIssued> {
    const { deviceClientId, tokenUrl } = this.options.github;
    if (!deviceClientId) {
      throw new ConfigurationError('GitHub device flow is not configured');
    }
    this.assertCanSignIn();

    if (this.stateStore && !(await this.stateStore.has('device', deviceCode))) {
      throw new InvalidOAuthStateError('Unknown or expired device code');
    }

    const { maxAttempts, slowDownIncrementSeconds } = this.options.deviceFlow;
    let currentInterval = interval;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const body = await this.postForm(tokenUrl, {
        client_id: deviceClientId,
        device_code: deviceCode,
        grant_type: DEVICE_CODE_GRANT_TYPE,
      });
      const response = GitHubOAuthProvider.parseTokenResponse(body);

      if (response.kind === 'token') {
        const session = await this.signIn(toTokenSet(response.token));
        await this.stateStore?.consume('device', deviceCode);
        return session;
      }

      if (response.kind === 'unknown') {
        throw new UpstreamAuthError('No access token received from GitHub');
      }

      switch (response.error.error) {
        case 'authorization_pending':
          break;
        case 'slow_down':
          currentInterval += slowDownIncrementSeconds;
          this.logger.debug(`GitHub asked to slow down; polling every ${currentInterval}s`);
          break;
        case 'expired_token':
          await this.stateStore?.consume('device', deviceCode);
          throw new DeviceCodeExpiredError();
        default:
          this.logger.warn(`Device verification failed for ${userCode}: ${response.error.error}`);
          throw new UpstreamAuthError(
            `Device verification failed: ${response.error.error}`,
            response.error.error,
          );
      }

      await this.sleep(currentInterval * 1000);
    }

    this.logger.warn(`Device verification for ${userCode} timed out after ${maxAttempts} attempts`);
    throw new DeviceFlowTimeoutError(maxAttempts);
  }

  /**
   * Store a new GitHub token (and refresh token, when given) for an existing
   * account.
   */
  async refreshProviderToken(
    userId: string,
    accessToken: string,
    update: ProviderTokenUpdate = {},
  ): Promise<PublicUserSummary> {
    const account = await this.accounts.replaceToken(userId, {
      encryptedAccessToken: this.cipher.encrypt(accessToken),
      tokenExpiresAt: update.expiresAt,
      encryptedRefreshToken:
        update.refreshToken === undefined ? undefined : this.cipher.encrypt(update.refreshToken),
    });
    this.logger.log(`Replaced GitHub token for user ${account.id}`);
    return toPublicSummary(account);
  }

  /** Both secrets must be set before a flow touches GitHub or the store. */
  private assertCanSignIn(): void {
    this.sessions.assertConfigured();
    this.cipher.assertConfigured();
  }

  private async signIn(tokens: ProviderTokenSet): Promise<SessionIssued> {
    const body = await this.githubApi.request(tokens.accessToken, 'GET', '/user', {}, {
      timeoutMs: this.options.timeouts.identityMs,
    });
    const user = GitHubOAuthProvider.parseUser(body);
    if (!user) {
      this.logger.error('GitHub /user response is missing id or login');
      throw new UpstreamError('Failed to communicate with GitHub API', 200);
    }

    const profile = GitHubOAuthProvider.profileMapper(user);
    const { account, created } = await this.accounts.upsertFromProfile(profile, {
      encryptedAccessToken: this.cipher.encrypt(tokens.accessToken),
      tokenExpiresAt: tokens.expiresAt ?? null,
      encryptedRefreshToken: tokens.refreshToken
        ? this.cipher.encrypt(tokens.refreshToken)
        : undefined,
    });

    const accessToken = this.sessions.issue(account.id);
    this.logger.log(
      `User ${account.username} authenticated${created ? ' (new account)' : ''}`,
    );

    return {
      accessToken,
      tokenType: 'Bearer',
      expiresIn: this.sessions.expiresInSeconds,
      user: toPublicSummary(account),
    };
  }

  /**
   * Form-encoded POST with a JSON answer, as GitHub's OAuth endpoints expect.
   */
  private async postForm(
    url: string,
    fields: Record<string, string | undefined>,
  ): Promise<unknown> {
    const form = new URLSearchParams();
    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined) {
        form.set(key, value);
      }
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: form.toString(),
        signal: AbortSignal.timeout(this.options.timeouts.identityMs),
      });
      text = await response.text();
    } catch (error) {
      this.logger.error(`GitHub OAuth request to ${url} failed: ${describeError(error)}`);
      throw new UpstreamUnavailableError('Failed to communicate with GitHub', {
        cause: error,
      });
    }

    if (!response.ok) {
      this.logger.error(`GitHub OAuth endpoint ${url} answered ${response.status}`);
      throw new UpstreamError(`GitHub OAuth error: ${response.status}`, response.status);
    }

    try {
      return JSON.parse(text);
    } catch {
      this.logger.error(`GitHub OAuth endpoint ${url} returned non-JSON body`);
      throw new UpstreamError('Invalid response from GitHub', response.status);
    }
  }
}

function toTokenSet(token: GitHubTokenSuccess): ProviderTokenSet {
  return {
    accessToken: token.access_token,
    expiresAt:
      token.expires_in !== undefined
        ? new Date(Date.now() + token.expires_in * 1000)
        : undefined,
    refreshToken: token.refresh_token,
  };
}
