import type { PublicUserSummary } from '../../accounts/interfaces/user-account.interface';

export interface OAuthUserProfile {
  githubId: number;
  username: string;
  email: string | null;
  name: string | null;
  avatarUrl: string | null;
  publicRepos: number | null;
  privateRepos: number | null;
  followers: number | null;
  following: number | null;
}

export interface ProviderTokenSet {
  accessToken: string;
  /** Absolute expiry, when the provider issues expiring tokens. */
  expiresAt?: Date;
  refreshToken?: string;
}

export interface AuthorizationRequest {
  authorizationUrl: string;
  state: string;
}

export interface DeviceFlowHandle {
  deviceCode: string;
  userCode: string;
  verificationUri: string;
  verificationUriComplete: string;
  /** Seconds until the device code expires. */
  expiresIn: number;
  /** Minimum seconds between polls. */
  interval: number;
  message: string;
}

export interface SessionIssued {
  accessToken: string;
  tokenType: 'Bearer';
  /** Seconds. */
  expiresIn: number;
  user: PublicUserSummary;
}
