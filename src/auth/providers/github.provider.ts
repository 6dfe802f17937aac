import { z } from 'zod';
import type { OAuthUserProfile } from '../interfaces/oauth-common.interface';

export const DEVICE_CODE_GRANT_TYPE =
  'urn:ietf:params:oauth:grant-type:device_code';

const tokenSuccessSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  scope: z.string().optional(),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
});

const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
  interval: z.number().optional(),
});

const deviceCodeSchema = z.object({
  device_code: z.string(),
  user_code: z.string(),
  verification_uri: z.string(),
  verification_uri_complete: z.string().optional(),
  expires_in: z.number(),
  interval: z.number().optional(),
});

const userSchema = z
  .object({
    id: z.number().int(),
    login: z.string(),
    email: z.string().nullish(),
    name: z.string().nullish(),
    avatar_url: z.string().nullish(),
    public_repos: z.number().nullish(),
    total_private_repos: z.number().nullish(),
    followers: z.number().nullish(),
    following: z.number().nullish(),
  })
  .passthrough();

export type GitHubTokenSuccess = z.infer<typeof tokenSuccessSchema>;
export type GitHubTokenError = z.infer<typeof tokenErrorSchema>;
export type GitHubDeviceCode = z.infer<typeof deviceCodeSchema>;
export type GitHubUser = z.infer<typeof userSchema>;

export type GitHubTokenResponse =
  | { kind: 'token'; token: GitHubTokenSuccess }
  | { kind: 'error'; error: GitHubTokenError }
  | { kind: 'unknown' };

export const GitHubOAuthProvider = {
  name: 'github',
  scope: ['repo', 'read:org', 'read:user'],
  endpoints: {
    authorizeUrl: 'https://github.com/login/oauth/authorize',
    tokenUrl: 'https://github.com/login/oauth/access_token',
    deviceCodeUrl: 'https://github.com/login/device/code',
    apiBaseUrl: 'https://api.github.com',
  },

  /**
   * Token endpoint bodies carry either a token or an `error` code; GitHub
   * answers 200 for both.
   */
  parseTokenResponse(body: unknown): GitHubTokenResponse {
    const error = tokenErrorSchema.safeParse(body);
    if (error.success) {
      return { kind: 'error', error: error.data };
    }
    const token = tokenSuccessSchema.safeParse(body);
    if (token.success) {
      return { kind: 'token', token: token.data };
    }
    return { kind: 'unknown' };
  },

  parseDeviceCode(body: unknown): GitHubDeviceCode | undefined {
    const parsed = deviceCodeSchema.safeParse(body);
    return parsed.success ? parsed.data : undefined;
  },

  parseUser(body: unknown): GitHubUser | undefined {
    const parsed = userSchema.safeParse(body);
    return parsed.success ? parsed.data : undefined;
  },

  profileMapper: (user: GitHubUser): OAuthUserProfile => ({
    githubId: user.id,
    username: user.login,
    email: user.email ?? null,
    name: user.name ?? null,
    avatarUrl: user.avatar_url ?? null,
    publicRepos: user.public_repos ?? null,
    privateRepos: user.total_private_repos ?? null,
    followers: user.followers ?? null,
    following: user.following ?? null,
  }),
} as const;
