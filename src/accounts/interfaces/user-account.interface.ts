export const CADENCES = ['daily', 'weekly', 'bi-weekly', 'monthly'] as const;
export const TONES = ['formal', 'informal', 'casual'] as const;

export type Cadence = (typeof CADENCES)[number];
export type Tone = (typeof TONES)[number];

export interface NotificationPreferences {
  cadence: Cadence;
  tone: Tone;
  emojis: boolean;
  hashtags: boolean;
}

export const DEFAULT_PREFERENCES: NotificationPreferences = {
  cadence: 'weekly',
  tone: 'formal',
  emojis: false,
  hashtags: true,
};

/**
 * A local user linked to exactly one GitHub account.
 *
 * `encryptedAccessToken` and `encryptedRefreshToken` only ever hold
 * ciphertext produced by `TokenCipherService`.
 */
export interface UserAccount {
  id: string;
  githubId: number;
  username: string;
  email: string | null;
  name: string | null;
  avatarUrl: string | null;
  publicRepos: number | null;
  privateRepos: number | null;
  followers: number | null;
  following: number | null;
  preferences: NotificationPreferences;
  encryptedAccessToken: string;
  tokenExpiresAt: Date | null;
  encryptedRefreshToken: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * What callers hand to `CredentialStore.upsert`. Without an `id` the account
 * is inserted; with one it replaces the stored record.
 */
export type UserAccountInput = Omit<UserAccount, 'id' | 'createdAt' | 'updatedAt'> & {
  id?: string;
};

export interface PublicUserSummary {
  id: string;
  githubId: number;
  username: string;
  email: string | null;
}

export function toPublicSummary(account: UserAccount): PublicUserSummary {
  return {
    id: account.id,
    githubId: account.githubId,
    username: account.username,
    email: account.email,
  };
}
