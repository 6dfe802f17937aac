export type OAuthStateKind = 'authorization' | 'device';

/**
 * Tracks in-flight OAuth attempts: CSRF state values for the redirect flow
 * and device codes for the polling flow. Entries are single use.
 * Implementations can use memory, Redis, a database, etc.
 */
export interface OAuthStateStore {
  save(kind: OAuthStateKind, value: string, ttlMs: number): Promise<void>;

  /** True if the value is present and unexpired. Does not consume it. */
  has(kind: OAuthStateKind, value: string): Promise<boolean>;

  /**
   * Remove the value and report whether it was present and unexpired.
   * A second consume of the same value returns false.
   */
  consume(kind: OAuthStateKind, value: string): Promise<boolean>;
}
