import type { UserAccount, UserAccountInput } from './user-account.interface';

/**
 * Persistence for user accounts and their encrypted GitHub credentials.
 * Implementations can use memory, a relational database, a document store, etc.
 */
export interface CredentialStore {
  /**
   * Find the account linked to a GitHub user id.
   */
  findBySubjectId(githubId: number): Promise<UserAccount | undefined>;

  /**
   * Find an account by its local id.
   */
  findById(id: string): Promise<UserAccount | undefined>;

  /**
   * Insert (no `id`) or replace (with `id`) an account and return the stored
   * record. Refreshes `updatedAt`; `id` and `createdAt` are set on insert only.
   *
   * @throws DuplicateAccountError when another account already has the githubId
   * @throws AccountNotFoundError when `id` is given but unknown
   */
  upsert(account: UserAccountInput): Promise<UserAccount>;
}
