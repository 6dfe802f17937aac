import { Logger } from '@nestjs/common';
import { createLogger, LoggingOptions } from '../../common/utils/logger.factory';
import type {
  OAuthStateKind,
  OAuthStateStore,
} from './oauth-state-store.interface';

/**
 * In-memory OAuth state store.
 * For deployments with more than one instance, provide a shared store.
 */
export class MemoryOAuthStateStore implements OAuthStateStore {
  private readonly logger: Logger;

  // kind:value -> expiry (epoch ms)
  private entries = new Map<string, number>();

  constructor(
    private readonly now: () => number = Date.now,
    logging?: LoggingOptions,
  ) {
    this.logger = createLogger(MemoryOAuthStateStore.name, logging);
  }

  async save(kind: OAuthStateKind, value: string, ttlMs: number): Promise<void> {
    this.removeExpired();
    this.entries.set(this.key(kind, value), this.now() + ttlMs);
  }

  async has(kind: OAuthStateKind, value: string): Promise<boolean> {
    const expiresAt = this.entries.get(this.key(kind, value));
    return expiresAt !== undefined && expiresAt > this.now();
  }

  async consume(kind: OAuthStateKind, value: string): Promise<boolean> {
    const key = this.key(kind, value);
    const expiresAt = this.entries.get(key);
    if (expiresAt === undefined) {
      return false;
    }

    this.entries.delete(key);
    if (expiresAt <= this.now()) {
      this.logger.debug(`Discarded expired ${kind} state`);
      return false;
    }
    return true;
  }

  private removeExpired(): void {
    const now = this.now();
    for (const [key, expiresAt] of this.entries.entries()) {
      if (expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }

  private key(kind: OAuthStateKind, value: string): string {
    return `${kind}:${value}`;
  }
}
