import { Inject, Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { z } from 'zod';
import {
  ConfigurationError,
  ExpiredTokenError,
  InvalidTokenError,
  describeError,
} from '../../common/errors/github-activity.errors';
import { GITHUB_ACTIVITY_OPTIONS } from '../../common/constants';
import { createLogger } from '../../common/utils/logger.factory';
import type { ResolvedGitHubActivityOptions } from '../../interfaces/module-options.interface';

const sessionClaimsSchema = z.object({
  sub: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

export type SessionClaims = z.infer<typeof sessionClaimsSchema>;

export type SessionTokenServiceOptions = Pick<
  ResolvedGitHubActivityOptions,
  'session' | 'logging'
>;

/**
 * Mints and verifies the bearer tokens this service hands to its own callers.
 * Claims are `sub` (local user id), `iat` and `exp`, signed with the
 * configured HMAC algorithm.
 */
@Injectable()
export class SessionTokenService {
  private readonly logger: Logger;

  constructor(
    private readonly jwtService: JwtService,
    @Inject(GITHUB_ACTIVITY_OPTIONS)
    private readonly options: SessionTokenServiceOptions,
  ) {
    this.logger = createLogger(SessionTokenService.name, options.logging);
  }

  /** Lifetime of issued tokens, in whole seconds. */
  get expiresInSeconds(): number {
    return Math.floor(this.options.session.expiresInHours * 60 * 60);
  }

  /** Throws `ConfigurationError` when no signing secret is set. */
  assertConfigured(): void {
    this.requireSecret();
  }

  issue(subjectId: string, issuedAt: Date = new Date()): string {
    const secret = this.requireSecret();
    const iat = Math.floor(issuedAt.getTime() / 1000);

    return this.jwtService.sign(
      { sub: subjectId, iat, exp: iat + this.expiresInSeconds },
      { secret, algorithm: this.options.session.algorithm },
    );
  }

  /**
   * Checks signature, algorithm and claim shape, then expiry.
   * A token is expired once `now` is strictly past its `exp`.
   */
  verify(token: string, now: Date = new Date()): SessionClaims {
    const secret = this.requireSecret();

    let decoded: Record<string, unknown>;
    try {
      decoded = this.jwtService.verify<Record<string, unknown>>(token, {
        secret,
        algorithms: [this.options.session.algorithm],
        ignoreExpiration: true,
      });
    } catch (error) {
      this.logger.debug(`Session token rejected: ${describeError(error)}`);
      throw new InvalidTokenError(`Invalid token: ${describeError(error)}`, {
        cause: error,
      });
    }

    const parsed = sessionClaimsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new InvalidTokenError('Invalid token payload');
    }

    const claims = parsed.data;
    if (claims.exp <= claims.iat) {
      throw new InvalidTokenError('Invalid token payload');
    }

    if (now.getTime() > claims.exp * 1000) {
      throw new ExpiredTokenError();
    }

    return claims;
  }

  private requireSecret(): string {
    const { secret } = this.options.session;
    if (!secret) {
      throw new ConfigurationError('JWT secret key is not configured');
    }
    return secret;
  }
}
