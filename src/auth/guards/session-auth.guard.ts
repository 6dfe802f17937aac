import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import type { Request } from 'express';
import type { UserAccount } from '../../accounts/interfaces/user-account.interface';
import { UserAccountService } from '../../accounts/services/user-account.service';
import {
  AccountNotFoundError,
  InvalidTokenError,
} from '../../common/errors/github-activity.errors';
import { SessionTokenService } from '../services/session-token.service';

export interface AuthenticatedRequest extends Request {
  user: UserAccount;
}

/**
 * Accepts requests carrying `Authorization: Bearer <session token>` for an
 * existing account, and exposes that account as `request.user`.
 */
@Injectable()
export class SessionAuthGuard implements CanActivate {
  constructor(
    private readonly sessions: SessionTokenService,
    private readonly accounts: UserAccountService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = this.extractTokenFromHeader(request);
    if (!token) {
      throw new InvalidTokenError('Access token required');
    }

    const claims = this.sessions.verify(token);

    try {
      request.user = await this.accounts.getById(claims.sub);
    } catch (error) {
      if (error instanceof AccountNotFoundError) {
        throw new InvalidTokenError('User not found');
      }
      throw error;
    }
    return true;
  }

  private extractTokenFromHeader(request: Request): string | undefined {
    const authHeader = request.headers.authorization;
    if (!authHeader) {
      return undefined;
    }

    const [type, token] = authHeader.split(' ');
    return type === 'Bearer' && token ? token : undefined;
  }
}
