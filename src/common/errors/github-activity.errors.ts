import { HttpException, HttpStatus } from '@nestjs/common';

export type GitHubActivityErrorCode =
  | 'configuration_error'
  | 'encryption_error'
  | 'upstream_auth_error'
  | 'upstream_unavailable'
  | 'upstream_error'
  | 'rate_limited'
  | 'invalid_credential'
  | 'expired_token'
  | 'invalid_token'
  | 'device_code_expired'
  | 'device_flow_timeout'
  | 'duplicate_account'
  | 'invalid_oauth_state'
  | 'account_not_found';

interface ErrorOptions {
  cause?: unknown;
}

/**
 * Base class for every failure this library raises.
 *
 * Each subclass carries a stable `code` so callers can branch on the kind of
 * failure without parsing messages, and an HTTP status so the errors render
 * correctly when they escape a controller.
 */
export abstract class GitHubActivityError extends HttpException {
  abstract readonly code: GitHubActivityErrorCode;

  protected constructor(
    message: string,
    status: HttpStatus,
    options: ErrorOptions = {},
  ) {
    super(message, status, { cause: options.cause });
  }
}

/** A required secret or client id is missing for the requested operation. */
export class ConfigurationError extends GitHubActivityError {
  readonly code = 'configuration_error';

  constructor(message: string) {
    super(message, HttpStatus.INTERNAL_SERVER_ERROR);
  }
}

export class EncryptionError extends GitHubActivityError {
  readonly code = 'encryption_error';

  constructor(message: string, options?: ErrorOptions) {
    super(message, HttpStatus.INTERNAL_SERVER_ERROR, options);
  }
}

/** GitHub answered an OAuth exchange with an error payload. */
export class UpstreamAuthError extends GitHubActivityError {
  readonly code = 'upstream_auth_error';

  constructor(
    message: string,
    readonly upstreamError?: string,
  ) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

/** GitHub could not be reached (connection failure or timeout). */
export class UpstreamUnavailableError extends GitHubActivityError {
  readonly code = 'upstream_unavailable';

  constructor(message: string, options?: ErrorOptions) {
    super(message, HttpStatus.BAD_GATEWAY, options);
  }
}

export class UpstreamError extends GitHubActivityError {
  readonly code = 'upstream_error';

  constructor(
    message: string,
    readonly upstreamStatus: number,
  ) {
    super(message, HttpStatus.BAD_GATEWAY);
  }
}

export class RateLimitedError extends GitHubActivityError {
  readonly code = 'rate_limited';

  constructor(
    message: string,
    readonly resetAt?: Date,
  ) {
    super(message, HttpStatus.TOO_MANY_REQUESTS);
  }
}

/** The stored GitHub token was rejected; the user has to sign in again. */
export class InvalidCredentialError extends GitHubActivityError {
  readonly code = 'invalid_credential';

  constructor(message = 'GitHub token is invalid or expired') {
    super(message, HttpStatus.UNAUTHORIZED);
  }
}

export class ExpiredTokenError extends GitHubActivityError {
  readonly code = 'expired_token';

  constructor(message = 'Token has expired') {
    super(message, HttpStatus.UNAUTHORIZED);
  }
}

export class InvalidTokenError extends GitHubActivityError {
  readonly code = 'invalid_token';

  constructor(message = 'Invalid token', options?: ErrorOptions) {
    super(message, HttpStatus.UNAUTHORIZED, options);
  }
}

export class DeviceCodeExpiredError extends GitHubActivityError {
  readonly code = 'device_code_expired';

  constructor(message = 'Device code has expired') {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

export class DeviceFlowTimeoutError extends GitHubActivityError {
  readonly code = 'device_flow_timeout';

  constructor(readonly attempts: number) {
    super(
      `Device verification timed out after ${attempts} attempts`,
      HttpStatus.REQUEST_TIMEOUT,
    );
  }
}

/** Two sign-ins for the same GitHub user raced to create the account. */
export class DuplicateAccountError extends GitHubActivityError {
  readonly code = 'duplicate_account';

  constructor(
    readonly field: string,
    options?: ErrorOptions,
  ) {
    super(`A record with this ${field} already exists`, HttpStatus.CONFLICT, options);
  }
}

export class InvalidOAuthStateError extends GitHubActivityError {
  readonly code = 'invalid_oauth_state';

  constructor(message = 'Invalid or expired OAuth state') {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

export class AccountNotFoundError extends GitHubActivityError {
  readonly code = 'account_not_found';

  constructor(readonly accountId: string) {
    super(`User with ID ${accountId} not found`, HttpStatus.NOT_FOUND);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
