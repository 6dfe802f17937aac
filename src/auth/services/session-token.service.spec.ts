import { JwtService } from '@nestjs/jwt';
import {
  ConfigurationError,
  ExpiredTokenError,
  InvalidTokenError,
} from '../../common/errors/github-activity.errors';
import { SessionTokenService } from './session-token.service';

const HOUR_MS = 60 * 60 * 1000;

function createService(
  secret: string | undefined,
  algorithm: 'HS256' | 'HS384' | 'HS512' = 'HS256',
  expiresInHours = 24,
): SessionTokenService {
  return new SessionTokenService(new JwtService({}), {
    session: { secret, algorithm, expiresInHours },
    logging: false,
  });
}

describe('SessionTokenService', () => {
  it('should round-trip the subject immediately after issuance', () => {
    const service = createService('test-secret');
    const token = service.issue('user-123');

    expect(service.verify(token).sub).toBe('user-123');
  });

  it('should set expiry to issued-at plus the configured hours', () => {
    const service = createService('test-secret');
    const issuedAt = new Date('2024-05-01T12:00:00Z');

    const claims = service.verify(
      service.issue('user-123', issuedAt),
      new Date('2024-05-01T13:00:00Z'),
    );

    expect(claims.iat).toBe(issuedAt.getTime() / 1000);
    expect(claims.exp - claims.iat).toBe(24 * 60 * 60);
    expect(service.expiresInSeconds).toBe(86400);
  });

  it('should round fractional hours down to whole seconds', () => {
    const service = createService('test-secret', 'HS256', 1.0001);
    const issuedAt = new Date('2024-05-01T12:00:00Z');

    const claims = service.verify(
      service.issue('user-123', issuedAt),
      new Date('2024-05-01T12:30:00Z'),
    );

    expect(claims.sub).toBe('user-123');
    expect(claims.exp - claims.iat).toBe(3600);
    expect(service.expiresInSeconds).toBe(3600);
  });

  it('should reject tokens whose expiry has passed', () => {
    const service = createService('test-secret');
    const token = service.issue('user-123', new Date(Date.now() - 25 * HOUR_MS));

    expect(() => service.verify(token)).toThrow(ExpiredTokenError);
  });

  it('should accept a token at exactly its expiry instant', () => {
    const service = createService('test-secret');
    const issuedAt = new Date('2024-05-01T00:00:00Z');
    const token = service.issue('user-123', issuedAt);

    const atExpiry = new Date(issuedAt.getTime() + 24 * HOUR_MS);
    expect(service.verify(token, atExpiry).sub).toBe('user-123');
    expect(() =>
      service.verify(token, new Date(atExpiry.getTime() + 1)),
    ).toThrow(ExpiredTokenError);
  });

  it('should reject tokens signed with a different secret', () => {
    const token = createService('other-secret').issue('user-123');

    expect(() => createService('test-secret').verify(token)).toThrow(InvalidTokenError);
  });

  it('should reject tokens signed with a different algorithm', () => {
    const token = createService('test-secret', 'HS512').issue('user-123');

    expect(() => createService('test-secret', 'HS256').verify(token)).toThrow(
      InvalidTokenError,
    );
  });

  it('should reject malformed tokens and payloads without a subject', () => {
    const service = createService('test-secret');
    expect(() => service.verify('not.a.jwt')).toThrow(InvalidTokenError);

    const noSubject = new JwtService({}).sign(
      { foo: 'bar' },
      { secret: 'test-secret', algorithm: 'HS256', expiresIn: '1h' },
    );
    expect(() => service.verify(noSubject)).toThrow('Invalid token payload');
  });

  it('should fail with a configuration error when no secret is set', () => {
    const service = createService(undefined);

    expect(() => service.issue('user-123')).toThrow(ConfigurationError);
    expect(() => service.verify('a.b.c')).toThrow(ConfigurationError);
  });
});
