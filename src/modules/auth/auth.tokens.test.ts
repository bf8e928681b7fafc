import jwt from 'jsonwebtoken';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  createAccessToken,
  createPasswordResetToken,
  createVerificationToken,
  decodeScopedToken,
  hashPassword,
  verifyAccessToken,
  verifyPassword,
} from './auth.tokens.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { Role, TokenScope } from '../../utils/constants.js';

const user = { id: 'user-1', email: 'alice@example.com', role: Role.ADMIN };

function captureError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AppError) return error;
    throw error;
  }
  throw new Error('Expected an AppError');
}

afterEach(() => {
  vi.useRealTimers();
});

describe('passwords', () => {
  it('hashes and verifies', async () => {
    const hash = await hashPassword('secret123');
    expect(hash).not.toBe('secret123');
    expect(await verifyPassword('secret123', hash)).toBe(true);
    expect(await verifyPassword('secret124', hash)).toBe(false);
  });
});

describe('access tokens', () => {
  it('round-trips the claims', () => {
    const claims = verifyAccessToken(createAccessToken(user));
    expect(claims).toEqual({
      sub: 'user-1',
      email: 'alice@example.com',
      role: Role.ADMIN,
      scope: TokenScope.ACCESS,
    });
  });

  it('reports expiry separately', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    const token = createAccessToken(user);
    vi.setSystemTime(new Date('2024-01-01T00:30:01Z'));

    const error = captureError(() => verifyAccessToken(token));
    expect(error.statusCode).toBe(401);
    expect(error.code).toBe(ErrorCode.TOKEN_EXPIRED);
  });

  it('rejects a token signed with another secret', () => {
    const forged = jwt.sign({ email: user.email, role: user.role, scope: 'access' }, 'another-secret-value', {
      subject: user.id,
    });
    expect(captureError(() => verifyAccessToken(forged)).code).toBe(ErrorCode.TOKEN_INVALID);
  });

  it('rejects email tokens used as access tokens', () => {
    const token = createVerificationToken(user.email);
    expect(captureError(() => verifyAccessToken(token)).code).toBe(ErrorCode.TOKEN_INVALID);
  });
});

describe('scoped email tokens', () => {
  it('decodes a verification token', () => {
    const claims = decodeScopedToken(createVerificationToken('bob@example.com'), TokenScope.VERIFICATION);
    expect(claims.email).toBe('bob@example.com');
    expect(claims.jti).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('gives reset tokens a one hour lifetime', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));

    const claims = decodeScopedToken(createPasswordResetToken('bob@example.com'), TokenScope.RESET);
    expect(claims.expiresAt).toEqual(new Date('2024-01-01T01:00:00Z'));
  });

  it('rejects a token issued for another scope', () => {
    const token = createVerificationToken('bob@example.com');
    const error = captureError(() => decodeScopedToken(token, TokenScope.RESET));
    expect(error.statusCode).toBe(400);
    expect(error.code).toBe(ErrorCode.TOKEN_INVALID);
  });

  it('rejects an expired token', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    const token = createPasswordResetToken('bob@example.com');
    vi.setSystemTime(new Date('2024-01-01T01:00:01Z'));

    expect(captureError(() => decodeScopedToken(token, TokenScope.RESET)).code).toBe(ErrorCode.TOKEN_INVALID);
  });

  it('rejects garbage', () => {
    expect(captureError(() => decodeScopedToken('not-a-jwt', TokenScope.VERIFICATION)).statusCode).toBe(400);
  });
});
