import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { env } from '../../config/env.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { Role, TokenScope } from '../../utils/constants.js';

// ── Passwords ──

export async function hashPassword(plain: string): Promise<string> {
  return bcrypt.hash(plain, env.BCRYPT_ROUNDS);
}

export async function verifyPassword(plain: string, hash: string): Promise<boolean> {
  return bcrypt.compare(plain, hash);
}

// ── Access tokens ──

const accessClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  role: z.nativeEnum(Role),
  scope: z.literal(TokenScope.ACCESS),
});

export type AccessClaims = z.infer<typeof accessClaimsSchema>;

export function createAccessToken(user: { id: string; email: string; role: Role }): string {
  return jwt.sign({ email: user.email, role: user.role, scope: TokenScope.ACCESS }, env.JWT_SECRET, {
    subject: user.id,
    algorithm: env.JWT_ALGORITHM,
    expiresIn: env.ACCESS_TOKEN_EXPIRE_MINUTES * 60,
  });
}

export function verifyAccessToken(token: string): AccessClaims {
  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, env.JWT_SECRET, { algorithms: [env.JWT_ALGORITHM] });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw AppError.unauthorized('Access token expired', ErrorCode.TOKEN_EXPIRED);
    }
    if (error instanceof jwt.JsonWebTokenError) {
      throw AppError.unauthorized('Invalid access token', ErrorCode.TOKEN_INVALID);
    }
    throw error;
  }

  const claims = accessClaimsSchema.safeParse(payload);
  if (!claims.success) {
    throw AppError.unauthorized('Invalid access token', ErrorCode.TOKEN_INVALID);
  }
  return claims.data;
}

// ── Email tokens (verification, password reset) ──

type EmailScope = TokenScope.VERIFICATION | TokenScope.RESET;

const emailClaimsSchema = z.object({
  sub: z.string().email(),
  scope: z.nativeEnum(TokenScope),
  jti: z.string().min(1),
  exp: z.number(),
});

export interface EmailTokenClaims {
  email: string;
  jti: string;
  expiresAt: Date;
}

function emailTokenLifetime(scope: EmailScope): number {
  return scope === TokenScope.VERIFICATION
    ? env.VERIFICATION_TOKEN_EXPIRE_HOURS * 60 * 60
    : env.RESET_TOKEN_EXPIRE_MINUTES * 60;
}

function createScopedToken(email: string, scope: EmailScope): string {
  return jwt.sign({ scope }, env.JWT_SECRET, {
    subject: email,
    jwtid: uuidv4(),
    algorithm: env.JWT_ALGORITHM,
    expiresIn: emailTokenLifetime(scope),
  });
}

export function createVerificationToken(email: string): string {
  return createScopedToken(email, TokenScope.VERIFICATION);
}

export function createPasswordResetToken(email: string): string {
  return createScopedToken(email, TokenScope.RESET);
}

/**
 * Verifies an emailed token and checks it was issued for `scope`.
 * Any failure, including a token of another scope, is the same 400.
 */
export function decodeScopedToken(token: string, scope: EmailScope): EmailTokenClaims {
  const invalid = () => AppError.badRequest('Invalid or expired token', ErrorCode.TOKEN_INVALID);

  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, env.JWT_SECRET, { algorithms: [env.JWT_ALGORITHM] });
  } catch (error) {
    if (error instanceof jwt.JsonWebTokenError) {
      throw invalid();
    }
    throw error;
  }

  const claims = emailClaimsSchema.safeParse(payload);
  if (!claims.success || claims.data.scope !== scope) {
    throw invalid();
  }

  return {
    email: claims.data.sub,
    jti: claims.data.jti,
    expiresAt: new Date(claims.data.exp * 1000),
  };
}
