import { v4 as uuidv4 } from 'uuid';
import { env } from '../../config/env.js';
import { repositories } from '../../repositories/index.js';
import type { UserRecord } from '../../repositories/index.js';
import { getCache } from '../../services/cache.service.js';
import { cacheUser, invalidateUser, type AuthUser } from '../../services/userCache.service.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { CacheKeys, Role, TokenScope } from '../../utils/constants.js';
import { generateOpaqueToken, hashToken, joinUrl } from '../../utils/helpers.js';
import { logger } from '../../utils/logger.js';
import { sendPasswordResetEmail, sendVerificationEmail } from '../notifications/email.service.js';
import {
  createAccessToken,
  createPasswordResetToken,
  createVerificationToken,
  decodeScopedToken,
  hashPassword,
  verifyPassword,
} from './auth.tokens.js';
import type {
  SignupInput,
  LoginInput,
  ResetConfirmInput,
  ChangePasswordInput,
} from './auth.validation.js';

export interface RequestMeta {
  ip?: string;
  userAgent?: string;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
}

// ── Helpers ──

function apiLink(path: string, token: string): string {
  const url = joinUrl(env.BASE_URL, `${env.API_PREFIX}${path}`);
  return `${url}?token=${encodeURIComponent(token)}`;
}

async function storeRefreshToken(
  userId: string,
  tokenHash: string,
  family: string,
  meta: RequestMeta,
): Promise<void> {
  await repositories().refreshTokens.create({
    userId,
    tokenHash,
    family,
    expiresAt: new Date(Date.now() + env.REFRESH_TOKEN_EXPIRE_MINUTES * 60 * 1000),
    userAgent: meta.userAgent,
    ipAddress: meta.ip,
  });
}

async function rejectReuse(family: string, userId: string): Promise<never> {
  const revoked = await repositories().refreshTokens.revokeFamily(family);
  logger.warn('Refresh token reuse detected, family revoked', { userId, family, revoked });
  throw AppError.unauthorized('Refresh token has already been used', ErrorCode.TOKEN_REUSED);
}

// ── Service Methods ──

export async function signup(input: SignupInput, actor?: AuthUser): Promise<UserRecord> {
  const { users } = repositories();
  const role = input.role ?? Role.USER;

  if (role === Role.ADMIN && actor?.role !== Role.ADMIN) {
    throw AppError.forbidden('Only administrators can create admin accounts');
  }

  const existing = await users.findByEmail(input.email);
  if (existing) {
    throw AppError.conflict('Account already exists', ErrorCode.DUPLICATE_ENTRY);
  }

  const user = await users.create({
    email: input.email,
    password: await hashPassword(input.password),
    role,
  });

  await sendVerificationEmail(user.email, apiLink('/auth/verify', createVerificationToken(user.email)));
  logger.info('User signed up', { userId: user.id, role: user.role });

  return user;
}

export async function login(input: LoginInput, meta: RequestMeta): Promise<TokenPair> {
  const user = await repositories().users.findByEmailWithPassword(input.email);
  if (!user || !(await verifyPassword(input.password, user.password))) {
    throw AppError.unauthorized('Incorrect email or password', ErrorCode.INVALID_CREDENTIALS);
  }

  if (!user.isVerified) {
    throw AppError.forbidden('Email not verified', ErrorCode.EMAIL_NOT_VERIFIED);
  }

  await cacheUser(user);

  const refreshToken = generateOpaqueToken();
  await storeRefreshToken(user.id, hashToken(refreshToken), uuidv4(), meta);

  return { accessToken: createAccessToken(user), refreshToken, tokenType: 'bearer' };
}

/**
 * Exchanges a refresh token for a new pair. The presented token is revoked and
 * linked to its successor; presenting a revoked token again revokes the family.
 */
export async function refresh(refreshToken: string, meta: RequestMeta): Promise<TokenPair> {
  const { users, refreshTokens } = repositories();
  const tokenHash = hashToken(refreshToken);

  const record = await refreshTokens.findByHash(tokenHash);
  if (!record) {
    throw AppError.unauthorized('Invalid refresh token', ErrorCode.TOKEN_INVALID);
  }

  if (record.revokedAt) {
    return rejectReuse(record.family, record.userId);
  }

  if (record.expiresAt.getTime() <= Date.now()) {
    await refreshTokens.revoke(tokenHash);
    throw AppError.unauthorized('Refresh token expired', ErrorCode.TOKEN_EXPIRED);
  }

  const user = await users.findById(record.userId);
  if (!user) {
    await refreshTokens.revokeFamily(record.family);
    throw AppError.notFound('User not found');
  }

  const successor = generateOpaqueToken();
  const successorHash = hashToken(successor);

  // The successor joins the family before the rotation, so a concurrent refresh
  // that loses the conditional revoke below also revokes the winner's token.
  await storeRefreshToken(user.id, successorHash, record.family, meta);

  const rotated = await refreshTokens.revoke(tokenHash, successorHash);
  if (!rotated) {
    return rejectReuse(record.family, record.userId);
  }

  return { accessToken: createAccessToken(user), refreshToken: successor, tokenType: 'bearer' };
}

export async function logout(userId: string, refreshToken: string): Promise<{ message: string }> {
  const { refreshTokens } = repositories();
  const record = await refreshTokens.findByHash(hashToken(refreshToken));

  if (record && record.userId === userId) {
    await refreshTokens.revokeFamily(record.family);
  }

  return { message: 'Logged out successfully' };
}

export async function verifyEmail(token: string): Promise<{ message: string }> {
  const { users } = repositories();
  const { email } = decodeScopedToken(token, TokenScope.VERIFICATION);

  const user = await users.findByEmail(email);
  if (!user) throw AppError.notFound('User not found');

  if (user.isVerified) {
    return { message: 'Email already verified' };
  }

  await users.markVerified(user.id);
  await invalidateUser(user.id);
  logger.info('Email verified', { userId: user.id });

  return { message: 'Email verified successfully' };
}

export async function resendVerification(email: string): Promise<{ message: string }> {
  const user = await repositories().users.findByEmail(email);
  if (!user) throw AppError.notFound('User not found');

  if (user.isVerified) {
    return { message: 'Email already verified' };
  }

  await sendVerificationEmail(user.email, apiLink('/auth/verify', createVerificationToken(user.email)));
  return { message: 'Check your email for confirmation' };
}

export async function requestPasswordReset(email: string): Promise<{ message: string }> {
  const user = await repositories().users.findByEmail(email);
  if (!user) throw AppError.notFound('User not found');

  await sendPasswordResetEmail(
    user.email,
    apiLink('/auth/password/reset/confirm', createPasswordResetToken(user.email)),
  );
  return { message: 'Check your email for password reset instructions' };
}

export async function confirmPasswordReset(input: ResetConfirmInput): Promise<{ message: string }> {
  const { users, refreshTokens } = repositories();
  const { email, jti, expiresAt } = decodeScopedToken(input.token, TokenScope.RESET);

  const user = await users.findByEmail(email);
  if (!user) throw AppError.notFound('User not found');

  // Burn the token id for as long as the token would stay valid; the counter
  // makes two concurrent confirmations produce a single winner.
  const { count } = await getCache().increment(
    CacheKeys.usedResetToken(jti),
    Math.max(expiresAt.getTime() - Date.now(), 1000),
  );
  if (count > 1) {
    throw AppError.badRequest('Invalid or expired token', ErrorCode.TOKEN_INVALID);
  }

  await users.updatePassword(user.id, await hashPassword(input.newPassword));
  await refreshTokens.revokeAllForUser(user.id);
  await invalidateUser(user.id);
  logger.info('Password reset', { userId: user.id });

  return { message: 'Password has been reset successfully' };
}

export async function changePassword(
  userId: string,
  input: ChangePasswordInput,
): Promise<{ message: string }> {
  const { users, refreshTokens } = repositories();

  const user = await users.findByIdWithPassword(userId);
  if (!user) throw AppError.notFound('User not found');

  const isMatch = await verifyPassword(input.currentPassword, user.password);
  if (!isMatch) {
    throw AppError.badRequest('Current password is incorrect', ErrorCode.INVALID_CREDENTIALS);
  }

  await users.updatePassword(user.id, await hashPassword(input.newPassword));
  await refreshTokens.revokeAllForUser(user.id);
  await invalidateUser(user.id);

  return { message: 'Password changed successfully' };
}
