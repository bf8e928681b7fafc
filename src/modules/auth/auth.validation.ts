import { z } from 'zod';
import { Role } from '../../utils/constants.js';

const email = z.string().trim().toLowerCase().email('Invalid email address');

const password = z
  .string()
  .min(6, 'Password must be at least 6 characters')
  .max(128, 'Password must be at most 128 characters');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export const signupSchema = z.object({
  email,
  password,
  role: z.nativeEnum(Role).optional(),
});

// OAuth2 password-form clients send `username`; JSON clients send `email`
export const loginSchema = z.preprocess(
  (value) =>
    isRecord(value) && value.email === undefined && value.username !== undefined
      ? { ...value, email: value.username }
      : value,
  z.object({
    email,
    password: z.string().min(1, 'Password is required'),
  }),
);

export const refreshTokenSchema = z.object({
  refreshToken: z.string().min(1, 'Refresh token is required'),
});

export const verifyQuerySchema = z.object({
  token: z.string().min(1, 'Token is required'),
});

export const emailOnlySchema = z.object({
  email,
});

export const resetConfirmSchema = z.object({
  token: z.string().min(1, 'Token is required'),
  newPassword: password,
});

export const changePasswordSchema = z.object({
  currentPassword: z.string().min(1),
  newPassword: password,
});

export type SignupInput = z.infer<typeof signupSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type RefreshTokenInput = z.infer<typeof refreshTokenSchema>;
export type EmailOnlyInput = z.infer<typeof emailOnlySchema>;
export type ResetConfirmInput = z.infer<typeof resetConfirmSchema>;
export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
