import crypto from 'crypto';

/**
 * Generate an opaque refresh token (64 random bytes, hex encoded).
 */
export function generateOpaqueToken(bytes = 64): string {
  return crypto.randomBytes(bytes).toString('hex');
}

/**
 * SHA-256 digest used to store tokens without keeping the raw value.
 */
export function hashToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

export function hasProperty<K extends string>(value: unknown, key: K): value is Record<K, unknown> {
  return typeof value === 'object' && value !== null && key in value;
}

/**
 * MongoDB unique index violation (E11000).
 */
export function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof Error && error.name === 'MongoServerError' && hasProperty(error, 'code') && error.code === 11000;
}

/**
 * Escape a user-provided string for use inside a RegExp.
 */
export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Allowed avatar upload extensions
 */
export const ALLOWED_AVATAR_EXTENSIONS = ['jpg', 'jpeg', 'png', 'webp'] as const;

/**
 * Get file extension from filename
 */
export function getFileExtension(filename: string): string {
  return filename.split('.').pop()?.toLowerCase() ?? '';
}

/**
 * Validate avatar file type
 */
export function isAllowedAvatarType(filename: string): boolean {
  const ext = getFileExtension(filename);
  return ALLOWED_AVATAR_EXTENSIONS.some((allowed) => allowed === ext);
}

/**
 * Join a base URL and a path without doubling the slash.
 */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
