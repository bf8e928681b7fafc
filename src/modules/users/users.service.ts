import { repositories } from '../../repositories/index.js';
import type { Page, UserRecord } from '../../repositories/index.js';
import {
  StorageFolders,
  deleteFile,
  generateUploadUrl,
  keyFromPublicUrl,
  publicUrl,
  verifyFileExists,
} from '../../services/storage.service.js';
import { invalidateUser, type AuthUser } from '../../services/userCache.service.js';
import { AppError } from '../../utils/appError.js';
import { Role } from '../../utils/constants.js';
import { logger } from '../../utils/logger.js';
import type { AvatarUploadUrlInput, ListUsersQuery } from './users.validation.js';

// Removes an avatar object unless another user still points at it
async function releaseAvatar(avatarUrl: string, ownerId: string, keep?: string): Promise<void> {
  const key = keyFromPublicUrl(avatarUrl);
  if (!key || key === keep) return;
  if (await repositories().users.isAvatarInUse(avatarUrl, ownerId)) return;
  await deleteFile(key);
}

function assertAvatarAdmin(actor: AuthUser): void {
  if (actor.role !== Role.ADMIN) {
    throw AppError.forbidden('Only administrators can change avatars');
  }
}

// ── Avatar ──

export async function createAvatarUploadUrl(actor: AuthUser, input: AvatarUploadUrlInput) {
  assertAvatarAdmin(actor);
  return generateUploadUrl(StorageFolders.AVATARS, input.filename, input.contentType);
}

export async function updateAvatar(actor: AuthUser, key: string): Promise<UserRecord> {
  assertAvatarAdmin(actor);
  const { users } = repositories();

  if (!key.startsWith(`${StorageFolders.AVATARS}/`)) {
    throw AppError.badRequest('Invalid avatar key');
  }

  const exists = await verifyFileExists(key);
  if (!exists) {
    throw AppError.badRequest('Uploaded file not found. Please upload first.');
  }

  const current = await users.findById(actor.id);
  if (!current) throw AppError.notFound('User not found');

  const updated = await users.updateAvatar(actor.id, publicUrl(key));
  if (!updated) throw AppError.notFound('User not found');
  await invalidateUser(actor.id);

  if (current.avatarUrl) {
    await releaseAvatar(current.avatarUrl, actor.id, key);
  }

  return updated;
}

// ── Admin User Management ──

export async function listUsers(query: ListUsersQuery): Promise<Page<UserRecord>> {
  return repositories().users.list(query);
}

export async function updateRole(userId: string, role: Role): Promise<UserRecord> {
  const user = await repositories().users.updateRole(userId, role);
  if (!user) throw AppError.notFound('User not found');

  await invalidateUser(userId);
  logger.info('User role changed', { userId, role });
  return user;
}

export async function deleteUser(actorId: string, userId: string): Promise<{ ok: true }> {
  const { users, contacts, refreshTokens } = repositories();

  if (actorId === userId) {
    throw AppError.badRequest('Administrators cannot delete their own account');
  }

  const user = await users.findById(userId);
  if (!user) throw AppError.notFound('User not found');

  const removedContacts = await contacts.deleteAllForOwner(userId);
  await refreshTokens.deleteAllForUser(userId);
  await users.delete(userId);
  await invalidateUser(userId);

  if (user.avatarUrl) {
    await releaseAvatar(user.avatarUrl, userId);
  }

  logger.info('User deleted', { userId, removedContacts });
  return { ok: true };
}
