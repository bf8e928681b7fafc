import { z } from 'zod';
import { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT, Role } from '../../utils/constants.js';

export const listUsersQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_LIMIT).default(DEFAULT_PAGE_LIMIT),
});

export const updateRoleSchema = z.object({
  role: z.nativeEnum(Role),
});

export const avatarUploadUrlSchema = z.object({
  filename: z.string().trim().min(1).max(255),
  contentType: z.string().regex(/^image\/[a-z0-9.+-]+$/i, 'Must be an image content type'),
});

export const updateAvatarSchema = z.object({
  key: z.string().trim().min(1),
});

export type ListUsersQuery = z.infer<typeof listUsersQuerySchema>;
export type AvatarUploadUrlInput = z.infer<typeof avatarUploadUrlSchema>;
