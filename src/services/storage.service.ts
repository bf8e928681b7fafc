import { v4 as uuidv4 } from 'uuid';
import { PutObjectCommand, HeadObjectCommand, DeleteObjectCommand, NotFound } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { storageClient } from '../config/storage.js';
import { env, isStorageConfigured } from '../config/env.js';
import { AppError, ErrorCode } from '../utils/appError.js';
import { getFileExtension, isAllowedAvatarType, joinUrl } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';

const UPLOAD_EXPIRY = 15 * 60; // 15 minutes

export const StorageFolders = {
  AVATARS: 'avatars',
} as const;

function assertConfigured(): void {
  if (!isStorageConfigured) {
    throw AppError.serviceUnavailable('Avatar storage is not configured');
  }
}

// ── Generate Upload Signed URL ──

export async function generateUploadUrl(
  folder: string,
  filename: string,
  contentType: string,
): Promise<{ uploadUrl: string; key: string }> {
  assertConfigured();

  if (!isAllowedAvatarType(filename)) {
    throw AppError.badRequest('File type not allowed', ErrorCode.VALIDATION_ERROR);
  }

  const ext = getFileExtension(filename);
  const key = `${folder}/${uuidv4()}.${ext}`;

  const command = new PutObjectCommand({
    Bucket: env.STORAGE_BUCKET,
    Key: key,
    ContentType: contentType,
  });

  const uploadUrl = await getSignedUrl(storageClient, command, {
    expiresIn: UPLOAD_EXPIRY,
  });

  return { uploadUrl, key };
}

// ── Verify File Exists (HEAD) ──

export async function verifyFileExists(key: string): Promise<boolean> {
  assertConfigured();
  try {
    await storageClient.send(new HeadObjectCommand({
      Bucket: env.STORAGE_BUCKET,
      Key: key,
    }));
    return true;
  } catch (error) {
    if (error instanceof NotFound) {
      return false;
    }
    throw error;
  }
}

// ── Delete File ──

export async function deleteFile(key: string): Promise<void> {
  try {
    await storageClient.send(new DeleteObjectCommand({
      Bucket: env.STORAGE_BUCKET,
      Key: key,
    }));
  } catch (error) {
    logger.error(`Failed to delete storage object: ${key}`, error);
  }
}

export function publicUrl(key: string): string {
  assertConfigured();
  return joinUrl(env.STORAGE_PUBLIC_URL, key);
}

/**
 * Inverse of publicUrl; null when the URL does not point into our bucket.
 */
export function keyFromPublicUrl(url: string): string | null {
  if (!env.STORAGE_PUBLIC_URL) return null;
  const prefix = joinUrl(env.STORAGE_PUBLIC_URL, '');
  return url.startsWith(prefix) ? url.slice(prefix.length) : null;
}
