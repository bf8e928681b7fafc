import { Router } from 'express';
import * as usersController from './users.controller.js';
import { authenticate } from '../../middleware/auth.js';
import { authorize } from '../../middleware/rbac.js';
import { validate } from '../../middleware/validate.js';
import { profileLimiter } from '../../middleware/rateLimiter.js';
import { Role } from '../../utils/constants.js';
import { avatarUploadUrlSchema, updateAvatarSchema, updateRoleSchema } from './users.validation.js';

const router = Router();

// ── Profile (any authenticated user) ──

/**
 * @openapi
 * /users/me:
 *   get:
 *     summary: Current user
 *     tags: [Users]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: The authenticated user
 *       429:
 *         description: Too many requests
 */
router.get('/me', authenticate, profileLimiter, usersController.me);

/**
 * @openapi
 * /users/avatar/upload-url:
 *   post:
 *     summary: Presigned URL for uploading an avatar image (administrators only)
 *     tags: [Users]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Upload URL and object key
 *       403:
 *         description: Only administrators can change avatars
 *       503:
 *         description: Avatar storage is not configured
 * /users/avatar:
 *   put:
 *     summary: Set the avatar from an uploaded object (administrators only)
 *     tags: [Users]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Updated user
 *       400:
 *         description: Uploaded file not found
 *       403:
 *         description: Only administrators can change avatars
 */
router.post(
  '/avatar/upload-url',
  authenticate,
  validate(avatarUploadUrlSchema),
  usersController.createAvatarUploadUrl,
);
router.put('/avatar', authenticate, validate(updateAvatarSchema), usersController.updateAvatar);

// ── Admin User Management ──

/**
 * @openapi
 * /users:
 *   get:
 *     summary: List users (administrators only)
 *     tags: [Users]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: query
 *         name: skip
 *         schema: { type: integer, minimum: 0, default: 0 }
 *       - in: query
 *         name: limit
 *         schema: { type: integer, minimum: 1, maximum: 100, default: 100 }
 *     responses:
 *       200:
 *         description: Page of users
 */
router.get('/', authenticate, authorize(Role.ADMIN), usersController.listUsers);

/**
 * @openapi
 * /users/{id}/role:
 *   patch:
 *     summary: Change a user's role (administrators only)
 *     tags: [Users]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Updated user
 *       404:
 *         description: User not found
 * /users/{id}:
 *   delete:
 *     summary: Delete a user with their contacts and sessions (administrators only)
 *     tags: [Users]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Deleted
 *       400:
 *         description: Administrators cannot delete their own account
 */
router.patch(
  '/:id/role',
  authenticate,
  authorize(Role.ADMIN),
  validate(updateRoleSchema),
  usersController.updateRole,
);
router.delete('/:id', authenticate, authorize(Role.ADMIN), usersController.deleteUser);

export default router;
