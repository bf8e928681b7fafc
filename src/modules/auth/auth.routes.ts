import { Router } from 'express';
import * as authController from './auth.controller.js';
import { validate } from '../../middleware/validate.js';
import { authenticate } from '../../middleware/auth.js';
import { authLimiter, emailLimiter } from '../../middleware/rateLimiter.js';
import {
  signupSchema,
  loginSchema,
  refreshTokenSchema,
  emailOnlySchema,
  resetConfirmSchema,
  changePasswordSchema,
} from './auth.validation.js';

const router = Router();

/**
 * @openapi
 * /auth/signup:
 *   post:
 *     summary: Register a new account and send a verification email
 *     tags: [Auth]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 6 }
 *               role: { type: string, enum: [user, admin] }
 *     responses:
 *       201:
 *         description: Account created
 *       403:
 *         description: Only administrators can create admin accounts
 *       409:
 *         description: Account already exists
 */
router.post('/signup', authLimiter, validate(signupSchema), authController.signup);

/**
 * @openapi
 * /auth/login:
 *   post:
 *     summary: Exchange credentials for an access and refresh token
 *     description: Accepts JSON `email`/`password` or a form-encoded `username`/`password`.
 *     tags: [Auth]
 *     responses:
 *       200:
 *         description: Token pair
 *       401:
 *         description: Incorrect email or password
 *       403:
 *         description: Email not verified
 *       429:
 *         description: Too many attempts
 */
router.post('/login', authLimiter, validate(loginSchema), authController.login);

/**
 * @openapi
 * /auth/refresh:
 *   post:
 *     summary: Rotate a refresh token
 *     tags: [Auth]
 *     responses:
 *       200:
 *         description: New token pair
 *       401:
 *         description: Invalid, expired or reused refresh token
 */
router.post('/refresh', validate(refreshTokenSchema), authController.refresh);

/**
 * @openapi
 * /auth/logout:
 *   post:
 *     summary: Revoke the session a refresh token belongs to
 *     tags: [Auth]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Logged out
 */
router.post('/logout', authenticate, validate(refreshTokenSchema), authController.logout);

/**
 * @openapi
 * /auth/verify:
 *   get:
 *     summary: Confirm an email address from the emailed link
 *     tags: [Auth]
 *     parameters:
 *       - in: query
 *         name: token
 *         required: true
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: Email verified (or already verified)
 *       400:
 *         description: Invalid or expired token
 *   post:
 *     summary: Send the verification email again
 *     tags: [Auth]
 *     responses:
 *       200:
 *         description: Email sent
 *       404:
 *         description: User not found
 */
router.get('/verify', authController.verifyEmail);
router.post('/verify', emailLimiter, validate(emailOnlySchema), authController.resendVerification);

/**
 * @openapi
 * /auth/password/reset:
 *   post:
 *     summary: Email a password reset link
 *     tags: [Auth]
 *     responses:
 *       200:
 *         description: Email sent
 *       404:
 *         description: User not found
 */
router.post('/password/reset', emailLimiter, validate(emailOnlySchema), authController.requestPasswordReset);

/**
 * @openapi
 * /auth/password/reset/confirm:
 *   post:
 *     summary: Set a new password using a reset token
 *     tags: [Auth]
 *     responses:
 *       200:
 *         description: Password reset
 *       400:
 *         description: Invalid, expired or already used token
 */
router.post('/password/reset/confirm', validate(resetConfirmSchema), authController.confirmPasswordReset);

/**
 * @openapi
 * /auth/password/change:
 *   post:
 *     summary: Change the password of the current user
 *     tags: [Auth]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Password changed
 *       400:
 *         description: Current password is incorrect
 */
router.post('/password/change', authenticate, validate(changePasswordSchema), authController.changePassword);

export default router;
