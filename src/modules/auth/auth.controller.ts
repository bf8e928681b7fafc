import { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { requireUser } from '../../middleware/auth.js';
import { parseWith } from '../../middleware/validate.js';
import * as authService from './auth.service.js';
import { verifyQuerySchema } from './auth.validation.js';

const requestMeta = (req: Request): authService.RequestMeta => ({
  ip: req.ip,
  userAgent: req.headers['user-agent'],
});

export const signup = asyncHandler(async (req: Request, res: Response) => {
  const user = await authService.signup(req.body, req.user);
  res.status(201).json({ success: true, data: user });
});

export const login = asyncHandler(async (req: Request, res: Response) => {
  const tokens = await authService.login(req.body, requestMeta(req));
  res.json({ success: true, data: tokens });
});

export const refresh = asyncHandler(async (req: Request, res: Response) => {
  const tokens = await authService.refresh(req.body.refreshToken, requestMeta(req));
  res.json({ success: true, data: tokens });
});

export const logout = asyncHandler(async (req: Request, res: Response) => {
  const result = await authService.logout(requireUser(req).id, req.body.refreshToken);
  res.json({ success: true, data: result });
});

export const verifyEmail = asyncHandler(async (req: Request, res: Response) => {
  const { token } = parseWith(verifyQuerySchema, req.query);
  const result = await authService.verifyEmail(token);
  res.json({ success: true, data: result });
});

export const resendVerification = asyncHandler(async (req: Request, res: Response) => {
  const result = await authService.resendVerification(req.body.email);
  res.json({ success: true, data: result });
});

export const requestPasswordReset = asyncHandler(async (req: Request, res: Response) => {
  const result = await authService.requestPasswordReset(req.body.email);
  res.json({ success: true, data: result });
});

export const confirmPasswordReset = asyncHandler(async (req: Request, res: Response) => {
  const result = await authService.confirmPasswordReset(req.body);
  res.json({ success: true, data: result });
});

export const changePassword = asyncHandler(async (req: Request, res: Response) => {
  const result = await authService.changePassword(requireUser(req).id, req.body);
  res.json({ success: true, data: result });
});
