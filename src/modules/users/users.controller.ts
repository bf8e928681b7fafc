import { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { requireUser } from '../../middleware/auth.js';
import { parseWith } from '../../middleware/validate.js';
import * as usersService from './users.service.js';
import { listUsersQuerySchema } from './users.validation.js';

export const me = asyncHandler(async (req: Request, res: Response) => {
  res.json({ success: true, data: requireUser(req) });
});

export const createAvatarUploadUrl = asyncHandler(async (req: Request, res: Response) => {
  const result = await usersService.createAvatarUploadUrl(requireUser(req), req.body);
  res.json({ success: true, data: result });
});

export const updateAvatar = asyncHandler(async (req: Request, res: Response) => {
  const result = await usersService.updateAvatar(requireUser(req), req.body.key);
  res.json({ success: true, data: result });
});

export const listUsers = asyncHandler(async (req: Request, res: Response) => {
  const result = await usersService.listUsers(parseWith(listUsersQuerySchema, req.query));
  res.json({ success: true, data: result });
});

export const updateRole = asyncHandler(async (req: Request, res: Response) => {
  const result = await usersService.updateRole(req.params.id, req.body.role);
  res.json({ success: true, data: result });
});

export const deleteUser = asyncHandler(async (req: Request, res: Response) => {
  const result = await usersService.deleteUser(requireUser(req).id, req.params.id);
  res.json({ success: true, data: result });
});
