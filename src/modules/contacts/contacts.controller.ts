import { Request, Response } from 'express';
import { asyncHandler } from '../../utils/asyncHandler.js';
import { requireUser } from '../../middleware/auth.js';
import { parseWith } from '../../middleware/validate.js';
import * as contactsService from './contacts.service.js';
import { listContactsQuerySchema, upcomingBirthdaysQuerySchema } from './contacts.validation.js';

export const createContact = asyncHandler(async (req: Request, res: Response) => {
  const result = await contactsService.createContact(requireUser(req).id, req.body);
  res.status(201).json({ success: true, data: result });
});

export const listContacts = asyncHandler(async (req: Request, res: Response) => {
  const query = parseWith(listContactsQuerySchema, req.query);
  const result = await contactsService.listContacts(requireUser(req).id, query);
  res.json({ success: true, data: result });
});

export const upcomingBirthdays = asyncHandler(async (req: Request, res: Response) => {
  const { days } = parseWith(upcomingBirthdaysQuerySchema, req.query);
  const result = await contactsService.upcomingBirthdays(requireUser(req).id, days);
  res.json({ success: true, data: result });
});

export const getContact = asyncHandler(async (req: Request, res: Response) => {
  const result = await contactsService.getContact(requireUser(req).id, req.params.id);
  res.json({ success: true, data: result });
});

export const updateContact = asyncHandler(async (req: Request, res: Response) => {
  const result = await contactsService.updateContact(requireUser(req).id, req.params.id, req.body);
  res.json({ success: true, data: result });
});

export const deleteContact = asyncHandler(async (req: Request, res: Response) => {
  const result = await contactsService.deleteContact(requireUser(req).id, req.params.id);
  res.json({ success: true, data: result });
});
