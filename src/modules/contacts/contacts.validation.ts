import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';
import {
  DEFAULT_BIRTHDAY_WINDOW_DAYS,
  DEFAULT_PAGE_LIMIT,
  MAX_BIRTHDAY_WINDOW_DAYS,
  MAX_PAGE_LIMIT,
} from '../../utils/constants.js';

const name = z.string().trim().min(1).max(100);

const birthday = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Birthday must be in YYYY-MM-DD format')
  .refine((value) => isValid(parseISO(value)), 'Birthday is not a valid date');

const contactFields = z.object({
  firstName: name,
  lastName: name,
  email: z.string().trim().toLowerCase().email('Invalid email address'),
  phone: z.string().trim().max(50).nullable().optional(),
  birthday: birthday.nullable().optional(),
  extra: z.string().max(500).nullable().optional(),
});

export const createContactSchema = contactFields;

export const updateContactSchema = contactFields
  .partial()
  .refine((changes) => Object.keys(changes).length > 0, 'At least one field must be provided');

export const listContactsQuerySchema = z.object({
  q: z.string().trim().max(100).optional(),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_LIMIT).default(DEFAULT_PAGE_LIMIT),
});

export const upcomingBirthdaysQuerySchema = z.object({
  days: z.coerce
    .number()
    .int()
    .min(0)
    .max(MAX_BIRTHDAY_WINDOW_DAYS)
    .default(DEFAULT_BIRTHDAY_WINDOW_DAYS),
});

export type CreateContactInput = z.infer<typeof createContactSchema>;
export type UpdateContactInput = z.infer<typeof updateContactSchema>;
export type ListContactsQuery = z.infer<typeof listContactsQuerySchema>;
