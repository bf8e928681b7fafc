import { repositories } from '../../repositories/index.js';
import type { ContactRecord } from '../../repositories/index.js';
import { AppError, ErrorCode } from '../../utils/appError.js';
import { isDuplicateKeyError } from '../../utils/helpers.js';
import { selectUpcomingBirthdays } from './contacts.birthdays.js';
import type { CreateContactInput, ListContactsQuery, UpdateContactInput } from './contacts.validation.js';

const contactExists = () => AppError.conflict('Contact already exists', ErrorCode.DUPLICATE_ENTRY);

// The unique (owner, email) index catches what the existence check misses under concurrency
function rethrowDuplicate(error: unknown): never {
  if (isDuplicateKeyError(error)) throw contactExists();
  throw error;
}

export async function createContact(ownerId: string, input: CreateContactInput): Promise<ContactRecord> {
  const { contacts } = repositories();

  if (await contacts.existsWithEmail(ownerId, input.email)) {
    throw contactExists();
  }

  return contacts
    .create({
      ownerId,
      firstName: input.firstName,
      lastName: input.lastName,
      email: input.email,
      phone: input.phone ?? null,
      birthday: input.birthday ?? null,
      extra: input.extra ?? null,
    })
    .catch(rethrowDuplicate);
}

export async function listContacts(ownerId: string, query: ListContactsQuery): Promise<ContactRecord[]> {
  return repositories().contacts.list(ownerId, {
    skip: query.skip,
    limit: query.limit,
    search: query.q || undefined,
  });
}

export async function getContact(ownerId: string, contactId: string): Promise<ContactRecord> {
  const contact = await repositories().contacts.findOwned(contactId, ownerId);
  if (!contact) throw AppError.notFound('Contact not found');
  return contact;
}

export async function updateContact(
  ownerId: string,
  contactId: string,
  changes: UpdateContactInput,
): Promise<ContactRecord> {
  const { contacts } = repositories();
  const existing = await getContact(ownerId, contactId);

  if (
    changes.email &&
    changes.email !== existing.email &&
    (await contacts.existsWithEmail(ownerId, changes.email, contactId))
  ) {
    throw contactExists();
  }

  const updated = await contacts.update(contactId, ownerId, changes).catch(rethrowDuplicate);
  if (!updated) throw AppError.notFound('Contact not found');
  return updated;
}

export async function deleteContact(ownerId: string, contactId: string): Promise<{ ok: true }> {
  const deleted = await repositories().contacts.delete(contactId, ownerId);
  if (!deleted) throw AppError.notFound('Contact not found');
  return { ok: true };
}

export async function upcomingBirthdays(
  ownerId: string,
  days: number,
  today: Date = new Date(),
): Promise<ContactRecord[]> {
  const withBirthday = await repositories().contacts.listWithBirthday(ownerId);
  return selectUpcomingBirthdays(withBirthday, days, today);
}
