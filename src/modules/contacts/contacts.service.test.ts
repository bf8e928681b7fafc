import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createUser, resetState } from '../../test/helpers.js';
import type { MemoryRepositories } from '../../test/memoryRepositories.js';
import type { UserRecord } from '../../repositories/index.js';
import { createContact, updateContact } from './contacts.service.js';

const kim = { firstName: 'Kim', lastName: 'Lee', email: 'kim@example.com' };

describe('contacts service', () => {
  let repos: MemoryRepositories;
  let owner: UserRecord;

  beforeEach(async () => {
    ({ repos } = resetState());
    owner = await createUser(repos);
  });

  it('reports a concurrent duplicate create as an existing contact', async () => {
    const results = await Promise.allSettled([createContact(owner.id, kim), createContact(owner.id, kim)]);

    expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
    const reasons = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
    expect(reasons[0]).toMatchObject({
      statusCode: 409,
      code: 'DUPLICATE_ENTRY',
      message: 'Contact already exists',
    });
    expect(repos.contacts.rows.size).toBe(1);
  });

  it('reports a unique index violation on update as an existing contact', async () => {
    await createContact(owner.id, kim);
    const other = await createContact(owner.id, { ...kim, email: 'lee@example.com' });

    // Skip the existence check so only the index can object
    vi.spyOn(repos.contacts, 'existsWithEmail').mockResolvedValue(false);

    await expect(updateContact(owner.id, other.id, { email: 'kim@example.com' })).rejects.toMatchObject({
      statusCode: 409,
      message: 'Contact already exists',
    });

    expect((await repos.contacts.findOwned(other.id, owner.id))?.email).toBe('lee@example.com');
  });
});
