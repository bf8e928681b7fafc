import request from 'supertest';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import app from '../../app.js';
import { deleteFile, generateUploadUrl, verifyFileExists } from '../../services/storage.service.js';
import { bearer, createUser, resetState } from '../../test/helpers.js';
import type { MemoryRepositories } from '../../test/memoryRepositories.js';
import type { UserRecord } from '../../repositories/index.js';
import { AppError } from '../../utils/appError.js';
import { Role } from '../../utils/constants.js';

const CDN = 'https://cdn.example.test/';

vi.mock('../../services/storage.service.js', () => ({
  StorageFolders: { AVATARS: 'avatars' },
  generateUploadUrl: vi.fn(),
  verifyFileExists: vi.fn(),
  deleteFile: vi.fn(),
  publicUrl: (key: string) => `https://cdn.example.test/${key}`,
  keyFromPublicUrl: (url: string) =>
    url.startsWith('https://cdn.example.test/') ? url.slice('https://cdn.example.test/'.length) : null,
}));

describe('users routes', () => {
  let repos: MemoryRepositories;
  let user: UserRecord;
  let admin: UserRecord;

  beforeEach(async () => {
    ({ repos } = resetState());
    user = await createUser(repos, { email: 'user@example.com' });
    admin = await createUser(repos, { email: 'admin@example.com', role: Role.ADMIN });
  });

  describe('GET /users/me', () => {
    it('returns the current user without secrets', async () => {
      const res = await request(app).get('/users/me').set('Authorization', bearer(user));
      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({
        id: user.id,
        email: 'user@example.com',
        role: 'user',
        isVerified: true,
        avatarUrl: null,
      });
    });

    it('rejects a malformed token', async () => {
      const res = await request(app).get('/users/me').set('Authorization', 'Bearer not-a-token');
      expect(res.status).toBe(401);
      expect(res.body.error.code).toBe('TOKEN_INVALID');
    });

    it('allows five profile reads per minute', async () => {
      for (let i = 0; i < 5; i += 1) {
        expect((await request(app).get('/users/me').set('Authorization', bearer(user))).status).toBe(200);
      }
      const sixth = await request(app).get('/users/me').set('Authorization', bearer(user));
      expect(sixth.status).toBe(429);

      // Limits are per account
      const other = await request(app).get('/users/me').set('Authorization', bearer(admin));
      expect(other.status).toBe(200);
    });
  });

  describe('avatar', () => {
    it('is reserved for administrators', async () => {
      const uploadUrl = await request(app)
        .post('/users/avatar/upload-url')
        .set('Authorization', bearer(user))
        .send({ filename: 'me.png', contentType: 'image/png' });
      expect(uploadUrl.status).toBe(403);
      expect(uploadUrl.body.error.message).toBe('Only administrators can change avatars');

      const update = await request(app)
        .put('/users/avatar')
        .set('Authorization', bearer(user))
        .send({ key: 'avatars/abc.png' });
      expect(update.status).toBe(403);
      expect(vi.mocked(verifyFileExists)).not.toHaveBeenCalled();
    });

    it('hands out a presigned upload URL', async () => {
      vi.mocked(generateUploadUrl).mockResolvedValue({
        uploadUrl: 'https://storage.test/signed-upload',
        key: 'avatars/abc.png',
      });

      const res = await request(app)
        .post('/users/avatar/upload-url')
        .set('Authorization', bearer(admin))
        .send({ filename: 'me.png', contentType: 'image/png' });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ uploadUrl: 'https://storage.test/signed-upload', key: 'avatars/abc.png' });
      expect(vi.mocked(generateUploadUrl)).toHaveBeenCalledWith('avatars', 'me.png', 'image/png');
    });

    it('rejects non-image content types', async () => {
      const res = await request(app)
        .post('/users/avatar/upload-url')
        .set('Authorization', bearer(admin))
        .send({ filename: 'me.pdf', contentType: 'application/pdf' });
      expect(res.status).toBe(400);
    });

    it('stores the public URL of an uploaded object and replaces the old one', async () => {
      vi.mocked(verifyFileExists).mockResolvedValue(true);

      const first = await request(app)
        .put('/users/avatar')
        .set('Authorization', bearer(admin))
        .send({ key: 'avatars/abc.png' });
      expect(first.status).toBe(200);
      expect(first.body.data.avatarUrl).toBe(`${CDN}avatars/abc.png`);

      const me = await request(app).get('/users/me').set('Authorization', bearer(admin));
      expect(me.body.data.avatarUrl).toBe(`${CDN}avatars/abc.png`);

      await request(app).put('/users/avatar').set('Authorization', bearer(admin)).send({ key: 'avatars/def.png' });
      expect(vi.mocked(deleteFile)).toHaveBeenCalledWith('avatars/abc.png');
    });

    it('keeps an object that another user still points at', async () => {
      vi.mocked(verifyFileExists).mockResolvedValue(true);
      const other = await createUser(repos, { email: 'second-admin@example.com', role: Role.ADMIN });
      const setAvatar = (actor: UserRecord, key: string) =>
        request(app).put('/users/avatar').set('Authorization', bearer(actor)).send({ key });

      await setAvatar(admin, 'avatars/shared.png');
      await setAvatar(other, 'avatars/shared.png');

      expect((await setAvatar(admin, 'avatars/own.png')).status).toBe(200);
      expect(vi.mocked(deleteFile)).not.toHaveBeenCalled();

      expect((await setAvatar(other, 'avatars/other.png')).status).toBe(200);
      expect(vi.mocked(deleteFile)).toHaveBeenCalledTimes(1);
      expect(vi.mocked(deleteFile)).toHaveBeenCalledWith('avatars/shared.png');
    });

    it('requires the object to exist', async () => {
      vi.mocked(verifyFileExists).mockResolvedValue(false);

      const res = await request(app)
        .put('/users/avatar')
        .set('Authorization', bearer(admin))
        .send({ key: 'avatars/missing.png' });
      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Uploaded file not found. Please upload first.');
    });

    it('only accepts keys in the avatar folder', async () => {
      const res = await request(app)
        .put('/users/avatar')
        .set('Authorization', bearer(admin))
        .send({ key: 'other/abc.png' });
      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Invalid avatar key');
    });

    it('reports unconfigured storage as unavailable', async () => {
      vi.mocked(verifyFileExists).mockRejectedValue(AppError.serviceUnavailable('Avatar storage is not configured'));

      const res = await request(app)
        .put('/users/avatar')
        .set('Authorization', bearer(admin))
        .send({ key: 'avatars/abc.png' });
      expect(res.status).toBe(503);
      expect(res.body.error.code).toBe('SERVICE_UNAVAILABLE');
    });
  });

  describe('administration', () => {
    it('lists users for administrators only', async () => {
      const forbidden = await request(app).get('/users').set('Authorization', bearer(user));
      expect(forbidden.status).toBe(403);

      const res = await request(app).get('/users').query({ limit: 1 }).set('Authorization', bearer(admin));
      expect(res.status).toBe(200);
      expect(res.body.data.total).toBe(2);
      expect(res.body.data.items).toHaveLength(1);
    });

    it('changes a role and applies it on the next request', async () => {
      const res = await request(app)
        .patch(`/users/${user.id}/role`)
        .set('Authorization', bearer(admin))
        .send({ role: 'admin' });
      expect(res.status).toBe(200);
      expect(res.body.data.role).toBe('admin');

      const list = await request(app).get('/users').set('Authorization', bearer(user));
      expect(list.status).toBe(200);
    });

    it('validates role changes', async () => {
      const invalid = await request(app)
        .patch(`/users/${user.id}/role`)
        .set('Authorization', bearer(admin))
        .send({ role: 'owner' });
      expect(invalid.status).toBe(400);

      const missing = await request(app)
        .patch('/users/no-such-user/role')
        .set('Authorization', bearer(admin))
        .send({ role: 'user' });
      expect(missing.status).toBe(404);
    });

    it('deletes a user with their contacts and sessions', async () => {
      await repos.contacts.create({
        ownerId: user.id,
        firstName: 'Kim',
        lastName: 'Lee',
        email: 'kim@example.com',
        phone: null,
        birthday: null,
        extra: null,
      });
      await repos.refreshTokens.create({
        userId: user.id,
        tokenHash: 'hash-1',
        family: 'family-1',
        expiresAt: new Date(Date.now() + 60_000),
      });
      // Warm the user cache
      await request(app).get('/users/me').set('Authorization', bearer(user));

      const res = await request(app).delete(`/users/${user.id}`).set('Authorization', bearer(admin));
      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ ok: true });

      expect(repos.contacts.rows.size).toBe(0);
      expect(repos.refreshTokens.rows).toHaveLength(0);
      expect(await repos.users.findById(user.id)).toBeNull();

      const me = await request(app).get('/users/me').set('Authorization', bearer(user));
      expect(me.status).toBe(401);
    });

    it('does not let an administrator delete themself', async () => {
      const res = await request(app).delete(`/users/${admin.id}`).set('Authorization', bearer(admin));
      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Administrators cannot delete their own account');
    });

    it('answers 404 for an unknown user', async () => {
      const res = await request(app).delete('/users/no-such-user').set('Authorization', bearer(admin));
      expect(res.status).toBe(404);
    });
  });
});
