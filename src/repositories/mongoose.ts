import mongoose, { type FilterQuery } from 'mongoose';
import { User, Contact, RefreshToken, EmailLog } from '../models/index.js';
import type { IUser, IContact, IRefreshToken, IEmailLog } from '../models/index.js';
import { EmailLogStatus } from '../utils/constants.js';
import { escapeRegex } from '../utils/helpers.js';
import type {
  ContactRecord,
  ContactRepository,
  EmailLogRecord,
  EmailLogRepository,
  RefreshTokenRecord,
  RefreshTokenRepository,
  Repositories,
  UserRecord,
  UserRepository,
  UserWithPassword,
} from './types.js';

// Malformed ids would make Mongoose throw a CastError; treat them as "not found".
const isId = (id: string): boolean => mongoose.isObjectIdOrHexString(id);

// ── Mappers ──

function toUserRecord(doc: IUser): UserRecord {
  return {
    id: doc._id.toString(),
    email: doc.email,
    role: doc.role,
    isVerified: doc.isVerified,
    avatarUrl: doc.avatarUrl ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toUserWithPassword(doc: IUser): UserWithPassword {
  return { ...toUserRecord(doc), password: doc.password };
}

function toContactRecord(doc: IContact): ContactRecord {
  return {
    id: doc._id.toString(),
    ownerId: doc.ownerId.toString(),
    firstName: doc.firstName,
    lastName: doc.lastName,
    email: doc.email,
    phone: doc.phone ?? null,
    birthday: doc.birthday ?? null,
    extra: doc.extra ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toRefreshTokenRecord(doc: IRefreshToken): RefreshTokenRecord {
  return {
    id: doc._id.toString(),
    userId: doc.userId.toString(),
    tokenHash: doc.tokenHash,
    family: doc.family,
    replacedBy: doc.replacedBy ?? null,
    revokedAt: doc.revokedAt ?? null,
    userAgent: doc.userAgent,
    ipAddress: doc.ipAddress,
    expiresAt: doc.expiresAt,
    createdAt: doc.createdAt,
  };
}

function toEmailLogRecord(doc: IEmailLog): EmailLogRecord {
  return {
    id: doc._id.toString(),
    to: doc.to,
    subject: doc.subject,
    template: doc.template,
    data: Object.fromEntries(doc.data ?? new Map<string, string>()),
    status: doc.status,
    attempts: doc.attempts,
    lastAttemptAt: doc.lastAttemptAt ?? null,
    nextRetryAt: doc.nextRetryAt ?? null,
    errorMessage: doc.errorMessage ?? null,
    createdAt: doc.createdAt,
  };
}

// ── Users ──

const users: UserRepository = {
  async create(input) {
    const doc = await User.create({
      email: input.email,
      password: input.password,
      role: input.role,
      isVerified: input.isVerified ?? false,
    });
    return toUserRecord(doc);
  },

  async findById(id) {
    if (!isId(id)) return null;
    const doc = await User.findById(id);
    return doc ? toUserRecord(doc) : null;
  },

  async findByEmail(email) {
    const doc = await User.findOne({ email: email.toLowerCase() });
    return doc ? toUserRecord(doc) : null;
  },

  async findByIdWithPassword(id) {
    if (!isId(id)) return null;
    const doc = await User.findById(id).select('+password');
    return doc ? toUserWithPassword(doc) : null;
  },

  async findByEmailWithPassword(email) {
    const doc = await User.findOne({ email: email.toLowerCase() }).select('+password');
    return doc ? toUserWithPassword(doc) : null;
  },

  async markVerified(id) {
    if (!isId(id)) return null;
    const doc = await User.findByIdAndUpdate(id, { $set: { isVerified: true } }, { new: true });
    return doc ? toUserRecord(doc) : null;
  },

  async updatePassword(id, passwordHash) {
    if (!isId(id)) return null;
    const doc = await User.findByIdAndUpdate(id, { $set: { password: passwordHash } }, { new: true });
    return doc ? toUserRecord(doc) : null;
  },

  async updateAvatar(id, avatarUrl) {
    if (!isId(id)) return null;
    const doc = await User.findByIdAndUpdate(id, { $set: { avatarUrl } }, { new: true });
    return doc ? toUserRecord(doc) : null;
  },

  async isAvatarInUse(avatarUrl, excludeId) {
    const filter: FilterQuery<IUser> = isId(excludeId) ? { avatarUrl, _id: { $ne: excludeId } } : { avatarUrl };
    return (await User.exists(filter)) !== null;
  },

  async updateRole(id, role) {
    if (!isId(id)) return null;
    const doc = await User.findByIdAndUpdate(id, { $set: { role } }, { new: true, runValidators: true });
    return doc ? toUserRecord(doc) : null;
  },

  async list({ skip, limit }) {
    const [docs, total] = await Promise.all([
      User.find().sort({ createdAt: 1 }).skip(skip).limit(limit),
      User.countDocuments(),
    ]);
    return { items: docs.map(toUserRecord), total };
  },

  async delete(id) {
    if (!isId(id)) return false;
    const result = await User.deleteOne({ _id: id });
    return result.deletedCount > 0;
  },
};

// ── Contacts ──

const contacts: ContactRepository = {
  async create(input) {
    const doc = await Contact.create(input);
    return toContactRecord(doc);
  },

  async findOwned(id, ownerId) {
    if (!isId(id) || !isId(ownerId)) return null;
    const doc = await Contact.findOne({ _id: id, ownerId });
    return doc ? toContactRecord(doc) : null;
  },

  async list(ownerId, { skip, limit, search }) {
    if (!isId(ownerId)) return [];
    const filter: FilterQuery<IContact> = { ownerId };
    if (search) {
      const pattern = { $regex: escapeRegex(search), $options: 'i' };
      filter.$or = [{ firstName: pattern }, { lastName: pattern }, { email: pattern }];
    }
    const docs = await Contact.find(filter)
      .sort({ lastName: 1, firstName: 1, _id: 1 })
      .skip(skip)
      .limit(limit);
    return docs.map(toContactRecord);
  },

  async listWithBirthday(ownerId) {
    if (!isId(ownerId)) return [];
    const docs = await Contact.find({ ownerId, birthday: { $ne: null } });
    return docs.map(toContactRecord);
  },

  async update(id, ownerId, changes) {
    if (!isId(id) || !isId(ownerId)) return null;
    const doc = await Contact.findOneAndUpdate(
      { _id: id, ownerId },
      { $set: changes },
      { new: true, runValidators: true },
    );
    return doc ? toContactRecord(doc) : null;
  },

  async delete(id, ownerId) {
    if (!isId(id) || !isId(ownerId)) return false;
    const result = await Contact.deleteOne({ _id: id, ownerId });
    return result.deletedCount > 0;
  },

  async existsWithEmail(ownerId, email, excludeId) {
    if (!isId(ownerId)) return false;
    const filter: FilterQuery<IContact> = { ownerId, email: email.toLowerCase() };
    if (excludeId && isId(excludeId)) {
      filter._id = { $ne: excludeId };
    }
    const found = await Contact.exists(filter);
    return found !== null;
  },

  async deleteAllForOwner(ownerId) {
    if (!isId(ownerId)) return 0;
    const result = await Contact.deleteMany({ ownerId });
    return result.deletedCount;
  },
};

// ── Refresh Tokens ──

const refreshTokens: RefreshTokenRepository = {
  async create(input) {
    const doc = await RefreshToken.create(input);
    return toRefreshTokenRecord(doc);
  },

  async findByHash(tokenHash) {
    const doc = await RefreshToken.findOne({ tokenHash });
    return doc ? toRefreshTokenRecord(doc) : null;
  },

  async revoke(tokenHash, replacedBy) {
    // Conditional on revokedAt so concurrent rotations have a single winner
    const doc = await RefreshToken.findOneAndUpdate(
      { tokenHash, revokedAt: null },
      { $set: { revokedAt: new Date(), replacedBy: replacedBy ?? null } },
    );
    return doc !== null;
  },

  async revokeFamily(family) {
    const result = await RefreshToken.updateMany(
      { family, revokedAt: null },
      { $set: { revokedAt: new Date() } },
    );
    return result.modifiedCount;
  },

  async revokeAllForUser(userId) {
    if (!isId(userId)) return 0;
    const result = await RefreshToken.updateMany(
      { userId, revokedAt: null },
      { $set: { revokedAt: new Date() } },
    );
    return result.modifiedCount;
  },

  async deleteAllForUser(userId) {
    if (!isId(userId)) return 0;
    const result = await RefreshToken.deleteMany({ userId });
    return result.deletedCount;
  },

  async deleteExpired(now) {
    const result = await RefreshToken.deleteMany({ expiresAt: { $lte: now } });
    return result.deletedCount;
  },
};

// ── Email Logs ──

const emailLogs: EmailLogRepository = {
  async create(input) {
    const doc = await EmailLog.create({ ...input, status: EmailLogStatus.PENDING });
    return toEmailLogRecord(doc);
  },

  async update(id, changes) {
    if (!isId(id)) return null;
    const doc = await EmailLog.findByIdAndUpdate(id, { $set: changes }, { new: true });
    return doc ? toEmailLogRecord(doc) : null;
  },

  async findDueForRetry(now, maxAttempts) {
    const docs = await EmailLog.find({
      status: EmailLogStatus.FAILED,
      nextRetryAt: { $ne: null, $lte: now },
      attempts: { $lt: maxAttempts },
    }).sort({ nextRetryAt: 1 });
    return docs.map(toEmailLogRecord);
  },

  async claimForRetry(id, attempts, leaseUntil) {
    if (!isId(id)) return null;
    const doc = await EmailLog.findOneAndUpdate(
      { _id: id, status: EmailLogStatus.FAILED, attempts },
      { $set: { attempts: attempts + 1, lastAttemptAt: new Date(), nextRetryAt: leaseUntil } },
      { new: true },
    );
    return doc ? toEmailLogRecord(doc) : null;
  },
};

export function createMongooseRepositories(): Repositories {
  return { users, contacts, refreshTokens, emailLogs };
}
