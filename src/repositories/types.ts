import type { EmailLogStatus, Role } from '../utils/constants.js';

// ── Records ──

export interface UserRecord {
  id: string;
  email: string;
  role: Role;
  isVerified: boolean;
  avatarUrl: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface UserWithPassword extends UserRecord {
  password: string;
}

export interface NewUser {
  email: string;
  password: string;
  role: Role;
  isVerified?: boolean;
}

export interface ContactRecord {
  id: string;
  ownerId: string;
  firstName: string;
  lastName: string;
  email: string;
  phone: string | null;
  birthday: string | null;
  extra: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewContact = Omit<ContactRecord, 'id' | 'createdAt' | 'updatedAt'>;

export type ContactChanges = Partial<
  Pick<ContactRecord, 'firstName' | 'lastName' | 'email' | 'phone' | 'birthday' | 'extra'>
>;

export interface ContactListOptions {
  skip: number;
  limit: number;
  search?: string;
}

export interface RefreshTokenRecord {
  id: string;
  userId: string;
  tokenHash: string;
  family: string;
  replacedBy: string | null;
  revokedAt: Date | null;
  userAgent?: string;
  ipAddress?: string;
  expiresAt: Date;
  createdAt: Date;
}

export type NewRefreshToken = Pick<
  RefreshTokenRecord,
  'userId' | 'tokenHash' | 'family' | 'expiresAt' | 'userAgent' | 'ipAddress'
>;

export interface EmailLogRecord {
  id: string;
  to: string;
  subject: string;
  template: string;
  data: Record<string, string>;
  status: EmailLogStatus;
  attempts: number;
  lastAttemptAt: Date | null;
  nextRetryAt: Date | null;
  errorMessage: string | null;
  createdAt: Date;
}

export type NewEmailLog = Pick<EmailLogRecord, 'to' | 'subject' | 'template' | 'data'>;

export type EmailLogChanges = Partial<
  Pick<EmailLogRecord, 'status' | 'attempts' | 'lastAttemptAt' | 'nextRetryAt' | 'errorMessage'>
>;

export interface Page<T> {
  items: T[];
  total: number;
}

// ── Repositories ──

export interface UserRepository {
  create(input: NewUser): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  findByIdWithPassword(id: string): Promise<UserWithPassword | null>;
  findByEmailWithPassword(email: string): Promise<UserWithPassword | null>;
  markVerified(id: string): Promise<UserRecord | null>;
  updatePassword(id: string, passwordHash: string): Promise<UserRecord | null>;
  updateAvatar(id: string, avatarUrl: string): Promise<UserRecord | null>;
  /** True when a user other than `excludeId` has this avatar URL. */
  isAvatarInUse(avatarUrl: string, excludeId: string): Promise<boolean>;
  updateRole(id: string, role: Role): Promise<UserRecord | null>;
  list(options: { skip: number; limit: number }): Promise<Page<UserRecord>>;
  delete(id: string): Promise<boolean>;
}

export interface ContactRepository {
  create(input: NewContact): Promise<ContactRecord>;
  findOwned(id: string, ownerId: string): Promise<ContactRecord | null>;
  list(ownerId: string, options: ContactListOptions): Promise<ContactRecord[]>;
  listWithBirthday(ownerId: string): Promise<ContactRecord[]>;
  update(id: string, ownerId: string, changes: ContactChanges): Promise<ContactRecord | null>;
  delete(id: string, ownerId: string): Promise<boolean>;
  existsWithEmail(ownerId: string, email: string, excludeId?: string): Promise<boolean>;
  deleteAllForOwner(ownerId: string): Promise<number>;
}

export interface RefreshTokenRepository {
  create(input: NewRefreshToken): Promise<RefreshTokenRecord>;
  findByHash(tokenHash: string): Promise<RefreshTokenRecord | null>;
  /** Revokes an active token. Resolves false when it was already revoked. */
  revoke(tokenHash: string, replacedBy?: string): Promise<boolean>;
  revokeFamily(family: string): Promise<number>;
  revokeAllForUser(userId: string): Promise<number>;
  deleteAllForUser(userId: string): Promise<number>;
  deleteExpired(now: Date): Promise<number>;
}

export interface EmailLogRepository {
  create(input: NewEmailLog): Promise<EmailLogRecord>;
  update(id: string, changes: EmailLogChanges): Promise<EmailLogRecord | null>;
  findDueForRetry(now: Date, maxAttempts: number): Promise<EmailLogRecord[]>;
  /**
   * Takes a failed log for one more attempt: bumps `attempts` and pushes
   * `nextRetryAt` to `leaseUntil`. Resolves null when another run already
   * took it (its attempts no longer match).
   */
  claimForRetry(id: string, attempts: number, leaseUntil: Date): Promise<EmailLogRecord | null>;
}

export interface Repositories {
  users: UserRepository;
  contacts: ContactRepository;
  refreshTokens: RefreshTokenRepository;
  emailLogs: EmailLogRepository;
}
