// ── Roles ──
export enum Role {
  USER = 'user',
  ADMIN = 'admin',
}

// ── Token Scopes ──
export enum TokenScope {
  ACCESS = 'access',
  VERIFICATION = 'verification',
  RESET = 'reset',
}

// ── Email Log Status ──
export enum EmailLogStatus {
  PENDING = 'pending',
  SENT = 'sent',
  FAILED = 'failed',
}

// ── Cache Keys ──
export const CacheKeys = {
  user: (userId: string) => `user:${userId}`,
  usedResetToken: (jti: string) => `reset:used:${jti}`,
  rateLimit: (limiter: string) => `rl:${limiter}:`,
} as const;

// ── Pagination ──
export const DEFAULT_PAGE_LIMIT = 100;
export const MAX_PAGE_LIMIT = 100;

// ── Birthdays ──
export const DEFAULT_BIRTHDAY_WINDOW_DAYS = 7;
export const MAX_BIRTHDAY_WINDOW_DAYS = 366;
