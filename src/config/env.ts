import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_JWT_SECRET = 'change-me-jwt-secret-32chars!!!!';
const DEFAULT_ADMIN_PASSWORD = 'change-me-admin';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(8000),
  API_PREFIX: z.string().default(''),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  // MongoDB
  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required').default('mongodb://localhost:27017/contacts'),

  // Redis (empty disables it; the in-memory cache is used instead)
  REDIS_URL: z.string().default(''),

  // JWT
  JWT_SECRET: z.string().min(16).default(DEFAULT_JWT_SECRET),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
  REFRESH_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60 * 24 * 7),
  VERIFICATION_TOKEN_EXPIRE_HOURS: z.coerce.number().int().positive().default(24),
  RESET_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),

  // CORS
  CORS_ORIGIN: z.string().default('*'),

  // Links in outgoing mail
  BASE_URL: z.string().url().default('http://localhost:8000'),

  // Mail provider
  EMAIL_PROVIDER: z.enum(['smtp', 'sendgrid_api']).default('smtp'),

  // SMTP
  SMTP_HOST: z.string().default('localhost'),
  SMTP_PORT: z.coerce.number().default(1025),
  SMTP_USER: z.string().default(''),
  SMTP_PASS: z.string().default(''),
  SMTP_FROM_EMAIL: z.string().email().default('noreply@example.com'),
  SMTP_FROM_NAME: z.string().default('Contacts API'),
  SENDGRID_API_KEY: z.string().default(''),

  // Avatar storage (any S3-compatible bucket)
  STORAGE_ENDPOINT: z.string().default(''),
  STORAGE_REGION: z.string().default('auto'),
  STORAGE_ACCESS_KEY_ID: z.string().default(''),
  STORAGE_SECRET_ACCESS_KEY: z.string().default(''),
  STORAGE_BUCKET: z.string().default('contacts-avatars'),
  STORAGE_PUBLIC_URL: z.string().default(''),

  // Admin seed
  ADMIN_EMAIL: z.string().email().default('admin@example.com'),
  ADMIN_PASSWORD: z.string().min(6).default(DEFAULT_ADMIN_PASSWORD),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:');
  console.error(parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const envData = parsed.data;

if (envData.NODE_ENV === 'production') {
  const prodConfigErrors: string[] = [];

  if (envData.JWT_SECRET === DEFAULT_JWT_SECRET) {
    prodConfigErrors.push('JWT_SECRET must be overridden in production');
  }

  if (envData.ADMIN_PASSWORD === DEFAULT_ADMIN_PASSWORD) {
    prodConfigErrors.push('ADMIN_PASSWORD must be overridden in production');
  }

  if (envData.BCRYPT_ROUNDS < 10) {
    prodConfigErrors.push('BCRYPT_ROUNDS must be at least 10 in production');
  }

  if (envData.EMAIL_PROVIDER === 'smtp') {
    if (!envData.SMTP_USER) {
      prodConfigErrors.push('SMTP_USER is required when EMAIL_PROVIDER=smtp');
    }

    if (!envData.SMTP_PASS) {
      prodConfigErrors.push('SMTP_PASS is required when EMAIL_PROVIDER=smtp');
    }
  }

  if (envData.EMAIL_PROVIDER === 'sendgrid_api' && !envData.SENDGRID_API_KEY) {
    prodConfigErrors.push('SENDGRID_API_KEY is required when EMAIL_PROVIDER=sendgrid_api');
  }

  if (prodConfigErrors.length > 0) {
    console.error('Invalid production environment variables:');
    for (const message of prodConfigErrors) {
      console.error(`- ${message}`);
    }
    process.exit(1);
  }
}

export const env = envData;

export const isStorageConfigured = Boolean(
  env.STORAGE_ACCESS_KEY_ID && env.STORAGE_SECRET_ACCESS_KEY && env.STORAGE_PUBLIC_URL,
);
