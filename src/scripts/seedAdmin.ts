import { env } from '../config/env.js';
import { connectDB, disconnectDB } from '../config/database.js';
import { repositories } from '../repositories/index.js';
import { hashPassword } from '../modules/auth/auth.tokens.js';
import { Role } from '../utils/constants.js';
import { logger } from '../utils/logger.js';

async function seedAdmin(): Promise<void> {
  const { users } = repositories();

  try {
    await connectDB();

    const existing = await users.findByEmail(env.ADMIN_EMAIL);
    if (existing) {
      logger.info(`Account ${existing.email} already exists (role: ${existing.role}), skipping seed.`);
      await disconnectDB();
      process.exit(0);
    }

    const admin = await users.create({
      email: env.ADMIN_EMAIL,
      password: await hashPassword(env.ADMIN_PASSWORD),
      role: Role.ADMIN,
      isVerified: true,
    });

    logger.info(`Admin created: ${admin.email}`);
    await disconnectDB();
    process.exit(0);
  } catch (error) {
    logger.error('Failed to seed admin:', error);
    await disconnectDB();
    process.exit(1);
  }
}

void seedAdmin();
