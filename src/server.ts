import http from 'http';
import app from './app.js';
import { env } from './config/env.js';
import { connectDB, disconnectDB } from './config/database.js';
import { initCache, closeCache } from './services/cache.service.js';
import { processEmailRetries } from './modules/notifications/email.service.js';
import { repositories } from './repositories/index.js';
import { logger } from './utils/logger.js';

const server = http.createServer(app);

const EMAIL_RETRY_INTERVAL_MS = 60 * 1000;
const TOKEN_PURGE_INTERVAL_MS = 60 * 60 * 1000;
let emailRetryInterval: NodeJS.Timeout | undefined;
let tokenPurgeInterval: NodeJS.Timeout | undefined;

async function startServer(): Promise<void> {
  try {
    await connectDB();

    const cache = await initCache();
    logger.info(`Cache backend: ${cache.backend}`);

    // Resend failed mail whose retry time has come
    emailRetryInterval = setInterval(() => {
      processEmailRetries()
        .then((delivered) => {
          if (delivered > 0) logger.info(`Email retries delivered: ${delivered}`);
        })
        .catch((error: unknown) => {
          logger.error('Email retry processor error:', error);
        });
    }, EMAIL_RETRY_INTERVAL_MS);

    tokenPurgeInterval = setInterval(() => {
      repositories()
        .refreshTokens.deleteExpired(new Date())
        .then((removed) => {
          if (removed > 0) logger.info(`Purged ${removed} expired refresh tokens`);
        })
        .catch((error: unknown) => {
          logger.error('Refresh token purge error:', error);
        });
    }, TOKEN_PURGE_INTERVAL_MS);

    server.listen(env.PORT, () => {
      logger.info(`Server running on port ${env.PORT} in ${env.NODE_ENV} mode`);
      logger.info(`Docs: ${env.BASE_URL}/docs`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

// ── Graceful Shutdown ──
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Shutting down gracefully...`);

  server.close(() => {
    logger.info('HTTP server closed');

    clearInterval(emailRetryInterval);
    clearInterval(tokenPurgeInterval);

    Promise.all([closeCache(), disconnectDB()])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
      });
  });

  // Force shutdown after 10s
  setTimeout(() => {
    logger.error('Forced shutdown after 10s timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', reason);
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

void startServer();
