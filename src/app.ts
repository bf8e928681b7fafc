import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import swaggerUi from 'swagger-ui-express';

import { env } from './config/env.js';
import { swaggerSpec } from './config/swagger.js';
import { apiLimiter } from './middleware/rateLimiter.js';
import { optionalAuth } from './middleware/auth.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { getCache } from './services/cache.service.js';
import { logger } from './utils/logger.js';

// Route imports
import authRoutes from './modules/auth/auth.routes.js';
import userRoutes from './modules/users/users.routes.js';
import contactRoutes from './modules/contacts/contacts.routes.js';

const app = express();
app.set('trust proxy', 1);

// ── Security Headers ──
app.use(
  helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:', 'https:'],
        objectSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    crossOriginEmbedderPolicy: false,
  }),
);

// ── CORS ──
const corsOrigins = env.CORS_ORIGIN.split(',').map((o) => o.trim());
app.use(
  cors({
    origin: corsOrigins.includes('*') ? '*' : corsOrigins,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }),
);

// ── Body Parsing ──
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: false, limit: '1mb' }));

// ── HTTP Logging ──
const morganStream = {
  write: (message: string) => logger.http(message.trim()),
};
app.use(morgan('combined', { stream: morganStream }));

// ── Identity, then the global limiter keyed on it ──
app.use(optionalAuth);
app.use(apiLimiter);

/**
 * @openapi
 * /:
 *   servers:
 *     - url: /
 *       description: Host root, outside API_PREFIX
 *   get:
 *     summary: Welcome message
 *     tags: [Health]
 *     responses:
 *       200:
 *         description: Pointer to the documentation
 */
app.get('/', (_req, res) => {
  res.json({ msg: 'Contacts API. Visit /docs for Swagger UI' });
});

/**
 * @openapi
 * /health:
 *   servers:
 *     - url: /
 *       description: Host root, outside API_PREFIX
 *   get:
 *     summary: Liveness check
 *     tags: [Health]
 *     responses:
 *       200:
 *         description: Status, uptime and active cache backend
 */
app.get('/health', (_req, res) => {
  res.json({
    success: true,
    data: {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      cache: getCache().backend,
    },
  });
});

// ── API Docs ──
app.get('/docs.json', (_req, res) => {
  res.json(swaggerSpec);
});
app.use('/docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));

// ── API Routes ──
const prefix = env.API_PREFIX;

app.use(`${prefix}/auth`, authRoutes);
app.use(`${prefix}/users`, userRoutes);
app.use(`${prefix}/contacts`, contactRoutes);

// ── 404 Handler ──
app.use(notFoundHandler);

// ── Global Error Handler ──
app.use(errorHandler);

export default app;
