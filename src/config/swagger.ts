import { fileURLToPath } from 'url';
import swaggerJsdoc from 'swagger-jsdoc';
import { env } from './env.js';

const srcDir = fileURLToPath(new URL('..', import.meta.url));

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Contacts API',
      version: '1.0.0',
      description: 'Contact management with JWT authentication, email verification and role-based access',
    },
    servers: [
      {
        url: `${env.BASE_URL.replace(/\/+$/, '')}${env.API_PREFIX}`,
        description: 'API server',
      },
    ],
    tags: [
      { name: 'Health', description: 'Service status' },
      { name: 'Auth', description: 'Signup, login, tokens, verification and password reset' },
      { name: 'Users', description: 'Profile, avatar and user administration' },
      { name: 'Contacts', description: 'Personal contacts and upcoming birthdays' },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        ContactInput: {
          type: 'object',
          required: ['firstName', 'lastName', 'email'],
          properties: {
            firstName: { type: 'string', maxLength: 100 },
            lastName: { type: 'string', maxLength: 100 },
            email: { type: 'string', format: 'email' },
            phone: { type: 'string', nullable: true, maxLength: 50 },
            birthday: { type: 'string', format: 'date', nullable: true },
            extra: { type: 'string', nullable: true, maxLength: 500 },
          },
        },
      },
    },
  },
  apis: [`${srcDir}app.{ts,js}`, `${srcDir}modules/**/*.routes.{ts,js}`],
};

export const swaggerSpec = swaggerJsdoc(options);
