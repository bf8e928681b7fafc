// Runs before each test file, ahead of config/env.ts parsing process.env.
// Placeholders only; nothing here reaches a real service.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.JWT_SECRET = 'test-secret-at-least-16';
process.env.BCRYPT_ROUNDS = '4';
process.env.REDIS_URL = '';
process.env.MONGODB_URI = 'mongodb://localhost:27017/contacts-test';
process.env.BASE_URL = 'http://localhost:8000';
process.env.API_PREFIX = '';
process.env.EMAIL_PROVIDER = 'smtp';
process.env.SMTP_HOST = 'localhost';
process.env.SMTP_PORT = '1025';
process.env.STORAGE_ENDPOINT = 'http://storage.test';
process.env.STORAGE_ACCESS_KEY_ID = 'test-access-key';
process.env.STORAGE_SECRET_ACCESS_KEY = 'test-secret';
process.env.STORAGE_BUCKET = 'contacts-avatars';
process.env.STORAGE_PUBLIC_URL = 'https://cdn.example.test';
