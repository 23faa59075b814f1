import 'reflect-metadata';

// Tests run against an in-memory database and never read a .env file.
process.env.JWT_SECRET = 'test-secret';
process.env.JWT_EXPIRATION = '3600';
process.env.DB_TYPE = 'better-sqlite3';
process.env.DB_NAME = ':memory:';
process.env.THROTTLE_CREATE_LIMIT = '1000';
process.env.THROTTLE_READ_LIMIT = '1000';
