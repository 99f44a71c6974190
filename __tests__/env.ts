/**
 * Test environment variables, loaded before any module reads the config
 */
process.env.NODE_ENV = 'test';
process.env.CORS_ORIGIN = '*';
process.env.PORT = '3001';
process.env.LOG_LEVEL = 'error'; // Reduce logging noise during tests
process.env.DATABASE_PATH = ':memory:';
process.env.REDIS_ENABLED = 'false';
process.env.RATE_LIMIT_MAX_REQUESTS = '1000';
