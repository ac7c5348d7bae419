// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
process.env.LEDGER_DRIVER = 'memory';
