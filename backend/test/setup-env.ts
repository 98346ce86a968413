/**
 * Runs before every spec file.
 * Keeps winston quiet and pins the env the app reports on /status.
 */
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
