// backend/services/shared/test/setup.ts
// Runs before every test file: the shared logger requires LOG_LEVEL at import.
process.env.NODE_ENV ||= "test";
process.env.LOG_LEVEL ||= "silent";
