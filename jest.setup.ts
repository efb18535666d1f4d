/**
 * Jest global setup: set env vars before any module is imported.
 */
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
process.env.CREATE_BACKUPS = 'true';
process.env.BACKUP_SUFFIX = '.backup';
