export { createDatabase, getDb, closeDb, isUniqueViolation, schema } from './client';
export type { Database, DatabaseHandle, DatabaseOptions } from './client';
export * from './schema';
