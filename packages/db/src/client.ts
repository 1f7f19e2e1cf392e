import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { getHotelConfig } from '@innkeep/core/config';
import { logger, ObservabilityDrizzleLogger } from '@innkeep/core/observability';
import * as schema from './schema';

export type Database = PostgresJsDatabase<typeof schema>;
type SqlClient = ReturnType<typeof postgres>;

export interface DatabaseOptions {
  poolSize?: number;
  prepareStatements?: boolean;
}

export interface DatabaseHandle {
  db: Database;
  close: () => Promise<void>;
}

export function createDatabase(connectionString: string, options: DatabaseOptions = {}): DatabaseHandle {
  const client: SqlClient = postgres(connectionString, {
    max: options.poolSize ?? 5,
    prepare: options.prepareStatements ?? false,
    idle_timeout: 20,
    max_lifetime: 300,
    connect_timeout: 10,
    onnotice: (notice) => {
      logger.warn('pg-notice', { severity: notice.severity, notice: notice.message });
    },
  });
  const db = drizzle(client, { schema, logger: new ObservabilityDrizzleLogger() });
  return {
    db,
    close: () => client.end(),
  };
}

let _handle: DatabaseHandle | null = null;

/** Process-wide database built from DATABASE_URL on first use. */
export function getDb(): Database {
  if (!_handle) {
    const { database } = getHotelConfig();
    if (!database.url) {
      throw new Error('DATABASE_URL environment variable is required');
    }
    _handle = createDatabase(database.url, {
      poolSize: database.poolSize,
      prepareStatements: database.prepareStatements,
    });
  }
  return _handle.db;
}

export async function closeDb(): Promise<void> {
  if (_handle) {
    const handle = _handle;
    _handle = null;
    await handle.close();
  }
}

/** postgres.js raises SQLSTATE 23505 on a unique index violation. */
export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (!(err instanceof postgres.PostgresError)) return false;
  if (err.code !== '23505') return false;
  return constraint === undefined || err.constraint_name === constraint;
}

export { schema };
