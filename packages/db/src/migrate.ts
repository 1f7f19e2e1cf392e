import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';

dotenv.config({ path: fileURLToPath(new URL('../../../.env.local', import.meta.url)) });
dotenv.config({ path: fileURLToPath(new URL('../../../.env', import.meta.url)) });

import { drizzle } from 'drizzle-orm/postgres-js';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import postgres from 'postgres';
import { logger, errorFields } from '@innkeep/core/observability';

const MIGRATIONS_FOLDER = fileURLToPath(new URL('../migrations', import.meta.url));

async function runMigrations(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const masked = connectionString.replace(/:[^:@]+@/, ':***@');
  logger.info('Connecting to database', { url: masked });
  const client = postgres(connectionString, { max: 1, prepare: false });
  const db = drizzle(client);

  try {
    logger.info('Running migrations', { folder: MIGRATIONS_FOLDER });
    await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
    logger.info('Migrations complete');
  } finally {
    await client.end();
  }
}

runMigrations().catch((err: unknown) => {
  logger.error('Migration failed', { error: errorFields(err) });
  process.exit(1);
});
