/**
 * Process configuration, read once from the environment.
 *
 * Database and listing settings, so that the database client and the
 * service agree on one parsed view of `process.env`. LOG_LEVEL is read by
 * the logger itself.
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(100).default(5),
  DB_PREPARE_STATEMENTS: booleanFlag.default('false'),
  HOTEL_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(50),
});

export interface HotelConfig {
  database: {
    url?: string;
    poolSize: number;
    prepareStatements: boolean;
  };
  pageSize: number;
}

let _config: HotelConfig | null = null;

export function loadHotelConfig(env: Record<string, string | undefined>): HotelConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  const e = parsed.data;
  return {
    database: {
      url: e.DATABASE_URL,
      poolSize: e.DB_POOL_MAX,
      prepareStatements: e.DB_PREPARE_STATEMENTS,
    },
    pageSize: e.HOTEL_PAGE_SIZE,
  };
}

export function getHotelConfig(): HotelConfig {
  if (!_config) {
    _config = loadHotelConfig(process.env);
  }
  return _config;
}

/** Drop the cached config so the next read sees the current environment. */
export function resetHotelConfig(): void {
  _config = null;
}
