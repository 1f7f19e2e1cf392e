/**
 * Drizzle ORM logger hook. Routes SQL through the structured logger at
 * debug level.
 */

import type { Logger } from 'drizzle-orm';
import { logger } from './logger';

const MAX_QUERY_LENGTH = 200;

export class ObservabilityDrizzleLogger implements Logger {
  logQuery(query: string, params: unknown[]): void {
    logger.debug('db:query', {
      query: query.length > MAX_QUERY_LENGTH ? query.slice(0, MAX_QUERY_LENGTH) + '...' : query,
      paramCount: params.length,
    });
  }
}
