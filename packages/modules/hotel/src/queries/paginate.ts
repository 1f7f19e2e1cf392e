import type { Page, PageRequest } from '../types';

/**
 * Fetch one keyset page: ask the store for `limit + 1` rows so the extra
 * row tells us whether another page exists.
 */
export async function fetchPage<T extends { id: string }>(
  fetch: (request: PageRequest) => Promise<T[]>,
  cursor: string | undefined,
  limit: number,
): Promise<Page<T>> {
  const rows = await fetch({ cursor, limit: limit + 1 });
  const hasMore = rows.length > limit;
  const items = hasMore ? rows.slice(0, limit) : rows;
  const last = items[items.length - 1];
  return {
    items,
    cursor: hasMore && last ? last.id : null,
    hasMore,
  };
}

/**
 * A lazy sequence over keyset pages. Nothing is read until iteration
 * starts, each page is read on demand, and every new iteration starts again
 * from the newest row.
 */
export function iteratePages<T>(
  loadPage: (cursor: string | undefined) => Promise<Page<T>>,
): AsyncIterable<T> {
  return {
    async *[Symbol.asyncIterator]() {
      let cursor: string | undefined;
      for (;;) {
        const page = await loadPage(cursor);
        yield* page.items;
        if (!page.hasMore || page.cursor === null) return;
        cursor = page.cursor;
      }
    },
  };
}
