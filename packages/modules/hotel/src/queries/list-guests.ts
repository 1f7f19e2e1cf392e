import { assertValidated } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import type { Guest, Page } from '../types';
import { listPageSchema } from '../validation';
import type { ListPageInput } from '../validation';
import { fetchPage } from './paginate';
import { DEFAULT_PAGE_SIZE } from './list-rooms';

/** One page of guests, newest first. */
export async function listGuestsPage(tx: HotelTx, input: ListPageInput = {}): Promise<Page<Guest>> {
  const parsed = listPageSchema.safeParse(input);
  assertValidated(parsed);
  const { cursor, limit = DEFAULT_PAGE_SIZE } = parsed.data;
  return fetchPage((request) => tx.listGuests(request), cursor, limit);
}
