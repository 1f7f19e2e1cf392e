import { assertValidated } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import type { BookingListItem, Page } from '../types';
import { listPageSchema } from '../validation';
import type { ListPageInput } from '../validation';
import { fetchPage } from './paginate';
import { DEFAULT_PAGE_SIZE } from './list-rooms';

/** One page of bookings with room number and guest name, newest first. */
export async function listBookingsPage(
  tx: HotelTx,
  input: ListPageInput = {},
): Promise<Page<BookingListItem>> {
  const parsed = listPageSchema.safeParse(input);
  assertValidated(parsed);
  const { cursor, limit = DEFAULT_PAGE_SIZE } = parsed.data;
  return fetchPage((request) => tx.listBookings(request), cursor, limit);
}
