import { assertValidated } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import type { Page, Room } from '../types';
import { listPageSchema } from '../validation';
import type { ListPageInput } from '../validation';
import { fetchPage } from './paginate';

export const DEFAULT_PAGE_SIZE = 50;

/** One page of rooms, newest first. */
export async function listRoomsPage(tx: HotelTx, input: ListPageInput = {}): Promise<Page<Room>> {
  const parsed = listPageSchema.safeParse(input);
  assertValidated(parsed);
  const { cursor, limit = DEFAULT_PAGE_SIZE } = parsed.data;
  return fetchPage((request) => tx.listRooms(request), cursor, limit);
}

/** Rooms a new booking may target, ordered by room number. */
export async function listBookableRooms(tx: HotelTx): Promise<Room[]> {
  return tx.listBookableRooms();
}
