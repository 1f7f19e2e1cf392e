import { NotFoundError } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import type { Guest } from '../types';

export async function getGuest(tx: HotelTx, guestId: string): Promise<Guest> {
  const guest = await tx.findGuest(guestId);
  if (!guest) {
    throw new NotFoundError('Guest', guestId);
  }
  return guest;
}
