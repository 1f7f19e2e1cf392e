import { NotFoundError } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import type { Guest, Room } from '../types';
import { syncRoomStatus } from './sync-room-status';

/**
 * Delete a guest and, by cascade, their bookings. Rooms that lose an active
 * booking are recomputed in the same transaction.
 */
export async function deleteGuest(tx: HotelTx, guestId: string): Promise<Guest> {
  const guest = await tx.findGuest(guestId);
  if (!guest) {
    throw new NotFoundError('Guest', guestId);
  }

  // Lock in id order so two deletions touching the same rooms cannot deadlock.
  const roomIds = await tx.listActiveRoomIdsForGuest(guestId);
  const lockedRooms: Room[] = [];
  for (const roomId of [...roomIds].sort()) {
    const room = await tx.findRoom(roomId, { forUpdate: true });
    if (room) lockedRooms.push(room);
  }

  await tx.deleteGuest(guestId);

  for (const room of lockedRooms) {
    await syncRoomStatus(tx, room);
  }
  return guest;
}
