import { NotFoundError } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import type { Room } from '../types';

/** Delete a room; its bookings go with it. */
export async function deleteRoom(tx: HotelTx, roomId: string): Promise<Room> {
  const room = await tx.findRoom(roomId, { forUpdate: true });
  if (!room) {
    throw new NotFoundError('Room', roomId);
  }
  await tx.deleteRoom(roomId);
  return room;
}
