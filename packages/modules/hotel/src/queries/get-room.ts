import { NotFoundError } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import type { Room } from '../types';

export async function getRoom(tx: HotelTx, roomId: string): Promise<Room> {
  const room = await tx.findRoom(roomId);
  if (!room) {
    throw new NotFoundError('Room', roomId);
  }
  return room;
}
