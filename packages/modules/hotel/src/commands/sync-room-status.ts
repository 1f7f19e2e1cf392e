import type { HotelTx } from '../store/types';
import { deriveRoomStatus } from '../state-machines';
import type { Room, RoomStatus } from '../types';

/**
 * Recompute a room's status from its Booked/Checked-In bookings and write it
 * back if it changed. The caller must already hold the room's row lock.
 */
export async function syncRoomStatus(tx: HotelTx, room: Room): Promise<RoomStatus> {
  const active = await tx.listActiveBookingsForRoom(room.id);
  const next = deriveRoomStatus(room.status, active.length);
  if (next !== room.status) {
    await tx.updateRoomStatus(room.id, next);
  }
  return next;
}
