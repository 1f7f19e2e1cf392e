import { NotFoundError, assertValidated } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import { occupancyStatus } from '../state-machines';
import { RoomStatus } from '../types';
import type { Room } from '../types';
import { setRoomMaintenanceSchema } from '../validation';
import type { SetRoomMaintenanceInput } from '../validation';

/**
 * Take a room out of service, or return it. A returned room's status is
 * recomputed from its active bookings.
 */
export async function setRoomMaintenance(tx: HotelTx, input: SetRoomMaintenanceInput): Promise<Room> {
  const parsed = setRoomMaintenanceSchema.safeParse(input);
  assertValidated(parsed);
  const { roomId, underMaintenance } = parsed.data;

  const room = await tx.findRoom(roomId, { forUpdate: true });
  if (!room) {
    throw new NotFoundError('Room', roomId);
  }

  let next: RoomStatus;
  if (underMaintenance) {
    next = RoomStatus.MAINTENANCE;
  } else {
    const active = await tx.listActiveBookingsForRoom(roomId);
    next = occupancyStatus(active.length);
  }

  if (next !== room.status) {
    await tx.updateRoomStatus(roomId, next);
  }
  return { ...room, status: next };
}
