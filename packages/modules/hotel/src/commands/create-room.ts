import { assertValidated, generateUlid, toCents, toDollars } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import { RoomNumberTakenError } from '../errors';
import { RoomStatus } from '../types';
import type { Room } from '../types';
import { createRoomSchema } from '../validation';
import type { CreateRoomInput } from '../validation';

export async function createRoom(tx: HotelTx, input: CreateRoomInput, now: Date = new Date()): Promise<Room> {
  const parsed = createRoomSchema.safeParse(input);
  assertValidated(parsed, 'Invalid room');
  const { number, category, price } = parsed.data;

  if (await tx.findRoomByNumber(number)) {
    throw new RoomNumberTakenError(number);
  }

  const room: Room = {
    id: generateUlid(),
    number,
    category,
    pricePerNight: toDollars(toCents(price)),
    status: RoomStatus.AVAILABLE,
    createdAt: now,
  };
  await tx.insertRoom(room);
  return room;
}
