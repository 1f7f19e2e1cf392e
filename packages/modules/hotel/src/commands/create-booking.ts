import {
  MAX_MONEY_AMOUNT,
  NotFoundError,
  ValidationError,
  assertValidated,
  generateUlid,
  multiplyMoney,
  nightsBetween,
  staysOverlap,
} from '@innkeep/shared';
import { logger } from '@innkeep/core/observability';
import type { HotelTx } from '../store/types';
import { RoomUnderMaintenanceError } from '../errors';
import { syncRoomStatus } from './sync-room-status';
import { BookingStatus, RoomStatus } from '../types';
import type { Booking } from '../types';
import { createBookingSchema } from '../validation';
import type { CreateBookingInput } from '../validation';

const DATE_FIELDS = new Set<PropertyKey>(['checkIn', 'checkOut']);

/** Nights and total cost of a stay at a nightly price. */
export function quoteStay(
  pricePerNight: number,
  checkIn: string,
  checkOut: string,
): { nights: number; totalAmount: number } {
  const nights = nightsBetween(checkIn, checkOut);
  return { nights, totalAmount: multiplyMoney(pricePerNight, nights) };
}

/**
 * Book a room for a guest. The booking insert and the room status update
 * share the caller's transaction; the room row stays locked until it ends.
 *
 * Overlapping stays on the same room are accepted and logged.
 */
export async function createBooking(
  tx: HotelTx,
  input: CreateBookingInput,
  now: Date = new Date(),
): Promise<Booking> {
  const parsed = createBookingSchema.safeParse(input);
  const badDates =
    !parsed.success && parsed.error.issues.some((i) => DATE_FIELDS.has(i.path[0] ?? ''));
  assertValidated(parsed, badDates ? 'Invalid date range' : 'Invalid booking');
  const { roomId, guestId, checkIn, checkOut } = parsed.data;

  const room = await tx.findRoom(roomId, { forUpdate: true });
  if (!room) {
    throw new NotFoundError('Room', roomId);
  }
  const guest = await tx.findGuest(guestId);
  if (!guest) {
    throw new NotFoundError('Guest', guestId);
  }
  if (room.status === RoomStatus.MAINTENANCE) {
    throw new RoomUnderMaintenanceError(room.number);
  }

  const active = await tx.listActiveBookingsForRoom(roomId);
  const overlapping = active.filter((b) => staysOverlap(checkIn, checkOut, b.checkIn, b.checkOut));
  if (overlapping.length > 0) {
    logger.warn('Booking overlaps an active stay on the same room', {
      operation: 'createBooking',
      roomId,
      guestId,
      checkIn,
      checkOut,
      overlappingBookingIds: overlapping.map((b) => b.id),
    });
  }

  const { nights, totalAmount } = quoteStay(room.pricePerNight, checkIn, checkOut);
  if (totalAmount > MAX_MONEY_AMOUNT) {
    throw new ValidationError('Invalid booking', [
      { field: 'totalAmount', message: `Booking total must not exceed ${MAX_MONEY_AMOUNT}` },
    ]);
  }
  const booking: Booking = {
    id: generateUlid(),
    roomId,
    guestId,
    checkIn,
    checkOut,
    nights,
    status: BookingStatus.BOOKED,
    totalAmount,
    createdAt: now,
  };
  await tx.insertBooking(booking);
  await syncRoomStatus(tx, room);
  return booking;
}
