import { NotFoundError, assertValidated } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import { ACTION_TARGET_STATUS, assertBookingTransition } from '../state-machines';
import { syncRoomStatus } from './sync-room-status';
import type { TransitionResult } from '../types';
import { transitionBookingSchema } from '../validation';
import type { TransitionBookingInput } from '../validation';

/**
 * Apply a check-in, check-out or cancel action to a booking.
 *
 * Only moves allowed by BOOKING_TRANSITIONS are applied; anything else, and
 * every action on a Checked-Out or Cancelled booking, fails before a write.
 * The room's status is then recomputed from all of its remaining active
 * bookings rather than set from the action alone.
 */
export async function transitionBooking(
  tx: HotelTx,
  input: TransitionBookingInput,
): Promise<TransitionResult> {
  const parsed = transitionBookingSchema.safeParse(input);
  assertValidated(parsed);
  const { bookingId, action } = parsed.data;

  const found = await tx.findBooking(bookingId);
  if (!found) {
    throw new NotFoundError('Booking', bookingId);
  }

  // Room before booking, the same lock order createBooking and deleteGuest use.
  const room = await tx.findRoom(found.roomId, { forUpdate: true });
  const booking = room ? await tx.findBooking(bookingId, { forUpdate: true }) : null;
  if (!room || !booking) {
    // The room was deleted between the two reads and took the booking with it.
    throw new NotFoundError('Booking', bookingId);
  }

  const target = ACTION_TARGET_STATUS[action];
  assertBookingTransition(booking.status, target);

  await tx.updateBookingStatus(bookingId, target);
  const roomStatus = await syncRoomStatus(tx, room);

  return { booking: { ...booking, status: target }, roomStatus };
}
