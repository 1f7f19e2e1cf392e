import { NotFoundError } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import type { Booking } from '../types';

export async function getBooking(tx: HotelTx, bookingId: string): Promise<Booking> {
  const booking = await tx.findBooking(bookingId);
  if (!booking) {
    throw new NotFoundError('Booking', bookingId);
  }
  return booking;
}
