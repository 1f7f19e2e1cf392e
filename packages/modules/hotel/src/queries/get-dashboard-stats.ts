import { toUtcCalendarDate, utcDayRange } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import { RoomStatus } from '../types';
import type { DashboardStats } from '../types';

/** Front-desk counters; "today" is the UTC calendar day of `now`. */
export async function getDashboardStats(tx: HotelTx, now: Date = new Date()): Promise<DashboardStats> {
  const { start, end } = utcDayRange(toUtcCalendarDate(now));
  const [roomsTotal, roomsAvailable, guestsTotal, bookingsToday] = await Promise.all([
    tx.countRooms(),
    tx.countRooms({ status: RoomStatus.AVAILABLE }),
    tx.countGuests(),
    tx.countBookingsCreatedBetween(start, end),
  ]);
  return { roomsTotal, roomsAvailable, guestsTotal, bookingsToday };
}
