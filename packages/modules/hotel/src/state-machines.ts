import { BookingStatus, RoomStatus } from './types';
import type { BookingAction } from './types';
import { InvalidStatusTransitionError } from './errors';

// ══════════════════════════════════════════════════════════════════
// Booking State Machine
// ══════════════════════════════════════════════════════════════════
//
// Booked → Checked-In, Cancelled
// Checked-In → Checked-Out, Cancelled
// Checked-Out → (terminal)
// Cancelled → (terminal)

export const BOOKING_TRANSITIONS: Record<BookingStatus, readonly BookingStatus[]> = {
  [BookingStatus.BOOKED]: [BookingStatus.CHECKED_IN, BookingStatus.CANCELLED],
  [BookingStatus.CHECKED_IN]: [BookingStatus.CHECKED_OUT, BookingStatus.CANCELLED],
  [BookingStatus.CHECKED_OUT]: [],
  [BookingStatus.CANCELLED]: [],
};

/** Statuses that keep a room occupied */
export const ACTIVE_BOOKING_STATUSES: readonly BookingStatus[] = [
  BookingStatus.BOOKED,
  BookingStatus.CHECKED_IN,
];

export const TERMINAL_BOOKING_STATUSES: readonly BookingStatus[] = [
  BookingStatus.CHECKED_OUT,
  BookingStatus.CANCELLED,
];

/** The status each caller-facing action moves a booking into */
export const ACTION_TARGET_STATUS: Record<BookingAction, BookingStatus> = {
  checkIn: BookingStatus.CHECKED_IN,
  checkOut: BookingStatus.CHECKED_OUT,
  cancel: BookingStatus.CANCELLED,
};

export function isActiveBookingStatus(status: BookingStatus): boolean {
  return ACTIVE_BOOKING_STATUSES.includes(status);
}

export function isTerminalBookingStatus(status: BookingStatus): boolean {
  return TERMINAL_BOOKING_STATUSES.includes(status);
}

export function canTransitionBooking(from: BookingStatus, to: BookingStatus): boolean {
  return BOOKING_TRANSITIONS[from].includes(to);
}

export function assertBookingTransition(from: BookingStatus, to: BookingStatus): void {
  if (!canTransitionBooking(from, to)) {
    throw new InvalidStatusTransitionError('booking', from, to);
  }
}

// ══════════════════════════════════════════════════════════════════
// Room Status Derivation
// ══════════════════════════════════════════════════════════════════
//
// Occupied while at least one Booked/Checked-In booking references the
// room, Available otherwise. Maintenance is set and cleared only by
// setRoomMaintenance; booking activity never overwrites it.

export function occupancyStatus(activeBookingCount: number): RoomStatus {
  return activeBookingCount > 0 ? RoomStatus.OCCUPIED : RoomStatus.AVAILABLE;
}

export function deriveRoomStatus(current: RoomStatus, activeBookingCount: number): RoomStatus {
  if (current === RoomStatus.MAINTENANCE) return RoomStatus.MAINTENANCE;
  return occupancyStatus(activeBookingCount);
}
