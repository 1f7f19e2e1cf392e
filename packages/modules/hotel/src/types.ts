// ── Room Categories ──────────────────────────────────────────────
export const RoomCategory = {
  SINGLE: 'Single',
  DOUBLE: 'Double',
  SUITE: 'Suite',
} as const;
export type RoomCategory = (typeof RoomCategory)[keyof typeof RoomCategory];

// ── Room Statuses ────────────────────────────────────────────────
export const RoomStatus = {
  AVAILABLE: 'Available',
  OCCUPIED: 'Occupied',
  MAINTENANCE: 'Maintenance',
} as const;
export type RoomStatus = (typeof RoomStatus)[keyof typeof RoomStatus];

// ── Booking Statuses ─────────────────────────────────────────────
export const BookingStatus = {
  BOOKED: 'Booked',
  CHECKED_IN: 'Checked-In',
  CHECKED_OUT: 'Checked-Out',
  CANCELLED: 'Cancelled',
} as const;
export type BookingStatus = (typeof BookingStatus)[keyof typeof BookingStatus];

// ── Booking Actions ──────────────────────────────────────────────
export const BookingAction = {
  CHECK_IN: 'checkIn',
  CHECK_OUT: 'checkOut',
  CANCEL: 'cancel',
} as const;
export type BookingAction = (typeof BookingAction)[keyof typeof BookingAction];

export const ROOM_CATEGORIES = [RoomCategory.SINGLE, RoomCategory.DOUBLE, RoomCategory.SUITE] as const;
export const ROOM_STATUSES = [RoomStatus.AVAILABLE, RoomStatus.OCCUPIED, RoomStatus.MAINTENANCE] as const;
export const BOOKING_STATUSES = [
  BookingStatus.BOOKED,
  BookingStatus.CHECKED_IN,
  BookingStatus.CHECKED_OUT,
  BookingStatus.CANCELLED,
] as const;
export const BOOKING_ACTIONS = [
  BookingAction.CHECK_IN,
  BookingAction.CHECK_OUT,
  BookingAction.CANCEL,
] as const;

export function isRoomCategory(value: string): value is RoomCategory {
  return ROOM_CATEGORIES.some((c) => c === value);
}

export function isRoomStatus(value: string): value is RoomStatus {
  return ROOM_STATUSES.some((s) => s === value);
}

export function isBookingStatus(value: string): value is BookingStatus {
  return BOOKING_STATUSES.some((s) => s === value);
}

// ── Entities ─────────────────────────────────────────────────────
export interface Room {
  id: string;
  number: string;
  category: RoomCategory;
  pricePerNight: number;
  status: RoomStatus;
  createdAt: Date;
}

export interface Guest {
  id: string;
  name: string;
  phone: string | null;
  email: string | null;
  createdAt: Date;
}

export interface Booking {
  id: string;
  roomId: string;
  guestId: string;
  /** `YYYY-MM-DD` */
  checkIn: string;
  /** `YYYY-MM-DD`, strictly after `checkIn` */
  checkOut: string;
  nights: number;
  status: BookingStatus;
  totalAmount: number;
  createdAt: Date;
}

/** A booking joined with the room number and guest name it refers to. */
export interface BookingListItem extends Booking {
  roomNumber: string;
  guestName: string;
}

export interface TransitionResult {
  booking: Booking;
  roomStatus: RoomStatus;
}

export interface DashboardStats {
  roomsTotal: number;
  roomsAvailable: number;
  guestsTotal: number;
  bookingsToday: number;
}

// ── Pagination ───────────────────────────────────────────────────
export interface PageRequest {
  /** Return rows whose id sorts strictly before this one. */
  cursor?: string;
  limit: number;
}

export interface Page<T> {
  items: T[];
  cursor: string | null;
  hasMore: boolean;
}
