import type {
  Booking,
  BookingListItem,
  Guest,
  PageRequest,
  Room,
  RoomStatus,
} from '../types';

/**
 * Unit-of-work handle for one transaction. Every read and write an engine
 * operation performs goes through the handle it was given, so the booking
 * and room mutations of one call commit together or not at all.
 */
export interface HotelTx {
  // ── Rooms ──
  insertRoom(room: Room): Promise<void>;
  /** `forUpdate` takes a row lock held until the transaction ends. */
  findRoom(roomId: string, options?: { forUpdate?: boolean }): Promise<Room | null>;
  findRoomByNumber(roomNumber: string): Promise<Room | null>;
  updateRoomStatus(roomId: string, status: RoomStatus): Promise<void>;
  /** Deletes the room and, by cascade, its bookings. */
  deleteRoom(roomId: string): Promise<boolean>;
  /** Newest first, ids strictly below `cursor`. */
  listRooms(page: PageRequest): Promise<Room[]>;
  /** Rooms not under maintenance, ordered by room number. */
  listBookableRooms(): Promise<Room[]>;
  countRooms(filter?: { status?: RoomStatus }): Promise<number>;

  // ── Guests ──
  insertGuest(guest: Guest): Promise<void>;
  findGuest(guestId: string): Promise<Guest | null>;
  /** Deletes the guest and, by cascade, their bookings. */
  deleteGuest(guestId: string): Promise<boolean>;
  listGuests(page: PageRequest): Promise<Guest[]>;
  countGuests(): Promise<number>;

  // ── Bookings ──
  insertBooking(booking: Booking): Promise<void>;
  findBooking(bookingId: string, options?: { forUpdate?: boolean }): Promise<Booking | null>;
  updateBookingStatus(bookingId: string, status: Booking['status']): Promise<void>;
  /** Bookings on the room in Booked or Checked-In. */
  listActiveBookingsForRoom(roomId: string): Promise<Booking[]>;
  /** Distinct rooms on which the guest holds a Booked or Checked-In booking. */
  listActiveRoomIdsForGuest(guestId: string): Promise<string[]>;
  listBookings(page: PageRequest): Promise<BookingListItem[]>;
  countBookingsCreatedBetween(start: Date, end: Date): Promise<number>;
}

export interface HotelStore {
  /**
   * Run `operation` inside one transaction. A rejection rolls back every
   * write made through the handle.
   */
  transaction<T>(operation: (tx: HotelTx) => Promise<T>): Promise<T>;
}
