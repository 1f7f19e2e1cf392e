import { isAppError } from '@innkeep/shared';
import { getHotelConfig } from '@innkeep/core/config';
import { errorFields, logger } from '@innkeep/core/observability';
import type { LogFields } from '@innkeep/core/observability';
import type { HotelStore, HotelTx } from './store/types';
import { createRoom } from './commands/create-room';
import { createGuest } from './commands/create-guest';
import { createBooking } from './commands/create-booking';
import { transitionBooking } from './commands/transition-booking';
import { setRoomMaintenance } from './commands/set-room-maintenance';
import { deleteRoom } from './commands/delete-room';
import { deleteGuest } from './commands/delete-guest';
import { getRoom } from './queries/get-room';
import { getGuest } from './queries/get-guest';
import { getBooking } from './queries/get-booking';
import { listRoomsPage, listBookableRooms } from './queries/list-rooms';
import { listGuestsPage } from './queries/list-guests';
import { listBookingsPage } from './queries/list-bookings';
import { getDashboardStats } from './queries/get-dashboard-stats';
import { iteratePages } from './queries/paginate';
import { BookingAction } from './types';
import type {
  Booking,
  BookingListItem,
  DashboardStats,
  Guest,
  Page,
  Room,
  TransitionResult,
} from './types';
import type {
  CreateBookingInput,
  CreateGuestInput,
  CreateRoomInput,
  ListPageInput,
} from './validation';

/**
 * Everything a presentation layer needs from the hotel core. Each call runs
 * in its own store transaction and either resolves with plain values or
 * rejects with an AppError (ValidationError, NotFoundError, ConflictError).
 */
export interface BookingService {
  // ── Registry ──
  createRoom(input: CreateRoomInput): Promise<Room>;
  createGuest(input: CreateGuestInput): Promise<Guest>;
  getRoom(roomId: string): Promise<Room>;
  getGuest(guestId: string): Promise<Guest>;
  /** Newest first; pages are read lazily and each iteration starts over. */
  listRooms(): AsyncIterable<Room>;
  /** Newest first; pages are read lazily and each iteration starts over. */
  listGuests(): AsyncIterable<Guest>;
  listRoomsPage(input?: ListPageInput): Promise<Page<Room>>;
  listGuestsPage(input?: ListPageInput): Promise<Page<Guest>>;
  listBookableRooms(): Promise<Room[]>;
  setRoomMaintenance(roomId: string, underMaintenance: boolean): Promise<Room>;
  deleteRoom(roomId: string): Promise<Room>;
  deleteGuest(guestId: string): Promise<Guest>;

  // ── Bookings ──
  createBooking(input: CreateBookingInput): Promise<Booking>;
  transition(bookingId: string, action: BookingAction): Promise<TransitionResult>;
  checkIn(bookingId: string): Promise<TransitionResult>;
  checkOut(bookingId: string): Promise<TransitionResult>;
  cancel(bookingId: string): Promise<TransitionResult>;
  getBooking(bookingId: string): Promise<Booking>;
  /** Newest first, joined with room number and guest name. */
  listBookings(): AsyncIterable<BookingListItem>;
  listBookingsPage(input?: ListPageInput): Promise<Page<BookingListItem>>;
  getDashboardStats(): Promise<DashboardStats>;
}

export interface BookingServiceOptions {
  /** Source of creation timestamps and of "today" for the dashboard. */
  clock?: () => Date;
  /** Rows per page read by the lazy listings; defaults to HOTEL_PAGE_SIZE. */
  pageSize?: number;
}

export function createBookingService(
  store: HotelStore,
  options: BookingServiceOptions = {},
): BookingService {
  const clock = options.clock ?? (() => new Date());
  const pageSize = options.pageSize ?? getHotelConfig().pageSize;

  async function run<T>(
    operation: string,
    fields: LogFields,
    fn: (tx: HotelTx) => Promise<T>,
    summarize?: (result: T) => LogFields,
  ): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await store.transaction(fn);
      if (summarize) {
        logger.info(`${operation} committed`, {
          operation,
          ...fields,
          ...summarize(result),
          durationMs: Date.now() - startedAt,
        });
      }
      return result;
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      if (isAppError(error)) {
        logger.warn(`${operation} rejected`, {
          operation,
          ...fields,
          durationMs,
          error: { code: error.code, message: error.message },
        });
      } else {
        logger.error(`${operation} failed`, {
          operation,
          ...fields,
          durationMs,
          error: errorFields(error),
        });
      }
      throw error;
    }
  }

  const transition = (bookingId: string, action: BookingAction) =>
    run(
      'transition',
      { bookingId, action },
      (tx) => transitionBooking(tx, { bookingId, action }),
      (r) => ({ roomId: r.booking.roomId, bookingStatus: r.booking.status, roomStatus: r.roomStatus }),
    );

  const service: BookingService = {
    createRoom: (input) =>
      run(
        'createRoom',
        {},
        (tx) => createRoom(tx, input, clock()),
        (room) => ({ roomId: room.id, roomNumber: room.number }),
      ),

    createGuest: (input) =>
      run(
        'createGuest',
        {},
        (tx) => createGuest(tx, input, clock()),
        (guest) => ({ guestId: guest.id }),
      ),

    getRoom: (roomId) => run('getRoom', { roomId }, (tx) => getRoom(tx, roomId)),

    getGuest: (guestId) => run('getGuest', { guestId }, (tx) => getGuest(tx, guestId)),

    listRooms: () => iteratePages((cursor) => service.listRoomsPage({ cursor, limit: pageSize })),

    listGuests: () => iteratePages((cursor) => service.listGuestsPage({ cursor, limit: pageSize })),

    listRoomsPage: (input) => run('listRooms', {}, (tx) => listRoomsPage(tx, input)),

    listGuestsPage: (input) => run('listGuests', {}, (tx) => listGuestsPage(tx, input)),

    listBookableRooms: () => run('listBookableRooms', {}, (tx) => listBookableRooms(tx)),

    setRoomMaintenance: (roomId, underMaintenance) =>
      run(
        'setRoomMaintenance',
        { roomId, underMaintenance },
        (tx) => setRoomMaintenance(tx, { roomId, underMaintenance }),
        (room) => ({ roomStatus: room.status }),
      ),

    deleteRoom: (roomId) =>
      run('deleteRoom', { roomId }, (tx) => deleteRoom(tx, roomId), () => ({})),

    deleteGuest: (guestId) =>
      run('deleteGuest', { guestId }, (tx) => deleteGuest(tx, guestId), () => ({})),

    createBooking: (input) =>
      run(
        'createBooking',
        { roomId: input.roomId, guestId: input.guestId },
        (tx) => createBooking(tx, input, clock()),
        (booking) => ({
          bookingId: booking.id,
          nights: booking.nights,
          totalAmount: booking.totalAmount,
        }),
      ),

    transition,
    checkIn: (bookingId) => transition(bookingId, BookingAction.CHECK_IN),
    checkOut: (bookingId) => transition(bookingId, BookingAction.CHECK_OUT),
    cancel: (bookingId) => transition(bookingId, BookingAction.CANCEL),

    getBooking: (bookingId) => run('getBooking', { bookingId }, (tx) => getBooking(tx, bookingId)),

    listBookings: () =>
      iteratePages((cursor) => service.listBookingsPage({ cursor, limit: pageSize })),

    listBookingsPage: (input) => run('listBookings', {}, (tx) => listBookingsPage(tx, input)),

    getDashboardStats: () => run('getDashboardStats', {}, (tx) => getDashboardStats(tx, clock())),
  };

  return service;
}
