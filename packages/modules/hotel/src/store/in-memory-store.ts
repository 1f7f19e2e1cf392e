import { compareIdsDesc } from '@innkeep/shared';
import { RoomNumberTakenError } from '../errors';
import { isActiveBookingStatus } from '../state-machines';
import { RoomStatus } from '../types';
import type { Booking, BookingListItem, Guest, PageRequest, Room } from '../types';
import type { HotelStore, HotelTx } from './types';

interface HotelState {
  rooms: Map<string, Room>;
  guests: Map<string, Guest>;
  bookings: Map<string, Booking>;
}

function emptyState(): HotelState {
  return { rooms: new Map(), guests: new Map(), bookings: new Map() };
}

// Rows are replaced, never mutated in place, so copying the maps is enough
// to give each transaction its own snapshot.
function cloneState(state: HotelState): HotelState {
  return {
    rooms: new Map(state.rooms),
    guests: new Map(state.guests),
    bookings: new Map(state.bookings),
  };
}

function page<T extends { id: string }>(rows: Iterable<T>, request: PageRequest): T[] {
  const { cursor } = request;
  return Array.from(rows)
    .filter((row) => cursor === undefined || row.id < cursor)
    .sort(compareIdsDesc)
    .slice(0, request.limit);
}

class InMemoryHotelTx implements HotelTx {
  constructor(private readonly state: HotelState) {}

  // ── Rooms ──

  async insertRoom(room: Room): Promise<void> {
    for (const existing of this.state.rooms.values()) {
      if (existing.number === room.number) {
        throw new RoomNumberTakenError(room.number);
      }
    }
    this.state.rooms.set(room.id, { ...room });
  }

  async findRoom(roomId: string): Promise<Room | null> {
    const room = this.state.rooms.get(roomId);
    return room ? { ...room } : null;
  }

  async findRoomByNumber(roomNumber: string): Promise<Room | null> {
    for (const room of this.state.rooms.values()) {
      if (room.number === roomNumber) return { ...room };
    }
    return null;
  }

  async updateRoomStatus(roomId: string, status: RoomStatus): Promise<void> {
    const room = this.state.rooms.get(roomId);
    if (room) {
      this.state.rooms.set(roomId, { ...room, status });
    }
  }

  async deleteRoom(roomId: string): Promise<boolean> {
    if (!this.state.rooms.delete(roomId)) return false;
    for (const booking of Array.from(this.state.bookings.values())) {
      if (booking.roomId === roomId) this.state.bookings.delete(booking.id);
    }
    return true;
  }

  async listRooms(request: PageRequest): Promise<Room[]> {
    return page(this.state.rooms.values(), request).map((r) => ({ ...r }));
  }

  async listBookableRooms(): Promise<Room[]> {
    return Array.from(this.state.rooms.values())
      .filter((r) => r.status !== RoomStatus.MAINTENANCE)
      .sort((a, b) => (a.number < b.number ? -1 : a.number > b.number ? 1 : 0))
      .map((r) => ({ ...r }));
  }

  async countRooms(filter?: { status?: RoomStatus }): Promise<number> {
    let total = 0;
    for (const room of this.state.rooms.values()) {
      if (!filter?.status || room.status === filter.status) total++;
    }
    return total;
  }

  // ── Guests ──

  async insertGuest(guest: Guest): Promise<void> {
    this.state.guests.set(guest.id, { ...guest });
  }

  async findGuest(guestId: string): Promise<Guest | null> {
    const guest = this.state.guests.get(guestId);
    return guest ? { ...guest } : null;
  }

  async deleteGuest(guestId: string): Promise<boolean> {
    if (!this.state.guests.delete(guestId)) return false;
    for (const booking of Array.from(this.state.bookings.values())) {
      if (booking.guestId === guestId) this.state.bookings.delete(booking.id);
    }
    return true;
  }

  async listGuests(request: PageRequest): Promise<Guest[]> {
    return page(this.state.guests.values(), request).map((g) => ({ ...g }));
  }

  async countGuests(): Promise<number> {
    return this.state.guests.size;
  }

  // ── Bookings ──

  async insertBooking(booking: Booking): Promise<void> {
    if (!this.state.rooms.has(booking.roomId) || !this.state.guests.has(booking.guestId)) {
      throw new Error(`Booking ${booking.id} references a missing room or guest`);
    }
    this.state.bookings.set(booking.id, { ...booking });
  }

  async findBooking(bookingId: string): Promise<Booking | null> {
    const booking = this.state.bookings.get(bookingId);
    return booking ? { ...booking } : null;
  }

  async updateBookingStatus(bookingId: string, status: Booking['status']): Promise<void> {
    const booking = this.state.bookings.get(bookingId);
    if (booking) {
      this.state.bookings.set(bookingId, { ...booking, status });
    }
  }

  async listActiveBookingsForRoom(roomId: string): Promise<Booking[]> {
    return Array.from(this.state.bookings.values())
      .filter((b) => b.roomId === roomId && isActiveBookingStatus(b.status))
      .sort((a, b) => -compareIdsDesc(a, b))
      .map((b) => ({ ...b }));
  }

  async listActiveRoomIdsForGuest(guestId: string): Promise<string[]> {
    const roomIds = new Set<string>();
    for (const booking of this.state.bookings.values()) {
      if (booking.guestId === guestId && isActiveBookingStatus(booking.status)) {
        roomIds.add(booking.roomId);
      }
    }
    return Array.from(roomIds).sort();
  }

  async listBookings(request: PageRequest): Promise<BookingListItem[]> {
    const items: BookingListItem[] = [];
    for (const booking of page(this.state.bookings.values(), request)) {
      const room = this.state.rooms.get(booking.roomId);
      const guest = this.state.guests.get(booking.guestId);
      if (room && guest) {
        items.push({ ...booking, roomNumber: room.number, guestName: guest.name });
      }
    }
    return items;
  }

  async countBookingsCreatedBetween(start: Date, end: Date): Promise<number> {
    let total = 0;
    for (const booking of this.state.bookings.values()) {
      const at = booking.createdAt.getTime();
      if (at >= start.getTime() && at < end.getTime()) total++;
    }
    return total;
  }
}

/**
 * In-process store with the same transactional contract as the database:
 * each transaction works on a snapshot that replaces the committed state
 * only when the operation resolves. Transactions run one at a time, which
 * stands in for the row locks the database takes. Not reentrant: opening a
 * transaction from inside another one never settles.
 */
export class InMemoryHotelStore implements HotelStore {
  private state: HotelState = emptyState();
  private tail: Promise<void> = Promise.resolve();

  transaction<T>(operation: (tx: HotelTx) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const draft = cloneState(this.state);
      const result = await operation(new InMemoryHotelTx(draft));
      this.state = draft;
      return result;
    };
    const result = this.tail.then(run);
    // Failures reach the caller through `result`; the tail only orders transactions.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
