import { and, asc, count, desc, eq, gte, inArray, lt, ne } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { AnyPgColumn } from 'drizzle-orm/pg-core';
import { bookings, guests, rooms, isUniqueViolation } from '@innkeep/db';
import type { BookingRow, Database, GuestRow, RoomRow } from '@innkeep/db';
import { fromDecimalString, nightsBetween, toDecimalString } from '@innkeep/shared';
import { RoomNumberTakenError } from '../errors';
import { ACTIVE_BOOKING_STATUSES } from '../state-machines';
import { RoomStatus, isBookingStatus, isRoomCategory, isRoomStatus } from '../types';
import type { Booking, BookingListItem, Guest, PageRequest, Room } from '../types';
import type { HotelStore, HotelTx } from './types';

type DrizzleTx = Parameters<Parameters<Database['transaction']>[0]>[0];

// ── Row mapping ──────────────────────────────────────────────────

function toRoom(row: RoomRow): Room {
  if (!isRoomCategory(row.category)) {
    throw new Error(`Room ${row.id} has unknown category ${row.category}`);
  }
  if (!isRoomStatus(row.status)) {
    throw new Error(`Room ${row.id} has unknown status ${row.status}`);
  }
  return {
    id: row.id,
    number: row.number,
    category: row.category,
    pricePerNight: fromDecimalString(row.pricePerNight),
    status: row.status,
    createdAt: row.createdAt,
  };
}

function toGuest(row: GuestRow): Guest {
  return {
    id: row.id,
    name: row.name,
    phone: row.phone ?? null,
    email: row.email ?? null,
    createdAt: row.createdAt,
  };
}

function toBooking(row: BookingRow): Booking {
  if (!isBookingStatus(row.status)) {
    throw new Error(`Booking ${row.id} has unknown status ${row.status}`);
  }
  return {
    id: row.id,
    roomId: row.roomId,
    guestId: row.guestId,
    checkIn: row.checkIn,
    checkOut: row.checkOut,
    nights: nightsBetween(row.checkIn, row.checkOut),
    status: row.status,
    totalAmount: fromDecimalString(row.totalAmount),
    createdAt: row.createdAt,
  };
}

function beforeCursor(column: AnyPgColumn, cursor?: string): SQL | undefined {
  return cursor ? lt(column, cursor) : undefined;
}

const activeStatuses = [...ACTIVE_BOOKING_STATUSES];

// ── Transaction handle ───────────────────────────────────────────

export class DrizzleHotelTx implements HotelTx {
  constructor(private readonly tx: DrizzleTx) {}

  async insertRoom(room: Room): Promise<void> {
    try {
      await this.tx.insert(rooms).values({
        id: room.id,
        number: room.number,
        category: room.category,
        pricePerNight: toDecimalString(room.pricePerNight),
        status: room.status,
        createdAt: room.createdAt,
      });
    } catch (err) {
      // Two writers passed the number check concurrently; the index decides.
      if (isUniqueViolation(err, 'uq_rooms_number')) {
        throw new RoomNumberTakenError(room.number);
      }
      throw err;
    }
  }

  async findRoom(roomId: string, options?: { forUpdate?: boolean }): Promise<Room | null> {
    const query = this.tx.select().from(rooms).where(eq(rooms.id, roomId));
    const [row] = options?.forUpdate ? await query.for('update') : await query;
    return row ? toRoom(row) : null;
  }

  async findRoomByNumber(roomNumber: string): Promise<Room | null> {
    const [row] = await this.tx.select().from(rooms).where(eq(rooms.number, roomNumber));
    return row ? toRoom(row) : null;
  }

  async updateRoomStatus(roomId: string, status: Room['status']): Promise<void> {
    await this.tx.update(rooms).set({ status }).where(eq(rooms.id, roomId));
  }

  async deleteRoom(roomId: string): Promise<boolean> {
    const deleted = await this.tx.delete(rooms).where(eq(rooms.id, roomId)).returning({ id: rooms.id });
    return deleted.length > 0;
  }

  async listRooms(page: PageRequest): Promise<Room[]> {
    const rows = await this.tx
      .select()
      .from(rooms)
      .where(beforeCursor(rooms.id, page.cursor))
      .orderBy(desc(rooms.id))
      .limit(page.limit);
    return rows.map(toRoom);
  }

  async listBookableRooms(): Promise<Room[]> {
    const rows = await this.tx
      .select()
      .from(rooms)
      .where(ne(rooms.status, RoomStatus.MAINTENANCE))
      .orderBy(asc(rooms.number));
    return rows.map(toRoom);
  }

  async countRooms(filter?: { status?: Room['status'] }): Promise<number> {
    const [row] = await this.tx
      .select({ value: count() })
      .from(rooms)
      .where(filter?.status ? eq(rooms.status, filter.status) : undefined);
    return row?.value ?? 0;
  }

  async insertGuest(guest: Guest): Promise<void> {
    await this.tx.insert(guests).values({
      id: guest.id,
      name: guest.name,
      phone: guest.phone,
      email: guest.email,
      createdAt: guest.createdAt,
    });
  }

  async findGuest(guestId: string): Promise<Guest | null> {
    const [row] = await this.tx.select().from(guests).where(eq(guests.id, guestId));
    return row ? toGuest(row) : null;
  }

  async deleteGuest(guestId: string): Promise<boolean> {
    const deleted = await this.tx.delete(guests).where(eq(guests.id, guestId)).returning({ id: guests.id });
    return deleted.length > 0;
  }

  async listGuests(page: PageRequest): Promise<Guest[]> {
    const rows = await this.tx
      .select()
      .from(guests)
      .where(beforeCursor(guests.id, page.cursor))
      .orderBy(desc(guests.id))
      .limit(page.limit);
    return rows.map(toGuest);
  }

  async countGuests(): Promise<number> {
    const [row] = await this.tx.select({ value: count() }).from(guests);
    return row?.value ?? 0;
  }

  async insertBooking(booking: Booking): Promise<void> {
    await this.tx.insert(bookings).values({
      id: booking.id,
      roomId: booking.roomId,
      guestId: booking.guestId,
      checkIn: booking.checkIn,
      checkOut: booking.checkOut,
      status: booking.status,
      totalAmount: toDecimalString(booking.totalAmount),
      createdAt: booking.createdAt,
    });
  }

  async findBooking(bookingId: string, options?: { forUpdate?: boolean }): Promise<Booking | null> {
    const query = this.tx.select().from(bookings).where(eq(bookings.id, bookingId));
    const [row] = options?.forUpdate ? await query.for('update') : await query;
    return row ? toBooking(row) : null;
  }

  async updateBookingStatus(bookingId: string, status: Booking['status']): Promise<void> {
    await this.tx.update(bookings).set({ status }).where(eq(bookings.id, bookingId));
  }

  async listActiveBookingsForRoom(roomId: string): Promise<Booking[]> {
    const rows = await this.tx
      .select()
      .from(bookings)
      .where(and(eq(bookings.roomId, roomId), inArray(bookings.status, activeStatuses)))
      .orderBy(asc(bookings.id));
    return rows.map(toBooking);
  }

  async listActiveRoomIdsForGuest(guestId: string): Promise<string[]> {
    const rows = await this.tx
      .selectDistinct({ roomId: bookings.roomId })
      .from(bookings)
      .where(and(eq(bookings.guestId, guestId), inArray(bookings.status, activeStatuses)))
      .orderBy(asc(bookings.roomId));
    return rows.map((r) => r.roomId);
  }

  async listBookings(page: PageRequest): Promise<BookingListItem[]> {
    const rows = await this.tx
      .select({ booking: bookings, roomNumber: rooms.number, guestName: guests.name })
      .from(bookings)
      .innerJoin(rooms, eq(rooms.id, bookings.roomId))
      .innerJoin(guests, eq(guests.id, bookings.guestId))
      .where(beforeCursor(bookings.id, page.cursor))
      .orderBy(desc(bookings.id))
      .limit(page.limit);
    return rows.map((r) => ({
      ...toBooking(r.booking),
      roomNumber: r.roomNumber,
      guestName: r.guestName,
    }));
  }

  async countBookingsCreatedBetween(start: Date, end: Date): Promise<number> {
    const [row] = await this.tx
      .select({ value: count() })
      .from(bookings)
      .where(and(gte(bookings.createdAt, start), lt(bookings.createdAt, end)));
    return row?.value ?? 0;
  }
}

// ── Store ────────────────────────────────────────────────────────

/** PostgreSQL-backed store; each transaction maps to `db.transaction`. */
export class DrizzleHotelStore implements HotelStore {
  constructor(private readonly db: Database) {}

  transaction<T>(operation: (tx: HotelTx) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => operation(new DrizzleHotelTx(tx)));
  }
}
