import {
  pgTable,
  text,
  date,
  timestamp,
  numeric,
  index,
  uniqueIndex,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { generateUlid } from '@innkeep/shared';

// ── Rooms ───────────────────────────────────────────────────────
export const rooms = pgTable(
  'rooms',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    number: text('number').notNull(),
    category: text('category').notNull(),
    pricePerNight: numeric('price_per_night', { precision: 10, scale: 2 }).notNull(),
    status: text('status').notNull().default('Available'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_rooms_number').on(table.number),
    index('idx_rooms_status').on(table.status),
    check('chk_rooms_category', sql`category IN ('Single', 'Double', 'Suite')`),
    check('chk_rooms_status', sql`status IN ('Available', 'Occupied', 'Maintenance')`),
    check('chk_rooms_price', sql`price_per_night >= 0`),
  ],
);

// ── Guests ──────────────────────────────────────────────────────
export const guests = pgTable('guests', {
  id: text('id').primaryKey().$defaultFn(generateUlid),
  name: text('name').notNull(),
  phone: text('phone'),
  email: text('email'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

// ── Bookings ────────────────────────────────────────────────────
export const bookings = pgTable(
  'bookings',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    roomId: text('room_id')
      .notNull()
      .references(() => rooms.id, { onDelete: 'cascade' }),
    guestId: text('guest_id')
      .notNull()
      .references(() => guests.id, { onDelete: 'cascade' }),
    checkIn: date('check_in', { mode: 'string' }).notNull(),
    checkOut: date('check_out', { mode: 'string' }).notNull(),
    status: text('status').notNull().default('Booked'),
    totalAmount: numeric('total_amount', { precision: 10, scale: 2 }).notNull().default('0'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_bookings_room_status').on(table.roomId, table.status),
    index('idx_bookings_guest').on(table.guestId),
    index('idx_bookings_created_at').on(table.createdAt),
    check('chk_bookings_dates', sql`check_out > check_in`),
    check(
      'chk_bookings_status',
      sql`status IN ('Booked', 'Checked-In', 'Checked-Out', 'Cancelled')`,
    ),
    check('chk_bookings_total', sql`total_amount >= 0`),
  ],
);

export type RoomRow = typeof rooms.$inferSelect;
export type GuestRow = typeof guests.$inferSelect;
export type BookingRow = typeof bookings.$inferSelect;
export type NewRoomRow = typeof rooms.$inferInsert;
export type NewGuestRow = typeof guests.$inferInsert;
export type NewBookingRow = typeof bookings.$inferInsert;
