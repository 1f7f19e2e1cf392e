import { z } from 'zod';
import { MAX_MONEY_AMOUNT, isCalendarDate } from '@innkeep/shared';
import { ROOM_CATEGORIES, BOOKING_ACTIONS } from './types';

const calendarDate = z
  .string()
  .refine(isCalendarDate, { message: 'Must be a calendar date (YYYY-MM-DD)' });

// Blank optional contact fields are stored as absent.
const blankToUndefined = (v: string | undefined) => (v ? v : undefined);

// ── Room ─────────────────────────────────────────────────────────
export const createRoomSchema = z.object({
  number: z.string().trim().min(1, 'Room number is required').max(20),
  category: z.enum(ROOM_CATEGORIES),
  price: z
    .number()
    .finite()
    .min(0, 'Price must not be negative')
    .max(MAX_MONEY_AMOUNT, `Price must not exceed ${MAX_MONEY_AMOUNT}`),
});
export type CreateRoomInput = z.input<typeof createRoomSchema>;

export const setRoomMaintenanceSchema = z.object({
  roomId: z.string().min(1),
  underMaintenance: z.boolean(),
});
export type SetRoomMaintenanceInput = z.input<typeof setRoomMaintenanceSchema>;

// ── Guest ────────────────────────────────────────────────────────
export const createGuestSchema = z.object({
  name: z.string().trim().min(1, 'Guest name is required').max(200),
  phone: z.string().trim().max(40).optional().transform(blankToUndefined),
  email: z
    .string()
    .trim()
    .optional()
    .transform(blankToUndefined)
    .pipe(z.string().email().optional()),
});
export type CreateGuestInput = z.input<typeof createGuestSchema>;

// ── Booking ──────────────────────────────────────────────────────
export const createBookingSchema = z
  .object({
    roomId: z.string().min(1),
    guestId: z.string().min(1),
    checkIn: calendarDate,
    checkOut: calendarDate,
  })
  .refine((data) => data.checkOut > data.checkIn, {
    message: 'Check-out must be after check-in',
    path: ['checkOut'],
  });
export type CreateBookingInput = z.input<typeof createBookingSchema>;

export const transitionBookingSchema = z.object({
  bookingId: z.string().min(1),
  action: z.enum(BOOKING_ACTIONS),
});
export type TransitionBookingInput = z.input<typeof transitionBookingSchema>;

// ── Listing ──────────────────────────────────────────────────────
export const listPageSchema = z.object({
  cursor: z.string().min(1).optional(),
  limit: z.number().int().min(1).max(100).optional(),
});
export type ListPageInput = z.input<typeof listPageSchema>;
