export const MODULE_KEY = 'hotel' as const;
export const MODULE_NAME = 'Hotel Rooms & Bookings';
export const MODULE_VERSION = '0.1.0';

// Types
export {
  RoomCategory,
  RoomStatus,
  BookingStatus,
  BookingAction,
  ROOM_CATEGORIES,
  ROOM_STATUSES,
  BOOKING_STATUSES,
  BOOKING_ACTIONS,
  isRoomCategory,
  isRoomStatus,
  isBookingStatus,
} from './types';
export type {
  Room,
  Guest,
  Booking,
  BookingListItem,
  TransitionResult,
  DashboardStats,
  Page,
  PageRequest,
} from './types';

// Errors
export { RoomNumberTakenError, RoomUnderMaintenanceError, InvalidStatusTransitionError } from './errors';

// State machines
export {
  BOOKING_TRANSITIONS,
  ACTIVE_BOOKING_STATUSES,
  TERMINAL_BOOKING_STATUSES,
  ACTION_TARGET_STATUS,
  isActiveBookingStatus,
  isTerminalBookingStatus,
  canTransitionBooking,
  assertBookingTransition,
  occupancyStatus,
  deriveRoomStatus,
} from './state-machines';

// Validation schemas
export {
  createRoomSchema,
  setRoomMaintenanceSchema,
  createGuestSchema,
  createBookingSchema,
  transitionBookingSchema,
  listPageSchema,
} from './validation';
export type {
  CreateRoomInput,
  SetRoomMaintenanceInput,
  CreateGuestInput,
  CreateBookingInput,
  TransitionBookingInput,
  ListPageInput,
} from './validation';

// Stores
export { DrizzleHotelStore, DrizzleHotelTx, InMemoryHotelStore } from './store';
export type { HotelStore, HotelTx } from './store';

// Commands
export { createRoom } from './commands/create-room';
export { createGuest } from './commands/create-guest';
export { createBooking, quoteStay } from './commands/create-booking';
export { transitionBooking } from './commands/transition-booking';
export { setRoomMaintenance } from './commands/set-room-maintenance';
export { deleteRoom } from './commands/delete-room';
export { deleteGuest } from './commands/delete-guest';
export { syncRoomStatus } from './commands/sync-room-status';

// Queries
export { getRoom } from './queries/get-room';
export { getGuest } from './queries/get-guest';
export { getBooking } from './queries/get-booking';
export { listRoomsPage, listBookableRooms, DEFAULT_PAGE_SIZE } from './queries/list-rooms';
export { listGuestsPage } from './queries/list-guests';
export { listBookingsPage } from './queries/list-bookings';
export { getDashboardStats } from './queries/get-dashboard-stats';
export { fetchPage, iteratePages } from './queries/paginate';

// Service
export { createBookingService } from './service';
export type { BookingService, BookingServiceOptions } from './service';
