export type { HotelStore, HotelTx } from './types';
export { DrizzleHotelStore, DrizzleHotelTx } from './drizzle-store';
export { InMemoryHotelStore } from './in-memory-store';
