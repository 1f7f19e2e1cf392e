import { assertValidated, generateUlid } from '@innkeep/shared';
import type { HotelTx } from '../store/types';
import type { Guest } from '../types';
import { createGuestSchema } from '../validation';
import type { CreateGuestInput } from '../validation';

export async function createGuest(tx: HotelTx, input: CreateGuestInput, now: Date = new Date()): Promise<Guest> {
  const parsed = createGuestSchema.safeParse(input);
  assertValidated(parsed, 'Invalid guest');

  const guest: Guest = {
    id: generateUlid(),
    name: parsed.data.name,
    phone: parsed.data.phone ?? null,
    email: parsed.data.email ?? null,
    createdAt: now,
  };
  await tx.insertGuest(guest);
  return guest;
}
