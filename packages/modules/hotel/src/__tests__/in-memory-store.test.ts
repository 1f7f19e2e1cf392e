import { describe, it, expect, beforeEach } from 'vitest';
import { ConflictError } from '@innkeep/shared';
import { InMemoryHotelStore } from '../store/in-memory-store';
import type { Booking, Guest, Room } from '../types';

function room(id: string, number: string): Room {
  return {
    id,
    number,
    category: 'Single',
    pricePerNight: 100,
    status: 'Available',
    createdAt: new Date('2024-01-01T00:00:00Z'),
  };
}

function guest(id: string): Guest {
  return { id, name: `Guest ${id}`, phone: null, email: null, createdAt: new Date('2024-01-01T00:00:00Z') };
}

function booking(id: string, roomId: string, guestId: string, createdAt: string): Booking {
  return {
    id,
    roomId,
    guestId,
    checkIn: '2024-01-01',
    checkOut: '2024-01-02',
    nights: 1,
    status: 'Booked',
    totalAmount: 100,
    createdAt: new Date(createdAt),
  };
}

describe('InMemoryHotelStore', () => {
  let store: InMemoryHotelStore;

  beforeEach(() => {
    store = new InMemoryHotelStore();
  });

  it('commits writes when the operation resolves', async () => {
    await store.transaction((tx) => tx.insertRoom(room('01A', '101')));

    expect(await store.transaction((tx) => tx.findRoom('01A'))).toMatchObject({ number: '101' });
  });

  it('discards every write of a failed operation', async () => {
    await expect(
      store.transaction(async (tx) => {
        await tx.insertRoom(room('01A', '101'));
        await tx.insertGuest(guest('01G'));
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(await store.transaction((tx) => tx.countRooms())).toBe(0);
    expect(await store.transaction((tx) => tx.countGuests())).toBe(0);
  });

  it('keeps working after a failed transaction', async () => {
    await store.transaction(() => Promise.reject(new Error('boom'))).catch(() => undefined);

    await store.transaction((tx) => tx.insertRoom(room('01A', '101')));

    expect(await store.transaction((tx) => tx.countRooms())).toBe(1);
  });

  it('runs transactions one at a time in call order', async () => {
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = store.transaction(async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
    });
    const second = store.transaction(async () => {
      events.push('second:start');
    });

    await Promise.resolve();
    release();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('sees writes committed by the previous transaction', async () => {
    const insert = store.transaction((tx) => tx.insertRoom(room('01A', '101')));
    const count = store.transaction((tx) => tx.countRooms());

    await insert;
    expect(await count).toBe(1);
  });

  it('enforces unique room numbers', async () => {
    await store.transaction((tx) => tx.insertRoom(room('01A', '101')));

    await expect(store.transaction((tx) => tx.insertRoom(room('01B', '101')))).rejects.toThrow(ConflictError);
  });

  it('returns copies that cannot change stored rows', async () => {
    await store.transaction((tx) => tx.insertRoom(room('01A', '101')));

    const copy = await store.transaction((tx) => tx.findRoom('01A'));
    if (copy) copy.status = 'Maintenance';

    expect((await store.transaction((tx) => tx.findRoom('01A')))?.status).toBe('Available');
  });

  it('refuses bookings that reference missing rows', async () => {
    await store.transaction((tx) => tx.insertGuest(guest('01G')));

    await expect(
      store.transaction((tx) => tx.insertBooking(booking('01B', 'missing', '01G', '2024-01-01T00:00:00Z'))),
    ).rejects.toThrow('Booking 01B references a missing room or guest');
  });

  it('pages rows by descending id below the cursor', async () => {
    await store.transaction(async (tx) => {
      await tx.insertRoom(room('01A', '101'));
      await tx.insertRoom(room('01C', '103'));
      await tx.insertRoom(room('01B', '102'));
    });

    const firstTwo = await store.transaction((tx) => tx.listRooms({ limit: 2 }));
    const rest = await store.transaction((tx) => tx.listRooms({ cursor: '01B', limit: 2 }));

    expect(firstTwo.map((r) => r.id)).toEqual(['01C', '01B']);
    expect(rest.map((r) => r.id)).toEqual(['01A']);
  });

  it('counts bookings created in a half-open window', async () => {
    await store.transaction(async (tx) => {
      await tx.insertRoom(room('01A', '101'));
      await tx.insertGuest(guest('01G'));
      await tx.insertBooking(booking('01B1', '01A', '01G', '2024-03-01T00:00:00Z'));
      await tx.insertBooking(booking('01B2', '01A', '01G', '2024-03-01T23:59:59Z'));
      await tx.insertBooking(booking('01B3', '01A', '01G', '2024-03-02T00:00:00Z'));
    });

    const count = await store.transaction((tx) =>
      tx.countBookingsCreatedBetween(new Date('2024-03-01T00:00:00Z'), new Date('2024-03-02T00:00:00Z')),
    );

    expect(count).toBe(2);
  });

  it('lists distinct rooms holding active bookings of a guest', async () => {
    await store.transaction(async (tx) => {
      await tx.insertRoom(room('01R2', '102'));
      await tx.insertRoom(room('01R1', '101'));
      await tx.insertGuest(guest('01G'));
      await tx.insertBooking(booking('01B1', '01R2', '01G', '2024-03-01T00:00:00Z'));
      await tx.insertBooking(booking('01B2', '01R1', '01G', '2024-03-01T00:00:00Z'));
      await tx.insertBooking(booking('01B3', '01R2', '01G', '2024-03-01T00:00:00Z'));
      await tx.updateBookingStatus('01B2', 'Cancelled');
    });

    expect(await store.transaction((tx) => tx.listActiveRoomIdsForGuest('01G'))).toEqual(['01R2']);
  });
});
