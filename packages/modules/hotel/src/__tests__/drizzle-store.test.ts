import { describe, it, expect, vi, beforeEach } from 'vitest';

// ── Mocks (hoisted) ────────────────────────────────────────────

vi.mock('@innkeep/db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@innkeep/db')>();
  return { ...actual, isUniqueViolation: vi.fn(() => false) };
});

// ── Imports ─────────────────────────────────────────────────────

import { isUniqueViolation, rooms } from '@innkeep/db';
import { ConflictError } from '@innkeep/shared';
import { DrizzleHotelStore, DrizzleHotelTx } from '../store/drizzle-store';

// ── Mock transaction ────────────────────────────────────────────

const BUILDER_METHODS = [
  'select',
  'selectDistinct',
  'from',
  'where',
  'innerJoin',
  'orderBy',
  'limit',
  'for',
  'insert',
  'values',
  'update',
  'set',
  'delete',
  'returning',
] as const;
type BuilderMethod = (typeof BUILDER_METHODS)[number];
type Settle = (value: unknown) => void;

/**
 * Chainable stand-in for a drizzle transaction. Every builder call is
 * recorded and returns the chain; each `await` on it takes the next queued
 * result, and an Error in the queue rejects instead. Builder steps are plain
 * functions: a spy would call `then` itself and eat queued results.
 */
type MockTx = { [K in BuilderMethod]: (...args: unknown[]) => MockTx } & {
  results: unknown[];
  calls: Array<{ method: BuilderMethod; args: unknown[] }>;
  then: (resolve: Settle, reject: Settle) => void;
};

function createMockTx(...results: unknown[]): MockTx {
  const step =
    (method: BuilderMethod) =>
    (...args: unknown[]): MockTx => {
      tx.calls.push({ method, args });
      return tx;
    };
  const tx: MockTx = {
    results: [...results],
    calls: [],
    select: step('select'),
    selectDistinct: step('selectDistinct'),
    from: step('from'),
    where: step('where'),
    innerJoin: step('innerJoin'),
    orderBy: step('orderBy'),
    limit: step('limit'),
    for: step('for'),
    insert: step('insert'),
    values: step('values'),
    update: step('update'),
    set: step('set'),
    delete: step('delete'),
    returning: step('returning'),
    then(resolve, reject) {
      const next = tx.results.length > 0 ? tx.results.shift() : [];
      if (next instanceof Error) reject(next);
      else resolve(next);
    },
  };
  return tx;
}

/** Argument lists of every recorded call to one builder method. */
function callsTo(tx: MockTx, method: BuilderMethod): unknown[][] {
  return tx.calls.filter((c) => c.method === method).map((c) => c.args);
}

type DrizzleTx = ConstructorParameters<typeof DrizzleHotelTx>[0];
type Database = ConstructorParameters<typeof DrizzleHotelStore>[0];

// The store only walks the builder chain, which the mock reproduces.
function asDrizzleTx(tx: MockTx): DrizzleTx {
  return tx as unknown as DrizzleTx;
}

// ── Fixtures ────────────────────────────────────────────────────

const CREATED_AT = new Date('2024-01-01T09:00:00Z');

function roomRow(overrides: Record<string, unknown> = {}) {
  return {
    id: '01R',
    number: '101',
    category: 'Suite',
    pricePerNight: '1500.00',
    status: 'Occupied',
    createdAt: CREATED_AT,
    ...overrides,
  };
}

function bookingRow(overrides: Record<string, unknown> = {}) {
  return {
    id: '01B',
    roomId: '01R',
    guestId: '01G',
    checkIn: '2024-01-01',
    checkOut: '2024-01-03',
    status: 'Booked',
    totalAmount: '3000.00',
    createdAt: CREATED_AT,
    ...overrides,
  };
}

const BOOKING = {
  id: '01B',
  roomId: '01R',
  guestId: '01G',
  checkIn: '2024-01-01',
  checkOut: '2024-01-03',
  nights: 2,
  status: 'Booked',
  totalAmount: 3000,
  createdAt: CREATED_AT,
};

beforeEach(() => {
  vi.mocked(isUniqueViolation).mockReset();
  vi.mocked(isUniqueViolation).mockReturnValue(false);
});

// ── Rooms ───────────────────────────────────────────────────────

describe('DrizzleHotelTx rooms', () => {
  it('maps a room row, parsing the numeric price', async () => {
    const tx = createMockTx([roomRow()]);

    const room = await new DrizzleHotelTx(asDrizzleTx(tx)).findRoom('01R');

    expect(room).toEqual({
      id: '01R',
      number: '101',
      category: 'Suite',
      pricePerNight: 1500,
      status: 'Occupied',
      createdAt: CREATED_AT,
    });
    expect(callsTo(tx, 'for')).toEqual([]);
  });

  it('locks the row when asked to', async () => {
    const tx = createMockTx([roomRow()]);

    await new DrizzleHotelTx(asDrizzleTx(tx)).findRoom('01R', { forUpdate: true });

    expect(callsTo(tx, 'for')).toEqual([['update']]);
  });

  it('returns null when no row matches', async () => {
    const tx = createMockTx([]);

    expect(await new DrizzleHotelTx(asDrizzleTx(tx)).findRoom('missing')).toBeNull();
  });

  it('refuses rows with an unknown category', async () => {
    const tx = createMockTx([roomRow({ category: 'Penthouse' })]);

    await expect(new DrizzleHotelTx(asDrizzleTx(tx)).findRoom('01R')).rejects.toThrow(
      'Room 01R has unknown category Penthouse',
    );
  });

  it('refuses rows with an unknown status', async () => {
    const tx = createMockTx([roomRow({ status: 'Closed' })]);

    await expect(new DrizzleHotelTx(asDrizzleTx(tx)).findRoom('01R')).rejects.toThrow(
      'Room 01R has unknown status Closed',
    );
  });

  it('writes the price as a numeric string', async () => {
    const tx = createMockTx();

    await new DrizzleHotelTx(asDrizzleTx(tx)).insertRoom({
      id: '01R',
      number: '101',
      category: 'Double',
      pricePerNight: 99.5,
      status: 'Available',
      createdAt: CREATED_AT,
    });

    expect(callsTo(tx, 'insert')).toEqual([[rooms]]);
    expect(callsTo(tx, 'values')[0]).toEqual([{
      id: '01R',
      number: '101',
      category: 'Double',
      pricePerNight: '99.50',
      status: 'Available',
      createdAt: CREATED_AT,
    }]);
  });

  it('maps a room-number unique violation to ROOM_NUMBER_TAKEN', async () => {
    const violation = new Error('duplicate key value violates unique constraint "uq_rooms_number"');
    const tx = createMockTx(violation);
    vi.mocked(isUniqueViolation).mockReturnValueOnce(true);

    const err = await new DrizzleHotelTx(asDrizzleTx(tx))
      .insertRoom({
        id: '01R',
        number: '101',
        category: 'Single',
        pricePerNight: 10,
        status: 'Available',
        createdAt: CREATED_AT,
      })
      .catch((e: unknown) => e);

    expect(isUniqueViolation).toHaveBeenCalledWith(violation, 'uq_rooms_number');
    expect(err).toBeInstanceOf(ConflictError);
    if (err instanceof ConflictError) {
      expect(err.code).toBe('ROOM_NUMBER_TAKEN');
      expect(err.message).toBe('Room number 101 already exists');
    }
  });

  it('rethrows other insert failures unchanged', async () => {
    const failure = new Error('connection reset');
    const tx = createMockTx(failure);

    await expect(
      new DrizzleHotelTx(asDrizzleTx(tx)).insertRoom({
        id: '01R',
        number: '101',
        category: 'Single',
        pricePerNight: 10,
        status: 'Available',
        createdAt: CREATED_AT,
      }),
    ).rejects.toBe(failure);
  });

  it('reports whether a delete removed a row', async () => {
    const tx = createMockTx([{ id: '01R' }], []);
    const store = new DrizzleHotelTx(asDrizzleTx(tx));

    expect(await store.deleteRoom('01R')).toBe(true);
    expect(await store.deleteRoom('01R')).toBe(false);
    expect(callsTo(tx, 'returning')).toHaveLength(2);
  });

  it('counts rooms, treating an empty result as zero', async () => {
    const tx = createMockTx([{ value: 3 }], []);
    const store = new DrizzleHotelTx(asDrizzleTx(tx));

    expect(await store.countRooms({ status: 'Available' })).toBe(3);
    expect(await store.countRooms()).toBe(0);
  });

  it('pages rooms with the requested limit', async () => {
    const tx = createMockTx([roomRow({ id: '01R2' }), roomRow({ id: '01R1', number: '100' })]);

    const page = await new DrizzleHotelTx(asDrizzleTx(tx)).listRooms({ cursor: '01R3', limit: 2 });

    expect(page.map((r) => r.id)).toEqual(['01R2', '01R1']);
    expect(callsTo(tx, 'limit')).toEqual([[2]]);
  });
});

// ── Guests ──────────────────────────────────────────────────────

describe('DrizzleHotelTx guests', () => {
  it('maps missing contacts to null', async () => {
    const tx = createMockTx([{ id: '01G', name: 'A', phone: null, email: null, createdAt: CREATED_AT }]);

    expect(await new DrizzleHotelTx(asDrizzleTx(tx)).findGuest('01G')).toEqual({
      id: '01G',
      name: 'A',
      phone: null,
      email: null,
      createdAt: CREATED_AT,
    });
  });
});

// ── Bookings ────────────────────────────────────────────────────

describe('DrizzleHotelTx bookings', () => {
  it('maps a booking row and derives nights', async () => {
    const tx = createMockTx([bookingRow()]);

    expect(await new DrizzleHotelTx(asDrizzleTx(tx)).findBooking('01B')).toEqual(BOOKING);
    expect(callsTo(tx, 'for')).toEqual([]);
  });

  it('locks the booking row when asked to', async () => {
    const tx = createMockTx([bookingRow({ status: 'Checked-In' })]);

    const booking = await new DrizzleHotelTx(asDrizzleTx(tx)).findBooking('01B', { forUpdate: true });

    expect(booking?.status).toBe('Checked-In');
    expect(callsTo(tx, 'for')).toEqual([['update']]);
  });

  it('refuses rows with an unknown status', async () => {
    const tx = createMockTx([bookingRow({ status: 'Pending' })]);

    await expect(new DrizzleHotelTx(asDrizzleTx(tx)).findBooking('01B')).rejects.toThrow(
      'Booking 01B has unknown status Pending',
    );
  });

  it('joins room number and guest name into list items', async () => {
    const tx = createMockTx([{ booking: bookingRow(), roomNumber: '101', guestName: 'A' }]);

    const items = await new DrizzleHotelTx(asDrizzleTx(tx)).listBookings({ limit: 51 });

    expect(items).toEqual([{ ...BOOKING, roomNumber: '101', guestName: 'A' }]);
    expect(callsTo(tx, 'innerJoin')).toHaveLength(2);
    expect(callsTo(tx, 'limit')).toEqual([[51]]);
  });

  it('lists the distinct rooms of a guest', async () => {
    const tx = createMockTx([{ roomId: '01R1' }, { roomId: '01R2' }]);

    expect(await new DrizzleHotelTx(asDrizzleTx(tx)).listActiveRoomIdsForGuest('01G')).toEqual([
      '01R1',
      '01R2',
    ]);
    expect(callsTo(tx, 'selectDistinct')).toHaveLength(1);
  });
});

// ── Store ───────────────────────────────────────────────────────

describe('DrizzleHotelStore', () => {
  it('runs the operation inside db.transaction with a DrizzleHotelTx', async () => {
    const mockTx = createMockTx([roomRow()]);
    const transaction = vi.fn(async (fn: (tx: DrizzleTx) => Promise<unknown>) => fn(asDrizzleTx(mockTx)));
    const db = { transaction };

    const store = new DrizzleHotelStore(db as unknown as Database);
    const room = await store.transaction(async (tx) => {
      expect(tx).toBeInstanceOf(DrizzleHotelTx);
      return tx.findRoom('01R');
    });

    expect(transaction).toHaveBeenCalledTimes(1);
    expect(room?.number).toBe('101');
  });
});
