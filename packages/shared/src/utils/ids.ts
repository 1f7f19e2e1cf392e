import { monotonicFactory } from 'ulid';

// Monotonic within a millisecond, so ids created by one process sort in creation order.
const ulid = monotonicFactory();

export function generateUlid(): string {
  return ulid();
}

/** Comparator for "most recently created first" ordering of ULID-keyed rows. */
export function compareIdsDesc(a: { id: string }, b: { id: string }): number {
  if (a.id === b.id) return 0;
  return a.id < b.id ? 1 : -1;
}
