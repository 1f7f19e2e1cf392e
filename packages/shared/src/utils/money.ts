/** Largest amount a `numeric(10,2)` column holds. */
const MAX_MONEY_AMOUNT = 99_999_999.99;

function toCents(amount: number): number {
  return Math.round(amount * 100);
}

function toDollars(cents: number): number {
  return cents / 100;
}

/** Multiply a 2-decimal amount by a whole quantity without float drift. */
function multiplyMoney(amount: number, qty: number): number {
  return toDollars(Math.round(toCents(amount) * qty));
}

/** Render an amount for a `numeric(10,2)` column. */
function toDecimalString(amount: number): string {
  return toDollars(toCents(amount)).toFixed(2);
}

/** Parse a `numeric` column value (postgres.js returns strings). */
function fromDecimalString(value: string | number): number {
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(n)) {
    throw new TypeError(`Not a decimal amount: ${String(value)}`);
  }
  return toDollars(toCents(n));
}

export { toCents, toDollars, multiplyMoney, toDecimalString, fromDecimalString, MAX_MONEY_AMOUNT };
