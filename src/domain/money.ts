/**
 * Amount helpers. Amounts are decimal numbers with two places; arithmetic
 * runs on integer cents so sums do not drift.
 */

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/** Round to two decimal places */
export function roundAmount(amount: number): number {
  return fromCents(toCents(amount));
}

export function multiplyAmount(unitPrice: number, quantity: number): number {
  return fromCents(toCents(unitPrice) * quantity);
}

export function sumAmounts(amounts: Iterable<number>): number {
  let cents = 0;
  for (const amount of amounts) {
    cents += toCents(amount);
  }
  return fromCents(cents);
}
