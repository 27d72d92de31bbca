// /src/lib/payroll/money.ts
/**
 * Money helpers for the payroll engine.
 *
 * Amounts are plain numbers in currency units (e.g. 1234.56). Intermediate
 * arithmetic keeps full precision; every field a calculator returns goes
 * through roundMoney (2 decimals, half-up) exactly once, at the point it is
 * produced.
 */

export type Money = number;

/** A percentage expressed on the 0–100 scale (e.g. 7.5 for 7.5%). */
export type Percent = number;

export const ZERO: Money = 0;

/** Absolute precision every value is snapped to before rounding. */
const SNAP_DECIMALS = 8;

/**
 * Half-up rounding to `decimals` fractional digits (at most 8).
 * The value is snapped to 8 decimal places first, then the scaled value is
 * normalised to 15 significant digits, so binary error cannot flip a tie:
 * neither 1.005 * 100 = 100.49999… nor the residue of
 * (2305.74 - 186.34) * 0.075 - 158.4 = 0.55499999999995 once the
 * deduction cancels.
 */
export function roundHalfUp(x: number, decimals = 2): number {
  if (!Number.isFinite(x)) return 0;
  const factor = 10 ** decimals;
  const snapped = Number(Math.abs(x).toFixed(SNAP_DECIMALS));
  const scaled = Number((snapped * factor).toPrecision(15));
  const rounded = Math.floor(scaled + 0.5) / factor;
  return x < 0 ? -rounded : rounded;
}

export function roundMoney(x: number): Money {
  return roundHalfUp(x, 2);
}

export function clampMin0(x: number): number {
  return x < 0 ? 0 : x;
}

/** Non-finite and negative inputs collapse to 0. */
export function toNonNegative(x: unknown): number {
  return typeof x === "number" && Number.isFinite(x) && x > 0 ? x : 0;
}

export function sumMoney(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/** `part / whole * 100`, rounded to 2 decimals; 0 when whole is not positive. */
export function percentOf(part: number, whole: number): Percent {
  if (!(whole > 0)) return 0;
  return roundHalfUp((part / whole) * 100, 2);
}

export function isWithinCents(a: Money, b: Money, cents = 1): boolean {
  return Math.abs(a - b) <= cents / 100 + 1e-9;
}
