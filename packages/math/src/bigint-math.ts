/**
 * @concentra/math — Integer helpers.
 *
 * bigint never wraps, so range checks are explicit here rather than
 * implied by a storage width.
 */

import { I128_MAX, I128_MIN, U128_MAX } from "./constants.js";

/**
 * Division rounding toward positive infinity. Both operands must be non-negative.
 */
export function divUp(numerator: bigint, denominator: bigint): bigint {
  const quotient = numerator / denominator;
  return numerator % denominator === 0n ? quotient : quotient + 1n;
}

export function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function isU128(value: bigint): boolean {
  return value >= 0n && value <= U128_MAX;
}

export function isI128(value: bigint): boolean {
  return value >= I128_MIN && value <= I128_MAX;
}

/**
 * Floor division for tick arithmetic (rounds toward negative infinity).
 */
export function floorDiv(a: number, b: number): number {
  return Math.floor(a / b);
}
