/**
 * @concentra/math — Liquidity and position amounts.
 *
 * A position between sqrt ratios (lower, upper) holds:
 * - only token0 while the price is at or below `lower`
 * - both tokens while the price is strictly inside the range
 * - only token1 while the price is at or above `upper`
 */

import type { Bounds } from "@concentra/types";
import { abs, isI128, isU128, min } from "./bigint-math.js";
import {
  FULL_RANGE_ONLY_TICK_SPACING,
  I128_MAX,
  MAX_TICK,
  MAX_TICK_SPACING,
  MIN_TICK,
  U128_MAX,
} from "./constants.js";
import { amount0Delta, amount1Delta } from "./delta.js";
import type { AmountDelta } from "./types.js";
import { MathError } from "./types.js";

// ─── Tick spacing ────────────────────────────────────────────────────────

export function isValidTickSpacing(tickSpacing: number): boolean {
  return (
    Number.isInteger(tickSpacing) &&
    tickSpacing >= FULL_RANGE_ONLY_TICK_SPACING &&
    tickSpacing <= MAX_TICK_SPACING
  );
}

export function assertValidTickSpacing(tickSpacing: number): void {
  if (!isValidTickSpacing(tickSpacing)) {
    throw new MathError(
      "INVALID_TICK_SPACING",
      `Tick spacing ${String(tickSpacing)} must be an integer in [0, ${String(MAX_TICK_SPACING)}]`,
    );
  }
}

/**
 * Largest liquidity that may reference a single tick.
 *
 * Tighter spacing allows more initialized ticks, so each one gets a smaller
 * share of the 128-bit range; the sum over every tick stays representable.
 */
export function maxLiquidityPerTick(tickSpacing: number): bigint {
  assertValidTickSpacing(tickSpacing);
  if (tickSpacing === FULL_RANGE_ONLY_TICK_SPACING) {
    return U128_MAX;
  }
  const usableTicks = 1n + BigInt(Math.floor(MAX_TICK / tickSpacing)) * 2n;
  return U128_MAX / usableTicks;
}

/**
 * The widest bounds usable at a tick spacing.
 */
export function fullRangeBounds(tickSpacing: number): Bounds {
  assertValidTickSpacing(tickSpacing);
  if (tickSpacing === FULL_RANGE_ONLY_TICK_SPACING) {
    return { lower: MIN_TICK, upper: MAX_TICK };
  }
  const magnitude = Math.floor(MAX_TICK / tickSpacing) * tickSpacing;
  return { lower: -magnitude, upper: magnitude };
}

// ─── Amounts ─────────────────────────────────────────────────────────────

/**
 * Token amounts for changing a position's liquidity by `liquidityDelta`.
 *
 * Deposits (positive delta) return positive amounts rounded up.
 * Withdrawals (negative delta) return negative amounts rounded down in magnitude.
 *
 * @throws {MathError} LIQUIDITY_DELTA_OVERFLOW if an amount does not fit in int128
 */
export function liquidityDeltaToAmountDelta(
  sqrtRatio: bigint,
  liquidityDelta: bigint,
  sqrtRatioLower: bigint,
  sqrtRatioUpper: bigint,
): AmountDelta {
  if (liquidityDelta === 0n) {
    return { amount0: 0n, amount1: 0n };
  }

  const roundUp = liquidityDelta > 0n;
  const magnitude = abs(liquidityDelta);

  let amount0 = 0n;
  let amount1 = 0n;

  if (sqrtRatio <= sqrtRatioLower) {
    amount0 = amount0Delta(sqrtRatioLower, sqrtRatioUpper, magnitude, roundUp);
  } else if (sqrtRatio < sqrtRatioUpper) {
    amount0 = amount0Delta(sqrtRatio, sqrtRatioUpper, magnitude, roundUp);
    amount1 = amount1Delta(sqrtRatioLower, sqrtRatio, magnitude, roundUp);
  } else {
    amount1 = amount1Delta(sqrtRatioLower, sqrtRatioUpper, magnitude, roundUp);
  }

  if (!isI128(amount0) || !isI128(amount1)) {
    throw new MathError(
      "LIQUIDITY_DELTA_OVERFLOW",
      `Amounts for liquidity delta ${liquidityDelta.toString()} do not fit in int128`,
    );
  }

  return roundUp
    ? { amount0, amount1 }
    : { amount0: -amount0, amount1: -amount1 };
}

function maxLiquidityForToken0(
  sqrtRatioLower: bigint,
  sqrtRatioUpper: bigint,
  amount: bigint,
): bigint {
  if (amount === 0n) return 0n;
  return (
    (amount * sqrtRatioLower * sqrtRatioUpper) /
    ((sqrtRatioUpper - sqrtRatioLower) << 128n)
  );
}

function maxLiquidityForToken1(
  sqrtRatioLower: bigint,
  sqrtRatioUpper: bigint,
  amount: bigint,
): bigint {
  if (amount === 0n) return 0n;
  return (amount << 128n) / (sqrtRatioUpper - sqrtRatioLower);
}

/**
 * Largest liquidity whose deposit at `sqrtRatio` costs no more than the given amounts.
 * Capped at the largest positive int128 so it can be used as a liquidity delta.
 */
export function maxLiquidity(
  sqrtRatio: bigint,
  sqrtRatioLower: bigint,
  sqrtRatioUpper: bigint,
  amount0: bigint,
  amount1: bigint,
): bigint {
  if (sqrtRatioLower >= sqrtRatioUpper) {
    return 0n;
  }

  let liquidity: bigint;
  if (sqrtRatio <= sqrtRatioLower) {
    liquidity = maxLiquidityForToken0(sqrtRatioLower, sqrtRatioUpper, amount0);
  } else if (sqrtRatio < sqrtRatioUpper) {
    liquidity = min(
      maxLiquidityForToken0(sqrtRatio, sqrtRatioUpper, amount0),
      maxLiquidityForToken1(sqrtRatioLower, sqrtRatio, amount1),
    );
  } else {
    liquidity = maxLiquidityForToken1(sqrtRatioLower, sqrtRatioUpper, amount1);
  }

  return min(liquidity, I128_MAX);
}

/**
 * Apply a signed delta to an unsigned 128-bit liquidity.
 * Returns null when the result leaves [0, U128_MAX].
 */
export function addLiquidityDelta(liquidity: bigint, delta: bigint): bigint | null {
  const next = liquidity + delta;
  return isU128(next) ? next : null;
}
