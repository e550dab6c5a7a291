/**
 * @concentra/math — Price after adding or removing an amount of one token.
 *
 * Rounding always favours the pool: adding a token moves the price less
 * than the exact result, removing a token moves it more.
 *
 * Both functions return null when the removal asks for more than the
 * liquidity can provide at any price.
 */

import { divUp } from "./bigint-math.js";
import { MathError } from "./types.js";

function assertLiquidity(liquidity: bigint): void {
  if (liquidity <= 0n) {
    throw new MathError("ZERO_LIQUIDITY", "Cannot move price without liquidity");
  }
}

/**
 * Positive `amount` adds token0 (price falls); negative removes it (price rises).
 */
export function nextSqrtRatioFromAmount0(
  sqrtRatio: bigint,
  liquidity: bigint,
  amount: bigint,
): bigint | null {
  if (amount === 0n) {
    return sqrtRatio;
  }
  assertLiquidity(liquidity);

  const numerator = liquidity << 128n;

  if (amount > 0n) {
    const denominator = numerator + amount * sqrtRatio;
    return divUp(numerator * sqrtRatio, denominator);
  }

  const product = -amount * sqrtRatio;
  if (product >= numerator) {
    return null;
  }
  return divUp(numerator * sqrtRatio, numerator - product);
}

/**
 * Positive `amount` adds token1 (price rises); negative removes it (price falls).
 */
export function nextSqrtRatioFromAmount1(
  sqrtRatio: bigint,
  liquidity: bigint,
  amount: bigint,
): bigint | null {
  if (amount === 0n) {
    return sqrtRatio;
  }
  assertLiquidity(liquidity);

  if (amount > 0n) {
    return sqrtRatio + (amount << 128n) / liquidity;
  }

  const quotient = divUp(-amount << 128n, liquidity);
  if (quotient >= sqrtRatio) {
    return null;
  }
  return sqrtRatio - quotient;
}
