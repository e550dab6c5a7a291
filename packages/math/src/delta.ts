/**
 * @concentra/math — Token amounts between two prices.
 *
 * For liquidity L between sqrt ratios a < b (64.128 fixed point):
 *
 *   amount0 = L * (b - a) / (a * b)    (scaled by 2^128)
 *   amount1 = L * (b - a)              (scaled by 2^-128)
 *
 * Callers choose the rounding direction: amounts paid into the pool round
 * up, amounts paid out of the pool round down.
 */

import { divUp, isU128 } from "./bigint-math.js";
import { MathError } from "./types.js";

function ordered(sqrtRatioA: bigint, sqrtRatioB: bigint): [bigint, bigint] {
  return sqrtRatioA < sqrtRatioB
    ? [sqrtRatioA, sqrtRatioB]
    : [sqrtRatioB, sqrtRatioA];
}

/**
 * Amount of token0 covered by `liquidity` between two sqrt ratios.
 * The ratios may be given in either order.
 *
 * @throws {MathError} AMOUNT0_DELTA_OVERFLOW if the result exceeds 128 bits
 */
export function amount0Delta(
  sqrtRatioA: bigint,
  sqrtRatioB: bigint,
  liquidity: bigint,
  roundUp: boolean,
): bigint {
  const [lower, upper] = ordered(sqrtRatioA, sqrtRatioB);
  if (liquidity === 0n || lower === upper) {
    return 0n;
  }

  const numerator = (liquidity << 128n) * (upper - lower);
  const result = roundUp
    ? divUp(divUp(numerator, upper), lower)
    : numerator / upper / lower;

  if (!isU128(result)) {
    throw new MathError(
      "AMOUNT0_DELTA_OVERFLOW",
      `Token0 amount ${result.toString()} does not fit in 128 bits`,
    );
  }
  return result;
}

/**
 * Amount of token1 covered by `liquidity` between two sqrt ratios.
 * The ratios may be given in either order.
 *
 * @throws {MathError} AMOUNT1_DELTA_OVERFLOW if the result exceeds 128 bits
 */
export function amount1Delta(
  sqrtRatioA: bigint,
  sqrtRatioB: bigint,
  liquidity: bigint,
  roundUp: boolean,
): bigint {
  const [lower, upper] = ordered(sqrtRatioA, sqrtRatioB);
  if (liquidity === 0n || lower === upper) {
    return 0n;
  }

  const product = liquidity * (upper - lower);
  const result = roundUp ? divUp(product, 1n << 128n) : product >> 128n;

  if (!isU128(result)) {
    throw new MathError(
      "AMOUNT1_DELTA_OVERFLOW",
      `Token1 amount ${result.toString()} does not fit in 128 bits`,
    );
  }
  return result;
}
