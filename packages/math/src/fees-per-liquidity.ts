/**
 * @concentra/math — Fee growth accumulators.
 *
 * Accumulators are 128.128 fixed-point values kept modulo 2^256.
 * Only differences between two readings carry meaning, and a difference
 * is correct as long as less than 2^256 of growth happened in between.
 */

import type { FeesPerLiquidity } from "@concentra/types";
import { isU128 } from "./bigint-math.js";
import { U256_MODULUS } from "./constants.js";
import { MathError } from "./types.js";

export const ZERO_FEES_PER_LIQUIDITY: FeesPerLiquidity = { value0: 0n, value1: 0n };

function wrap(value: bigint): bigint {
  const r = value % U256_MODULUS;
  return r < 0n ? r + U256_MODULUS : r;
}

export function addFeesPerLiquidity(
  a: FeesPerLiquidity,
  b: FeesPerLiquidity,
): FeesPerLiquidity {
  return { value0: wrap(a.value0 + b.value0), value1: wrap(a.value1 + b.value1) };
}

export function subFeesPerLiquidity(
  a: FeesPerLiquidity,
  b: FeesPerLiquidity,
): FeesPerLiquidity {
  return { value0: wrap(a.value0 - b.value0), value1: wrap(a.value1 - b.value1) };
}

/**
 * Growth per unit of liquidity produced by distributing the amounts.
 * Zero liquidity distributes nothing.
 */
export function feesPerLiquidityFromAmounts(
  amount0: bigint,
  amount1: bigint,
  liquidity: bigint,
): FeesPerLiquidity {
  if (liquidity === 0n) {
    return ZERO_FEES_PER_LIQUIDITY;
  }
  return {
    value0: wrap((amount0 << 128n) / liquidity),
    value1: wrap((amount1 << 128n) / liquidity),
  };
}

/**
 * Token amounts earned by `liquidity` since the checkpoint `last`.
 *
 * @throws {MathError} FEES_OVERFLOW if an amount does not fit in 128 bits
 */
export function feesEarned(
  inside: FeesPerLiquidity,
  last: FeesPerLiquidity,
  liquidity: bigint,
): { readonly amount0: bigint; readonly amount1: bigint } {
  const growth = subFeesPerLiquidity(inside, last);
  const amount0 = (growth.value0 * liquidity) >> 128n;
  const amount1 = (growth.value1 * liquidity) >> 128n;

  if (!isU128(amount0) || !isU128(amount1)) {
    throw new MathError("FEES_OVERFLOW", "Accrued fees do not fit in 128 bits");
  }
  return { amount0, amount1 };
}
