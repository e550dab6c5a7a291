/**
 * @concentra/math — Numeric bounds.
 *
 * sqrtRatio is sqrt(price) as an unsigned 64.128 fixed-point number.
 * A single tick multiplies price by 1.000001, so MAX_TICK puts price at
 * about 2^128 and sqrtRatio at about 2^192.
 */

export const MIN_TICK = -88_722_835;
export const MAX_TICK = 88_722_835;

/** Largest tick spacing a pool may use. */
export const MAX_TICK_SPACING = 698_605;

/** Tick spacing of pools that only allow positions over [MIN_TICK, MAX_TICK]. */
export const FULL_RANGE_ONLY_TICK_SPACING = 0;

/** tickToSqrtRatio(MIN_TICK) */
export const MIN_SQRT_RATIO = 18447191164202170526n;

/** tickToSqrtRatio(MAX_TICK) */
export const MAX_SQRT_RATIO =
  6276949602062853172742588666638147158083741740262337144812n;

/** sqrtRatio at tick 0 (price 1). */
export const ONE_X128 = 1n << 128n;

export const U64_SCALE = 1n << 64n;

export const U128_MAX = (1n << 128n) - 1n;
export const I128_MAX = (1n << 127n) - 1n;
export const I128_MIN = -(1n << 127n);

export const U256_MODULUS = 1n << 256n;
export const U256_MAX = U256_MODULUS - 1n;
