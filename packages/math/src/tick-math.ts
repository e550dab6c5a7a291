/**
 * @concentra/math — Conversions between ticks and sqrt ratios.
 *
 * sqrtRatio(tick) = 1.000001^(tick / 2) * 2^128
 *
 * The forward direction multiplies together precomputed factors for each
 * set bit of |tick|, then inverts for positive ticks. The reverse direction
 * estimates the tick with a float logarithm and corrects the estimate
 * against the forward function, so the two always agree exactly.
 */

import {
  MAX_SQRT_RATIO,
  MAX_TICK,
  MIN_SQRT_RATIO,
  MIN_TICK,
  ONE_X128,
  U256_MAX,
} from "./constants.js";
import { MathError } from "./types.js";

/**
 * floor(2^128 * 1.000001^(-2^i / 2)) for i = 0..26.
 * 2^27 is the first power of two above MAX_TICK.
 */
const TICK_FACTORS: readonly bigint[] = [
  0xfffff79c8499329c7cbb2510d893283an,
  0xffffef390978c398134b4ff3764fe40fn,
  0xffffde72140b00a354bd3dc828e976c9n,
  0xffffbce42c7be6c998ad6318193c0b18n,
  0xffff79c86a8f6150a32d9778eceef97bn,
  0xfffef3911b7cff24ba1b3dbb5f8f5974n,
  0xfffde72350725cc4ea8feece3b5f13c7n,
  0xfffbce4b06c196e9247ac87695d53c5fn,
  0xfff79ca7a4d1bf1ee8556cea23cdbaa5n,
  0xffef3995a5b6a6267530f207142a5763n,
  0xffde7444b28145508125d10077ba83b8n,
  0xffbceceeb791747f10df216f2e53ec56n,
  0xff79eb706b9a64c6431d76e63531e929n,
  0xfef41d1a5f2ae3a20676bec6f7f94599n,
  0xfde95287d26d81bea159c37073122c73n,
  0xfbd701c7cbc4c8a6bb81efd232d1e4e7n,
  0xf7bf5211c72f5185f372aeb1d48f937dn,
  0xefc2bf59df33ecc28125cf78ec4f167fn,
  0xe08d35706200796273f0b3a981d90cfdn,
  0xc4f76b68947482dc198a48a54348c4edn,
  0x978bcb9894317807e5fa4498eee7c0fan,
  0x59b63684b86e9f486ec54727371ba6c9n,
  0x1f703399d88f6aa83a28b22d4a1f56e3n,
  0x3dc5dac7376e20fc8679758d1bcdcfbn,
  0xee7e32d61fdb0a5e622b820f681d0n,
  0xde2ee4bc381afa7089aa84bb65n,
  0xc0d55d4d7152c25fb139n,
];

const LOG_TICK_BASE = Math.log(1.000001);
const LOG_ONE_X128 = 128 * Math.LN2;

export function isValidTick(tick: number): boolean {
  return Number.isInteger(tick) && tick >= MIN_TICK && tick <= MAX_TICK;
}

export function assertValidTick(tick: number): void {
  if (!isValidTick(tick)) {
    throw new MathError(
      "TICK_OUT_OF_RANGE",
      `Tick ${String(tick)} is not an integer in [${String(MIN_TICK)}, ${String(MAX_TICK)}]`,
    );
  }
}

export function isValidSqrtRatio(sqrtRatio: bigint): boolean {
  return sqrtRatio >= MIN_SQRT_RATIO && sqrtRatio <= MAX_SQRT_RATIO;
}

export function assertValidSqrtRatio(sqrtRatio: bigint): void {
  if (!isValidSqrtRatio(sqrtRatio)) {
    throw new MathError(
      "SQRT_RATIO_OUT_OF_RANGE",
      `sqrtRatio ${sqrtRatio.toString()} is outside [${MIN_SQRT_RATIO.toString()}, ${MAX_SQRT_RATIO.toString()}]`,
    );
  }
}

/**
 * Compute the sqrt ratio at a tick.
 *
 * Monotonic: tickToSqrtRatio(t) < tickToSqrtRatio(t + 1) for every valid t.
 */
export function tickToSqrtRatio(tick: number): bigint {
  assertValidTick(tick);

  const magnitude = Math.abs(tick);
  let ratio = ONE_X128;

  TICK_FACTORS.forEach((factor, bit) => {
    if ((magnitude & (1 << bit)) !== 0) {
      ratio = (ratio * factor) >> 128n;
    }
  });

  return tick > 0 ? U256_MAX / ratio : ratio;
}

/**
 * Compute the greatest tick whose sqrt ratio is at or below `sqrtRatio`.
 *
 * tickToSqrtRatio(result) <= sqrtRatio < tickToSqrtRatio(result + 1),
 * except at MAX_SQRT_RATIO which maps to MAX_TICK.
 */
export function sqrtRatioToTick(sqrtRatio: bigint): number {
  assertValidSqrtRatio(sqrtRatio);

  const estimate = Math.floor(
    (2 * (Math.log(Number(sqrtRatio)) - LOG_ONE_X128)) / LOG_TICK_BASE,
  );
  let tick = Math.min(MAX_TICK, Math.max(MIN_TICK, estimate));

  while (tick > MIN_TICK && tickToSqrtRatio(tick) > sqrtRatio) {
    tick--;
  }
  while (tick < MAX_TICK && tickToSqrtRatio(tick + 1) <= sqrtRatio) {
    tick++;
  }

  return tick;
}
