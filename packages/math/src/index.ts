/**
 * @concentra/math — Fixed-point math for concentrated liquidity.
 *
 * Pure bigint functions with no state:
 * - tick <-> sqrt ratio conversion (64.128 fixed point)
 * - token amounts between prices, with explicit rounding direction
 * - next price after adding or removing an amount
 * - fee arithmetic (0.64 fixed-point fee fractions)
 * - single-range swap steps
 * - fee growth accumulators (mod 2^256)
 *
 * Rules:
 * - No floating point in any result (floats only seed a tick estimate)
 * - Every range overflow throws MathError
 */

export {
  MIN_TICK,
  MAX_TICK,
  MAX_TICK_SPACING,
  FULL_RANGE_ONLY_TICK_SPACING,
  MIN_SQRT_RATIO,
  MAX_SQRT_RATIO,
  ONE_X128,
  U64_SCALE,
  U128_MAX,
  I128_MAX,
  I128_MIN,
  U256_MODULUS,
  U256_MAX,
} from "./constants.js";

export {
  divUp,
  abs,
  min,
  isU128,
  isI128,
  floorDiv,
} from "./bigint-math.js";

export {
  tickToSqrtRatio,
  sqrtRatioToTick,
  isValidTick,
  assertValidTick,
  isValidSqrtRatio,
  assertValidSqrtRatio,
} from "./tick-math.js";

export { amount0Delta, amount1Delta } from "./delta.js";

export {
  nextSqrtRatioFromAmount0,
  nextSqrtRatioFromAmount1,
} from "./sqrt-ratio.js";

export {
  isValidFee,
  assertValidFee,
  feeFromFraction,
  computeFee,
  amountBeforeFee,
} from "./fee.js";

export {
  isValidTickSpacing,
  assertValidTickSpacing,
  maxLiquidityPerTick,
  fullRangeBounds,
  liquidityDeltaToAmountDelta,
  maxLiquidity,
  addLiquidityDelta,
} from "./liquidity.js";

export {
  ZERO_FEES_PER_LIQUIDITY,
  addFeesPerLiquidity,
  subFeesPerLiquidity,
  feesPerLiquidityFromAmounts,
  feesEarned,
} from "./fees-per-liquidity.js";

export { isPriceIncreasing, swapStep } from "./swap-step.js";

export type {
  MathErrorCode,
  Direction,
  SwapStepResult,
  AmountDelta,
} from "./types.js";
export { MathError } from "./types.js";
