/**
 * @concentra/math — Error types.
 *
 * Rules:
 * - Math functions are pure and never return sentinel values for errors
 * - Out-of-range inputs are validation errors
 * - Results that leave their representable range are arithmetic errors
 */

import { ConcentraError } from "@concentra/types";
import type { ErrorCategory } from "@concentra/types";

/** Error codes for math operations. */
export type MathErrorCode =
  | "TICK_OUT_OF_RANGE"
  | "SQRT_RATIO_OUT_OF_RANGE"
  | "INVALID_TICK_SPACING"
  | "INVALID_FEE"
  | "ZERO_LIQUIDITY"
  | "AMOUNT0_DELTA_OVERFLOW"
  | "AMOUNT1_DELTA_OVERFLOW"
  | "AMOUNT_BEFORE_FEE_OVERFLOW"
  | "LIQUIDITY_DELTA_OVERFLOW"
  | "FEES_OVERFLOW";

const CATEGORY: Readonly<Record<MathErrorCode, ErrorCategory>> = {
  TICK_OUT_OF_RANGE: "validation",
  SQRT_RATIO_OUT_OF_RANGE: "validation",
  INVALID_TICK_SPACING: "validation",
  INVALID_FEE: "validation",
  ZERO_LIQUIDITY: "validation",
  AMOUNT0_DELTA_OVERFLOW: "arithmetic",
  AMOUNT1_DELTA_OVERFLOW: "arithmetic",
  AMOUNT_BEFORE_FEE_OVERFLOW: "arithmetic",
  LIQUIDITY_DELTA_OVERFLOW: "arithmetic",
  FEES_OVERFLOW: "arithmetic",
};

/**
 * Structured error from the math library.
 */
export class MathError extends ConcentraError<MathErrorCode> {
  constructor(code: MathErrorCode, message: string) {
    super(code, CATEGORY[code], message);
    this.name = "MathError";
  }
}

/**
 * Direction of price movement for a swap or tick search.
 */
export type Direction = "up" | "down";

/**
 * Outcome of a swap within a single liquidity range.
 */
export interface SwapStepResult {
  /** Portion of the specified amount used; same sign as the specified amount. */
  readonly consumedAmount: bigint;

  /** Magnitude of the other token: paid out for exact input, paid in for exact output. */
  readonly calculatedAmount: bigint;

  readonly sqrtRatioNext: bigint;

  /** Fee taken from the input token, already included in the input amount. */
  readonly feeAmount: bigint;
}

export interface AmountDelta {
  readonly amount0: bigint;
  readonly amount1: bigint;
}
