/**
 * @concentra/math — Pool fee arithmetic.
 *
 * A fee is a 0.64 fixed-point fraction: the rate is `fee / 2^64`.
 * Fees always round up so the pool never undercharges.
 */

import { divUp, isU128 } from "./bigint-math.js";
import { U64_SCALE } from "./constants.js";
import { MathError } from "./types.js";

export function isValidFee(fee: bigint): boolean {
  return fee >= 0n && fee < U64_SCALE;
}

export function assertValidFee(fee: bigint): void {
  if (!isValidFee(fee)) {
    throw new MathError("INVALID_FEE", `Fee ${fee.toString()} must be in [0, 2^64)`);
  }
}

/**
 * Build a fee from a fraction, e.g. feeFromFraction(5n, 100n) for 5%.
 * Rounds down.
 */
export function feeFromFraction(numerator: bigint, denominator: bigint): bigint {
  const fee = (numerator << 64n) / denominator;
  assertValidFee(fee);
  return fee;
}

/**
 * Fee owed on `amount`, rounded up.
 */
export function computeFee(amount: bigint, fee: bigint): bigint {
  return divUp(amount * fee, U64_SCALE);
}

/**
 * Smallest input that leaves at least `afterFee` once the fee is taken.
 *
 * @throws {MathError} AMOUNT_BEFORE_FEE_OVERFLOW if the input exceeds 128 bits
 */
export function amountBeforeFee(afterFee: bigint, fee: bigint): bigint {
  const result = divUp(afterFee << 64n, U64_SCALE - fee);
  if (!isU128(result)) {
    throw new MathError(
      "AMOUNT_BEFORE_FEE_OVERFLOW",
      `Amount before fee ${result.toString()} does not fit in 128 bits`,
    );
  }
  return result;
}
