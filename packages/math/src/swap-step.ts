/**
 * @concentra/math — Swap within a single liquidity range.
 *
 * The specified amount is positive for exact input and negative for exact
 * output. The swap moves the price toward `sqrtRatioLimit` and stops there
 * if the amount would carry it further.
 *
 * Fees are charged on the input token:
 * - exact input: the fee is deducted from the amount before pricing
 * - exact output: the fee is added on top of the computed input
 */

import { amount0Delta, amount1Delta } from "./delta.js";
import { amountBeforeFee, computeFee } from "./fee.js";
import {
  nextSqrtRatioFromAmount0,
  nextSqrtRatioFromAmount1,
} from "./sqrt-ratio.js";
import type { SwapStepResult } from "./types.js";

/**
 * Selling token1 or buying token0 raises the price of token0 in token1.
 */
export function isPriceIncreasing(amount: bigint, isToken1: boolean): boolean {
  return isToken1 !== amount < 0n;
}

function noop(sqrtRatio: bigint): SwapStepResult {
  return { consumedAmount: 0n, calculatedAmount: 0n, sqrtRatioNext: sqrtRatio, feeAmount: 0n };
}

export function swapStep(
  sqrtRatio: bigint,
  liquidity: bigint,
  sqrtRatioLimit: bigint,
  amount: bigint,
  isToken1: boolean,
  fee: bigint,
): SwapStepResult {
  if (amount === 0n || sqrtRatio === sqrtRatioLimit) {
    return noop(sqrtRatio);
  }

  const increasing = isPriceIncreasing(amount, isToken1);

  // Nothing to trade against: the price is free to move.
  if (liquidity === 0n) {
    return noop(sqrtRatioLimit);
  }

  const isExactOut = amount < 0n;
  const withinLimit = (next: bigint | null): next is bigint =>
    next !== null && (increasing ? next <= sqrtRatioLimit : next >= sqrtRatioLimit);

  if (!isExactOut) {
    const priceImpactAmount = amount - computeFee(amount, fee);
    const sqrtRatioNext = isToken1
      ? nextSqrtRatioFromAmount1(sqrtRatio, liquidity, priceImpactAmount)
      : nextSqrtRatioFromAmount0(sqrtRatio, liquidity, priceImpactAmount);

    if (withinLimit(sqrtRatioNext)) {
      if (sqrtRatioNext === sqrtRatio) {
        // Too small to move the price; the whole amount is kept as fee.
        return { consumedAmount: amount, calculatedAmount: 0n, sqrtRatioNext, feeAmount: amount };
      }

      const calculatedAmount = isToken1
        ? amount0Delta(sqrtRatioNext, sqrtRatio, liquidity, false)
        : amount1Delta(sqrtRatioNext, sqrtRatio, liquidity, false);

      return {
        consumedAmount: amount,
        calculatedAmount,
        sqrtRatioNext,
        feeAmount: amount - priceImpactAmount,
      };
    }

    const specifiedAmountDelta = isToken1
      ? amount1Delta(sqrtRatioLimit, sqrtRatio, liquidity, true)
      : amount0Delta(sqrtRatioLimit, sqrtRatio, liquidity, true);
    const calculatedAmount = isToken1
      ? amount0Delta(sqrtRatioLimit, sqrtRatio, liquidity, false)
      : amount1Delta(sqrtRatioLimit, sqrtRatio, liquidity, false);

    // Rounding on both sides can ask for a unit more than was offered.
    const includingFee = amountBeforeFee(specifiedAmountDelta, fee);
    const consumedAmount = includingFee > amount ? amount : includingFee;

    return {
      consumedAmount,
      calculatedAmount,
      sqrtRatioNext: sqrtRatioLimit,
      feeAmount: consumedAmount - specifiedAmountDelta,
    };
  }

  const sqrtRatioNext = isToken1
    ? nextSqrtRatioFromAmount1(sqrtRatio, liquidity, amount)
    : nextSqrtRatioFromAmount0(sqrtRatio, liquidity, amount);

  if (withinLimit(sqrtRatioNext)) {
    const calculatedWithoutFee = isToken1
      ? amount0Delta(sqrtRatioNext, sqrtRatio, liquidity, true)
      : amount1Delta(sqrtRatioNext, sqrtRatio, liquidity, true);
    const includingFee = amountBeforeFee(calculatedWithoutFee, fee);

    return {
      consumedAmount: amount,
      calculatedAmount: includingFee,
      sqrtRatioNext,
      feeAmount: includingFee - calculatedWithoutFee,
    };
  }

  const specifiedAmountDelta = isToken1
    ? amount1Delta(sqrtRatioLimit, sqrtRatio, liquidity, false)
    : amount0Delta(sqrtRatioLimit, sqrtRatio, liquidity, false);
  const calculatedWithoutFee = isToken1
    ? amount0Delta(sqrtRatioLimit, sqrtRatio, liquidity, true)
    : amount1Delta(sqrtRatioLimit, sqrtRatio, liquidity, true);
  const includingFee = amountBeforeFee(calculatedWithoutFee, fee);

  return {
    consumedAmount: specifiedAmountDelta > -amount ? amount : -specifiedAmountDelta,
    calculatedAmount: includingFee,
    sqrtRatioNext: sqrtRatioLimit,
    feeAmount: includingFee - calculatedWithoutFee,
  };
}
