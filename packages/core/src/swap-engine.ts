/**
 * @concentra/core — Multi-step swap execution.
 *
 * A swap repeatedly trades against the liquidity of the current range until
 * the specified amount is used up or the price reaches the limit. Whenever a
 * step ends on an initialized tick the tick is crossed and the active
 * liquidity changes by the tick's liquidityDelta.
 *
 * After the loop:
 *   specified delta  = amount - remaining
 *   calculated delta = +input (exact output) or -output (exact input)
 */

import type { PoolId, PoolKey, PoolState } from "@concentra/types";
import {
  addFeesPerLiquidity,
  addLiquidityDelta,
  feesPerLiquidityFromAmounts,
  FULL_RANGE_ONLY_TICK_SPACING,
  isI128,
  isPriceIncreasing,
  isValidSqrtRatio,
  MAX_SQRT_RATIO,
  MAX_TICK,
  MIN_SQRT_RATIO,
  MIN_TICK,
  sqrtRatioToTick,
  swapStep,
  tickToSqrtRatio,
} from "@concentra/math";
import type { LiquidityLedger } from "./liquidity-ledger.js";
import type { PoolRegistry } from "./pool-registry.js";
import type { TickBitmap, TickSearchResult } from "./tick-bitmap.js";
import { CoreError } from "./types.js";
import type { SwapParams, SwapResult } from "./types.js";

export class SwapEngine {
  private readonly _registry: PoolRegistry;
  private readonly _ledger: LiquidityLedger;
  private readonly _bitmap: TickBitmap;

  constructor(registry: PoolRegistry, ledger: LiquidityLedger, bitmap: TickBitmap) {
    this._registry = registry;
    this._ledger = ledger;
    this._bitmap = bitmap;
  }

  /**
   * @throws {CoreError} INVALID_AMOUNT, INVALID_SKIP_AHEAD, INVALID_SQRT_RATIO_LIMIT,
   *   SQRT_RATIO_LIMIT_WRONG_DIRECTION, DELTA_OVERFLOW
   * @throws {MathError} AMOUNT_BEFORE_FEE_OVERFLOW
   */
  swap(poolKey: PoolKey, poolId: PoolId, params: SwapParams, defaultSkipAhead: number): SwapResult {
    const { amount, isToken1, sqrtRatioLimit } = params;
    const skipAhead = params.skipAhead ?? defaultSkipAhead;

    if (!isI128(amount)) {
      throw new CoreError("INVALID_AMOUNT", `Swap amount ${amount.toString()} does not fit in int128`);
    }
    if (!Number.isInteger(skipAhead) || skipAhead < 0) {
      throw new CoreError("INVALID_SKIP_AHEAD", `skipAhead must be a non-negative integer, got ${String(skipAhead)}`);
    }
    if (!isValidSqrtRatio(sqrtRatioLimit)) {
      throw new CoreError(
        "INVALID_SQRT_RATIO_LIMIT",
        `Limit ${sqrtRatioLimit.toString()} is outside [${MIN_SQRT_RATIO.toString()}, ${MAX_SQRT_RATIO.toString()}]`,
      );
    }

    const state = this._registry.getState(poolId);
    if (amount === 0n || sqrtRatioLimit === state.sqrtRatio) {
      return { delta0: 0n, delta1: 0n, state };
    }

    const increasing = isPriceIncreasing(amount, isToken1);
    if (increasing ? sqrtRatioLimit < state.sqrtRatio : sqrtRatioLimit > state.sqrtRatio) {
      throw new CoreError(
        "SQRT_RATIO_LIMIT_WRONG_DIRECTION",
        `Limit ${sqrtRatioLimit.toString()} is ${increasing ? "below" : "above"} the current price`,
      );
    }

    // First tick whose sqrt ratio reaches the limit in the direction of travel.
    const limitTick = sqrtRatioToTick(sqrtRatioLimit);
    const stopTick = increasing && tickToSqrtRatio(limitTick) !== sqrtRatioLimit ? limitTick + 1 : limitTick;

    let { sqrtRatio, tick, liquidity } = state;
    let fees = this._registry.getFeesPerLiquidity(poolId);
    let remaining = amount;
    let calculated = 0n;

    while (remaining !== 0n && sqrtRatio !== sqrtRatioLimit) {
      const next = this.nextTick(poolKey, poolId, tick, increasing, stopTick, skipAhead);
      const tickSqrtRatio = tickToSqrtRatio(next.tick);
      const stepLimit = increasing
        ? (tickSqrtRatio < sqrtRatioLimit ? tickSqrtRatio : sqrtRatioLimit)
        : (tickSqrtRatio > sqrtRatioLimit ? tickSqrtRatio : sqrtRatioLimit);

      const step = swapStep(sqrtRatio, liquidity, stepLimit, remaining, isToken1, poolKey.fee);
      remaining -= step.consumedAmount;
      calculated += step.calculatedAmount;

      if (step.feeAmount !== 0n && liquidity !== 0n) {
        fees = addFeesPerLiquidity(
          fees,
          increasing
            ? feesPerLiquidityFromAmounts(0n, step.feeAmount, liquidity)
            : feesPerLiquidityFromAmounts(step.feeAmount, 0n, liquidity),
        );
      }

      if (step.sqrtRatioNext === tickSqrtRatio) {
        if (next.initialized) {
          const liquidityDelta = this._ledger.crossTick(poolId, next.tick, fees);
          const crossed = addLiquidityDelta(liquidity, increasing ? liquidityDelta : -liquidityDelta);
          if (crossed === null) {
            throw new CoreError("LIQUIDITY_OVERFLOW", `Crossing tick ${String(next.tick)} leaves the 128-bit range`);
          }
          liquidity = crossed;
        }
        tick = increasing ? next.tick : next.tick - 1;
      } else if (step.sqrtRatioNext !== sqrtRatio) {
        tick = sqrtRatioToTick(step.sqrtRatioNext);
      }
      sqrtRatio = step.sqrtRatioNext;
    }

    const specifiedDelta = amount - remaining;
    const calculatedDelta = amount < 0n ? calculated : -calculated;
    const delta0 = isToken1 ? calculatedDelta : specifiedDelta;
    const delta1 = isToken1 ? specifiedDelta : calculatedDelta;

    if (!isI128(delta0) || !isI128(delta1)) {
      throw new CoreError("DELTA_OVERFLOW", "Swap deltas do not fit in int128");
    }

    const nextState: PoolState = { sqrtRatio, tick, liquidity };
    this._registry.setState(poolId, nextState);
    this._registry.setFeesPerLiquidity(poolId, fees);

    return { delta0, delta1, state: nextState };
  }

  /**
   * Nearest initialized tick in the direction of travel, or the first
   * uninitialized stop at or past `stopTick` or at the tick range bound.
   * A bitmap search covers 1 + skipAhead words; searches repeat until one
   * of those stops is reached, so skipAhead never splits a step.
   */
  private nextTick(
    poolKey: PoolKey,
    poolId: PoolId,
    tick: number,
    increasing: boolean,
    stopTick: number,
    skipAhead: number,
  ): TickSearchResult {
    if (poolKey.tickSpacing === FULL_RANGE_ONLY_TICK_SPACING) {
      return { tick: increasing ? MAX_TICK : MIN_TICK, initialized: false };
    }

    const direction = increasing ? "up" : "down";
    let next = this._bitmap.nextInitializedTick(poolId, tick, poolKey.tickSpacing, direction, skipAhead);
    while (!next.initialized && next.tick !== MAX_TICK && next.tick !== MIN_TICK) {
      if (increasing ? next.tick >= stopTick : next.tick <= stopTick) {
        break;
      }
      next = this._bitmap.nextInitializedTick(
        poolId,
        increasing ? next.tick : next.tick - 1,
        poolKey.tickSpacing,
        direction,
        skipAhead,
      );
    }
    return next;
  }
}
