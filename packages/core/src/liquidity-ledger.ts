/**
 * @concentra/core — Tick and position bookkeeping.
 *
 * Each position adds its liquidity at its lower tick and removes it at its
 * upper tick, so the pool's active liquidity is the running sum of tick
 * deltas up to the current tick.
 *
 * Rules:
 * - Σ liquidityDelta over a pool's initialized ticks is always zero
 * - A tick is initialized exactly while some position references it
 * - A position keeps its accrued fees across liquidity changes
 * - Withdrawing to zero liquidity requires collecting fees first
 */

import type {
  Address,
  Bounds,
  FeesPerLiquidity,
  PoolId,
  PoolKey,
  Position,
  PoolState,
  TickInfo,
} from "@concentra/types";
import {
  addFeesPerLiquidity,
  addLiquidityDelta,
  computeFee,
  feesEarned,
  feesPerLiquidityFromAmounts,
  FULL_RANGE_ONLY_TICK_SPACING,
  liquidityDeltaToAmountDelta,
  MAX_TICK,
  maxLiquidityPerTick,
  MIN_TICK,
  subFeesPerLiquidity,
  tickToSqrtRatio,
  ZERO_FEES_PER_LIQUIDITY,
} from "@concentra/math";
import { JournaledMap } from "./journal.js";
import type { Journal } from "./journal.js";
import type { PoolRegistry } from "./pool-registry.js";
import type { TickBitmap } from "./tick-bitmap.js";
import { CoreError } from "./types.js";
import type { CollectFeesResult, UpdatePositionParams, UpdatePositionResult } from "./types.js";

const EMPTY_TICK: TickInfo = {
  liquidityDelta: 0n,
  liquidityNet: 0n,
  feesPerLiquidityOutside: ZERO_FEES_PER_LIQUIDITY,
};

const EMPTY_POSITION: Position = {
  liquidity: 0n,
  feesPerLiquidityInsideLast: ZERO_FEES_PER_LIQUIDITY,
};

/**
 * Check that bounds are usable in a pool with the given tick spacing.
 *
 * @throws {CoreError} INVALID_TICK_BOUNDS
 */
export function validateBounds(bounds: Bounds, tickSpacing: number): void {
  const { lower, upper } = bounds;
  if (!Number.isInteger(lower) || !Number.isInteger(upper) || lower >= upper) {
    throw new CoreError(
      "INVALID_TICK_BOUNDS",
      `Bounds [${String(lower)}, ${String(upper)}] must be integers with lower < upper`,
    );
  }
  if (lower < MIN_TICK || upper > MAX_TICK) {
    throw new CoreError(
      "INVALID_TICK_BOUNDS",
      `Bounds [${String(lower)}, ${String(upper)}] exceed [${String(MIN_TICK)}, ${String(MAX_TICK)}]`,
    );
  }
  if (tickSpacing === FULL_RANGE_ONLY_TICK_SPACING) {
    if (lower !== MIN_TICK || upper !== MAX_TICK) {
      throw new CoreError("INVALID_TICK_BOUNDS", "Full-range-only pools accept only full-range bounds");
    }
    return;
  }
  if (lower % tickSpacing !== 0 || upper % tickSpacing !== 0) {
    throw new CoreError(
      "INVALID_TICK_BOUNDS",
      `Bounds [${String(lower)}, ${String(upper)}] must be multiples of ${String(tickSpacing)}`,
    );
  }
}

export class LiquidityLedger {
  private readonly _registry: PoolRegistry;
  private readonly _bitmap: TickBitmap;
  private readonly _ticks: JournaledMap<string, TickInfo>;
  private readonly _positions: JournaledMap<string, Position>;
  private readonly _protocolFees: JournaledMap<Address, bigint>;

  constructor(journal: Journal, registry: PoolRegistry, bitmap: TickBitmap) {
    this._registry = registry;
    this._bitmap = bitmap;
    this._ticks = new JournaledMap(journal);
    this._positions = new JournaledMap(journal);
    this._protocolFees = new JournaledMap(journal);
  }

  // ─── Positions ─────────────────────────────────────────────────────────

  /**
   * Change the liquidity of `owner`'s position and return the token deltas.
   *
   * @throws {CoreError} INVALID_TICK_BOUNDS, INSUFFICIENT_POSITION_LIQUIDITY,
   *   LIQUIDITY_OVERFLOW, MAX_LIQUIDITY_PER_TICK_EXCEEDED,
   *   MUST_COLLECT_FEES_BEFORE_WITHDRAWING_ALL_LIQUIDITY
   */
  updatePosition(
    poolKey: PoolKey,
    poolId: PoolId,
    owner: Address,
    params: UpdatePositionParams,
  ): UpdatePositionResult {
    const { bounds, liquidityDelta, salt } = params;
    validateBounds(bounds, poolKey.tickSpacing);

    const state = this._registry.getState(poolId);
    const positionKey = this.positionKey(poolId, owner, salt, bounds);
    const position = this._positions.get(positionKey) ?? EMPTY_POSITION;

    const liquidityNext = addLiquidityDelta(position.liquidity, liquidityDelta);
    if (liquidityNext === null) {
      throw liquidityDelta < 0n
        ? new CoreError(
            "INSUFFICIENT_POSITION_LIQUIDITY",
            `Position holds ${position.liquidity.toString()}, cannot remove ${(-liquidityDelta).toString()}`,
          )
        : new CoreError("LIQUIDITY_OVERFLOW", "Position liquidity would exceed 128 bits");
    }

    const fees = feesEarned(
      this.feesPerLiquidityInside(poolKey, poolId, bounds),
      position.feesPerLiquidityInsideLast,
      position.liquidity,
    );

    if (liquidityNext === 0n && (fees.amount0 !== 0n || fees.amount1 !== 0n)) {
      throw new CoreError(
        "MUST_COLLECT_FEES_BEFORE_WITHDRAWING_ALL_LIQUIDITY",
        `Position has uncollected fees (${fees.amount0.toString()}, ${fees.amount1.toString()})`,
      );
    }

    const amounts = liquidityDeltaToAmountDelta(
      state.sqrtRatio,
      liquidityDelta,
      tickToSqrtRatio(bounds.lower),
      tickToSqrtRatio(bounds.upper),
    );
    let delta0 = amounts.amount0;
    let delta1 = amounts.amount1;

    if (liquidityDelta < 0n && poolKey.fee !== 0n) {
      const protocolFee0 = computeFee(-delta0, poolKey.fee);
      const protocolFee1 = computeFee(-delta1, poolKey.fee);
      delta0 += protocolFee0;
      delta1 += protocolFee1;
      this.creditProtocolFees(poolKey.token0, protocolFee0);
      this.creditProtocolFees(poolKey.token1, protocolFee1);
    }

    if (liquidityDelta !== 0n) {
      this.applyToTicks(poolKey, poolId, state, bounds, liquidityDelta);
      this._registry.setState(poolId, this.applyToPool(poolKey, state, bounds, liquidityDelta));
    }

    if (liquidityNext === 0n) {
      this._positions.delete(positionKey);
    } else {
      // Move the checkpoint back by the accrued amount so it stays claimable.
      const inside = this.feesPerLiquidityInside(poolKey, poolId, bounds);
      this._positions.set(positionKey, {
        liquidity: liquidityNext,
        feesPerLiquidityInsideLast: subFeesPerLiquidity(
          inside,
          feesPerLiquidityFromAmounts(fees.amount0, fees.amount1, liquidityNext),
        ),
      });
    }

    return { delta0, delta1, fees0: fees.amount0, fees1: fees.amount1 };
  }

  /**
   * Pay out the fees accrued to a position and reset its checkpoint.
   */
  collectFees(
    poolKey: PoolKey,
    poolId: PoolId,
    owner: Address,
    salt: string,
    bounds: Bounds,
  ): CollectFeesResult {
    validateBounds(bounds, poolKey.tickSpacing);
    this._registry.getState(poolId);

    const positionKey = this.positionKey(poolId, owner, salt, bounds);
    const position = this._positions.get(positionKey);
    if (position === undefined) {
      return { amount0: 0n, amount1: 0n };
    }

    const inside = this.feesPerLiquidityInside(poolKey, poolId, bounds);
    const fees = feesEarned(inside, position.feesPerLiquidityInsideLast, position.liquidity);
    this._positions.set(positionKey, {
      liquidity: position.liquidity,
      feesPerLiquidityInsideLast: inside,
    });
    return fees;
  }

  getPosition(poolId: PoolId, owner: Address, salt: string, bounds: Bounds): Position {
    return this._positions.get(this.positionKey(poolId, owner, salt, bounds)) ?? EMPTY_POSITION;
  }

  /**
   * Fee growth per unit of liquidity inside `bounds`.
   */
  feesPerLiquidityInside(poolKey: PoolKey, poolId: PoolId, bounds: Bounds): FeesPerLiquidity {
    const global = this._registry.getFeesPerLiquidity(poolId);
    if (poolKey.tickSpacing === FULL_RANGE_ONLY_TICK_SPACING) {
      return global;
    }

    const { tick } = this._registry.getState(poolId);
    const lower = this.getTick(poolId, bounds.lower).feesPerLiquidityOutside;
    const upper = this.getTick(poolId, bounds.upper).feesPerLiquidityOutside;

    if (tick < bounds.lower) {
      return subFeesPerLiquidity(lower, upper);
    }
    if (tick < bounds.upper) {
      return subFeesPerLiquidity(subFeesPerLiquidity(global, lower), upper);
    }
    return subFeesPerLiquidity(upper, lower);
  }

  // ─── Ticks ─────────────────────────────────────────────────────────────

  getTick(poolId: PoolId, tick: number): TickInfo {
    return this._ticks.get(this.tickKey(poolId, tick)) ?? EMPTY_TICK;
  }

  /**
   * Initialized ticks of a pool, in ascending order.
   */
  initializedTicks(poolId: PoolId): Array<readonly [number, TickInfo]> {
    const prefix = `${poolId}:`;
    const result: Array<readonly [number, TickInfo]> = [];
    for (const [key, info] of this._ticks.entries()) {
      if (key.startsWith(prefix)) {
        result.push([Number(key.slice(prefix.length)), info]);
      }
    }
    return result.sort((a, b) => a[0] - b[0]);
  }

  /**
   * Cross a tick during a swap: flip its outside fee snapshot against the
   * current global value and return its liquidityDelta.
   */
  crossTick(poolId: PoolId, tick: number, global: FeesPerLiquidity): bigint {
    const key = this.tickKey(poolId, tick);
    const info = this._ticks.get(key);
    if (info === undefined) {
      return 0n;
    }
    this._ticks.set(key, {
      ...info,
      feesPerLiquidityOutside: subFeesPerLiquidity(global, info.feesPerLiquidityOutside),
    });
    return info.liquidityDelta;
  }

  // ─── Fees ──────────────────────────────────────────────────────────────

  /**
   * Distribute amounts to the pool's active liquidity.
   */
  accumulateAsFees(poolId: PoolId, amount0: bigint, amount1: bigint): void {
    const { liquidity } = this._registry.getState(poolId);
    if (liquidity === 0n || (amount0 === 0n && amount1 === 0n)) {
      return;
    }
    this._registry.setFeesPerLiquidity(
      poolId,
      addFeesPerLiquidity(
        this._registry.getFeesPerLiquidity(poolId),
        feesPerLiquidityFromAmounts(amount0, amount1, liquidity),
      ),
    );
  }

  protocolFeesCollected(token: Address): bigint {
    return this._protocolFees.get(token) ?? 0n;
  }

  /**
   * @throws {CoreError} INSUFFICIENT_PROTOCOL_FEES
   */
  debitProtocolFees(token: Address, amount: bigint): void {
    const available = this.protocolFeesCollected(token);
    if (amount > available) {
      throw new CoreError(
        "INSUFFICIENT_PROTOCOL_FEES",
        `Protocol fees of "${token}" are ${available.toString()}, cannot withdraw ${amount.toString()}`,
      );
    }
    this.setProtocolFees(token, available - amount);
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private creditProtocolFees(token: Address, amount: bigint): void {
    if (amount !== 0n) {
      this.setProtocolFees(token, this.protocolFeesCollected(token) + amount);
    }
  }

  private setProtocolFees(token: Address, amount: bigint): void {
    if (amount === 0n) {
      this._protocolFees.delete(token);
    } else {
      this._protocolFees.set(token, amount);
    }
  }

  private applyToTicks(
    poolKey: PoolKey,
    poolId: PoolId,
    state: PoolState,
    bounds: Bounds,
    liquidityDelta: bigint,
  ): void {
    if (poolKey.tickSpacing === FULL_RANGE_ONLY_TICK_SPACING) {
      return;
    }
    const cap = maxLiquidityPerTick(poolKey.tickSpacing);
    this.updateTick(poolKey, poolId, state, bounds.lower, liquidityDelta, liquidityDelta, cap);
    this.updateTick(poolKey, poolId, state, bounds.upper, -liquidityDelta, liquidityDelta, cap);
  }

  private updateTick(
    poolKey: PoolKey,
    poolId: PoolId,
    state: PoolState,
    tick: number,
    signedDelta: bigint,
    grossDelta: bigint,
    cap: bigint,
  ): void {
    const key = this.tickKey(poolId, tick);
    const current = this._ticks.get(key) ?? EMPTY_TICK;
    const liquidityNet = current.liquidityNet + grossDelta;

    if (liquidityNet > cap) {
      throw new CoreError(
        "MAX_LIQUIDITY_PER_TICK_EXCEEDED",
        `Tick ${String(tick)} would reference ${liquidityNet.toString()}, cap is ${cap.toString()}`,
      );
    }

    if (liquidityNet === 0n) {
      this._ticks.delete(key);
      this._bitmap.flip(poolId, tick, poolKey.tickSpacing);
      return;
    }

    if (current.liquidityNet === 0n) {
      // Growth below the current tick is attributed to the outside of a new tick.
      this._ticks.set(key, {
        liquidityDelta: signedDelta,
        liquidityNet,
        feesPerLiquidityOutside:
          tick <= state.tick ? this._registry.getFeesPerLiquidity(poolId) : ZERO_FEES_PER_LIQUIDITY,
      });
      this._bitmap.flip(poolId, tick, poolKey.tickSpacing);
      return;
    }

    this._ticks.set(key, {
      liquidityDelta: current.liquidityDelta + signedDelta,
      liquidityNet,
      feesPerLiquidityOutside: current.feesPerLiquidityOutside,
    });
  }

  private applyToPool(
    poolKey: PoolKey,
    state: PoolState,
    bounds: Bounds,
    liquidityDelta: bigint,
  ): PoolState {
    const inRange =
      poolKey.tickSpacing === FULL_RANGE_ONLY_TICK_SPACING ||
      (state.tick >= bounds.lower && state.tick < bounds.upper);
    if (!inRange) {
      return state;
    }
    const liquidity = addLiquidityDelta(state.liquidity, liquidityDelta);
    if (liquidity === null) {
      throw new CoreError("LIQUIDITY_OVERFLOW", "Pool liquidity would leave the 128-bit range");
    }
    return { ...state, liquidity };
  }

  private tickKey(poolId: PoolId, tick: number): string {
    return `${poolId}:${String(tick)}`;
  }

  private positionKey(poolId: PoolId, owner: Address, salt: string, bounds: Bounds): string {
    return JSON.stringify([poolId, owner, salt, bounds.lower, bounds.upper]);
  }
}
