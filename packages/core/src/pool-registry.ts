/**
 * @concentra/core — Pool registry.
 *
 * Maps PoolIds to pool state and the pool's global fee accumulators.
 * A pool is written once by initialize() and afterwards only replaced
 * by the swap and liquidity paths.
 *
 * PoolIds are derived from the key with RFC 8785 (JCS) canonicalization
 * plus SHA-256, so equal keys always produce the same id.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { FeesPerLiquidity, PoolId, PoolKey, PoolState } from "@concentra/types";
import {
  isValidFee,
  isValidTickSpacing,
  tickToSqrtRatio,
  ZERO_FEES_PER_LIQUIDITY,
} from "@concentra/math";
import { JournaledMap } from "./journal.js";
import type { Journal } from "./journal.js";
import { CoreError } from "./types.js";

/**
 * Compute the identifier of a pool key.
 */
export function computePoolId(poolKey: PoolKey): PoolId {
  const content = canonicalize({
    token0: poolKey.token0,
    token1: poolKey.token1,
    fee: poolKey.fee.toString(),
    tickSpacing: poolKey.tickSpacing,
    extension: poolKey.extension,
  });
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Check the structural rules of a pool key.
 *
 * @throws {CoreError} INVALID_POOL_KEY
 */
export function validatePoolKey(poolKey: PoolKey): void {
  if (poolKey.token0 === "" || poolKey.token1 === "") {
    throw new CoreError("INVALID_POOL_KEY", "Pool tokens must be non-empty");
  }
  if (poolKey.token0 >= poolKey.token1) {
    throw new CoreError(
      "INVALID_POOL_KEY",
      `token0 must sort before token1, got "${poolKey.token0}" and "${poolKey.token1}"`,
    );
  }
  if (!isValidFee(poolKey.fee)) {
    throw new CoreError("INVALID_POOL_KEY", `Fee ${poolKey.fee.toString()} must be in [0, 2^64)`);
  }
  if (!isValidTickSpacing(poolKey.tickSpacing)) {
    throw new CoreError("INVALID_POOL_KEY", `Invalid tick spacing ${String(poolKey.tickSpacing)}`);
  }
}

export class PoolRegistry {
  private readonly _states: JournaledMap<PoolId, PoolState>;
  private readonly _fees: JournaledMap<PoolId, FeesPerLiquidity>;

  constructor(journal: Journal) {
    this._states = new JournaledMap(journal);
    this._fees = new JournaledMap(journal);
  }

  /**
   * Create the state of a new pool at `tick` with no liquidity.
   *
   * @throws {CoreError} POOL_ALREADY_INITIALIZED
   * @throws {MathError} TICK_OUT_OF_RANGE
   */
  initialize(poolKey: PoolKey, tick: number): PoolState {
    validatePoolKey(poolKey);
    const poolId = computePoolId(poolKey);
    if (this._states.has(poolId)) {
      throw new CoreError("POOL_ALREADY_INITIALIZED", `Pool ${poolId} is already initialized`);
    }

    const state: PoolState = { sqrtRatio: tickToSqrtRatio(tick), tick, liquidity: 0n };
    this._states.set(poolId, state);
    this._fees.set(poolId, ZERO_FEES_PER_LIQUIDITY);
    return state;
  }

  isInitialized(poolId: PoolId): boolean {
    return this._states.has(poolId);
  }

  /**
   * @throws {CoreError} POOL_NOT_INITIALIZED
   */
  getState(poolId: PoolId): PoolState {
    const state = this._states.get(poolId);
    if (state === undefined) {
      throw new CoreError("POOL_NOT_INITIALIZED", `Pool ${poolId} is not initialized`);
    }
    return state;
  }

  setState(poolId: PoolId, state: PoolState): void {
    this._states.set(poolId, state);
  }

  getFeesPerLiquidity(poolId: PoolId): FeesPerLiquidity {
    return this._fees.get(poolId) ?? ZERO_FEES_PER_LIQUIDITY;
  }

  setFeesPerLiquidity(poolId: PoolId, fees: FeesPerLiquidity): void {
    this._fees.set(poolId, fees);
  }
}

