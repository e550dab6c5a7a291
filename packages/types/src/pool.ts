/**
 * Pool Types
 *
 * Identifiers and state records for concentrated-liquidity pools.
 *
 * Rules:
 * - All numeric quantities that can exceed 2^53 are bigint
 * - Ticks and tick spacings are plain integers (they fit in 32 bits)
 * - Records are immutable; stores replace them instead of mutating
 */

/**
 * Identifier of a token or of an account holding tokens.
 * Compared lexicographically when ordering a pair.
 */
export type Address = string;

/**
 * Hex-encoded SHA-256 of the canonical JSON form of a PoolKey.
 */
export type PoolId = string;

/**
 * The immutable configuration of a pool.
 * `token0` must sort strictly before `token1`.
 */
export interface PoolKey {
  readonly token0: Address;
  readonly token1: Address;

  /** Fee as a 0.64 fixed-point fraction: the fee rate is `fee / 2^64`. */
  readonly fee: bigint;

  /** Distance between usable ticks. 0 means the pool only supports full-range positions. */
  readonly tickSpacing: number;

  /** Extension invoked around pool operations, or the zero address. */
  readonly extension: Address;
}

/**
 * Mutable (by replacement) price state of a pool.
 */
export interface PoolState {
  /** sqrt(price) as an unsigned 64.128 fixed-point value. */
  readonly sqrtRatio: bigint;
  readonly tick: number;

  /** Sum of the liquidity of every position whose range covers `tick`. */
  readonly liquidity: bigint;
}

/**
 * Cumulative fees earned per unit of liquidity, 128-bit fractional fixed point.
 * Values wrap modulo 2^256; only differences are meaningful.
 */
export interface FeesPerLiquidity {
  readonly value0: bigint;
  readonly value1: bigint;
}

/**
 * Liquidity bookkeeping at a single tick boundary.
 */
export interface TickInfo {
  /** Signed change applied to pool liquidity when price crosses this tick upward. */
  readonly liquidityDelta: bigint;

  /** Total gross liquidity of all positions that use this tick as a bound. */
  readonly liquidityNet: bigint;

  readonly feesPerLiquidityOutside: FeesPerLiquidity;
}

export interface Bounds {
  readonly lower: number;
  readonly upper: number;
}

export interface Position {
  readonly liquidity: bigint;
  readonly feesPerLiquidityInsideLast: FeesPerLiquidity;
}

/**
 * Signed token movement produced by a pool operation.
 * Positive values are owed to the pool, negative values are owed by it.
 */
export interface Delta {
  readonly delta0: bigint;
  readonly delta1: bigint;
}

/**
 * Per-owner deferred settlement balance for an ordered token pair.
 */
export interface SavedBalance {
  readonly amount0: bigint;
  readonly amount1: bigint;
}
