/**
 * @concentra/core — Engine types.
 *
 * Parameter and result records for pool operations, the interfaces that
 * lockers, forwardees and extensions implement, and the engine error.
 *
 * Rules:
 * - All records are readonly
 * - Deltas are signed: positive is owed to the engine, negative is owed by it
 * - Fail-closed: every broken rule throws CoreError
 */

import type {
  Address,
  Bounds,
  Delta,
  PoolKey,
  PoolState,
  SavedBalance,
  ErrorCategory,
} from "@concentra/types";
import { ConcentraError } from "@concentra/types";

/** Placeholder address: "no extension" in a PoolKey, "unknown caller" for hooks. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

// ─── Operation records ───────────────────────────────────────────────────

export interface SwapParams {
  /** Positive: exact input of the specified token. Negative: exact output. */
  readonly amount: bigint;

  /** Whether `amount` is denominated in token1. */
  readonly isToken1: boolean;

  /** Price bound the swap may not cross. */
  readonly sqrtRatioLimit: bigint;

  /** Extra bitmap words to scan per search step. Does not change the result. */
  readonly skipAhead?: number | undefined;
}

export interface SwapResult extends Delta {
  readonly state: PoolState;
}

export interface UpdatePositionParams {
  readonly salt: string;
  readonly bounds: Bounds;
  readonly liquidityDelta: bigint;
}

export interface UpdatePositionResult extends Delta {
  /** Fees accrued to the position and still uncollected after this update. */
  readonly fees0: bigint;
  readonly fees1: bigint;
}

export interface CollectFeesResult {
  readonly amount0: bigint;
  readonly amount1: bigint;
}

// ─── Callers ─────────────────────────────────────────────────────────────

/**
 * The operations available to code running inside a lock.
 * A session is only usable while its context is the innermost active one.
 */
export interface LockSession {
  readonly id: number;
  readonly parentId: number | null;
  readonly locker: Address;

  swap(poolKey: PoolKey, params: SwapParams): SwapResult;
  updatePosition(poolKey: PoolKey, params: UpdatePositionParams): UpdatePositionResult;
  collectFees(poolKey: PoolKey, salt: string, bounds: Bounds): CollectFeesResult;

  /** Send tokens out of custody. Increases debt. */
  withdraw(token: Address, recipient: Address, amount: bigint): void;

  /** Pull tokens from the locker into custody. Decreases debt. */
  pay(token: Address, amount: bigint): void;

  /** Pull tokens from `from` using an allowance granted to the locker. Decreases debt. */
  payFrom(from: Address, token: Address, amount: bigint): void;

  /** Hand control to `target` under a child context whose debts settle into this one. */
  forward<TData, TResult>(target: Forwardee<TData, TResult>, data: TData): TResult;

  /** Move value into (positive) or out of (negative) the locker's saved balance. */
  updateSavedBalances(
    token0: Address,
    token1: Address,
    salt: string,
    delta0: bigint,
    delta1: bigint,
  ): SavedBalance;

  /** Donate tokens to in-range liquidity. Only the pool's extension may call this. */
  accumulateAsFees(poolKey: PoolKey, amount0: bigint, amount1: bigint): void;

  /** Current debt of this context for a token. */
  debt(token: Address): bigint;
}

export interface Locker<TData = unknown, TResult = unknown> {
  readonly address: Address;
  locked(session: LockSession, data: TData): TResult;
}

export interface Forwardee<TData = unknown, TResult = unknown> {
  readonly address: Address;
  forwarded(session: LockSession, data: TData): TResult;
}

/**
 * Pluggable pool logic. Every hook is optional; a hook only runs when the
 * extension registered the matching call point.
 */
export interface Extension {
  readonly address: Address;

  beforeInitializePool?(caller: Address, poolKey: PoolKey, tick: number): void;
  afterInitializePool?(caller: Address, poolKey: PoolKey, tick: number, sqrtRatio: bigint): void;

  beforeUpdatePosition?(locker: Address, poolKey: PoolKey, params: UpdatePositionParams): void;
  afterUpdatePosition?(
    locker: Address,
    poolKey: PoolKey,
    params: UpdatePositionParams,
    result: UpdatePositionResult,
  ): void;

  beforeSwap?(locker: Address, poolKey: PoolKey, params: SwapParams): void;
  afterSwap?(locker: Address, poolKey: PoolKey, params: SwapParams, result: SwapResult): void;

  beforeCollectFees?(locker: Address, poolKey: PoolKey, salt: string, bounds: Bounds): void;
  afterCollectFees?(
    locker: Address,
    poolKey: PoolKey,
    salt: string,
    bounds: Bounds,
    result: CollectFeesResult,
  ): void;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for engine operations. */
export type CoreErrorCode =
  | "INVALID_POOL_KEY"
  | "INVALID_TOKEN_PAIR"
  | "POOL_NOT_INITIALIZED"
  | "POOL_ALREADY_INITIALIZED"
  | "INVALID_TICK_BOUNDS"
  | "INVALID_SQRT_RATIO_LIMIT"
  | "SQRT_RATIO_LIMIT_WRONG_DIRECTION"
  | "INVALID_AMOUNT"
  | "INVALID_SKIP_AHEAD"
  | "INVALID_EXTENSION"
  | "EXTENSION_NOT_REGISTERED"
  | "EXTENSION_ALREADY_REGISTERED"
  | "ASYNC_CALLBACK"
  | "DELTA_OVERFLOW"
  | "MAX_LIQUIDITY_PER_TICK_EXCEEDED"
  | "LIQUIDITY_OVERFLOW"
  | "DEBTS_NOT_ZEROED"
  | "MUST_COLLECT_FEES_BEFORE_WITHDRAWING_ALL_LIQUIDITY"
  | "INSUFFICIENT_POSITION_LIQUIDITY"
  | "SAVED_BALANCE_OVERFLOW"
  | "INSUFFICIENT_SAVED_BALANCE"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_PROTOCOL_FEES"
  | "NOT_LOCKED"
  | "NOT_POOL_EXTENSION"
  | "NOT_OWNER"
  | "INSUFFICIENT_ALLOWANCE";

const CATEGORY: Readonly<Record<CoreErrorCode, ErrorCategory>> = {
  INVALID_POOL_KEY: "validation",
  INVALID_TOKEN_PAIR: "validation",
  POOL_NOT_INITIALIZED: "validation",
  POOL_ALREADY_INITIALIZED: "validation",
  INVALID_TICK_BOUNDS: "validation",
  INVALID_SQRT_RATIO_LIMIT: "validation",
  SQRT_RATIO_LIMIT_WRONG_DIRECTION: "validation",
  INVALID_AMOUNT: "validation",
  INVALID_SKIP_AHEAD: "validation",
  INVALID_EXTENSION: "validation",
  EXTENSION_NOT_REGISTERED: "validation",
  EXTENSION_ALREADY_REGISTERED: "validation",
  ASYNC_CALLBACK: "validation",
  DELTA_OVERFLOW: "arithmetic",
  MAX_LIQUIDITY_PER_TICK_EXCEEDED: "arithmetic",
  LIQUIDITY_OVERFLOW: "arithmetic",
  DEBTS_NOT_ZEROED: "invariant",
  MUST_COLLECT_FEES_BEFORE_WITHDRAWING_ALL_LIQUIDITY: "invariant",
  INSUFFICIENT_POSITION_LIQUIDITY: "invariant",
  SAVED_BALANCE_OVERFLOW: "invariant",
  INSUFFICIENT_SAVED_BALANCE: "invariant",
  INSUFFICIENT_BALANCE: "invariant",
  INSUFFICIENT_PROTOCOL_FEES: "invariant",
  NOT_LOCKED: "access",
  NOT_POOL_EXTENSION: "access",
  NOT_OWNER: "access",
  INSUFFICIENT_ALLOWANCE: "access",
};

/**
 * Structured error from the engine.
 * Always thrown, never returned as a code.
 */
export class CoreError extends ConcentraError<CoreErrorCode> {
  constructor(code: CoreErrorCode, message: string) {
    super(code, CATEGORY[code], message);
    this.name = "CoreError";
  }
}
