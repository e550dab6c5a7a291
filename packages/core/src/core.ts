/**
 * @concentra/core — Core engine.
 *
 * The single object that owns every store: pools, ticks, positions, saved
 * balances, protocol fees and token custody. All pool operations go through
 * a LockSession handed to a Locker by lock().
 *
 * Rules:
 * - Every public mutation is all-or-nothing
 * - Pool operations and token movements only happen inside a lock
 * - A lock returns only when all of its debts are zero
 */

import type {
  Address,
  Bounds,
  CallPointMask,
  CallPoints,
  FeesPerLiquidity,
  PoolId,
  PoolKey,
  PoolState,
  Position,
  SavedBalance,
  TickInfo,
} from "@concentra/types";
import { isConcentraError } from "@concentra/types";
import type { CoreConfig } from "./config.js";
import { ExtensionDispatcher } from "./extension-dispatcher.js";
import { FlashAccountant } from "./flash-accountant.js";
import type { LockFrame } from "./flash-accountant.js";
import { Journal } from "./journal.js";
import { LiquidityLedger } from "./liquidity-ledger.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { computePoolId, PoolRegistry, validatePoolKey } from "./pool-registry.js";
import { SavedBalances } from "./saved-balances.js";
import { SwapEngine } from "./swap-engine.js";
import { TickBitmap } from "./tick-bitmap.js";
import { TokenLedger } from "./token-ledger.js";
import { CoreError, ZERO_ADDRESS } from "./types.js";
import type {
  CollectFeesResult,
  Extension,
  Forwardee,
  Locker,
  LockSession,
  SwapParams,
  SwapResult,
  UpdatePositionParams,
  UpdatePositionResult,
} from "./types.js";

export interface CoreOptions {
  /** Custody address holding every token the engine owns. Default "0xcore". */
  readonly address?: Address;

  /** Account allowed to withdraw protocol fees. Default "0xowner". */
  readonly owner?: Address;

  /** skipAhead used by swaps that do not set one. Default 0. */
  readonly defaultSkipAhead?: number;

  readonly logger?: Logger;
}

export class Core {
  readonly address: Address;
  readonly owner: Address;

  private readonly _defaultSkipAhead: number;
  private readonly _logger: Logger | undefined;
  private readonly _journal = new Journal();
  private readonly _tokens: TokenLedger;
  private readonly _registry: PoolRegistry;
  private readonly _bitmap: TickBitmap;
  private readonly _ledger: LiquidityLedger;
  private readonly _swaps: SwapEngine;
  private readonly _accountant: FlashAccountant;
  private readonly _extensions: ExtensionDispatcher;
  private readonly _saved: SavedBalances;

  constructor(options: CoreOptions = {}) {
    this.address = options.address ?? "0xcore";
    this.owner = options.owner ?? "0xowner";
    this._defaultSkipAhead = options.defaultSkipAhead ?? 0;
    this._logger = options.logger;

    this._tokens = new TokenLedger(this._journal);
    this._registry = new PoolRegistry(this._journal);
    this._bitmap = new TickBitmap(this._journal);
    this._ledger = new LiquidityLedger(this._journal, this._registry, this._bitmap);
    this._swaps = new SwapEngine(this._registry, this._ledger, this._bitmap);
    this._accountant = new FlashAccountant(this._journal, this._logger);
    this._extensions = new ExtensionDispatcher(this._journal);
    this._saved = new SavedBalances(this._journal);
  }

  /**
   * Build an engine from loaded configuration.
   */
  static fromConfig(config: CoreConfig, logger: Logger = createLogger(config)): Core {
    return new Core({
      address: config.CORE_ADDRESS,
      owner: config.CORE_OWNER,
      defaultSkipAhead: config.DEFAULT_SKIP_AHEAD,
      logger,
    });
  }

  /** Token balances and allowances, including the engine's custody balance. */
  get tokens(): TokenLedger {
    return this._tokens;
  }

  get isLocked(): boolean {
    return this._accountant.isLocked;
  }

  // ─── Setup ─────────────────────────────────────────────────────────────

  /**
   * Register an extension and the call points it receives.
   *
   * @throws {CoreError} INVALID_EXTENSION, EXTENSION_ALREADY_REGISTERED
   */
  registerExtension(extension: Extension, callPoints: CallPoints): CallPointMask {
    const mask = this._journal.atomic(() => this._extensions.register(extension, callPoints));
    this._logger?.info({ extension: extension.address, mask }, "Extension registered");
    return mask;
  }

  /**
   * Create a pool at `tick` and return its starting sqrt ratio.
   *
   * @throws {CoreError} INVALID_POOL_KEY, EXTENSION_NOT_REGISTERED, POOL_ALREADY_INITIALIZED
   * @throws {MathError} TICK_OUT_OF_RANGE
   */
  initializePool(poolKey: PoolKey, tick: number, caller: Address = ZERO_ADDRESS): bigint {
    validatePoolKey(poolKey);
    this._extensions.assertUsable(poolKey);

    const state = this._journal.atomic(() => {
      this._extensions.dispatch(poolKey, caller, "beforeInitializePool", (ext) => {
        ext.beforeInitializePool?.(caller, poolKey, tick);
      });
      const initialized = this._registry.initialize(poolKey, tick);
      this._extensions.dispatch(poolKey, caller, "afterInitializePool", (ext) => {
        ext.afterInitializePool?.(caller, poolKey, tick, initialized.sqrtRatio);
      });
      return initialized;
    });

    this._logger?.info(
      { poolId: computePoolId(poolKey), tick, sqrtRatio: state.sqrtRatio.toString() },
      "Pool initialized",
    );
    return state.sqrtRatio;
  }

  // ─── Locking ───────────────────────────────────────────────────────────

  /**
   * Run `locker.locked` with a session and return its result.
   * Every change made during the call is undone if it throws or leaves debt.
   *
   * @throws {CoreError} DEBTS_NOT_ZEROED, ASYNC_CALLBACK, or whatever the locker throws
   */
  lock<TData, TResult>(locker: Locker<TData, TResult>, data: TData): TResult {
    try {
      const result = this._accountant.run(locker.address, "lock", (frame) =>
        locker.locked(this.createSession(frame), data),
      );
      this._logger?.debug({ locker: locker.address, depth: this._accountant.depth }, "Lock settled");
      return result;
    } catch (err: unknown) {
      this._logger?.warn(
        {
          locker: locker.address,
          code: isConcentraError(err) ? err.code : undefined,
          err,
        },
        "Lock aborted",
      );
      throw err;
    }
  }

  /**
   * Send collected protocol fees to `recipient`.
   *
   * @throws {CoreError} NOT_OWNER, INVALID_AMOUNT, INSUFFICIENT_PROTOCOL_FEES
   */
  withdrawProtocolFees(caller: Address, token: Address, recipient: Address, amount: bigint): void {
    if (caller !== this.owner) {
      throw new CoreError("NOT_OWNER", `"${caller}" is not the owner`);
    }
    if (amount < 0n) {
      throw new CoreError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount.toString()}`);
    }
    this._journal.atomic(() => {
      this._ledger.debitProtocolFees(token, amount);
      this._tokens.transfer(token, this.address, recipient, amount);
    });
    this._logger?.info({ token, recipient, amount: amount.toString() }, "Protocol fees withdrawn");
  }

  // ─── Reads ─────────────────────────────────────────────────────────────

  poolId(poolKey: PoolKey): PoolId {
    return computePoolId(poolKey);
  }

  isPoolInitialized(poolKey: PoolKey): boolean {
    return this._registry.isInitialized(computePoolId(poolKey));
  }

  /**
   * @throws {CoreError} POOL_NOT_INITIALIZED
   */
  getPoolState(poolKey: PoolKey): PoolState {
    return this._registry.getState(computePoolId(poolKey));
  }

  getPoolFeesPerLiquidity(poolKey: PoolKey): FeesPerLiquidity {
    return this._registry.getFeesPerLiquidity(computePoolId(poolKey));
  }

  /**
   * @throws {CoreError} POOL_NOT_INITIALIZED
   */
  getPoolFeesPerLiquidityInside(poolKey: PoolKey, bounds: Bounds): FeesPerLiquidity {
    return this._ledger.feesPerLiquidityInside(poolKey, this.requirePool(poolKey), bounds);
  }

  getTick(poolKey: PoolKey, tick: number): TickInfo {
    return this._ledger.getTick(computePoolId(poolKey), tick);
  }

  initializedTicks(poolKey: PoolKey): Array<readonly [number, TickInfo]> {
    return this._ledger.initializedTicks(computePoolId(poolKey));
  }

  getPosition(poolKey: PoolKey, owner: Address, salt: string, bounds: Bounds): Position {
    return this._ledger.getPosition(computePoolId(poolKey), owner, salt, bounds);
  }

  savedBalances(owner: Address, token0: Address, token1: Address, salt: string): SavedBalance {
    return this._saved.get(owner, token0, token1, salt);
  }

  protocolFeesCollected(token: Address): bigint {
    return this._ledger.protocolFeesCollected(token);
  }

  balanceOf(token: Address, holder: Address): bigint {
    return this._tokens.balanceOf(token, holder);
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this._tokens.allowance(token, owner, spender);
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private requirePool(poolKey: PoolKey): PoolId {
    const poolId = computePoolId(poolKey);
    this._registry.getState(poolId);
    return poolId;
  }

  private createSession(frame: LockFrame): LockSession {
    const accountant = this._accountant;
    const journal = this._journal;
    const locker = frame.locker;

    const swap = (poolKey: PoolKey, params: SwapParams): SwapResult => {
      accountant.requireActive(frame);
      return journal.atomic(() => {
        const poolId = this.requirePool(poolKey);
        this._extensions.dispatch(poolKey, locker, "beforeSwap", (ext) => {
          ext.beforeSwap?.(locker, poolKey, params);
        });
        const result = this._swaps.swap(poolKey, poolId, params, this._defaultSkipAhead);
        accountant.accountDebt(frame, poolKey.token0, result.delta0);
        accountant.accountDebt(frame, poolKey.token1, result.delta1);
        this._extensions.dispatch(poolKey, locker, "afterSwap", (ext) => {
          ext.afterSwap?.(locker, poolKey, params, result);
        });
        this._logger?.debug(
          {
            poolId,
            locker,
            delta0: result.delta0.toString(),
            delta1: result.delta1.toString(),
            tick: result.state.tick,
          },
          "Swap executed",
        );
        return result;
      });
    };

    const updatePosition = (poolKey: PoolKey, params: UpdatePositionParams): UpdatePositionResult => {
      accountant.requireActive(frame);
      return journal.atomic(() => {
        const poolId = this.requirePool(poolKey);
        this._extensions.dispatch(poolKey, locker, "beforeUpdatePosition", (ext) => {
          ext.beforeUpdatePosition?.(locker, poolKey, params);
        });
        const result = this._ledger.updatePosition(poolKey, poolId, locker, params);
        accountant.accountDebt(frame, poolKey.token0, result.delta0);
        accountant.accountDebt(frame, poolKey.token1, result.delta1);
        this._extensions.dispatch(poolKey, locker, "afterUpdatePosition", (ext) => {
          ext.afterUpdatePosition?.(locker, poolKey, params, result);
        });
        this._logger?.debug(
          {
            poolId,
            locker,
            salt: params.salt,
            liquidityDelta: params.liquidityDelta.toString(),
            delta0: result.delta0.toString(),
            delta1: result.delta1.toString(),
          },
          "Position updated",
        );
        return result;
      });
    };

    const collectFees = (poolKey: PoolKey, salt: string, bounds: Bounds): CollectFeesResult => {
      accountant.requireActive(frame);
      return journal.atomic(() => {
        const poolId = this.requirePool(poolKey);
        this._extensions.dispatch(poolKey, locker, "beforeCollectFees", (ext) => {
          ext.beforeCollectFees?.(locker, poolKey, salt, bounds);
        });
        const result = this._ledger.collectFees(poolKey, poolId, locker, salt, bounds);
        accountant.accountDebt(frame, poolKey.token0, -result.amount0);
        accountant.accountDebt(frame, poolKey.token1, -result.amount1);
        this._extensions.dispatch(poolKey, locker, "afterCollectFees", (ext) => {
          ext.afterCollectFees?.(locker, poolKey, salt, bounds, result);
        });
        return result;
      });
    };

    return {
      id: frame.id,
      parentId: frame.parentId,
      locker,

      swap,
      updatePosition,
      collectFees,

      withdraw: (token, recipient, amount) => {
        accountant.requireActive(frame);
        journal.atomic(() => {
          this._tokens.transfer(token, this.address, recipient, amount);
          accountant.accountDebt(frame, token, amount);
        });
      },

      pay: (token, amount) => {
        accountant.requireActive(frame);
        journal.atomic(() => {
          this._tokens.transfer(token, locker, this.address, amount);
          accountant.accountDebt(frame, token, -amount);
        });
      },

      payFrom: (from, token, amount) => {
        accountant.requireActive(frame);
        journal.atomic(() => {
          this._tokens.transferFrom(token, locker, from, this.address, amount);
          accountant.accountDebt(frame, token, -amount);
        });
      },

      forward: <TData, TResult>(target: Forwardee<TData, TResult>, data: TData): TResult => {
        accountant.requireActive(frame);
        return accountant.run(target.address, "forward", (child) =>
          target.forwarded(this.createSession(child), data),
        );
      },

      updateSavedBalances: (token0, token1, salt, delta0, delta1) => {
        accountant.requireActive(frame);
        return journal.atomic(() => {
          const balance = this._saved.update(locker, token0, token1, salt, delta0, delta1);
          accountant.accountDebt(frame, token0, delta0);
          accountant.accountDebt(frame, token1, delta1);
          return balance;
        });
      },

      accumulateAsFees: (poolKey, amount0, amount1) => {
        accountant.requireActive(frame);
        if (poolKey.extension === ZERO_ADDRESS || poolKey.extension !== locker) {
          throw new CoreError(
            "NOT_POOL_EXTENSION",
            `"${locker}" is not the extension of this pool`,
          );
        }
        if (amount0 < 0n || amount1 < 0n) {
          throw new CoreError("INVALID_AMOUNT", "Donated amounts must be non-negative");
        }
        journal.atomic(() => {
          const poolId = this.requirePool(poolKey);
          this._ledger.accumulateAsFees(poolId, amount0, amount1);
          accountant.accountDebt(frame, poolKey.token0, amount0);
          accountant.accountDebt(frame, poolKey.token1, amount1);
        });
      },

      debt: (token) => accountant.debt(frame, token),
    };
  }
}
