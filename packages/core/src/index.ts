/**
 * @concentra/core — Concentrated-liquidity engine with flash accounting.
 *
 * - Core: the engine object that owns every store
 * - Lock sessions: swaps, position updates, fee collection and token
 *   movements that must net to zero debt before the lock returns
 * - Extensions: hooks around pool operations, gated by call points
 * - Configuration (zod) and logging (pino)
 *
 * Rules:
 * - Synchronous: lockers, forwardees and hooks never await
 * - All-or-nothing: a failed lock leaves every store as it was
 */

export { Core } from "./core.js";
export type { CoreOptions } from "./core.js";

export type {
  SwapParams,
  SwapResult,
  UpdatePositionParams,
  UpdatePositionResult,
  CollectFeesResult,
  LockSession,
  Locker,
  Forwardee,
  Extension,
  CoreErrorCode,
} from "./types.js";
export { CoreError, ZERO_ADDRESS } from "./types.js";

export { computePoolId, validatePoolKey, PoolRegistry } from "./pool-registry.js";
export { validateBounds, LiquidityLedger } from "./liquidity-ledger.js";
export { SwapEngine } from "./swap-engine.js";
export { TickBitmap } from "./tick-bitmap.js";
export type { TickSearchResult } from "./tick-bitmap.js";
export { FlashAccountant } from "./flash-accountant.js";
export type { FrameKind, LockFrame } from "./flash-accountant.js";
export { ExtensionDispatcher } from "./extension-dispatcher.js";
export { SavedBalances } from "./saved-balances.js";
export { TokenLedger } from "./token-ledger.js";
export { Journal, JournaledMap } from "./journal.js";

export { ConfigSchema, loadConfig } from "./config.js";
export type { CoreConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
