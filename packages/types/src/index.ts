/**
 * @concentra/types — Shared domain types for the Concentra stack.
 *
 * These types are used across all Concentra packages:
 * - Pool keys, pool state and tick bookkeeping
 * - Positions and saved balances
 * - Extension call points
 * - The structured error base class
 *
 * Design rules:
 * - All record types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Pool types
export type {
  Address,
  PoolId,
  PoolKey,
  PoolState,
  FeesPerLiquidity,
  TickInfo,
  Bounds,
  Position,
  Delta,
  SavedBalance,
} from "./pool.js";

// Extension call points
export type { CallPoint, CallPointMask, CallPoints } from "./extension.js";
export {
  CALL_POINT_BITS,
  ALL_CALL_POINTS,
  toCallPointMask,
  hasCallPoint,
} from "./extension.js";

// Errors
export type { ErrorCategory } from "./errors.js";
export { ConcentraError } from "./errors.js";

// Runtime type guards
export {
  isPoolKey,
  isBounds,
  isSavedBalance,
  isCallPoints,
  isConcentraError,
} from "./guards.js";
