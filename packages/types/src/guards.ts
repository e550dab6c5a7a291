/**
 * Runtime Type Guards
 *
 * Narrowing functions for pool domain types.
 * These enable safe runtime validation at system boundaries
 * (deserialized pool keys, extension call points, caught errors).
 */

import type { Bounds, PoolKey, SavedBalance } from "./pool.js";
import type { CallPoints } from "./extension.js";
import { ALL_CALL_POINTS } from "./extension.js";
import { ConcentraError } from "./errors.js";

// =============================================================================
// Pool guards
// =============================================================================

export function isPoolKey(value: unknown): value is PoolKey {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.token0 === "string" &&
    v.token0.length > 0 &&
    typeof v.token1 === "string" &&
    v.token1.length > 0 &&
    typeof v.fee === "bigint" &&
    typeof v.tickSpacing === "number" &&
    Number.isInteger(v.tickSpacing) &&
    typeof v.extension === "string"
  );
}

export function isBounds(value: unknown): value is Bounds {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.lower === "number" &&
    Number.isInteger(v.lower) &&
    typeof v.upper === "number" &&
    Number.isInteger(v.upper)
  );
}

export function isSavedBalance(value: unknown): value is SavedBalance {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.amount0 === "bigint" && typeof v.amount1 === "bigint";
}

// =============================================================================
// Extension guards
// =============================================================================

const CALL_POINT_NAMES = new Set<string>(ALL_CALL_POINTS);

export function isCallPoints(value: unknown): value is CallPoints {
  if (value === null || typeof value !== "object") return false;
  return Object.entries(value).every(
    ([key, flag]) => CALL_POINT_NAMES.has(key) && typeof flag === "boolean",
  );
}

// =============================================================================
// Error guards
// =============================================================================

export function isConcentraError(value: unknown): value is ConcentraError {
  return value instanceof ConcentraError;
}
