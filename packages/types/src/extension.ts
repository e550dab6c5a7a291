/**
 * Extension Types
 *
 * Capability flags selecting which hook points an extension receives.
 * The eight call points are packed into a single bitmask so that a
 * registry can store them alongside the extension reference.
 */

export type CallPoint =
  | "beforeInitializePool"
  | "afterInitializePool"
  | "beforeUpdatePosition"
  | "afterUpdatePosition"
  | "beforeSwap"
  | "afterSwap"
  | "beforeCollectFees"
  | "afterCollectFees";

/**
 * Bit position of each call point within a CallPointMask.
 */
export const CALL_POINT_BITS: Readonly<Record<CallPoint, number>> = {
  beforeInitializePool: 1 << 0,
  afterInitializePool: 1 << 1,
  beforeUpdatePosition: 1 << 2,
  afterUpdatePosition: 1 << 3,
  beforeSwap: 1 << 4,
  afterSwap: 1 << 5,
  beforeCollectFees: 1 << 6,
  afterCollectFees: 1 << 7,
} as const;

export const ALL_CALL_POINTS: readonly CallPoint[] = [
  "beforeInitializePool",
  "afterInitializePool",
  "beforeUpdatePosition",
  "afterUpdatePosition",
  "beforeSwap",
  "afterSwap",
  "beforeCollectFees",
  "afterCollectFees",
];

/** An integer in [0, 255]; one bit per CallPoint. */
export type CallPointMask = number;

export type CallPoints = Readonly<Partial<Record<CallPoint, boolean>>>;

/**
 * Pack a set of call points into a mask.
 */
export function toCallPointMask(points: CallPoints): CallPointMask {
  let mask = 0;
  for (const point of ALL_CALL_POINTS) {
    if (points[point] === true) {
      mask |= CALL_POINT_BITS[point];
    }
  }
  return mask;
}

export function hasCallPoint(mask: CallPointMask, point: CallPoint): boolean {
  return (mask & CALL_POINT_BITS[point]) !== 0;
}
