/**
 * Tests for liquidity sizing and position amounts.
 *
 * Covers:
 * - maxLiquidityPerTick formula and scaling with tick spacing
 * - liquidityDeltaToAmountDelta in all three price cases
 * - maxLiquidity and the deposit/withdraw round trip
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  addLiquidityDelta,
  fullRangeBounds,
  liquidityDeltaToAmountDelta,
  MathError,
  MAX_TICK,
  MAX_TICK_SPACING,
  maxLiquidity,
  maxLiquidityPerTick,
  MIN_TICK,
  ONE_X128,
  tickToSqrtRatio,
  U128_MAX,
} from "../src/index.js";

describe("maxLiquidityPerTick", () => {
  it("is U128_MAX for full-range-only pools", () => {
    expect(maxLiquidityPerTick(0)).toBe(U128_MAX);
  });

  it("divides the 128-bit range among the usable ticks", () => {
    expect(maxLiquidityPerTick(1)).toBe(1917670715792995950086461153688n);
    expect(maxLiquidityPerTick(10)).toBe(19176707266000825123733625477125n);
    expect(maxLiquidityPerTick(100)).toBe(191767040238753862992101024387611n);
    expect(maxLiquidityPerTick(MAX_TICK_SPACING)).toBe(1334440654591915542993625911497130241n);
  });

  it("grows with tick spacing and ties only when the usable tick count ties", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: MAX_TICK_SPACING - 1 }), (spacing) => {
        const current = maxLiquidityPerTick(spacing);
        const wider = maxLiquidityPerTick(spacing + 1);
        const sameTickCount = Math.floor(MAX_TICK / spacing) === Math.floor(MAX_TICK / (spacing + 1));
        return sameTickCount ? current === wider : current < wider;
      }),
    );
  });

  it("rejects invalid spacings", () => {
    expect(() => maxLiquidityPerTick(-1)).toThrow(MathError);
    expect(() => maxLiquidityPerTick(MAX_TICK_SPACING + 1)).toThrow(MathError);
    expect(() => maxLiquidityPerTick(2.5)).toThrow("Tick spacing");
  });
});

describe("fullRangeBounds", () => {
  it("returns the tick range for spacing 0", () => {
    expect(fullRangeBounds(0)).toEqual({ lower: MIN_TICK, upper: MAX_TICK });
  });

  it("rounds the range inward to the spacing", () => {
    expect(fullRangeBounds(100)).toEqual({ lower: -88722800, upper: 88722800 });
    expect(fullRangeBounds(1)).toEqual({ lower: MIN_TICK, upper: MAX_TICK });
  });
});

describe("liquidityDeltaToAmountDelta", () => {
  const price = ONE_X128;

  it("needs only token0 when the range is above the price", () => {
    const lower = tickToSqrtRatio(100);
    const upper = tickToSqrtRatio(200);
    expect(liquidityDeltaToAmountDelta(price, 1_000_000n, lower, upper)).toEqual({ amount0: 50n, amount1: 0n });
    expect(liquidityDeltaToAmountDelta(price, -1_000_000n, lower, upper)).toEqual({
      amount0: -49n,
      amount1: 0n,
    });
  });

  it("needs only token1 when the range is below the price", () => {
    const lower = tickToSqrtRatio(-200);
    const upper = tickToSqrtRatio(-100);
    expect(liquidityDeltaToAmountDelta(price, 1_000_000n, lower, upper)).toEqual({ amount0: 0n, amount1: 50n });
  });

  it("needs both tokens when the range straddles the price", () => {
    const lower = tickToSqrtRatio(-1000);
    const upper = tickToSqrtRatio(2000);
    expect(liquidityDeltaToAmountDelta(price, 12351179n, lower, upper)).toEqual({
      amount0: 12345n,
      amount1: 6175n,
    });
    expect(liquidityDeltaToAmountDelta(price, -12351179n, lower, upper)).toEqual({
      amount0: -12344n,
      amount1: -6174n,
    });
  });

  it("returns zero for a zero delta", () => {
    expect(liquidityDeltaToAmountDelta(price, 0n, tickToSqrtRatio(-1), tickToSqrtRatio(1))).toEqual({
      amount0: 0n,
      amount1: 0n,
    });
  });
});

describe("maxLiquidity", () => {
  it("sizes a straddling position by the scarcer token", () => {
    expect(
      maxLiquidity(ONE_X128, tickToSqrtRatio(-1000), tickToSqrtRatio(2000), 12345n, 6789n),
    ).toBe(12351179n);
  });

  it("uses only the token the range needs", () => {
    expect(maxLiquidity(ONE_X128, tickToSqrtRatio(100), tickToSqrtRatio(200), 1000n, 0n)).toBe(20001510n);
    expect(maxLiquidity(ONE_X128, tickToSqrtRatio(-200), tickToSqrtRatio(-100), 0n, 1000n)).toBe(20001510n);
  });

  it("sizes the liquidity for a 100/100 deposit in [-100, 100]", () => {
    expect(maxLiquidity(ONE_X128, tickToSqrtRatio(-100), tickToSqrtRatio(100), 100n, 100n)).toBe(2000051n);
  });

  it("returns zero for an empty range", () => {
    const sqrtRatio = tickToSqrtRatio(100);
    expect(maxLiquidity(ONE_X128, sqrtRatio, sqrtRatio, 1n, 1n)).toBe(0n);
  });

  it("never costs more than the amounts offered", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: -50_000, max: 49_000 }),
        fc.integer({ min: 1, max: 1_000 }),
        fc.bigInt({ min: 0n, max: 10n ** 24n }),
        fc.bigInt({ min: 0n, max: 10n ** 24n }),
        (lowerTick, width, amount0, amount1) => {
          const lower = tickToSqrtRatio(lowerTick);
          const upper = tickToSqrtRatio(lowerTick + width);
          const liquidity = maxLiquidity(ONE_X128, lower, upper, amount0, amount1);
          const cost = liquidityDeltaToAmountDelta(ONE_X128, liquidity, lower, upper);
          return cost.amount0 <= amount0 && cost.amount1 <= amount1;
        },
      ),
    );
  });
});

describe("addLiquidityDelta", () => {
  it("applies signed deltas inside the unsigned range", () => {
    expect(addLiquidityDelta(10n, -4n)).toBe(6n);
    expect(addLiquidityDelta(10n, -11n)).toBeNull();
    expect(addLiquidityDelta(U128_MAX, 1n)).toBeNull();
  });
});
