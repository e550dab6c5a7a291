/**
 * Tests for positions, ticks and fees through the engine.
 *
 * Covers:
 * - Deposits and withdrawals in and out of range
 * - The withdrawal fee and protocol fee withdrawal
 * - Fee accrual, collection and the collect-before-exit rule
 * - Bound validation and per-tick liquidity caps
 * - Tick bookkeeping invariants (property-based)
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import type { Bounds, PoolKey } from "@concentra/types";
import {
  feeFromFraction,
  MAX_TICK,
  MAX_TICK_SPACING,
  MIN_SQRT_RATIO,
  MIN_TICK,
} from "@concentra/math";
import type { Core } from "../src/core.js";
import { CoreError } from "../src/types.js";
import type { LockSession, UpdatePositionResult } from "../src/types.js";
import { ALICE, BOB, createCore, FUNDING, poolKey, run, TOKEN0, TOKEN1 } from "./setup.js";

const RANGE: Bounds = { lower: -1000, upper: 1000 };

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof CoreError ? err.code : undefined;
  }
  return undefined;
}

function update(
  core: Core,
  key: PoolKey,
  bounds: Bounds,
  liquidityDelta: bigint,
  salt = "",
): UpdatePositionResult {
  return run(core, ALICE, (session) => session.updatePosition(key, { salt, bounds, liquidityDelta }));
}

describe("positions without fees", () => {
  let core: Core;
  const key = poolKey();

  beforeEach(() => {
    core = createCore();
    core.initializePool(key, 0);
  });

  it("deposits both tokens for a range around the price", () => {
    const result = update(core, key, RANGE, 1_000_000_000n);

    expect(result).toEqual({ delta0: 499875n, delta1: 499875n, fees0: 0n, fees1: 0n });
    expect(core.getPoolState(key).liquidity).toBe(1_000_000_000n);
    expect(core.balanceOf(TOKEN0, core.address)).toBe(499875n);
    expect(core.balanceOf(TOKEN1, ALICE)).toBe(FUNDING - 499875n);
    expect(core.getPosition(key, ALICE, "", RANGE).liquidity).toBe(1_000_000_000n);
  });

  it("records the liquidity at both bounds", () => {
    update(core, key, RANGE, 1_000_000_000n);

    expect(core.initializedTicks(key).map(([tick, info]) => [tick, info.liquidityDelta, info.liquidityNet])).toEqual([
      [-1000, 1_000_000_000n, 1_000_000_000n],
      [1000, -1_000_000_000n, 1_000_000_000n],
    ]);
  });

  it("returns one unit less of each token on withdrawal", () => {
    update(core, key, RANGE, 1_000_000_000n);
    const result = update(core, key, RANGE, -1_000_000_000n);

    expect(result).toEqual({ delta0: -499874n, delta1: -499874n, fees0: 0n, fees1: 0n });
    expect(core.getPoolState(key).liquidity).toBe(0n);
    expect(core.initializedTicks(key)).toEqual([]);
    expect(core.getPosition(key, ALICE, "", RANGE).liquidity).toBe(0n);
    expect(core.balanceOf(TOKEN0, core.address)).toBe(1n);
  });

  it("needs only one token outside the range", () => {
    expect(update(core, key, { lower: 100, upper: 200 }, 1_000_000_000n)).toMatchObject({
      delta0: 49997n,
      delta1: 0n,
    });
    expect(update(core, key, { lower: -200, upper: -100 }, 1_000_000_000n)).toMatchObject({
      delta0: 0n,
      delta1: 49997n,
    });
    expect(core.getPoolState(key).liquidity).toBe(0n);
  });

  it("keeps positions apart by salt", () => {
    update(core, key, RANGE, 10n, "a");
    update(core, key, RANGE, 20n, "b");

    expect(core.getPosition(key, ALICE, "a", RANGE).liquidity).toBe(10n);
    expect(core.getPosition(key, ALICE, "b", RANGE).liquidity).toBe(20n);
    expect(core.getTick(key, -1000).liquidityNet).toBe(30n);
  });

  it("accepts a zero liquidity delta", () => {
    expect(update(core, key, RANGE, 0n)).toEqual({ delta0: 0n, delta1: 0n, fees0: 0n, fees1: 0n });
    expect(core.initializedTicks(key)).toEqual([]);
  });

  it("rejects withdrawing more than the position holds", () => {
    update(core, key, RANGE, 100n);
    expect(codeOf(() => update(core, key, RANGE, -101n))).toBe("INSUFFICIENT_POSITION_LIQUIDITY");
    expect(core.getPosition(key, ALICE, "", RANGE).liquidity).toBe(100n);
  });

  it("validates bounds against the tick spacing", () => {
    expect(codeOf(() => update(core, key, { lower: 100, upper: 100 }, 1n))).toBe("INVALID_TICK_BOUNDS");
    expect(codeOf(() => update(core, key, { lower: 200, upper: 100 }, 1n))).toBe("INVALID_TICK_BOUNDS");
    expect(codeOf(() => update(core, key, { lower: -150, upper: 100 }, 1n))).toBe("INVALID_TICK_BOUNDS");
    expect(codeOf(() => update(core, key, { lower: -88_722_900, upper: 100 }, 1n))).toBe(
      "INVALID_TICK_BOUNDS",
    );
  });

  it("rejects operations on missing pools", () => {
    expect(codeOf(() => update(core, poolKey({ fee: 1n }), RANGE, 1n))).toBe("POOL_NOT_INITIALIZED");
  });
});

describe("full-range-only pools", () => {
  const key = poolKey({ tickSpacing: 0 });
  const FULL: Bounds = { lower: MIN_TICK, upper: MAX_TICK };

  it("accept only the full range and track no ticks", () => {
    const core = createCore();
    core.initializePool(key, 0);

    expect(update(core, key, FULL, 1_000_000_000n)).toMatchObject({
      delta0: 1_000_000_000n,
      delta1: 1_000_000_000n,
    });
    expect(core.getPoolState(key).liquidity).toBe(1_000_000_000n);
    expect(core.initializedTicks(key)).toEqual([]);
    expect(codeOf(() => update(core, key, RANGE, 1n))).toBe("INVALID_TICK_BOUNDS");
  });
});

describe("liquidity cap per tick", () => {
  it("rejects liquidity above the cap for the spacing", () => {
    const core = createCore();
    const key = poolKey({ tickSpacing: MAX_TICK_SPACING });
    core.initializePool(key, 0);

    const bounds = { lower: -MAX_TICK_SPACING, upper: MAX_TICK_SPACING };
    expect(codeOf(() => update(core, key, bounds, 1334440654591915542993625911497130242n))).toBe(
      "MAX_LIQUIDITY_PER_TICK_EXCEEDED",
    );
    expect(core.initializedTicks(key)).toEqual([]);
  });
});

describe("withdrawal fee", () => {
  const key = poolKey({ fee: feeFromFraction(1n, 2n) });
  const bounds = { lower: -100, upper: 100 };
  let core: Core;

  beforeEach(() => {
    core = createCore();
    core.initializePool(key, 0);
    update(core, key, bounds, 2000051n);
  });

  it("charges the pool fee on withdrawn amounts as protocol fees", () => {
    const result = update(core, key, bounds, -2000051n);

    expect(result).toEqual({ delta0: -49n, delta1: -49n, fees0: 0n, fees1: 0n });
    expect(core.protocolFeesCollected(TOKEN0)).toBe(50n);
    expect(core.protocolFeesCollected(TOKEN1)).toBe(50n);
    expect(core.balanceOf(TOKEN0, core.address)).toBe(51n);
  });

  it("lets only the owner withdraw protocol fees", () => {
    update(core, key, bounds, -2000051n);

    expect(codeOf(() => core.withdrawProtocolFees(ALICE, TOKEN0, ALICE, 1n))).toBe("NOT_OWNER");
    expect(codeOf(() => core.withdrawProtocolFees(core.owner, TOKEN0, BOB, 51n))).toBe(
      "INSUFFICIENT_PROTOCOL_FEES",
    );
    expect(codeOf(() => core.withdrawProtocolFees(core.owner, TOKEN0, BOB, -1n))).toBe("INVALID_AMOUNT");

    core.withdrawProtocolFees(core.owner, TOKEN0, BOB, 50n);
    expect(core.protocolFeesCollected(TOKEN0)).toBe(0n);
    expect(core.balanceOf(TOKEN0, BOB)).toBe(FUNDING + 50n);
    expect(core.balanceOf(TOKEN0, core.address)).toBe(1n);
  });
});

describe("fee accrual", () => {
  const key = poolKey({ fee: feeFromFraction(3n, 1000n) });
  let core: Core;

  beforeEach(() => {
    core = createCore();
    core.initializePool(key, 0);
    update(core, key, RANGE, 1_000_000_000n);
    run(core, BOB, (session) =>
      session.swap(key, { amount: 1000n, isToken1: false, sqrtRatioLimit: MIN_SQRT_RATIO }),
    );
  });

  it("credits swap fees to in-range liquidity", () => {
    expect(core.getPoolFeesPerLiquidity(key)).toEqual({
      value0: 1020847100762815390390123822295n,
      value1: 0n,
    });
    expect(core.getPoolFeesPerLiquidityInside(key, RANGE)).toEqual(core.getPoolFeesPerLiquidity(key));
    expect(core.getPoolFeesPerLiquidityInside(key, { lower: 1000, upper: 2000 })).toEqual({
      value0: 0n,
      value1: 0n,
    });
  });

  it("requires collecting fees before withdrawing everything", () => {
    expect(codeOf(() => update(core, key, RANGE, -1_000_000_000n))).toBe(
      "MUST_COLLECT_FEES_BEFORE_WITHDRAWING_ALL_LIQUIDITY",
    );

    const collected = run(core, ALICE, (session) => session.collectFees(key, "", RANGE));
    expect(collected).toEqual({ amount0: 2n, amount1: 0n });

    expect(update(core, key, RANGE, -1_000_000_000n)).toEqual({
      delta0: -499368n,
      delta1: -497380n,
      fees0: 0n,
      fees1: 0n,
    });
    expect(core.protocolFeesCollected(TOKEN0)).toBe(1503n);
    expect(core.protocolFeesCollected(TOKEN1)).toBe(1497n);
  });

  it("keeps accrued fees claimable when liquidity is added", () => {
    const result = update(core, key, RANGE, 1_000_000_000n);
    expect(result).toEqual({ delta0: 500872n, delta1: 498878n, fees0: 2n, fees1: 0n });

    const collected = run(core, ALICE, (session) => session.collectFees(key, "", RANGE));
    expect(collected).toEqual({ amount0: 1n, amount1: 0n });
  });

  it("collects nothing for an unknown position", () => {
    expect(run(core, BOB, (session) => session.collectFees(key, "", RANGE))).toEqual({
      amount0: 0n,
      amount1: 0n,
    });
  });
});

describe("tick bookkeeping", () => {
  const positionArb = fc.record({
    lower: fc.integer({ min: -50, max: 49 }),
    width: fc.integer({ min: 1, max: 20 }),
    liquidity: fc.bigInt({ min: 1n, max: 10n ** 15n }),
  });

  it("keeps tick deltas summing to zero and pool liquidity equal to the deltas at or below the tick", () => {
    fc.assert(
      fc.property(fc.array(positionArb, { minLength: 1, maxLength: 8 }), (positions) => {
        const core = createCore();
        const key = poolKey();
        core.initializePool(key, 0);

        const boundsOf = (p: (typeof positions)[number]): Bounds => ({
          lower: p.lower * 100,
          upper: (p.lower + p.width) * 100,
        });

        run(core, ALICE, (session: LockSession) => {
          positions.forEach((p, i) => {
            session.updatePosition(key, { salt: String(i), bounds: boundsOf(p), liquidityDelta: p.liquidity });
          });
        });

        const ticks = core.initializedTicks(key);
        const total = ticks.reduce((sum, [, info]) => sum + info.liquidityDelta, 0n);
        const active = ticks
          .filter(([tick]) => tick <= 0)
          .reduce((sum, [, info]) => sum + info.liquidityDelta, 0n);
        expect(total).toBe(0n);
        expect(core.getPoolState(key).liquidity).toBe(active);

        run(core, ALICE, (session: LockSession) => {
          positions.forEach((p, i) => {
            session.updatePosition(key, { salt: String(i), bounds: boundsOf(p), liquidityDelta: -p.liquidity });
          });
        });
        expect(core.initializedTicks(key)).toEqual([]);
        expect(core.getPoolState(key).liquidity).toBe(0n);
      }),
      { numRuns: 50 },
    );
  });
});

