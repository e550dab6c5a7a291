/**
 * Tests for locks, forwarding and token movement inside a lock.
 *
 * Covers:
 * - Borrowing and repaying within one lock
 * - Full rollback of a lock that ends with debt
 * - Forwarding and nested locks
 * - Stale sessions and asynchronous callbacks
 * - Rollback of extension registrations
 * - payFrom allowances and saved balances
 * - Zero-sum settlement (property-based)
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import fc from "fast-check";
import type { Core } from "../src/core.js";
import { CoreError } from "../src/types.js";
import type { LockSession } from "../src/types.js";
import {
  ALICE,
  BOB,
  createCore,
  FUNDING,
  makeForwardee,
  makeLocker,
  poolKey,
  settle,
  TOKEN0,
  TOKEN1,
} from "./setup.js";

const FORWARDEE = "0xf0";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof CoreError ? err.code : undefined;
  }
  return undefined;
}

describe("lock", () => {
  let core: Core;

  beforeEach(() => {
    core = createCore();
    core.tokens.mint(TOKEN0, core.address, 1000n);
  });

  it("passes data through and returns the locker's result", () => {
    const locker = {
      address: ALICE,
      locked: (session: LockSession, data: { readonly n: number }) => {
        expect(core.isLocked).toBe(true);
        expect(session.locker).toBe(ALICE);
        return data.n * 2;
      },
    };
    expect(core.lock(locker, { n: 21 })).toBe(42);
    expect(core.isLocked).toBe(false);
  });

  it("allows borrowing when the loan is repaid in the same lock", () => {
    core.lock(
      makeLocker(ALICE, (session) => {
        session.withdraw(TOKEN0, ALICE, 100n);
        expect(session.debt(TOKEN0)).toBe(100n);
        expect(core.balanceOf(TOKEN0, ALICE)).toBe(FUNDING + 100n);
        session.pay(TOKEN0, 100n);
        expect(session.debt(TOKEN0)).toBe(0n);
      }),
      undefined,
    );

    expect(core.balanceOf(TOKEN0, ALICE)).toBe(FUNDING);
    expect(core.balanceOf(TOKEN0, core.address)).toBe(1000n);
  });

  it("rejects a lock that leaves debt and undoes every change", () => {
    expect(() =>
      core.lock(
        makeLocker(ALICE, (session) => {
          session.withdraw(TOKEN0, ALICE, 100n);
          session.pay(TOKEN0, 99n);
        }),
        undefined,
      ),
    ).toThrow(`ended with debts: ${TOKEN0}=1`);

    expect(core.balanceOf(TOKEN0, ALICE)).toBe(FUNDING);
    expect(core.balanceOf(TOKEN0, core.address)).toBe(1000n);
    expect(core.isLocked).toBe(false);
  });

  it("rejects withdrawing more than the engine holds", () => {
    expect(
      codeOf(() =>
        core.lock(
          makeLocker(ALICE, (session) => {
            session.withdraw(TOKEN0, ALICE, 1001n);
          }),
          undefined,
        ),
      ),
    ).toBe("INSUFFICIENT_BALANCE");
  });

  it("rejects negative token movements", () => {
    expect(
      codeOf(() =>
        core.lock(
          makeLocker(ALICE, (session) => {
            session.pay(TOKEN0, -1n);
          }),
          undefined,
        ),
      ),
    ).toBe("INVALID_AMOUNT");
  });

  it("keeps the debt of an operation that failed and was caught at zero", () => {
    core.lock(
      makeLocker(ALICE, (session) => {
        expect(() => session.withdraw(TOKEN0, ALICE, 5000n)).toThrow(CoreError);
        expect(session.debt(TOKEN0)).toBe(0n);
      }),
      undefined,
    );
  });

  it("rejects callbacks that return a promise", () => {
    const locker = makeLocker(ALICE, () => Promise.resolve(1));
    expect(codeOf(() => core.lock(locker, undefined))).toBe("ASYNC_CALLBACK");
    expect(core.isLocked).toBe(false);
  });

  it("handles a rejected promise from an aborted callback", async () => {
    const unhandled = vi.fn();
    process.on("unhandledRejection", unhandled);
    try {
      const locker = makeLocker(ALICE, () => Promise.reject(new Error("late failure")));
      expect(codeOf(() => core.lock(locker, undefined))).toBe("ASYNC_CALLBACK");
      await new Promise((resolve) => setTimeout(resolve, 10));
      expect(unhandled).not.toHaveBeenCalled();
    } finally {
      process.off("unhandledRejection", unhandled);
    }
  });

  it("undoes an extension registration made inside a failed lock", () => {
    const extension = { address: "0xe7" };
    expect(() =>
      core.lock(
        makeLocker(ALICE, () => {
          core.registerExtension(extension, { beforeSwap: true });
          throw new Error("abort");
        }),
        undefined,
      ),
    ).toThrow("abort");

    expect(codeOf(() => core.initializePool(poolKey({ extension: extension.address }), 0))).toBe(
      "EXTENSION_NOT_REGISTERED",
    );
    expect(codeOf(() => core.registerExtension(extension, { beforeSwap: true }))).toBeUndefined();
  });

  it("rejects sessions used after their lock ended", () => {
    const sessions: LockSession[] = [];
    core.lock(
      makeLocker(ALICE, (session) => {
        sessions.push(session);
      }),
      undefined,
    );

    expect(sessions).toHaveLength(1);
    for (const stale of sessions) {
      expect(codeOf(() => stale.pay(TOKEN0, 1n))).toBe("NOT_LOCKED");
      expect(codeOf(() => stale.debt(TOKEN0))).toBe("NOT_LOCKED");
    }
  });
});

describe("forward", () => {
  let core: Core;

  beforeEach(() => {
    core = createCore();
    core.tokens.mint(TOKEN0, core.address, 1000n);
  });

  it("hands the forwardee's debts to the forwarding lock", () => {
    core.lock(
      makeLocker(ALICE, (session) => {
        const childId = session.forward(
          makeForwardee(FORWARDEE, (child) => {
            expect(child.locker).toBe(FORWARDEE);
            expect(child.parentId).toBe(session.id);
            child.withdraw(TOKEN0, FORWARDEE, 100n);
            return child.id;
          }),
          undefined,
        );
        expect(childId).toBeGreaterThan(session.id);
        expect(session.debt(TOKEN0)).toBe(100n);
        session.pay(TOKEN0, 100n);
      }),
      undefined,
    );

    expect(core.balanceOf(TOKEN0, FORWARDEE)).toBe(100n);
    expect(core.balanceOf(TOKEN0, ALICE)).toBe(FUNDING - 100n);
  });

  it("fails the lock when forwarded debts are left unpaid", () => {
    expect(
      codeOf(() =>
        core.lock(
          makeLocker(ALICE, (session) => {
            session.forward(
              makeForwardee(FORWARDEE, (child) => {
                child.withdraw(TOKEN0, FORWARDEE, 100n);
              }),
              undefined,
            );
          }),
          undefined,
        ),
      ),
    ).toBe("DEBTS_NOT_ZEROED");
    expect(core.balanceOf(TOKEN0, FORWARDEE)).toBe(0n);
  });

  it("blocks the parent session while the forwardee runs", () => {
    core.lock(
      makeLocker(ALICE, (session) => {
        session.forward(
          makeForwardee(FORWARDEE, () => {
            expect(codeOf(() => session.withdraw(TOKEN0, ALICE, 1n))).toBe("NOT_LOCKED");
          }),
          undefined,
        );
      }),
      undefined,
    );
  });
});

describe("nested locks", () => {
  let core: Core;

  beforeEach(() => {
    core = createCore();
    core.tokens.mint(TOKEN0, core.address, 1000n);
  });

  it("settle independently of the enclosing lock", () => {
    core.lock(
      makeLocker(ALICE, (outer) => {
        outer.withdraw(TOKEN0, ALICE, 10n);

        core.lock(
          makeLocker(BOB, (inner) => {
            expect(inner.parentId).toBe(outer.id);
            expect(inner.debt(TOKEN0)).toBe(0n);
            inner.withdraw(TOKEN0, BOB, 5n);
            inner.pay(TOKEN0, 5n);
          }),
          undefined,
        );

        expect(outer.debt(TOKEN0)).toBe(10n);
        outer.pay(TOKEN0, 10n);
      }),
      undefined,
    );
  });

  it("undo only themselves when they fail", () => {
    core.lock(
      makeLocker(ALICE, (outer) => {
        expect(
          codeOf(() =>
            core.lock(
              makeLocker(BOB, (inner) => {
                inner.withdraw(TOKEN0, BOB, 5n);
              }),
              undefined,
            ),
          ),
        ).toBe("DEBTS_NOT_ZEROED");

        expect(core.balanceOf(TOKEN0, BOB)).toBe(FUNDING);
        outer.withdraw(TOKEN0, ALICE, 1n);
        outer.pay(TOKEN0, 1n);
      }),
      undefined,
    );
  });
});

describe("payFrom", () => {
  let core: Core;

  beforeEach(() => {
    core = createCore();
    core.tokens.mint(TOKEN0, core.address, 1000n);
    core.tokens.approve(TOKEN0, BOB, ALICE, 50n);
  });

  it("pays with tokens the payer approved to the locker", () => {
    core.lock(
      makeLocker(ALICE, (session) => {
        session.withdraw(TOKEN0, ALICE, 50n);
        session.payFrom(BOB, TOKEN0, 50n);
      }),
      undefined,
    );

    expect(core.balanceOf(TOKEN0, ALICE)).toBe(FUNDING + 50n);
    expect(core.balanceOf(TOKEN0, BOB)).toBe(FUNDING - 50n);
    expect(core.allowance(TOKEN0, BOB, ALICE)).toBe(0n);
  });

  it("rejects payments beyond the allowance", () => {
    expect(
      codeOf(() =>
        core.lock(
          makeLocker(ALICE, (session) => {
            session.withdraw(TOKEN0, ALICE, 51n);
            session.payFrom(BOB, TOKEN0, 51n);
          }),
          undefined,
        ),
      ),
    ).toBe("INSUFFICIENT_ALLOWANCE");
    expect(core.allowance(TOKEN0, BOB, ALICE)).toBe(50n);
  });
});

describe("saved balances", () => {
  let core: Core;

  beforeEach(() => {
    core = createCore();
  });

  it("saves value against debt and loads it back later", () => {
    core.lock(
      makeLocker(ALICE, (session) => {
        const saved = session.updateSavedBalances(TOKEN0, TOKEN1, "vault", 10n, 5n);
        expect(saved).toEqual({ amount0: 10n, amount1: 5n });
        expect(session.debt(TOKEN0)).toBe(10n);
        expect(session.debt(TOKEN1)).toBe(5n);
        settle(session);
      }),
      undefined,
    );
    expect(core.savedBalances(ALICE, TOKEN0, TOKEN1, "vault")).toEqual({ amount0: 10n, amount1: 5n });
    expect(core.balanceOf(TOKEN0, core.address)).toBe(10n);

    core.lock(
      makeLocker(ALICE, (session) => {
        session.updateSavedBalances(TOKEN0, TOKEN1, "vault", -10n, -5n);
        expect(session.debt(TOKEN0)).toBe(-10n);
        settle(session);
      }),
      undefined,
    );
    expect(core.savedBalances(ALICE, TOKEN0, TOKEN1, "vault")).toEqual({ amount0: 0n, amount1: 0n });
    expect(core.balanceOf(TOKEN0, ALICE)).toBe(FUNDING);
  });

  it("keeps each locker's balances separate", () => {
    core.lock(
      makeLocker(ALICE, (session) => {
        session.updateSavedBalances(TOKEN0, TOKEN1, "vault", 10n, 0n);
        settle(session);
      }),
      undefined,
    );

    expect(
      codeOf(() =>
        core.lock(
          makeLocker(BOB, (session) => {
            session.updateSavedBalances(TOKEN0, TOKEN1, "vault", -1n, 0n);
            settle(session);
          }),
          undefined,
        ),
      ),
    ).toBe("INSUFFICIENT_SAVED_BALANCE");
  });

  it("requires an ordered token pair", () => {
    expect(
      codeOf(() =>
        core.lock(
          makeLocker(ALICE, (session) => {
            session.updateSavedBalances(TOKEN1, TOKEN0, "vault", 1n, 1n);
          }),
          undefined,
        ),
      ),
    ).toBe("INVALID_TOKEN_PAIR");
  });
});

describe("zero-sum settlement", () => {
  it("succeeds exactly when withdrawals and payments cancel out", () => {
    fc.assert(
      fc.property(
        fc.array(fc.bigInt({ min: 1n, max: 100n }), { minLength: 1, maxLength: 5 }),
        fc.bigInt({ min: 0n, max: 600n }),
        (withdrawals, repayment) => {
          const core = createCore();
          core.tokens.mint(TOKEN0, core.address, 1000n);
          const borrowed = withdrawals.reduce((sum, amount) => sum + amount, 0n);

          const code = codeOf(() =>
            core.lock(
              makeLocker(ALICE, (session) => {
                for (const amount of withdrawals) {
                  session.withdraw(TOKEN0, ALICE, amount);
                }
                session.pay(TOKEN0, repayment);
              }),
              undefined,
            ),
          );

          if (repayment === borrowed) {
            expect(code).toBeUndefined();
          } else {
            expect(code).toBe("DEBTS_NOT_ZEROED");
          }
          expect(core.balanceOf(TOKEN0, core.address)).toBe(1000n);
          expect(core.balanceOf(TOKEN0, ALICE)).toBe(FUNDING);
        },
      ),
      { numRuns: 50 },
    );
  });
});
