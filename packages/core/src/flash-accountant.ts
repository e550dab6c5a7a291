/**
 * @concentra/core — Flash accounting.
 *
 * Every operation runs inside a lock frame. Frames form a stack: a lock
 * opened inside another lock, or a forward, pushes a child frame that must
 * finish before its parent continues.
 *
 * Rules:
 * - Debts are signed: positive means the frame owes the engine
 * - A lock frame must end with every debt at zero
 * - A forward frame hands its remaining debts to its parent
 * - Only the frame on top of the stack may account debt
 * - Each frame runs inside a journal section and debt changes are journaled,
 *   so a failed frame or operation leaves no trace
 */

import type { Address } from "@concentra/types";
import type { Journal } from "./journal.js";
import type { Logger } from "./logger.js";
import { CoreError } from "./types.js";

export type FrameKind = "lock" | "forward";

export interface LockFrame {
  readonly id: number;
  readonly parentId: number | null;
  readonly locker: Address;
  readonly kind: FrameKind;
  readonly debts: Map<Address, bigint>;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

export class FlashAccountant {
  private readonly _journal: Journal;
  private readonly _logger: Logger | undefined;
  private readonly _stack: LockFrame[] = [];

  // Never reset, so a stale frame can never match a new one.
  private _nextId = 0;

  constructor(journal: Journal, logger?: Logger) {
    this._journal = journal;
    this._logger = logger;
  }

  get isLocked(): boolean {
    return this._stack.length > 0;
  }

  get depth(): number {
    return this._stack.length;
  }

  get current(): LockFrame | undefined {
    return this._stack[this._stack.length - 1];
  }

  /**
   * Run `body` in a new frame and settle the frame when it returns.
   *
   * @throws {CoreError} ASYNC_CALLBACK if body returns a promise
   * @throws {CoreError} DEBTS_NOT_ZEROED if a lock frame ends owing anything
   * @throws {CoreError} NOT_LOCKED if a forward is attempted outside a lock
   */
  run<T>(locker: Address, kind: FrameKind, body: (frame: LockFrame) => T): T {
    const parent = this.current;
    if (kind === "forward" && parent === undefined) {
      throw new CoreError("NOT_LOCKED", "forward requires an active lock");
    }

    const frame: LockFrame = {
      id: this._nextId++,
      parentId: parent?.id ?? null,
      locker,
      kind,
      debts: new Map(),
    };

    return this._journal.atomic(() => {
      this._stack.push(frame);
      try {
        const result = body(frame);
        if (isPromiseLike(result)) {
          // The frame is already aborted; a later rejection is only reported.
          void result.then(undefined, (err: unknown) => {
            this._logger?.warn({ locker, err }, "Callback promise rejected after its lock aborted");
          });
          throw new CoreError(
            "ASYNC_CALLBACK",
            `Callback of "${locker}" returned a promise; lock callbacks must be synchronous`,
          );
        }
        this.settle(frame, parent);
        return result;
      } finally {
        this._stack.pop();
      }
    });
  }

  /**
   * Add `delta` to the frame's debt for `token`.
   *
   * @throws {CoreError} NOT_LOCKED if the frame is not on top of the stack
   */
  accountDebt(frame: LockFrame, token: Address, delta: bigint): void {
    this.requireActive(frame);
    if (delta === 0n) {
      return;
    }
    this.addDebt(frame.debts, token, delta);
  }

  debt(frame: LockFrame, token: Address): bigint {
    this.requireActive(frame);
    return frame.debts.get(token) ?? 0n;
  }

  /**
   * @throws {CoreError} NOT_LOCKED
   */
  requireActive(frame: LockFrame): void {
    const top = this.current;
    if (top === undefined || top.id !== frame.id) {
      throw new CoreError(
        "NOT_LOCKED",
        `Lock context ${String(frame.id)} is not the active context`,
      );
    }
  }

  private settle(frame: LockFrame, parent: LockFrame | undefined): void {
    if (frame.kind === "forward" && parent !== undefined) {
      for (const [token, amount] of frame.debts) {
        this.addDebt(parent.debts, token, amount);
      }
      return;
    }

    const outstanding = [...frame.debts.entries()]
      .map(([token, amount]) => `${token}=${amount.toString()}`)
      .join(", ");
    if (outstanding !== "") {
      throw new CoreError(
        "DEBTS_NOT_ZEROED",
        `Lock ${String(frame.id)} of "${frame.locker}" ended with debts: ${outstanding}`,
      );
    }
  }

  private addDebt(debts: Map<Address, bigint>, token: Address, delta: bigint): void {
    const previous = debts.get(token);
    this._journal.record(() => {
      if (previous === undefined) {
        debts.delete(token);
      } else {
        debts.set(token, previous);
      }
    });

    const next = (previous ?? 0n) + delta;
    if (next === 0n) {
      debts.delete(token);
    } else {
      debts.set(token, next);
    }
  }
}
