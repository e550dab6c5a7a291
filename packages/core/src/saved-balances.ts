/**
 * @concentra/core — Saved balances.
 *
 * Value a locker parks in the engine instead of taking it out, keyed by
 * owner, ordered token pair and salt. Saving increases the locker's debt;
 * loading decreases it.
 */

import type { Address, SavedBalance } from "@concentra/types";
import { U128_MAX } from "@concentra/math";
import { JournaledMap } from "./journal.js";
import type { Journal } from "./journal.js";
import { CoreError } from "./types.js";

const EMPTY: SavedBalance = { amount0: 0n, amount1: 0n };

function applyDelta(current: bigint, delta: bigint, token: Address): bigint {
  const next = current + delta;
  if (next < 0n) {
    throw new CoreError(
      "INSUFFICIENT_SAVED_BALANCE",
      `Saved balance of "${token}" is ${current.toString()}, cannot remove ${(-delta).toString()}`,
    );
  }
  if (next > U128_MAX) {
    throw new CoreError("SAVED_BALANCE_OVERFLOW", `Saved balance of "${token}" would exceed 128 bits`);
  }
  return next;
}

export class SavedBalances {
  private readonly _balances: JournaledMap<string, SavedBalance>;

  constructor(journal: Journal) {
    this._balances = new JournaledMap(journal);
  }

  get(owner: Address, token0: Address, token1: Address, salt: string): SavedBalance {
    return this._balances.get(this.key(owner, token0, token1, salt)) ?? EMPTY;
  }

  /**
   * @throws {CoreError} INVALID_TOKEN_PAIR, INSUFFICIENT_SAVED_BALANCE, SAVED_BALANCE_OVERFLOW
   */
  update(
    owner: Address,
    token0: Address,
    token1: Address,
    salt: string,
    delta0: bigint,
    delta1: bigint,
  ): SavedBalance {
    if (token0 >= token1) {
      throw new CoreError(
        "INVALID_TOKEN_PAIR",
        `token0 must sort before token1, got "${token0}" and "${token1}"`,
      );
    }

    const key = this.key(owner, token0, token1, salt);
    const current = this._balances.get(key) ?? EMPTY;
    const next: SavedBalance = {
      amount0: applyDelta(current.amount0, delta0, token0),
      amount1: applyDelta(current.amount1, delta1, token1),
    };

    if (next.amount0 === 0n && next.amount1 === 0n) {
      this._balances.delete(key);
    } else {
      this._balances.set(key, next);
    }
    return next;
  }

  private key(owner: Address, token0: Address, token1: Address, salt: string): string {
    return JSON.stringify([owner, token0, token1, salt]);
  }
}
