/**
 * @concentra/core — Token custody ledger.
 *
 * Balances and allowances for every token the engine touches. The engine
 * holds its own custody balance under its address; withdraw, pay and
 * payFrom move tokens between that balance and callers.
 *
 * Rules:
 * - All amounts are non-negative bigints
 * - A transfer never leaves a negative balance
 * - transferFrom consumes allowance granted by the token owner
 */

import type { Address } from "@concentra/types";
import { JournaledMap } from "./journal.js";
import type { Journal } from "./journal.js";
import { CoreError } from "./types.js";

function balanceKey(token: Address, holder: Address): string {
  return JSON.stringify([token, holder]);
}

function allowanceKey(token: Address, owner: Address, spender: Address): string {
  return JSON.stringify([token, owner, spender]);
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new CoreError("INVALID_AMOUNT", `Token amounts must be non-negative, got ${amount.toString()}`);
  }
}

export class TokenLedger {
  private readonly _balances: JournaledMap<string, bigint>;
  private readonly _allowances: JournaledMap<string, bigint>;

  constructor(journal: Journal) {
    this._balances = new JournaledMap(journal);
    this._allowances = new JournaledMap(journal);
  }

  balanceOf(token: Address, holder: Address): bigint {
    return this._balances.get(balanceKey(token, holder)) ?? 0n;
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this._allowances.get(allowanceKey(token, owner, spender)) ?? 0n;
  }

  /**
   * Create tokens out of nothing. Used to fund accounts.
   */
  mint(token: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    this.setBalance(token, to, this.balanceOf(token, to) + amount);
  }

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    assertAmount(amount);
    const key = allowanceKey(token, owner, spender);
    if (amount === 0n) {
      this._allowances.delete(key);
    } else {
      this._allowances.set(key, amount);
    }
  }

  transfer(token: Address, from: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    const fromBalance = this.balanceOf(token, from);
    if (fromBalance < amount) {
      throw new CoreError(
        "INSUFFICIENT_BALANCE",
        `"${from}" holds ${fromBalance.toString()} of "${token}", cannot send ${amount.toString()}`,
      );
    }
    this.setBalance(token, from, fromBalance - amount);
    this.setBalance(token, to, this.balanceOf(token, to) + amount);
  }

  /**
   * Move tokens on behalf of `from`, spending the allowance it granted `spender`.
   */
  transferFrom(
    token: Address,
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): void {
    assertAmount(amount);
    if (spender !== from) {
      const allowed = this.allowance(token, from, spender);
      if (allowed < amount) {
        throw new CoreError(
          "INSUFFICIENT_ALLOWANCE",
          `"${spender}" may spend ${allowed.toString()} of "${token}" for "${from}", needs ${amount.toString()}`,
        );
      }
      this.approve(token, from, spender, allowed - amount);
    }
    this.transfer(token, from, to, amount);
  }

  private setBalance(token: Address, holder: Address, amount: bigint): void {
    const key = balanceKey(token, holder);
    if (amount === 0n) {
      this._balances.delete(key);
    } else {
      this._balances.set(key, amount);
    }
  }
}
