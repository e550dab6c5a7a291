/**
 * @concentra/core — Sparse index of initialized ticks.
 *
 * Ticks are compressed by the pool's tick spacing and grouped into words
 * of 256 bits. Only non-empty words are stored.
 *
 * A search scans the starting word plus `skipAhead` further words. When
 * nothing is found it returns the last tick it scanned with
 * `initialized: false`; the swap loop moves the price there and searches
 * again, so `skipAhead` only trades iterations for scan length.
 */

import type { PoolId } from "@concentra/types";
import { floorDiv, MAX_TICK, MIN_TICK } from "@concentra/math";
import type { Direction } from "@concentra/math";
import { JournaledMap } from "./journal.js";
import type { Journal } from "./journal.js";

const WORD_BITS = 256;

export interface TickSearchResult {
  readonly tick: number;
  readonly initialized: boolean;
}

interface BitmapPosition {
  readonly word: number;
  readonly bit: number;
}

function toPosition(compressed: number): BitmapPosition {
  const word = floorDiv(compressed, WORD_BITS);
  return { word, bit: compressed - word * WORD_BITS };
}

function lowestSetBit(bits: bigint): number {
  return (bits & -bits).toString(2).length - 1;
}

function highestSetBit(bits: bigint): number {
  return bits.toString(2).length - 1;
}

export class TickBitmap {
  private readonly _words: JournaledMap<string, bigint>;

  constructor(journal: Journal) {
    this._words = new JournaledMap(journal);
  }

  /**
   * Toggle the initialized flag of a tick. `tick` must be a multiple of `tickSpacing`.
   */
  flip(poolId: PoolId, tick: number, tickSpacing: number): void {
    const { word, bit } = toPosition(tick / tickSpacing);
    const key = this.wordKey(poolId, word);
    const next = (this._words.get(key) ?? 0n) ^ (1n << BigInt(bit));
    if (next === 0n) {
      this._words.delete(key);
    } else {
      this._words.set(key, next);
    }
  }

  isInitialized(poolId: PoolId, tick: number, tickSpacing: number): boolean {
    if (tick % tickSpacing !== 0) {
      return false;
    }
    const { word, bit } = toPosition(tick / tickSpacing);
    const bits = this._words.get(this.wordKey(poolId, word)) ?? 0n;
    return ((bits >> BigInt(bit)) & 1n) === 1n;
  }

  /**
   * Find the nearest initialized tick strictly above `fromTick` ("up")
   * or at or below it ("down").
   */
  nextInitializedTick(
    poolId: PoolId,
    fromTick: number,
    tickSpacing: number,
    direction: Direction,
    skipAhead: number,
  ): TickSearchResult {
    return direction === "up"
      ? this.searchUp(poolId, fromTick, tickSpacing, skipAhead)
      : this.searchDown(poolId, fromTick, tickSpacing, skipAhead);
  }

  private searchUp(
    poolId: PoolId,
    fromTick: number,
    tickSpacing: number,
    skipAhead: number,
  ): TickSearchResult {
    let compressed = floorDiv(fromTick, tickSpacing) + 1;
    let lastScanned = fromTick;

    for (let scanned = 0; scanned <= skipAhead; scanned++) {
      const { word, bit } = toPosition(compressed);
      const bits = (this._words.get(this.wordKey(poolId, word)) ?? 0n) >> BigInt(bit);

      if (bits !== 0n) {
        const tick = (compressed + lowestSetBit(bits)) * tickSpacing;
        return tick > MAX_TICK
          ? { tick: MAX_TICK, initialized: false }
          : { tick, initialized: true };
      }

      lastScanned = (word * WORD_BITS + WORD_BITS - 1) * tickSpacing;
      if (lastScanned >= MAX_TICK) {
        return { tick: MAX_TICK, initialized: false };
      }
      compressed = (word + 1) * WORD_BITS;
    }

    return { tick: lastScanned, initialized: false };
  }

  private searchDown(
    poolId: PoolId,
    fromTick: number,
    tickSpacing: number,
    skipAhead: number,
  ): TickSearchResult {
    let compressed = floorDiv(fromTick, tickSpacing);
    let lastScanned = fromTick;

    for (let scanned = 0; scanned <= skipAhead; scanned++) {
      const { word, bit } = toPosition(compressed);
      const mask = (1n << BigInt(bit + 1)) - 1n;
      const bits = (this._words.get(this.wordKey(poolId, word)) ?? 0n) & mask;

      if (bits !== 0n) {
        const tick = (word * WORD_BITS + highestSetBit(bits)) * tickSpacing;
        return tick < MIN_TICK
          ? { tick: MIN_TICK, initialized: false }
          : { tick, initialized: true };
      }

      lastScanned = word * WORD_BITS * tickSpacing;
      if (lastScanned <= MIN_TICK) {
        return { tick: MIN_TICK, initialized: false };
      }
      compressed = word * WORD_BITS - 1;
    }

    return { tick: lastScanned, initialized: false };
  }

  private wordKey(poolId: PoolId, word: number): string {
    return `${poolId}:${String(word)}`;
  }
}
