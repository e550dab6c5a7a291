/**
 * @concentra/core — Undo journal for all-or-nothing operations.
 *
 * Every store write made inside `atomic()` records how to undo itself.
 * When the section throws, the writes made since it began are undone in
 * reverse order and the error is rethrown. Sections nest: an inner section
 * that fails only undoes its own writes, and the journal is discarded once
 * the outermost section succeeds.
 *
 * Writes made outside any section are not recorded.
 */

export class Journal {
  private readonly _undo: Array<() => void> = [];
  private _depth = 0;

  /** Whether an atomic section is open. */
  get active(): boolean {
    return this._depth > 0;
  }

  /** Number of recorded undo steps. */
  get size(): number {
    return this._undo.length;
  }

  record(undo: () => void): void {
    if (this._depth > 0) {
      this._undo.push(undo);
    }
  }

  atomic<T>(body: () => T): T {
    const mark = this._undo.length;
    this._depth++;
    try {
      return body();
    } catch (err: unknown) {
      this.revertTo(mark);
      throw err;
    } finally {
      this._depth--;
      if (this._depth === 0) {
        this._undo.length = 0;
      }
    }
  }

  private revertTo(mark: number): void {
    while (this._undo.length > mark) {
      const undo = this._undo.pop();
      if (undo !== undefined) {
        undo();
      }
    }
  }
}

/**
 * A Map whose writes are recorded in a Journal.
 * Values are replaced, never mutated in place, so the recorded previous
 * value is always the one to restore.
 */
export class JournaledMap<K, V> {
  private readonly _journal: Journal;
  private readonly _map: Map<K, V> = new Map();

  constructor(journal: Journal) {
    this._journal = journal;
  }

  get(key: K): V | undefined {
    return this._map.get(key);
  }

  has(key: K): boolean {
    return this._map.has(key);
  }

  set(key: K, value: V): void {
    const previous = this._map.get(key);
    if (previous === undefined) {
      this._journal.record(() => {
        this._map.delete(key);
      });
    } else {
      this._journal.record(() => {
        this._map.set(key, previous);
      });
    }
    this._map.set(key, value);
  }

  delete(key: K): void {
    const previous = this._map.get(key);
    if (previous === undefined) {
      return;
    }
    this._journal.record(() => {
      this._map.set(key, previous);
    });
    this._map.delete(key);
  }

  entries(): IterableIterator<[K, V]> {
    return this._map.entries();
  }

  get size(): number {
    return this._map.size;
  }
}
