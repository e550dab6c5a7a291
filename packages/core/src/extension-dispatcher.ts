/**
 * @concentra/core — Extension registry and hook dispatch.
 *
 * An extension registers once with the call points it wants. Pools that
 * name the extension then run its hooks around their operations, but only
 * for the registered points and never when the extension itself is the
 * caller. A hook that throws aborts the operation it wraps. Registrations
 * are journaled, so one made inside an aborted lock is undone with it.
 */

import type { Address, CallPoint, CallPointMask, CallPoints, PoolKey } from "@concentra/types";
import { hasCallPoint, toCallPointMask } from "@concentra/types";
import type { Journal } from "./journal.js";
import { JournaledMap } from "./journal.js";
import type { Extension } from "./types.js";
import { CoreError, ZERO_ADDRESS } from "./types.js";

interface Registration {
  readonly extension: Extension;
  readonly mask: CallPointMask;
}

export class ExtensionDispatcher {
  private readonly _registrations: JournaledMap<Address, Registration>;

  constructor(journal: Journal) {
    this._registrations = new JournaledMap(journal);
  }

  /**
   * @throws {CoreError} INVALID_EXTENSION, EXTENSION_ALREADY_REGISTERED
   */
  register(extension: Extension, callPoints: CallPoints): CallPointMask {
    if (extension.address === "" || extension.address === ZERO_ADDRESS) {
      throw new CoreError("INVALID_EXTENSION", "Extensions need a non-zero address");
    }
    if (this._registrations.has(extension.address)) {
      throw new CoreError(
        "EXTENSION_ALREADY_REGISTERED",
        `Extension "${extension.address}" is already registered`,
      );
    }
    const mask = toCallPointMask(callPoints);
    this._registrations.set(extension.address, { extension, mask });
    return mask;
  }

  /**
   * @throws {CoreError} EXTENSION_NOT_REGISTERED
   */
  assertUsable(poolKey: PoolKey): void {
    if (poolKey.extension !== ZERO_ADDRESS && !this._registrations.has(poolKey.extension)) {
      throw new CoreError(
        "EXTENSION_NOT_REGISTERED",
        `Extension "${poolKey.extension}" is not registered`,
      );
    }
  }

  /**
   * Run `invoke` against the pool's extension if `point` is enabled for it.
   */
  dispatch(
    poolKey: PoolKey,
    caller: Address,
    point: CallPoint,
    invoke: (extension: Extension) => void,
  ): void {
    if (poolKey.extension === ZERO_ADDRESS || poolKey.extension === caller) {
      return;
    }
    const registration = this._registrations.get(poolKey.extension);
    if (registration === undefined) {
      throw new CoreError(
        "EXTENSION_NOT_REGISTERED",
        `Extension "${poolKey.extension}" is not registered`,
      );
    }
    if (hasCallPoint(registration.mask, point)) {
      invoke(registration.extension);
    }
  }
}
