/**
 * @file Initializable
 * @description Once-only initialization guard for contracts whose state is set after construction
 */

import { Contract } from "../../chain/Contract";
import { ContractError } from "../../chain/errors";

export class InvalidInitialization extends ContractError {
  constructor() {
    super("InvalidInitialization");
  }
}

export class NotInitializing extends ContractError {
  constructor() {
    super("NotInitializing");
  }
}

type InitializableStorage = {
  initialized: bigint;
  initializing: boolean;
};

export type InitializedEvent = {
  version: bigint;
};

const MAX_UINT64 = 2n ** 64n - 1n;

export abstract class Initializable extends Contract {
  private readonly $initializable = this.storage<InitializableStorage>(
    "soulbound-badge.storage.Initializable",
    { initialized: 0n, initializing: false }
  );

  /**
   * Run `body` as the single initialization of this instance.
   * Nested initializer-only helpers may call `onlyInitializing()`.
   */
  protected initializer<R>(body: () => R): R {
    const $ = this.$initializable.read();
    if ($.initializing || $.initialized !== 0n) {
      throw new InvalidInitialization();
    }
    $.initialized = 1n;
    $.initializing = true;
    let result: R;
    try {
      result = body();
    } finally {
      $.initializing = false;
    }
    this.emit<InitializedEvent>("Initialized", { version: 1n });
    return result;
  }

  protected onlyInitializing(): void {
    if (!this.$initializable.read().initializing) {
      throw new NotInitializing();
    }
  }

  /**
   * Lock the instance so that initialize() can never run on it.
   * Used on templates whose clones carry the live state.
   */
  protected disableInitializers(): void {
    const $ = this.$initializable.read();
    if ($.initializing) {
      throw new InvalidInitialization();
    }
    if ($.initialized !== MAX_UINT64) {
      $.initialized = MAX_UINT64;
      this.emit<InitializedEvent>("Initialized", { version: MAX_UINT64 });
    }
  }

  getInitializedVersion(): bigint {
    return this.$initializable.read().initialized;
  }
}
