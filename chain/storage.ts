/**
 * @file Namespaced contract storage
 * @description ERC-7201 storage locations and journaled storage records
 */

import { AbiCoder, keccak256, toBeHex, toUtf8Bytes } from "ethers";

/**
 * Compute the ERC-7201 storage location for a namespace id:
 * `keccak256(abi.encode(uint256(keccak256(id)) - 1)) & ~bytes32(uint256(0xff))`
 */
export function erc7201Slot(namespace: string): string {
  const inner = BigInt(keccak256(toUtf8Bytes(namespace))) - 1n;
  const outer = BigInt(keccak256(AbiCoder.defaultAbiCoder().encode(["uint256"], [inner])));
  return toBeHex(outer & ~0xffn, 32);
}

/**
 * Anything whose state takes part in transaction rollback.
 * `checkpoint` captures the current state and returns a function restoring it.
 */
export interface Checkpointable {
  readonly slot: string;
  checkpoint(): () => void;
}

/**
 * Receives every access to a bound record, so that the running
 * transaction can snapshot the record before it is first changed.
 */
export interface StorageJournal {
  recordAccess(contract: string, record: Checkpointable): void;
}

/**
 * One record owned by one contract, reached through its namespace slot
 * rather than through the layout of the contract's base classes.
 *
 * Records are mutated in place through `read()`; values must be
 * structured-cloneable (plain objects, arrays, Maps, bigints).
 */
export class NamespacedStorage<T> implements Checkpointable {
  readonly namespace: string;
  readonly slot: string;
  private value: T;
  private binding?: { contract: string; journal: StorageJournal };

  constructor(namespace: string, initial: T) {
    this.namespace = namespace;
    this.slot = erc7201Slot(namespace);
    this.value = initial;
  }

  /**
   * Report every later access of this record on `contract` to `journal`
   */
  attach(contract: string, journal: StorageJournal): void {
    this.binding = { contract, journal };
  }

  read(): T {
    this.binding?.journal.recordAccess(this.binding.contract, this);
    return this.value;
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.value);
    return () => {
      this.value = saved;
    };
  }
}
