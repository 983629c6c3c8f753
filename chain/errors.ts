/**
 * @file Custom contract errors
 * @description Base class for Solidity-style custom errors raised by contracts on the runtime
 */

/**
 * A revert carrying a custom error name and its arguments.
 * Any error thrown inside a transaction reverts it; contract code throws
 * subclasses of this one so callers can match on `errorName` and `args`.
 */
export class ContractError extends Error {
  readonly errorName: string;
  readonly args: readonly unknown[];

  constructor(errorName: string, args: readonly unknown[] = []) {
    super(args.length > 0 ? `${errorName}(${args.map(formatArg).join(", ")})` : `${errorName}()`);
    this.name = "ContractError";
    this.errorName = errorName;
    this.args = args;
  }
}

function formatArg(arg: unknown): string {
  return typeof arg === "bigint" ? arg.toString() : String(arg);
}

export function isContractError(error: unknown): error is ContractError {
  return error instanceof ContractError;
}

// ============================================
// Runtime errors
// ============================================

export class StorageSlotCollision extends ContractError {
  constructor(contract: string, slot: string) {
    super("StorageSlotCollision", [contract, slot]);
  }
}

export class UnknownContract extends ContractError {
  constructor(address: string) {
    super("UnknownContract", [address]);
  }
}

export class UnsupportedInterface extends ContractError {
  constructor(address: string) {
    super("UnsupportedInterface", [address]);
  }
}
