/**
 * @file Chain
 * @description In-process execution runtime: accounts, deployment, atomic transactions and logs
 */

import { dataSlice, getAddress, getCreateAddress, keccak256, toUtf8Bytes } from "ethers";
import { ContractError, StorageSlotCollision, UnknownContract } from "./errors";
import { type Checkpointable, type NamespacedStorage, type StorageJournal } from "./storage";
import { type Logger, defaultLogger } from "../utils/logger";

// ============================================
// Types
// ============================================

export interface Log {
  /** Emitting contract */
  address: string;
  eventName: string;
  args: Readonly<Record<string, unknown>>;
  transactionIndex: number;
  logIndex: number;
}

export interface TransactionRequest {
  from: string;
  to: string;
  method: string;
}

export interface TransactionReceipt extends TransactionRequest {
  index: number;
  status: "success" | "reverted";
  logs: Log[];
  /** Revert reason for reverted transactions */
  error?: unknown;
}

export interface LogFilter {
  address?: string;
  eventName?: string;
}

export interface ChainOptions {
  name?: string;
  chainId?: bigint;
  logger?: Logger;
}

/**
 * Minimal view of a deployed contract the runtime needs to keep
 */
export interface DeployedContract {
  readonly address: string;
}

interface PendingLog {
  address: string;
  eventName: string;
  args: Readonly<Record<string, unknown>>;
}

// ============================================
// Chain
// ============================================

/**
 * Single-threaded execution host.
 *
 * Every top-level call runs as one transaction. A storage record is
 * snapshotted the first time the transaction reads it, and every snapshot is
 * restored if the call throws; logs are only published when the call
 * returns. Calls made from inside a running transaction (a collaborator
 * calling back into its caller) join it.
 */
export class Chain implements StorageJournal {
  readonly name: string;
  readonly chainId: bigint;
  private readonly logger: Logger;
  private readonly contracts = new Map<string, DeployedContract>();
  private readonly storages = new Map<string, Map<string, Checkpointable>>();
  private readonly nonces = new Map<string, number>();
  private readonly receipts: TransactionReceipt[] = [];
  private pendingLogs: PendingLog[] = [];
  // contract -> slot -> restorer, for the running transaction
  private snapshots = new Map<string, Map<string, () => void>>();
  private depth = 0;

  constructor(options: ChainOptions = {}) {
    this.name = options.name ?? "local";
    this.chainId = options.chainId ?? 31337n;
    this.logger = options.logger ?? defaultLogger;
  }

  // ------------------------------------------
  // Accounts
  // ------------------------------------------

  /**
   * Deterministic externally-owned accounts, stable across runs
   */
  getSigners(count = 10): string[] {
    return Array.from({ length: count }, (_, i) =>
      getAddress(dataSlice(keccak256(toUtf8Bytes(`${this.name}:${this.chainId}:signer:${i}`)), 12))
    );
  }

  // ------------------------------------------
  // Contracts
  // ------------------------------------------

  /**
   * Deploy a contract from `deployer`. The factory receives the new address;
   * a throwing constructor leaves no contract or storage behind.
   */
  deploy<C extends DeployedContract>(deployer: string, factory: (address: string) => C): C {
    const from = getAddress(deployer);
    const nonce = this.nonces.get(from) ?? 0;
    this.nonces.set(from, nonce + 1);
    const address = getCreateAddress({ from, nonce });
    return this.transact({ from, to: address, method: "constructor" }, () => factory(address));
  }

  register(contract: DeployedContract): void {
    this.contracts.set(contract.address, contract);
    if (!this.storages.has(contract.address)) {
      this.storages.set(contract.address, new Map());
    }
  }

  /**
   * Attach a namespaced record to a contract. Two records of one contract
   * resolving to the same slot are rejected.
   */
  bindStorage<T>(contract: string, storage: NamespacedStorage<T>): NamespacedStorage<T> {
    const slots = this.storages.get(contract) ?? new Map<string, Checkpointable>();
    if (slots.has(storage.slot)) {
      throw new StorageSlotCollision(contract, storage.slot);
    }
    slots.set(storage.slot, storage);
    this.storages.set(contract, slots);
    storage.attach(contract, this);
    return storage;
  }

  isContract(address: string): boolean {
    return this.contracts.has(getAddress(address));
  }

  getContract(address: string): DeployedContract {
    const contract = this.contracts.get(getAddress(address));
    if (contract === undefined) {
      throw new UnknownContract(address);
    }
    return contract;
  }

  /** Namespace slots bound to a contract, in binding order */
  storageSlots(contract: string): string[] {
    return [...(this.storages.get(getAddress(contract))?.keys() ?? [])];
  }

  // ------------------------------------------
  // Transactions
  // ------------------------------------------

  /**
   * Run `body` atomically. Nested calls join the enclosing transaction.
   */
  transact<R>(request: TransactionRequest, body: () => R): R {
    if (this.depth > 0) {
      this.depth++;
      try {
        return body();
      } finally {
        this.depth--;
      }
    }

    this.snapshots = new Map();
    const knownContracts = new Set(this.contracts.keys());
    const index = this.receipts.length;
    this.pendingLogs = [];
    this.depth = 1;

    try {
      const result = body();
      const logs = this.pendingLogs.map((log, logIndex) => ({
        ...log,
        transactionIndex: index,
        logIndex,
      }));
      this.receipts.push({ ...request, index, status: "success", logs });
      this.logger.debug(`tx #${index} ${request.method} -> ${request.to} committed (${logs.length} logs)`);
      return result;
    } catch (error) {
      for (const restorers of this.snapshots.values()) {
        for (const restore of restorers.values()) {
          restore();
        }
      }
      for (const address of [...this.contracts.keys()]) {
        if (!knownContracts.has(address)) {
          this.contracts.delete(address);
          this.storages.delete(address);
        }
      }
      this.receipts.push({ ...request, index, status: "reverted", logs: [], error });
      const reason = error instanceof ContractError ? error.message : String(error);
      this.logger.debug(`tx #${index} ${request.method} -> ${request.to} reverted: ${reason}`);
      throw error;
    } finally {
      this.pendingLogs = [];
      this.snapshots = new Map();
      this.depth = 0;
    }
  }

  /**
   * Queue a log on the running transaction
   */
  emit(address: string, eventName: string, args: Readonly<Record<string, unknown>>): void {
    if (this.depth === 0) {
      throw new Error(`event ${eventName} emitted outside a transaction`);
    }
    this.pendingLogs.push({ address, eventName, args });
  }

  /**
   * Snapshot `record` the first time the running transaction touches it
   */
  recordAccess(contract: string, record: Checkpointable): void {
    if (this.depth === 0) {
      return;
    }
    const slots = this.snapshots.get(contract) ?? new Map<string, () => void>();
    if (!slots.has(record.slot)) {
      slots.set(record.slot, record.checkpoint());
      this.snapshots.set(contract, slots);
    }
  }

  /** Slots of `contract` snapshotted so far by the running transaction */
  checkpointedSlots(contract: string): string[] {
    return [...(this.snapshots.get(getAddress(contract))?.keys() ?? [])];
  }

  // ------------------------------------------
  // Receipts & logs
  // ------------------------------------------

  latestReceipt(): TransactionReceipt | undefined {
    return this.receipts[this.receipts.length - 1];
  }

  getReceipts(): readonly TransactionReceipt[] {
    return this.receipts;
  }

  getLogs(filter: LogFilter = {}): Log[] {
    const address = filter.address === undefined ? undefined : getAddress(filter.address);
    return this.receipts
      .flatMap((receipt) => receipt.logs)
      .filter(
        (log) =>
          (address === undefined || log.address === address) &&
          (filter.eventName === undefined || log.eventName === filter.eventName)
      );
  }
}
