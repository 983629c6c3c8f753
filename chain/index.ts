/**
 * @file Runtime index
 * @description Re-exports the execution runtime
 */

export {
  Chain,
  type ChainOptions,
  type DeployedContract,
  type Log,
  type LogFilter,
  type TransactionReceipt,
  type TransactionRequest,
} from "./Chain";
export { Contract } from "./Contract";
export {
  ContractError,
  StorageSlotCollision,
  UnknownContract,
  UnsupportedInterface,
  isContractError,
} from "./errors";
export { NamespacedStorage, erc7201Slot, type Checkpointable, type StorageJournal } from "./storage";
