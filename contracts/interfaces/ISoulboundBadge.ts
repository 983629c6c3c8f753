/**
 * @file ISoulboundBadge
 * @description Errors and public surface of the soulbound badge collection
 */

import { ContractError } from "../../chain/errors";
import { type BadgeInitParams, type MintResult, type UnifiedMetadata } from "../../types";

export interface ISoulboundBadge {
  initialize(params: BadgeInitParams): void;
  mintRoot(recipient: string): MintResult;
  mint(recipient: string): MintResult;
  setTokenURI(tokenURI: string): void;
  setContractURI(contractURI: string): void;

  tokenURI(tokenId: bigint): string;
  locked(tokenId: bigint): boolean;
  contractURI(): string;
  unifiedMetadata(): UnifiedMetadata;
  rootIpId(): string;
  hasRoot(): boolean;
  totalSupply(): bigint;
}

// ============================================
// Errors
// ============================================

/** A collaborator address passed at construction was the zero address */
export class ZeroAddressParam extends ContractError {
  constructor() {
    super("ZeroAddressParam");
  }
}

export class RootAlreadySet extends ContractError {
  constructor() {
    super("RootAlreadySet");
  }
}

export class RootNotSet extends ContractError {
  constructor() {
    super("RootNotSet");
  }
}

export class RecipientAlreadyHasBadge extends ContractError {
  constructor(recipient: string) {
    super("RecipientAlreadyHasBadge", [recipient]);
  }
}

export class TransferLocked extends ContractError {
  constructor() {
    super("TransferLocked");
  }
}

/** mintByPeriphery was called by someone other than the asset registry */
export class NotPeriphery extends ContractError {
  constructor(caller: string) {
    super("NotPeriphery", [caller]);
  }
}

/** The registry was asked to mint on the collection by an account other than the collection */
export class UnauthorizedMinter extends ContractError {
  constructor(minter: string) {
    super("UnauthorizedMinter", [minter]);
  }
}
