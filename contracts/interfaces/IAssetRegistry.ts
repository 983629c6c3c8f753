/**
 * @file IAssetRegistry
 * @description Collaborator contract that mints a token on a collection and registers it as an IP asset
 */

import { ContractError } from "../../chain/errors";
import { type MintResult, type UnifiedMetadata } from "../../types";

export interface IAssetRegistry {
  /**
   * Mint a token on `nftContract` to `recipient` and register it as an IP
   * asset carrying `metadata`, in one call. The caller must be allowed to mint
   * on the collection.
   */
  mintAndRegister(nftContract: string, recipient: string, metadata: UnifiedMetadata): MintResult;

  isRegistered(ipId: string): boolean;

  /** Current controller of the IP: the holder of its token */
  ipOwner(ipId: string): string;
}

export function isAssetRegistry(value: unknown): value is IAssetRegistry {
  return (
    typeof value === "object" &&
    value !== null &&
    "mintAndRegister" in value &&
    typeof value.mintAndRegister === "function" &&
    "isRegistered" in value &&
    typeof value.isRegistered === "function" &&
    "ipOwner" in value &&
    typeof value.ipOwner === "function"
  );
}

/**
 * Collection hook the registry mints through
 */
export interface IPeripheryMintable {
  /** `minter` is the account that asked the registry to mint */
  mintByPeriphery(to: string, minter: string): bigint;
  ownerOf(tokenId: bigint): string;
}

export function isPeripheryMintable(value: unknown): value is IPeripheryMintable {
  return (
    typeof value === "object" &&
    value !== null &&
    "mintByPeriphery" in value &&
    typeof value.mintByPeriphery === "function" &&
    "ownerOf" in value &&
    typeof value.ownerOf === "function"
  );
}

// ============================================
// Errors
// ============================================

export class IpAlreadyRegistered extends ContractError {
  constructor(ipId: string) {
    super("IpAlreadyRegistered", [ipId]);
  }
}

export class IpNotRegistered extends ContractError {
  constructor(ipId: string) {
    super("IpNotRegistered", [ipId]);
  }
}

export class EnforcedPause extends ContractError {
  constructor() {
    super("EnforcedPause");
  }
}
