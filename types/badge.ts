/**
 * @file TypeScript type definitions for the soulbound badge system
 * @description Structs, constants and type guards shared by contracts, scripts and tests
 */

// ============================================
// Metadata
// ============================================

/**
 * Single descriptor shared by every token of a collection.
 * `tokenURI` can be replaced by the owner; the other fields are fixed at initialization.
 */
export interface UnifiedMetadata {
  /** URI returned by tokenURI() for every token id */
  tokenURI: string;
  /** URI of the IP metadata registered for each asset */
  ipMetadataURI: string;
  /** bytes32 hash of the IP metadata */
  ipMetadataHash: string;
  /** bytes32 hash of the NFT metadata */
  nftMetadataHash: string;
}

// ============================================
// Deployment structs
// ============================================

/**
 * Construction-time wiring, fixed per code instance and shared by clones
 */
export interface BadgeWiring {
  assetRegistry: string;
  licensingModule: string;
  licenseTemplate: string;
  defaultLicenseTermsId: bigint;
}

/**
 * Per-instance state written once by initialize()
 */
export interface BadgeInitParams {
  owner: string;
  name: string;
  symbol: string;
  contractURI: string;
  metadata: UnifiedMetadata;
}

/**
 * Result of both mint paths
 */
export interface MintResult {
  tokenId: bigint;
  ipId: string;
}

// ============================================
// Event payloads
// ============================================

export type BadgeMintedEvent = {
  recipient: string;
  tokenId: bigint;
  ipId: string;
};

export type BatchMetadataUpdateEvent = {
  fromTokenId: bigint;
  toTokenId: bigint;
};

export type LockedEvent = {
  tokenId: bigint;
};

export type ContractURIUpdatedEvent = Record<string, never>;

// ============================================
// Constants
// ============================================

export const Constants = {
  /** Sentinel for "no address" */
  ZERO_ADDRESS: "0x0000000000000000000000000000000000000000",

  /** Zero bytes32 */
  ZERO_BYTES32: "0x0000000000000000000000000000000000000000000000000000000000000000",

  /** Storage namespace of the badge record */
  BADGE_STORAGE_NAMESPACE: "soulbound-badge.storage.SoulboundBadge",
} as const;

/**
 * ERC-165 interface ids answered by supportsInterface()
 */
export const InterfaceIds = {
  ERC165: "0x01ffc9a7",
  ERC721: "0x80ac58cd",
  ERC721_METADATA: "0x5b5e139f",
  ERC4906: "0x49064906",
  ERC5192: "0xb45a3c0e",
} as const;

export type InterfaceId = (typeof InterfaceIds)[keyof typeof InterfaceIds];

// ============================================
// Type guards
// ============================================

export function isValidAddress(address: string): boolean {
  return /^0x[0-9a-fA-F]{40}$/.test(address);
}

export function isValidBytes32(bytes32: string): boolean {
  return /^0x[0-9a-fA-F]{64}$/.test(bytes32);
}

export function isZeroAddress(address: string): boolean {
  return address.toLowerCase() === Constants.ZERO_ADDRESS;
}
