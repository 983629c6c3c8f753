/**
 * @file Types index - exports all type definitions
 */

export {
  // Structs
  type UnifiedMetadata,
  type BadgeWiring,
  type BadgeInitParams,
  type MintResult,

  // Event payloads
  type BadgeMintedEvent,
  type BatchMetadataUpdateEvent,
  type LockedEvent,
  type ContractURIUpdatedEvent,

  // Constants
  Constants,
  InterfaceIds,
  type InterfaceId,

  // Type guards
  isValidAddress,
  isValidBytes32,
  isZeroAddress,
} from "./badge";

export {
  type LicenseTermsRef,
  type DerivativeRecord,
  type RoyaltyLimits,
  ZERO_ROYALTY_LIMITS,
} from "./licensing";
