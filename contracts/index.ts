/**
 * @file Contracts index
 * @description Re-exports the badge, its base layers, collaborator interfaces and in-process collaborators
 */

// Core
export { SoulboundBadge, type BadgeDeployOptions } from "./SoulboundBadge";

// Base layers
export {
  ERC721,
  ERC721_RECEIVED,
  ERC721IncorrectOwner,
  ERC721InsufficientApproval,
  ERC721InvalidApprover,
  ERC721InvalidOperator,
  ERC721InvalidOwner,
  ERC721InvalidReceiver,
  ERC721InvalidSender,
  ERC721NonexistentToken,
  isERC721Receiver,
  type IERC721Receiver,
  type ApprovalEvent,
  type ApprovalForAllEvent,
  type TransferEvent,
} from "./token/ERC721";
export {
  Ownable,
  OwnableInvalidOwner,
  OwnableUnauthorizedAccount,
  type OwnershipTransferredEvent,
} from "./access/Ownable";
export {
  Initializable,
  InvalidInitialization,
  NotInitializing,
  type InitializedEvent,
} from "./proxy/Initializable";

// Interfaces & errors
export {
  type ISoulboundBadge,
  NotPeriphery,
  RecipientAlreadyHasBadge,
  RootAlreadySet,
  RootNotSet,
  TransferLocked,
  UnauthorizedMinter,
  ZeroAddressParam,
} from "./interfaces/ISoulboundBadge";
export {
  type IAssetRegistry,
  type IPeripheryMintable,
  EnforcedPause,
  IpAlreadyRegistered,
  IpNotRegistered,
  isAssetRegistry,
  isPeripheryMintable,
} from "./interfaces/IAssetRegistry";
export {
  type ILicensingModule,
  type DerivativeRegisteredEvent,
  type LicenseTermsAttachedEvent,
  type LicenseTermsRegisteredEvent,
  AccessDenied,
  DerivativeAlreadyRegistered,
  DerivativeIpAlreadyHasLicense,
  DerivativesCannotAddLicenseTerms,
  InvalidMaxRevenueShare,
  LicenseTermsAlreadyAttached,
  LicenseTermsLengthMismatch,
  LicenseTermsNotFound,
  NoParentIp,
  ParentIpEqualsChild,
  ParentIpHasNoLicenseTerms,
  isLicensingModule,
} from "./interfaces/ILicensingModule";

// In-process collaborators
export { MockAssetRegistry, type IpRecord, type IPRegisteredEvent } from "./mocks/MockAssetRegistry";
export { MockLicensingModule, MAX_REVENUE_SHARE } from "./mocks/MockLicensingModule";
export { MockERC721, MockERC721Receiver, MockNonReceiver, type ReceivedEvent } from "./mocks/MockERC721";
