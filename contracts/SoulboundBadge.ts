/**
 * @file SoulboundBadge
 * @description Non-transferable membership badges, each registered as an IP asset
 *
 * The first badge (root) is registered with the default license terms
 * attached. Every later badge is registered as a derivative of the root
 * under the same terms. Holders get at most one badge and can never move it.
 */

import { getAddress } from "ethers";
import { type Chain } from "../chain/Chain";
import { ERC721, ERC721InvalidReceiver } from "./token/ERC721";
import { isAssetRegistry, type IAssetRegistry, type IPeripheryMintable } from "./interfaces/IAssetRegistry";
import { isLicensingModule, type ILicensingModule } from "./interfaces/ILicensingModule";
import {
  type ISoulboundBadge,
  NotPeriphery,
  RecipientAlreadyHasBadge,
  RootAlreadySet,
  RootNotSet,
  TransferLocked,
  UnauthorizedMinter,
  ZeroAddressParam,
} from "./interfaces/ISoulboundBadge";
import {
  type BadgeInitParams,
  type BadgeMintedEvent,
  type BadgeWiring,
  type BatchMetadataUpdateEvent,
  type ContractURIUpdatedEvent,
  type LockedEvent,
  type MintResult,
  type UnifiedMetadata,
  Constants,
  InterfaceIds,
  ZERO_ROYALTY_LIMITS,
  isZeroAddress,
} from "../types";

type BadgeStorage = {
  rootIpId: string;
  totalSupply: bigint;
  contractURI: string;
  metadata: UnifiedMetadata;
};

export interface BadgeDeployOptions {
  /** Deploy as a template: initialize() is disabled, only clones are usable */
  template?: boolean;
}

export class SoulboundBadge extends ERC721 implements ISoulboundBadge, IPeripheryMintable {
  // Construction-time wiring, shared by every clone of this instance
  readonly assetRegistry: string;
  readonly licensingModule: string;
  readonly licenseTemplate: string;
  readonly defaultLicenseTermsId: bigint;

  private readonly $badge = this.storage<BadgeStorage>(Constants.BADGE_STORAGE_NAMESPACE, {
    rootIpId: Constants.ZERO_ADDRESS,
    totalSupply: 0n,
    contractURI: "",
    metadata: {
      tokenURI: "",
      ipMetadataURI: "",
      ipMetadataHash: Constants.ZERO_BYTES32,
      nftMetadataHash: Constants.ZERO_BYTES32,
    },
  });

  private constructor(chain: Chain, address: string, deployer: string, wiring: BadgeWiring) {
    super(chain, address, deployer);
    this.assetRegistry = getAddress(wiring.assetRegistry);
    this.licensingModule = getAddress(wiring.licensingModule);
    this.licenseTemplate = getAddress(wiring.licenseTemplate);
    this.defaultLicenseTermsId = wiring.defaultLicenseTermsId;
  }

  // ============================================
  // Deployment
  // ============================================

  static deploy(
    chain: Chain,
    deployer: string,
    wiring: BadgeWiring,
    options: BadgeDeployOptions = {}
  ): SoulboundBadge {
    assertWiring(wiring);
    return chain.deploy(deployer, (address) => {
      const badge = new SoulboundBadge(chain, address, deployer, wiring);
      if (options.template === true) {
        badge.disableInitializers();
      }
      return badge;
    });
  }

  /**
   * Deploy a fresh instance reusing the wiring of `template`.
   * The clone has its own storage and must be initialized separately.
   */
  static deployClone(template: SoulboundBadge, deployer: string): SoulboundBadge {
    return SoulboundBadge.deploy(template.chain, deployer, template.wiring());
  }

  wiring(): BadgeWiring {
    return {
      assetRegistry: this.assetRegistry,
      licensingModule: this.licensingModule,
      licenseTemplate: this.licenseTemplate,
      defaultLicenseTermsId: this.defaultLicenseTermsId,
    };
  }

  initialize(params: BadgeInitParams): void {
    this.transaction("initialize", () =>
      this.initializer(() => {
        this.initERC721(params.name, params.symbol);
        this.initOwnable(params.owner);
        const $ = this.$badge.read();
        $.contractURI = params.contractURI;
        $.metadata = { ...params.metadata };
      })
    );
  }

  // ============================================
  // Minting
  // ============================================

  /**
   * Mint the root badge and attach the default license terms to its IP.
   * Can succeed once per collection.
   */
  mintRoot(recipient: string): MintResult {
    return this.transaction("mintRoot", () => {
      this.checkOwner();
      if (this.hasRoot()) {
        throw new RootAlreadySet();
      }
      this.requireHolderAccount(recipient);

      const { tokenId, ipId } = this.mintAndRegisterToSelf();
      this.licensing().attachLicenseTerms(ipId, this.licenseTemplate, this.defaultLicenseTermsId);

      // Root is recorded before custody leaves the contract
      this.$badge.read().rootIpId = ipId;
      return this.deliver(recipient, tokenId, ipId);
    });
  }

  /**
   * Mint a badge whose IP is a derivative of the root under the default terms
   */
  mint(recipient: string): MintResult {
    return this.transaction("mint", () => {
      this.checkOwner();
      if (this.balanceOf(recipient) !== 0n) {
        throw new RecipientAlreadyHasBadge(getAddress(recipient));
      }
      const rootIpId = this.rootIpId();
      if (isZeroAddress(rootIpId)) {
        throw new RootNotSet();
      }
      this.requireHolderAccount(recipient);

      const { tokenId, ipId } = this.mintAndRegisterToSelf();
      this.licensing().registerDerivative(
        ipId,
        [rootIpId],
        this.licenseTemplate,
        [this.defaultLicenseTermsId],
        ZERO_ROYALTY_LIMITS.royaltyContext,
        ZERO_ROYALTY_LIMITS.maxMintingFee,
        ZERO_ROYALTY_LIMITS.maxRts,
        ZERO_ROYALTY_LIMITS.maxRevenueShare
      );

      return this.deliver(recipient, tokenId, ipId);
    });
  }

  /**
   * Periphery hook: the asset registry mints here on behalf of this collection only
   */
  mintByPeriphery(to: string, minter: string): bigint {
    return this.transaction("mintByPeriphery", () => {
      if (this.msgSender !== this.assetRegistry) {
        throw new NotPeriphery(this.msgSender);
      }
      if (getAddress(minter) !== this.address) {
        throw new UnauthorizedMinter(getAddress(minter));
      }
      const $ = this.$badge.read();
      const tokenId = $.totalSupply;
      $.totalSupply = tokenId + 1n;
      this.mintToken(to, tokenId);
      this.emit<LockedEvent>("Locked", { tokenId });
      return tokenId;
    });
  }

  /**
   * Badges go to accounts other than the collection itself
   */
  private requireHolderAccount(recipient: string): void {
    if (isZeroAddress(recipient) || getAddress(recipient) === this.address) {
      throw new ERC721InvalidReceiver(getAddress(recipient));
    }
  }

  private mintAndRegisterToSelf(): MintResult {
    return this.registry().mintAndRegister(this.address, this.address, this.unifiedMetadata());
  }

  private deliver(recipient: string, tokenId: bigint, ipId: string): MintResult {
    this.transferToken(this.address, recipient, tokenId);
    this.emit<BadgeMintedEvent>("BadgeMinted", {
      recipient: getAddress(recipient),
      tokenId,
      ipId,
    });
    return { tokenId, ipId };
  }

  private registry(): IAssetRegistry {
    return this.at(this.assetRegistry, isAssetRegistry);
  }

  private licensing(): ILicensingModule {
    return this.at(this.licensingModule, isLicensingModule);
  }

  // ============================================
  // Metadata
  // ============================================

  setTokenURI(tokenURI: string): void {
    this.transaction("setTokenURI", () => {
      this.checkOwner();
      const $ = this.$badge.read();
      $.metadata.tokenURI = tokenURI;
      this.emit<BatchMetadataUpdateEvent>("BatchMetadataUpdate", {
        fromTokenId: 0n,
        toTokenId: $.totalSupply,
      });
    });
  }

  setContractURI(contractURI: string): void {
    this.transaction("setContractURI", () => {
      this.checkOwner();
      this.$badge.read().contractURI = contractURI;
      this.emit<ContractURIUpdatedEvent>("ContractURIUpdated", {});
    });
  }

  /**
   * Every id resolves to the shared descriptor, minted or not
   */
  override tokenURI(_tokenId: bigint): string {
    return this.$badge.read().metadata.tokenURI;
  }

  /** ERC-5192: every id is locked */
  locked(_tokenId: bigint): boolean {
    return true;
  }

  contractURI(): string {
    return this.$badge.read().contractURI;
  }

  unifiedMetadata(): UnifiedMetadata {
    return { ...this.$badge.read().metadata };
  }

  rootIpId(): string {
    return this.$badge.read().rootIpId;
  }

  hasRoot(): boolean {
    return !isZeroAddress(this.rootIpId());
  }

  totalSupply(): bigint {
    return this.$badge.read().totalSupply;
  }

  override supportsInterface(interfaceId: string): boolean {
    const id = interfaceId.toLowerCase();
    return id === InterfaceIds.ERC4906 || id === InterfaceIds.ERC5192 || super.supportsInterface(id);
  }

  // ============================================
  // Locked transfer surface
  // ============================================

  override approve(_to: string, _tokenId: bigint): void {
    this.transaction("approve", locked);
  }

  override setApprovalForAll(_operator: string, _approved: boolean): void {
    this.transaction("setApprovalForAll", locked);
  }

  override transferFrom(_from: string, _to: string, _tokenId: bigint): void {
    this.transaction("transferFrom", locked);
  }

  override safeTransferFrom(_from: string, _to: string, _tokenId: bigint, _data = "0x"): void {
    this.transaction("safeTransferFrom", locked);
  }
}

function locked(): never {
  throw new TransferLocked();
}

function assertWiring(wiring: BadgeWiring): void {
  if (
    isZeroAddress(wiring.assetRegistry) ||
    isZeroAddress(wiring.licensingModule) ||
    isZeroAddress(wiring.licenseTemplate)
  ) {
    throw new ZeroAddressParam();
  }
}
