/**
 * @file SoulboundBadge unit tests
 * @description Tests for the soulbound badge collection: deployment, minting, metadata and the locked transfer surface
 */

import { expect } from "chai";
import { erc7201Slot } from "../chain";
import { SoulboundBadge } from "../contracts";
import { Constants, InterfaceIds } from "../types";
import {
  DEFAULT_TERMS_ID,
  TEST_LICENSE_TEMPLATE,
  deployBadgeFixture,
  deployWithDerivativeFixture,
  deployWithRootFixture,
  testMetadata,
} from "./fixtures";
import { expectEvent, expectRevert } from "./helpers";

describe("SoulboundBadge", function () {
  const initParams = (owner: string) => ({
    owner,
    name: "Second Badge",
    symbol: "SBDG",
    contractURI: "ipfs://QmSecondCollection",
    metadata: { ...testMetadata },
  });

  // ============================================
  // Deployment Tests
  // ============================================

  describe("Deployment", function () {
    it("should initialize with correct name and symbol", function () {
      const { badge } = deployBadgeFixture();

      expect(badge.name()).to.equal("Test Badge");
      expect(badge.symbol()).to.equal("TBDG");
    });

    it("should set the administrator and collection URI", function () {
      const { badge, owner } = deployBadgeFixture();

      expect(badge.owner()).to.equal(owner);
      expect(badge.contractURI()).to.equal("ipfs://QmTestCollection");
    });

    it("should store the unified metadata record", function () {
      const { badge } = deployBadgeFixture();

      expect(badge.unifiedMetadata()).to.deep.equal(testMetadata);
    });

    it("should start without a root and with zero supply", function () {
      const { badge } = deployBadgeFixture();

      expect(badge.rootIpId()).to.equal(Constants.ZERO_ADDRESS);
      expect(badge.hasRoot()).to.be.false;
      expect(badge.totalSupply()).to.equal(0n);
    });

    it("should keep the construction-time wiring", function () {
      const { badge, assetRegistry, licensingModule } = deployBadgeFixture();

      expect(badge.wiring()).to.deep.equal({
        assetRegistry: assetRegistry.address,
        licensingModule: licensingModule.address,
        licenseTemplate: TEST_LICENSE_TEMPLATE,
        defaultLicenseTermsId: DEFAULT_TERMS_ID,
      });
    });

    it("should emit Initialized and OwnershipTransferred", function () {
      const { chain, badge, owner } = deployBadgeFixture();

      expectEvent(chain, badge.address, "Initialized", { version: 1n });
      expectEvent(chain, badge.address, "OwnershipTransferred", {
        previousOwner: Constants.ZERO_ADDRESS,
        newOwner: owner,
      });
      expect(badge.getInitializedVersion()).to.equal(1n);
    });

    it("should keep its fields under separate namespaced slots", function () {
      const { chain, badge } = deployBadgeFixture();

      const slots = chain.storageSlots(badge.address);
      expect(slots).to.have.lengthOf(4);
      expect(new Set(slots).size).to.equal(4);
      expect(slots).to.include(erc7201Slot(Constants.BADGE_STORAGE_NAMESPACE));
    });

    it("should reject a zero asset registry", function () {
      const { chain, badge, owner } = deployBadgeFixture();
      const receiptsBefore = chain.getReceipts().length;

      expectRevert(
        () =>
          SoulboundBadge.deploy(chain, owner, {
            ...badge.wiring(),
            assetRegistry: Constants.ZERO_ADDRESS,
          }),
        "ZeroAddressParam",
        []
      );
      expect(chain.getReceipts()).to.have.lengthOf(receiptsBefore);
    });

    it("should reject a zero licensing module", function () {
      const { chain, badge, owner } = deployBadgeFixture();

      expectRevert(
        () =>
          SoulboundBadge.deploy(chain, owner, {
            ...badge.wiring(),
            licensingModule: Constants.ZERO_ADDRESS,
          }),
        "ZeroAddressParam",
        []
      );
    });

    it("should reject a zero license template", function () {
      const { chain, badge, owner } = deployBadgeFixture();

      expectRevert(
        () =>
          SoulboundBadge.deploy(chain, owner, {
            ...badge.wiring(),
            licenseTemplate: Constants.ZERO_ADDRESS,
          }),
        "ZeroAddressParam",
        []
      );
    });
  });

  // ============================================
  // Initialization Tests
  // ============================================

  describe("Initialization", function () {
    it("should reject a second initialize", function () {
      const { badge, owner } = deployBadgeFixture();

      expectRevert(() => badge.connect(owner).initialize(initParams(owner)), "InvalidInitialization", []);
      expect(badge.name()).to.equal("Test Badge");
    });

    it("should reject a zero administrator and leave the instance initializable", function () {
      const { chain, badge, owner } = deployBadgeFixture();
      const fresh = SoulboundBadge.deploy(chain, owner, badge.wiring());

      expectRevert(
        () => fresh.connect(owner).initialize(initParams(Constants.ZERO_ADDRESS)),
        "OwnableInvalidOwner",
        [Constants.ZERO_ADDRESS]
      );
      expect(fresh.getInitializedVersion()).to.equal(0n);
      expect(fresh.name()).to.equal("");

      fresh.connect(owner).initialize(initParams(owner));
      expect(fresh.name()).to.equal("Second Badge");
    });

    it("should gate every admin entry point before initialization", function () {
      const { chain, badge, owner, alice } = deployBadgeFixture();
      const fresh = SoulboundBadge.deploy(chain, owner, badge.wiring());

      expectRevert(() => fresh.connect(owner).mintRoot(alice), "OwnableUnauthorizedAccount", [owner]);
      expectRevert(() => fresh.connect(owner).setTokenURI("ipfs://x"), "OwnableUnauthorizedAccount", [owner]);
    });

    it("should lock a template and allow its clones to initialize", function () {
      const { chain, badge, owner, alice } = deployBadgeFixture();
      const template = SoulboundBadge.deploy(chain, owner, badge.wiring(), { template: true });

      expect(template.getInitializedVersion()).to.equal(2n ** 64n - 1n);
      expectRevert(() => template.connect(owner).initialize(initParams(owner)), "InvalidInitialization", []);

      const clone = SoulboundBadge.deployClone(template, owner);
      expect(clone.address).to.not.equal(template.address);
      expect(clone.wiring()).to.deep.equal(template.wiring());

      clone.connect(owner).initialize(initParams(owner));
      const { tokenId } = clone.connect(owner).mintRoot(alice);
      expect(tokenId).to.equal(0n);
      expect(clone.ownerOf(0n)).to.equal(alice);
      expect(template.totalSupply()).to.equal(0n);
    });
  });

  // ============================================
  // Root Minting Tests
  // ============================================

  describe("mintRoot", function () {
    it("should mint token 0 registered as an IP asset", function () {
      const { chain, badge, assetRegistry, owner, alice } = deployBadgeFixture();

      const { tokenId, ipId } = badge.connect(owner).mintRoot(alice);

      expect(tokenId).to.equal(0n);
      expect(ipId).to.equal(assetRegistry.ipId(chain.chainId, badge.address, 0n));
      expect(assetRegistry.isRegistered(ipId)).to.be.true;
    });

    it("should deliver the token to the recipient", function () {
      const { badge, assetRegistry, root, alice } = deployWithRootFixture();

      expect(badge.ownerOf(root.tokenId)).to.equal(alice);
      expect(badge.balanceOf(alice)).to.equal(1n);
      expect(badge.balanceOf(badge.address)).to.equal(0n);
      expect(assetRegistry.ipOwner(root.ipId)).to.equal(alice);
      expect(badge.totalSupply()).to.equal(1n);
    });

    it("should record the root asset", function () {
      const { badge, root } = deployWithRootFixture();

      expect(badge.rootIpId()).to.equal(root.ipId);
      expect(badge.hasRoot()).to.be.true;
    });

    it("should attach the default license terms and no parent", function () {
      const { licensingModule, root } = deployWithRootFixture();

      expect(licensingModule.getAttachedLicenseTerms(root.ipId)).to.deep.equal([
        { licenseTemplate: TEST_LICENSE_TEMPLATE, licenseTermsId: DEFAULT_TERMS_ID },
      ]);
      expect(licensingModule.getParentIps(root.ipId)).to.deep.equal([]);
      expect(licensingModule.isDerivativeIp(root.ipId)).to.be.false;
    });

    it("should register the unified metadata on the IP", function () {
      const { badge, assetRegistry, root } = deployWithRootFixture();

      expect(assetRegistry.getIp(root.ipId)).to.deep.equal({
        chainId: 31337n,
        tokenContract: badge.address,
        tokenId: 0n,
        ipMetadataURI: testMetadata.ipMetadataURI,
        ipMetadataHash: testMetadata.ipMetadataHash,
        nftMetadataHash: testMetadata.nftMetadataHash,
      });
    });

    it("should emit BadgeMinted, Locked and the custody transfer", function () {
      const { chain, badge, licensingModule, owner, alice } = deployBadgeFixture();

      const { ipId } = badge.connect(owner).mintRoot(alice);

      expectEvent(chain, badge.address, "BadgeMinted", { recipient: alice, tokenId: 0n, ipId });
      expectEvent(chain, badge.address, "Locked", { tokenId: 0n });
      expectEvent(chain, badge.address, "Transfer", {
        from: Constants.ZERO_ADDRESS,
        to: badge.address,
        tokenId: 0n,
      });
      expectEvent(chain, badge.address, "Transfer", { from: badge.address, to: alice, tokenId: 0n });
      expectEvent(chain, licensingModule.address, "LicenseTermsAttached", {
        caller: badge.address,
        ipId,
        licenseTemplate: TEST_LICENSE_TEMPLATE,
        licenseTermsId: DEFAULT_TERMS_ID,
      });
    });

    it("should reject non-admin callers", function () {
      const { badge, alice, other } = deployBadgeFixture();

      expectRevert(() => badge.connect(other).mintRoot(alice), "OwnableUnauthorizedAccount", [other]);
      expect(badge.hasRoot()).to.be.false;
    });

    it("should reject a second root without touching state", function () {
      const { badge, assetRegistry, root, owner, bob } = deployWithRootFixture();

      expectRevert(() => badge.connect(owner).mintRoot(bob), "RootAlreadySet", []);

      expect(badge.rootIpId()).to.equal(root.ipId);
      expect(badge.totalSupply()).to.equal(1n);
      expect(assetRegistry.totalRegistered()).to.equal(1n);
      expect(badge.balanceOf(bob)).to.equal(0n);
    });

    it("should revert everything when the recipient is the zero address", function () {
      const { badge, assetRegistry, owner, alice } = deployBadgeFixture();

      expectRevert(() => badge.connect(owner).mintRoot(Constants.ZERO_ADDRESS), "ERC721InvalidReceiver", [
        Constants.ZERO_ADDRESS,
      ]);

      expect(badge.hasRoot()).to.be.false;
      expect(badge.totalSupply()).to.equal(0n);
      expect(assetRegistry.totalRegistered()).to.equal(0n);
      expect(badge.connect(owner).mintRoot(alice).tokenId).to.equal(0n);
    });

    it("should refuse the collection itself as root holder", function () {
      const { badge, assetRegistry, owner } = deployBadgeFixture();

      expectRevert(() => badge.connect(owner).mintRoot(badge.address), "ERC721InvalidReceiver", [badge.address]);

      expect(badge.hasRoot()).to.be.false;
      expect(badge.balanceOf(badge.address)).to.equal(0n);
      expect(assetRegistry.totalRegistered()).to.equal(0n);
    });
  });

  // ============================================
  // Derivative Minting Tests
  // ============================================

  describe("mint", function () {
    it("should reject minting before a root exists", function () {
      const { badge, owner, alice } = deployBadgeFixture();

      expectRevert(() => badge.connect(owner).mint(alice), "RootNotSet", []);
      expect(badge.totalSupply()).to.equal(0n);
      expect(badge.balanceOf(alice)).to.equal(0n);
    });

    it("should mint the next token as a derivative of the root", function () {
      const { chain, badge, assetRegistry, licensingModule, root, derivative, bob } =
        deployWithDerivativeFixture();

      expect(derivative.tokenId).to.equal(1n);
      expect(derivative.ipId).to.equal(assetRegistry.ipId(chain.chainId, badge.address, 1n));
      expect(badge.ownerOf(1n)).to.equal(bob);
      expect(licensingModule.getDerivative(derivative.ipId)).to.deep.equal({
        parentIpIds: [root.ipId],
        licenseTemplate: TEST_LICENSE_TEMPLATE,
        licenseTermsIds: [DEFAULT_TERMS_ID],
      });
      expect(licensingModule.getChildIps(root.ipId)).to.deep.equal([derivative.ipId]);
    });

    it("should give the derivative the default terms", function () {
      const { licensingModule, derivative } = deployWithDerivativeFixture();

      expect(licensingModule.getAttachedLicenseTerms(derivative.ipId)).to.deep.equal([
        { licenseTemplate: TEST_LICENSE_TEMPLATE, licenseTermsId: DEFAULT_TERMS_ID },
      ]);
    });

    it("should emit BadgeMinted and DerivativeRegistered", function () {
      const { chain, badge, licensingModule, root, owner, bob } = deployWithRootFixture();

      const { ipId } = badge.connect(owner).mint(bob);

      expectEvent(chain, badge.address, "BadgeMinted", { recipient: bob, tokenId: 1n, ipId });
      expectEvent(chain, licensingModule.address, "DerivativeRegistered", {
        caller: badge.address,
        childIpId: ipId,
        parentIpIds: [root.ipId],
        licenseTemplate: TEST_LICENSE_TEMPLATE,
        licenseTermsIds: [DEFAULT_TERMS_ID],
      });
    });

    it("should reject the root holder", function () {
      const { badge, owner, alice } = deployWithRootFixture();

      expectRevert(() => badge.connect(owner).mint(alice), "RecipientAlreadyHasBadge", [alice]);
      expect(badge.balanceOf(alice)).to.equal(1n);
    });

    it("should reject a second badge for the same holder", function () {
      const { badge, owner, bob } = deployWithDerivativeFixture();

      expectRevert(() => badge.connect(owner).mint(bob), "RecipientAlreadyHasBadge", [bob]);
      expect(badge.balanceOf(bob)).to.equal(1n);
      expect(badge.totalSupply()).to.equal(2n);
    });

    it("should reject non-admin callers", function () {
      const { badge, other, carol } = deployWithRootFixture();

      expectRevert(() => badge.connect(other).mint(carol), "OwnableUnauthorizedAccount", [other]);
    });

    it("should reject the zero address as recipient", function () {
      const { badge, owner } = deployWithRootFixture();

      expectRevert(() => badge.connect(owner).mint(Constants.ZERO_ADDRESS), "ERC721InvalidOwner", [
        Constants.ZERO_ADDRESS,
      ]);
    });

    it("should refuse the collection itself as member", function () {
      const { badge, assetRegistry, licensingModule, root, owner } = deployWithRootFixture();

      expectRevert(() => badge.connect(owner).mint(badge.address), "ERC721InvalidReceiver", [badge.address]);

      expect(badge.balanceOf(badge.address)).to.equal(0n);
      expect(badge.totalSupply()).to.equal(1n);
      expect(assetRegistry.totalRegistered()).to.equal(1n);
      expect(licensingModule.getChildIps(root.ipId)).to.deep.equal([]);
    });
  });

  // ============================================
  // Atomicity Tests
  // ============================================

  describe("Atomicity", function () {
    it("should leave no registration behind when licensing fails on the root", function () {
      const { chain, badge, assetRegistry, licensingModule, owner, alice } = deployBadgeFixture();
      licensingModule.connect(owner).setPaused(true);

      expectRevert(() => badge.connect(owner).mintRoot(alice), "EnforcedPause", []);

      expect(badge.hasRoot()).to.be.false;
      expect(badge.totalSupply()).to.equal(0n);
      expect(badge.balanceOf(badge.address)).to.equal(0n);
      expect(assetRegistry.totalRegistered()).to.equal(0n);
      expectRevert(() => badge.ownerOf(0n), "ERC721NonexistentToken", [0n]);
      expect(chain.getLogs({ address: assetRegistry.address, eventName: "IPRegistered" })).to.be.empty;

      licensingModule.connect(owner).setPaused(false);
      expect(badge.connect(owner).mintRoot(alice).tokenId).to.equal(0n);
    });

    it("should propagate a registry failure unchanged", function () {
      const { badge, assetRegistry, owner, alice } = deployBadgeFixture();
      assetRegistry.connect(owner).setPaused(true);

      expectRevert(() => badge.connect(owner).mintRoot(alice), "EnforcedPause", []);
      expect(badge.hasRoot()).to.be.false;
    });

    it("should propagate missing license terms", function () {
      const { chain, badge, owner, alice } = deployBadgeFixture();
      const unlicensed = SoulboundBadge.deploy(chain, owner, {
        ...badge.wiring(),
        defaultLicenseTermsId: 99n,
      });
      unlicensed.connect(owner).initialize(initParams(owner));

      expectRevert(() => unlicensed.connect(owner).mintRoot(alice), "LicenseTermsNotFound", [
        TEST_LICENSE_TEMPLATE,
        99n,
      ]);
      expect(unlicensed.totalSupply()).to.equal(0n);
    });

    it("should leave no derivative behind when licensing fails", function () {
      const { badge, assetRegistry, licensingModule, root, owner, bob } = deployWithRootFixture();
      licensingModule.connect(owner).setPaused(true);

      expectRevert(() => badge.connect(owner).mint(bob), "EnforcedPause", []);

      expect(badge.balanceOf(bob)).to.equal(0n);
      expect(badge.totalSupply()).to.equal(1n);
      expect(assetRegistry.totalRegistered()).to.equal(1n);
      expect(licensingModule.getChildIps(root.ipId)).to.deep.equal([]);
    });
  });

  // ============================================
  // Periphery Tests
  // ============================================

  describe("Periphery minting", function () {
    it("should only accept mints from the asset registry", function () {
      const { badge, other } = deployBadgeFixture();

      expectRevert(() => badge.connect(other).mintByPeriphery(other, badge.address), "NotPeriphery", [other]);
    });

    it("should refuse registry mints requested by anyone but the collection", function () {
      const { badge, assetRegistry, other } = deployWithRootFixture();

      expectRevert(
        () => assetRegistry.connect(other).mintAndRegister(badge.address, other, testMetadata),
        "UnauthorizedMinter",
        [other]
      );
      expect(badge.balanceOf(other)).to.equal(0n);
      expect(badge.totalSupply()).to.equal(1n);
    });
  });

  // ============================================
  // Metadata Tests
  // ============================================

  describe("Metadata", function () {
    it("should resolve every id to the shared token URI", function () {
      const { badge } = deployWithRootFixture();

      expect(badge.tokenURI(0n)).to.equal(testMetadata.tokenURI);
      expect(badge.tokenURI(999n)).to.equal(testMetadata.tokenURI);
    });

    it("should update the URI of every token at once", function () {
      const { chain, badge, owner } = deployWithDerivativeFixture();

      badge.connect(owner).setTokenURI("ipfs://QmUpdated");

      expect(badge.tokenURI(0n)).to.equal("ipfs://QmUpdated");
      expect(badge.tokenURI(1n)).to.equal("ipfs://QmUpdated");
      expect(badge.tokenURI(42n)).to.equal("ipfs://QmUpdated");
      expect(badge.unifiedMetadata()).to.deep.equal({ ...testMetadata, tokenURI: "ipfs://QmUpdated" });
      expectEvent(chain, badge.address, "BatchMetadataUpdate", { fromTokenId: 0n, toTokenId: 2n });
    });

    it("should signal an empty range before any mint", function () {
      const { chain, badge, owner } = deployBadgeFixture();

      badge.connect(owner).setTokenURI("ipfs://QmEarly");

      expectEvent(chain, badge.address, "BatchMetadataUpdate", { fromTokenId: 0n, toTokenId: 0n });
    });

    it("should reject token URI updates from non-admins", function () {
      const { badge, alice } = deployWithRootFixture();

      expectRevert(() => badge.connect(alice).setTokenURI("ipfs://QmHijack"), "OwnableUnauthorizedAccount", [
        alice,
      ]);
      expect(badge.tokenURI(0n)).to.equal(testMetadata.tokenURI);
    });

    it("should update the collection URI", function () {
      const { chain, badge, owner, other } = deployBadgeFixture();

      badge.connect(owner).setContractURI("ipfs://QmNewCollection");
      expect(badge.contractURI()).to.equal("ipfs://QmNewCollection");
      expectEvent(chain, badge.address, "ContractURIUpdated", {});

      expectRevert(() => badge.connect(other).setContractURI("ipfs://x"), "OwnableUnauthorizedAccount", [other]);
    });

    it("should report every id as locked", function () {
      const { badge } = deployWithRootFixture();

      expect(badge.locked(0n)).to.be.true;
      expect(badge.locked(999n)).to.be.true;
    });

    it("should still check existence for ownerOf", function () {
      const { badge } = deployWithRootFixture();

      expectRevert(() => badge.ownerOf(999n), "ERC721NonexistentToken", [999n]);
    });

    it("should advertise the supported interfaces", function () {
      const { badge } = deployBadgeFixture();

      for (const interfaceId of Object.values(InterfaceIds)) {
        expect(badge.supportsInterface(interfaceId), interfaceId).to.be.true;
      }
      expect(badge.supportsInterface("0xffffffff")).to.be.false;
    });
  });

  // ============================================
  // Locked Transfer Surface Tests
  // ============================================

  describe("Locked transfers", function () {
    it("should reject every transfer entry point for every caller", function () {
      const { badge, owner, alice, carol, other } = deployWithDerivativeFixture();

      for (const caller of [alice, owner, other]) {
        const view = badge.connect(caller);
        expectRevert(() => view.approve(carol, 0n), "TransferLocked", []);
        expectRevert(() => view.setApprovalForAll(carol, true), "TransferLocked", []);
        expectRevert(() => view.transferFrom(alice, carol, 0n), "TransferLocked", []);
        expectRevert(() => view.safeTransferFrom(alice, carol, 0n), "TransferLocked", []);
        expectRevert(() => view.safeTransferFrom(alice, carol, 0n, "0x1234"), "TransferLocked", []);
      }

      expect(badge.ownerOf(0n)).to.equal(alice);
      expect(badge.getApproved(0n)).to.equal(Constants.ZERO_ADDRESS);
      expect(badge.isApprovedForAll(alice, carol)).to.be.false;
      expect(badge.balanceOf(carol)).to.equal(0n);
    });

    it("should record the rejected call as a reverted transaction", function () {
      const { chain, badge, alice, carol } = deployWithRootFixture();

      expectRevert(() => badge.connect(alice).transferFrom(alice, carol, 0n), "TransferLocked", []);

      const receipt = chain.latestReceipt();
      expect(receipt?.status).to.equal("reverted");
      expect(receipt?.method).to.equal("transferFrom");
      expect(receipt?.from).to.equal(alice);
    });

    it("should reject transfers of tokens that do not exist", function () {
      const { badge, alice, carol } = deployBadgeFixture();

      expectRevert(() => badge.connect(alice).transferFrom(alice, carol, 7n), "TransferLocked", []);
    });
  });

  // ============================================
  // Administration Tests
  // ============================================

  describe("Administration", function () {
    it("should hand minting rights to a new administrator", function () {
      const { badge, owner, carol, bob } = deployWithRootFixture();

      badge.connect(owner).transferOwnership(carol);

      expect(badge.owner()).to.equal(carol);
      expectRevert(() => badge.connect(owner).mint(bob), "OwnableUnauthorizedAccount", [owner]);
      expect(badge.connect(carol).mint(bob).tokenId).to.equal(1n);
    });

    it("should reject a zero new administrator", function () {
      const { badge, owner } = deployBadgeFixture();

      expectRevert(() => badge.connect(owner).transferOwnership(Constants.ZERO_ADDRESS), "OwnableInvalidOwner", [
        Constants.ZERO_ADDRESS,
      ]);
      expect(badge.owner()).to.equal(owner);
    });

    it("should close minting for good once ownership is renounced", function () {
      const { badge, owner, bob } = deployWithRootFixture();

      badge.connect(owner).renounceOwnership();

      expect(badge.owner()).to.equal(Constants.ZERO_ADDRESS);
      expectRevert(() => badge.connect(owner).mint(bob), "OwnableUnauthorizedAccount", [owner]);
    });
  });
});
