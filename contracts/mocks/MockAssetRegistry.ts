/**
 * @file MockAssetRegistry
 * @description In-process asset registry: mints through a collection's periphery hook and registers the IP
 */

import { getAddress } from "ethers";
import { type Chain } from "../../chain/Chain";
import { Contract } from "../../chain/Contract";
import {
  type IAssetRegistry,
  EnforcedPause,
  IpAlreadyRegistered,
  IpNotRegistered,
  isPeripheryMintable,
} from "../interfaces/IAssetRegistry";
import { type MintResult, type UnifiedMetadata } from "../../types";
import { deriveIpId } from "../../utils/ipId";

export interface IpRecord {
  chainId: bigint;
  tokenContract: string;
  tokenId: bigint;
  ipMetadataURI: string;
  ipMetadataHash: string;
  nftMetadataHash: string;
}

export type IPRegisteredEvent = {
  ipId: string;
  chainId: bigint;
  tokenContract: string;
  tokenId: bigint;
};

type RegistryStorage = {
  ips: Map<string, IpRecord>;
  totalRegistered: bigint;
  paused: boolean;
};

export class MockAssetRegistry extends Contract implements IAssetRegistry {
  private readonly $registry = this.storage<RegistryStorage>("soulbound-badge.storage.MockAssetRegistry", {
    ips: new Map(),
    totalRegistered: 0n,
    paused: false,
  });

  static deploy(chain: Chain, deployer: string): MockAssetRegistry {
    return chain.deploy(deployer, (address) => new MockAssetRegistry(chain, address, deployer));
  }

  mintAndRegister(nftContract: string, recipient: string, metadata: UnifiedMetadata): MintResult {
    return this.transaction("mintAndRegister", () => {
      const $ = this.$registry.read();
      if ($.paused) {
        throw new EnforcedPause();
      }

      const collection = this.at(nftContract, isPeripheryMintable);
      const tokenId = collection.mintByPeriphery(recipient, this.msgSender);
      const tokenContract = getAddress(nftContract);
      const ipId = this.ipId(this.chain.chainId, tokenContract, tokenId);
      if ($.ips.has(ipId)) {
        throw new IpAlreadyRegistered(ipId);
      }

      $.ips.set(ipId, {
        chainId: this.chain.chainId,
        tokenContract,
        tokenId,
        ipMetadataURI: metadata.ipMetadataURI,
        ipMetadataHash: metadata.ipMetadataHash,
        nftMetadataHash: metadata.nftMetadataHash,
      });
      $.totalRegistered += 1n;
      this.emit<IPRegisteredEvent>("IPRegistered", {
        ipId,
        chainId: this.chain.chainId,
        tokenContract,
        tokenId,
      });
      return { tokenId, ipId };
    });
  }

  ipId(chainId: bigint, tokenContract: string, tokenId: bigint): string {
    return deriveIpId(chainId, getAddress(tokenContract), tokenId);
  }

  isRegistered(ipId: string): boolean {
    return this.$registry.read().ips.has(getAddress(ipId));
  }

  ipOwner(ipId: string): string {
    const record = this.getIp(ipId);
    return this.at(record.tokenContract, isPeripheryMintable).ownerOf(record.tokenId);
  }

  getIp(ipId: string): IpRecord {
    const record = this.$registry.read().ips.get(getAddress(ipId));
    if (record === undefined) {
      throw new IpNotRegistered(getAddress(ipId));
    }
    return { ...record };
  }

  totalRegistered(): bigint {
    return this.$registry.read().totalRegistered;
  }

  /** Failure injection for tests */
  setPaused(paused: boolean): void {
    this.transaction("setPaused", () => {
      this.$registry.read().paused = paused;
    });
  }
}
