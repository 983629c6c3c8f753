/**
 * @file MockLicensingModule
 * @description In-process licensing module: license terms registry, attachments and parent/child edges
 */

import { getAddress } from "ethers";
import { type Chain } from "../../chain/Chain";
import { Contract } from "../../chain/Contract";
import { EnforcedPause, IpNotRegistered, isAssetRegistry, type IAssetRegistry } from "../interfaces/IAssetRegistry";
import {
  type DerivativeRegisteredEvent,
  type ILicensingModule,
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
} from "../interfaces/ILicensingModule";
import { type DerivativeRecord, type LicenseTermsRef } from "../../types";

/** Revenue share is expressed in units of 1e-6 percent; 100% == 100_000_000 */
export const MAX_REVENUE_SHARE = 100_000_000;

type LicensingStorage = {
  terms: Map<string, bigint[]>;
  nextTermsId: bigint;
  attachments: Map<string, LicenseTermsRef[]>;
  derivatives: Map<string, DerivativeRecord>;
  children: Map<string, string[]>;
  paused: boolean;
};

export class MockLicensingModule extends Contract implements ILicensingModule {
  readonly assetRegistry: string;

  private readonly $licensing = this.storage<LicensingStorage>(
    "soulbound-badge.storage.MockLicensingModule",
    {
      terms: new Map(),
      nextTermsId: 1n,
      attachments: new Map(),
      derivatives: new Map(),
      children: new Map(),
      paused: false,
    }
  );

  private constructor(chain: Chain, address: string, deployer: string, assetRegistry: string) {
    super(chain, address, deployer);
    this.assetRegistry = getAddress(assetRegistry);
  }

  static deploy(chain: Chain, deployer: string, assetRegistry: string): MockLicensingModule {
    return chain.deploy(
      deployer,
      (address) => new MockLicensingModule(chain, address, deployer, assetRegistry)
    );
  }

  // ============================================
  // License terms
  // ============================================

  /**
   * Register a new set of terms under `licenseTemplate`. Ids are global and start at 1.
   */
  registerLicenseTerms(licenseTemplate: string): bigint {
    return this.transaction("registerLicenseTerms", () => {
      const $ = this.$licensing.read();
      const template = getAddress(licenseTemplate);
      const licenseTermsId = $.nextTermsId;
      $.nextTermsId = licenseTermsId + 1n;
      $.terms.set(template, [...($.terms.get(template) ?? []), licenseTermsId]);
      this.emit<LicenseTermsRegisteredEvent>("LicenseTermsRegistered", {
        licenseTemplate: template,
        licenseTermsId,
      });
      return licenseTermsId;
    });
  }

  licenseTermsExist(licenseTemplate: string, licenseTermsId: bigint): boolean {
    return this.$licensing.read().terms.get(getAddress(licenseTemplate))?.includes(licenseTermsId) ?? false;
  }

  attachLicenseTerms(ipId: string, licenseTemplate: string, licenseTermsId: bigint): void {
    this.transaction("attachLicenseTerms", () => {
      const $ = this.$licensing.read();
      const ip = this.requireIpOwner(ipId);
      const template = getAddress(licenseTemplate);

      if (!this.licenseTermsExist(template, licenseTermsId)) {
        throw new LicenseTermsNotFound(template, licenseTermsId);
      }
      if ($.derivatives.has(ip)) {
        throw new DerivativesCannotAddLicenseTerms(ip);
      }
      const attached = $.attachments.get(ip) ?? [];
      if (attached.some((ref) => sameTerms(ref, template, licenseTermsId))) {
        throw new LicenseTermsAlreadyAttached(ip, template, licenseTermsId);
      }

      $.attachments.set(ip, [...attached, { licenseTemplate: template, licenseTermsId }]);
      this.emit<LicenseTermsAttachedEvent>("LicenseTermsAttached", {
        caller: this.msgSender,
        ipId: ip,
        licenseTemplate: template,
        licenseTermsId,
      });
    });
  }

  // ============================================
  // Derivatives
  // ============================================

  /**
   * Declare `childIpId` a derivative of every parent, the i-th parent under
   * the i-th terms. The child inherits the parents' terms.
   */
  registerDerivative(
    childIpId: string,
    parentIpIds: string[],
    licenseTemplate: string,
    licenseTermsIds: bigint[],
    _royaltyContext: string,
    _maxMintingFee: bigint,
    _maxRts: number,
    maxRevenueShare: number
  ): void {
    this.transaction("registerDerivative", () => {
      const $ = this.$licensing.read();
      const child = this.requireIpOwner(childIpId);
      const template = getAddress(licenseTemplate);

      if (parentIpIds.length === 0) {
        throw new NoParentIp();
      }
      if (parentIpIds.length !== licenseTermsIds.length) {
        throw new LicenseTermsLengthMismatch(parentIpIds.length, licenseTermsIds.length);
      }
      if (maxRevenueShare < 0 || maxRevenueShare > MAX_REVENUE_SHARE) {
        throw new InvalidMaxRevenueShare(maxRevenueShare);
      }
      if ($.derivatives.has(child)) {
        throw new DerivativeAlreadyRegistered(child);
      }
      if (($.attachments.get(child) ?? []).length > 0) {
        throw new DerivativeIpAlreadyHasLicense(child);
      }

      const parents = parentIpIds.map((parentIpId) => getAddress(parentIpId));
      parents.forEach((parent, i) => {
        const licenseTermsId = licenseTermsIds[i] ?? 0n;
        if (parent === child) {
          throw new ParentIpEqualsChild(child);
        }
        if (!this.registry().isRegistered(parent)) {
          throw new IpNotRegistered(parent);
        }
        const parentTerms = $.attachments.get(parent) ?? [];
        if (!parentTerms.some((ref) => sameTerms(ref, template, licenseTermsId))) {
          throw new ParentIpHasNoLicenseTerms(parent, licenseTermsId);
        }
      });

      $.derivatives.set(child, {
        parentIpIds: parents,
        licenseTemplate: template,
        licenseTermsIds: [...licenseTermsIds],
      });
      $.attachments.set(
        child,
        dedupeTerms(licenseTermsIds.map((licenseTermsId) => ({ licenseTemplate: template, licenseTermsId })))
      );
      for (const parent of parents) {
        $.children.set(parent, [...($.children.get(parent) ?? []), child]);
      }

      this.emit<DerivativeRegisteredEvent>("DerivativeRegistered", {
        caller: this.msgSender,
        childIpId: child,
        parentIpIds: [...parents],
        licenseTemplate: template,
        licenseTermsIds: [...licenseTermsIds],
      });
    });
  }

  // ============================================
  // Reads
  // ============================================

  getAttachedLicenseTerms(ipId: string): LicenseTermsRef[] {
    return (this.$licensing.read().attachments.get(getAddress(ipId)) ?? []).map((ref) => ({ ...ref }));
  }

  getDerivative(ipId: string): DerivativeRecord | undefined {
    const record = this.$licensing.read().derivatives.get(getAddress(ipId));
    return record === undefined
      ? undefined
      : { ...record, parentIpIds: [...record.parentIpIds], licenseTermsIds: [...record.licenseTermsIds] };
  }

  getParentIps(ipId: string): string[] {
    return this.getDerivative(ipId)?.parentIpIds ?? [];
  }

  getChildIps(ipId: string): string[] {
    return [...(this.$licensing.read().children.get(getAddress(ipId)) ?? [])];
  }

  isDerivativeIp(ipId: string): boolean {
    return this.$licensing.read().derivatives.has(getAddress(ipId));
  }

  /** Failure injection for tests */
  setPaused(paused: boolean): void {
    this.transaction("setPaused", () => {
      this.$licensing.read().paused = paused;
    });
  }

  // ============================================
  // Internal
  // ============================================

  private registry(): IAssetRegistry {
    return this.at(this.assetRegistry, isAssetRegistry);
  }

  /**
   * Checks the module is live, the IP exists and the caller controls it
   */
  private requireIpOwner(ipId: string): string {
    if (this.$licensing.read().paused) {
      throw new EnforcedPause();
    }
    const ip = getAddress(ipId);
    const registry = this.registry();
    if (!registry.isRegistered(ip)) {
      throw new IpNotRegistered(ip);
    }
    if (registry.ipOwner(ip) !== this.msgSender) {
      throw new AccessDenied(ip, this.msgSender);
    }
    return ip;
  }
}

function sameTerms(ref: LicenseTermsRef, licenseTemplate: string, licenseTermsId: bigint): boolean {
  return ref.licenseTemplate === licenseTemplate && ref.licenseTermsId === licenseTermsId;
}

function dedupeTerms(refs: LicenseTermsRef[]): LicenseTermsRef[] {
  return refs.filter(
    (ref, i) => refs.findIndex((other) => sameTerms(other, ref.licenseTemplate, ref.licenseTermsId)) === i
  );
}
