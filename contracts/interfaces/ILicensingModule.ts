/**
 * @file ILicensingModule
 * @description Collaborator contract attaching license terms and declaring derivatives
 */

import { ContractError } from "../../chain/errors";

export interface ILicensingModule {
  attachLicenseTerms(ipId: string, licenseTemplate: string, licenseTermsId: bigint): void;

  registerDerivative(
    childIpId: string,
    parentIpIds: string[],
    licenseTemplate: string,
    licenseTermsIds: bigint[],
    royaltyContext: string,
    maxMintingFee: bigint,
    maxRts: number,
    maxRevenueShare: number
  ): void;
}

export function isLicensingModule(value: unknown): value is ILicensingModule {
  return (
    typeof value === "object" &&
    value !== null &&
    "attachLicenseTerms" in value &&
    typeof value.attachLicenseTerms === "function" &&
    "registerDerivative" in value &&
    typeof value.registerDerivative === "function"
  );
}

// ============================================
// Events
// ============================================

export type LicenseTermsAttachedEvent = {
  caller: string;
  ipId: string;
  licenseTemplate: string;
  licenseTermsId: bigint;
};

export type DerivativeRegisteredEvent = {
  caller: string;
  childIpId: string;
  parentIpIds: string[];
  licenseTemplate: string;
  licenseTermsIds: bigint[];
};

export type LicenseTermsRegisteredEvent = {
  licenseTemplate: string;
  licenseTermsId: bigint;
};

// ============================================
// Errors
// ============================================

export class AccessDenied extends ContractError {
  constructor(ipId: string, caller: string) {
    super("AccessDenied", [ipId, caller]);
  }
}

export class LicenseTermsNotFound extends ContractError {
  constructor(licenseTemplate: string, licenseTermsId: bigint) {
    super("LicenseTermsNotFound", [licenseTemplate, licenseTermsId]);
  }
}

export class LicenseTermsAlreadyAttached extends ContractError {
  constructor(ipId: string, licenseTemplate: string, licenseTermsId: bigint) {
    super("LicenseTermsAlreadyAttached", [ipId, licenseTemplate, licenseTermsId]);
  }
}

export class DerivativesCannotAddLicenseTerms extends ContractError {
  constructor(ipId: string) {
    super("DerivativesCannotAddLicenseTerms", [ipId]);
  }
}

export class DerivativeAlreadyRegistered extends ContractError {
  constructor(childIpId: string) {
    super("DerivativeAlreadyRegistered", [childIpId]);
  }
}

export class DerivativeIpAlreadyHasLicense extends ContractError {
  constructor(childIpId: string) {
    super("DerivativeIpAlreadyHasLicense", [childIpId]);
  }
}

export class NoParentIp extends ContractError {
  constructor() {
    super("NoParentIp");
  }
}

export class LicenseTermsLengthMismatch extends ContractError {
  constructor(parentCount: number, termsCount: number) {
    super("LicenseTermsLengthMismatch", [parentCount, termsCount]);
  }
}

export class ParentIpEqualsChild extends ContractError {
  constructor(ipId: string) {
    super("ParentIpEqualsChild", [ipId]);
  }
}

export class ParentIpHasNoLicenseTerms extends ContractError {
  constructor(parentIpId: string, licenseTermsId: bigint) {
    super("ParentIpHasNoLicenseTerms", [parentIpId, licenseTermsId]);
  }
}

export class InvalidMaxRevenueShare extends ContractError {
  constructor(maxRevenueShare: number) {
    super("InvalidMaxRevenueShare", [maxRevenueShare]);
  }
}
