/**
 * @file Licensing types
 * @description Shapes exchanged with the licensing module
 */

/**
 * A license template / terms pair
 */
export interface LicenseTermsRef {
  licenseTemplate: string;
  licenseTermsId: bigint;
}

/**
 * Parent edges recorded for a derivative IP
 */
export interface DerivativeRecord {
  parentIpIds: string[];
  licenseTemplate: string;
  licenseTermsIds: bigint[];
}

/**
 * Extra parameters of a derivative registration. The badge always passes zeros.
 */
export interface RoyaltyLimits {
  royaltyContext: string;
  maxMintingFee: bigint;
  maxRts: number;
  maxRevenueShare: number;
}

export const ZERO_ROYALTY_LIMITS: Readonly<RoyaltyLimits> = {
  royaltyContext: "0x",
  maxMintingFee: 0n,
  maxRts: 0,
  maxRevenueShare: 0,
};
