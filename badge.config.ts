import * as dotenv from "dotenv";
import { getAddress } from "ethers";
import { type UnifiedMetadata, Constants, isValidAddress, isValidBytes32 } from "./types";
import { type LogLevel, isLogLevel } from "./utils/logger";

dotenv.config();

export interface BadgeDeploymentConfig {
  networkName: string;
  chainId: bigint;
  logLevel: LogLevel;

  // Collection
  name: string;
  symbol: string;
  contractURI: string;
  metadata: UnifiedMetadata;

  // Licensing
  licenseTemplate: string;
  defaultLicenseTermsId: bigint;

  /** Recipient of the root badge minted right after deployment, if any */
  rootRecipient?: string;
}

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

// Placeholder template address for local networks (DO NOT USE ON A LIVE NETWORK)
const LOCAL_LICENSE_TEMPLATE = "0x1111111111111111111111111111111111111111";

const DEFAULTS = {
  NETWORK: "local",
  CHAIN_ID: "31337",
  BADGE_NAME: "Soulbound Badge",
  BADGE_SYMBOL: "SBB",
  BADGE_CONTRACT_URI: "ipfs://QmCollectionMetadata",
  BADGE_TOKEN_URI: "ipfs://QmBadgeMetadata",
  BADGE_IP_METADATA_URI: "ipfs://QmBadgeIpMetadata",
  BADGE_IP_METADATA_HASH: Constants.ZERO_BYTES32,
  BADGE_NFT_METADATA_HASH: Constants.ZERO_BYTES32,
  LICENSE_TEMPLATE: LOCAL_LICENSE_TEMPLATE,
  DEFAULT_LICENSE_TERMS_ID: "1",
  LOG_LEVEL: "warn",
} as const;

type EnvKey = keyof typeof DEFAULTS | "ROOT_RECIPIENT";

type Env = Partial<Record<string, string>>;

function read(env: Env, key: EnvKey): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value === "" ? undefined : value;
}

function readOrDefault(env: Env, key: keyof typeof DEFAULTS): string {
  return read(env, key) ?? DEFAULTS[key];
}

function parseUint(key: string, raw: string): bigint {
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(key, `expected an unsigned integer, got "${raw}"`);
  }
  return BigInt(raw);
}

function parseAddress(key: string, raw: string): string {
  if (!isValidAddress(raw)) {
    throw new ConfigError(key, `expected a 20-byte hex address, got "${raw}"`);
  }
  return getAddress(raw.toLowerCase());
}

function parseBytes32(key: string, raw: string): string {
  if (!isValidBytes32(raw)) {
    throw new ConfigError(key, `expected a 32-byte hex value, got "${raw}"`);
  }
  return raw.toLowerCase();
}

/**
 * Resolve the deployment configuration from the environment (.env is loaded on import)
 */
export function loadBadgeConfig(env: Env = process.env): BadgeDeploymentConfig {
  const logLevel = readOrDefault(env, "LOG_LEVEL").toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError("LOG_LEVEL", `unknown level "${logLevel}"`);
  }

  const defaultLicenseTermsId = parseUint(
    "DEFAULT_LICENSE_TERMS_ID",
    readOrDefault(env, "DEFAULT_LICENSE_TERMS_ID")
  );
  if (defaultLicenseTermsId === 0n) {
    throw new ConfigError("DEFAULT_LICENSE_TERMS_ID", "license terms ids start at 1");
  }

  const rootRecipient = read(env, "ROOT_RECIPIENT");

  return {
    networkName: readOrDefault(env, "NETWORK"),
    chainId: parseUint("CHAIN_ID", readOrDefault(env, "CHAIN_ID")),
    logLevel,
    name: readOrDefault(env, "BADGE_NAME"),
    symbol: readOrDefault(env, "BADGE_SYMBOL"),
    contractURI: readOrDefault(env, "BADGE_CONTRACT_URI"),
    metadata: {
      tokenURI: readOrDefault(env, "BADGE_TOKEN_URI"),
      ipMetadataURI: readOrDefault(env, "BADGE_IP_METADATA_URI"),
      ipMetadataHash: parseBytes32("BADGE_IP_METADATA_HASH", readOrDefault(env, "BADGE_IP_METADATA_HASH")),
      nftMetadataHash: parseBytes32(
        "BADGE_NFT_METADATA_HASH",
        readOrDefault(env, "BADGE_NFT_METADATA_HASH")
      ),
    },
    licenseTemplate: parseAddress("LICENSE_TEMPLATE", readOrDefault(env, "LICENSE_TEMPLATE")),
    defaultLicenseTermsId,
    rootRecipient:
      rootRecipient === undefined ? undefined : parseAddress("ROOT_RECIPIENT", rootRecipient),
  };
}

export default loadBadgeConfig;
