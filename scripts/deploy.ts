/**
 * @file deploy.ts
 * @description Deployment script for the soulbound badge system
 * @dev Deploys the asset registry, licensing module and badge collection, then initializes the badge
 *
 * Usage:
 *   npx tsx scripts/deploy.ts            # reads .env, writes deployments/<network>-latest.json
 */

import * as fs from "fs";
import * as path from "path";
import { ConfigError, loadBadgeConfig, type BadgeDeploymentConfig } from "../badge.config";
import { Chain } from "../chain";
import { MockAssetRegistry, MockLicensingModule, SoulboundBadge } from "../contracts";
import { type MintResult } from "../types";
import { createLogger, type Logger } from "../utils";

// Deployment result
export interface DeploymentResult {
  networkName: string;
  chainId: string;
  timestamp: number;
  contracts: {
    assetRegistry: string;
    licensingModule: string;
    soulboundBadge: string;
  };
  licensing: {
    licenseTemplate: string;
    defaultLicenseTermsId: string;
  };
  roles: {
    admin: string;
  };
  root?: {
    recipient: string;
    tokenId: string;
    ipId: string;
  };
}

export interface DeployedSystem {
  chain: Chain;
  deployer: string;
  assetRegistry: MockAssetRegistry;
  licensingModule: MockLicensingModule;
  badge: SoulboundBadge;
  root?: MintResult & { recipient: string };
}

export interface DeployOptions {
  chain?: Chain;
  /** Deploying account, also the badge administrator. Defaults to the first signer */
  deployer?: string;
  logger?: Logger;
}

/**
 * Deploy and wire the whole system on `options.chain` (a fresh local chain by default)
 */
export function deploySystem(config: BadgeDeploymentConfig, options: DeployOptions = {}): DeployedSystem {
  const logger = options.logger ?? createLogger("deploy", config.logLevel);
  const chain =
    options.chain ?? new Chain({ name: config.networkName, chainId: config.chainId, logger });
  const deployer = options.deployer ?? firstSigner(chain);

  // 1. Collaborators
  logger.info("Deploying MockAssetRegistry...");
  const assetRegistry = MockAssetRegistry.deploy(chain, deployer);
  logger.info(`   Address: ${assetRegistry.address}`);

  logger.info("Deploying MockLicensingModule...");
  const licensingModule = MockLicensingModule.deploy(chain, deployer, assetRegistry.address);
  logger.info(`   Address: ${licensingModule.address}`);

  // 2. Default license terms must exist before the root can attach them
  const termsId = licensingModule.registerLicenseTerms(config.licenseTemplate);
  if (termsId !== config.defaultLicenseTermsId) {
    throw new ConfigError(
      "DEFAULT_LICENSE_TERMS_ID",
      `licensing module registered terms ${termsId}, expected ${config.defaultLicenseTermsId}`
    );
  }
  logger.debug(`   Registered license terms ${termsId}`);

  // 3. Badge collection
  logger.info("Deploying SoulboundBadge...");
  const badge = SoulboundBadge.deploy(chain, deployer, {
    assetRegistry: assetRegistry.address,
    licensingModule: licensingModule.address,
    licenseTemplate: config.licenseTemplate,
    defaultLicenseTermsId: config.defaultLicenseTermsId,
  });
  badge.connect(deployer).initialize({
    owner: deployer,
    name: config.name,
    symbol: config.symbol,
    contractURI: config.contractURI,
    metadata: config.metadata,
  });
  logger.info(`   Address: ${badge.address}`);

  const system: DeployedSystem = { chain, deployer, assetRegistry, licensingModule, badge };

  // 4. Optional root
  if (config.rootRecipient !== undefined) {
    const result = badge.connect(deployer).mintRoot(config.rootRecipient);
    logger.info(`Root badge #${result.tokenId} minted to ${config.rootRecipient} (ip ${result.ipId})`);
    system.root = { ...result, recipient: config.rootRecipient };
  }

  return system;
}

function firstSigner(chain: Chain): string {
  const [signer] = chain.getSigners(1);
  if (signer === undefined) {
    throw new Error("chain returned no signers");
  }
  return signer;
}

export function toDeploymentResult(
  config: BadgeDeploymentConfig,
  system: DeployedSystem,
  timestamp: number
): DeploymentResult {
  return {
    networkName: config.networkName,
    chainId: config.chainId.toString(),
    timestamp,
    contracts: {
      assetRegistry: system.assetRegistry.address,
      licensingModule: system.licensingModule.address,
      soulboundBadge: system.badge.address,
    },
    licensing: {
      licenseTemplate: system.badge.licenseTemplate,
      defaultLicenseTermsId: system.badge.defaultLicenseTermsId.toString(),
    },
    roles: {
      admin: system.badge.owner(),
    },
    root:
      system.root === undefined
        ? undefined
        : {
            recipient: system.root.recipient,
            tokenId: system.root.tokenId.toString(),
            ipId: system.root.ipId,
          },
  };
}

function saveDeploymentResult(result: DeploymentResult): void {
  const deploymentsDir = path.join(__dirname, "..", "deployments");
  if (!fs.existsSync(deploymentsDir)) {
    fs.mkdirSync(deploymentsDir, { recursive: true });
  }

  const filepath = path.join(deploymentsDir, `${result.networkName}-latest.json`);
  fs.writeFileSync(filepath, JSON.stringify(result, null, 2));
  console.log(`\n💾 Deployment saved to: ${filepath}`);
}

function printDeploymentSummary(result: DeploymentResult): void {
  console.log("\n" + "=".repeat(60));
  console.log("DEPLOYMENT SUMMARY");
  console.log("=".repeat(60));
  console.log(`Network: ${result.networkName} (${result.chainId})`);
  console.log(`Timestamp: ${new Date(result.timestamp * 1000).toISOString()}`);
  console.log("\nContract Addresses:");
  console.log(`  AssetRegistry:   ${result.contracts.assetRegistry}`);
  console.log(`  LicensingModule: ${result.contracts.licensingModule}`);
  console.log(`  SoulboundBadge:  ${result.contracts.soulboundBadge}`);
  console.log("\nLicensing:");
  console.log(`  Template: ${result.licensing.licenseTemplate}`);
  console.log(`  Default terms: ${result.licensing.defaultLicenseTermsId}`);
  console.log(`\nAdmin: ${result.roles.admin}`);
  if (result.root !== undefined) {
    console.log(`Root: token ${result.root.tokenId} -> ${result.root.recipient} (ip ${result.root.ipId})`);
  }
  console.log("=".repeat(60));
}

async function main() {
  console.log("🚀 Starting Soulbound Badge Deployment\n");

  const config = loadBadgeConfig();
  console.log(`📡 Network: ${config.networkName} (chainId: ${config.chainId})`);

  const system = deploySystem(config);
  console.log(`👤 Deployer: ${system.deployer}`);

  const result = toDeploymentResult(config, system, Math.floor(Date.now() / 1000));
  saveDeploymentResult(result);
  printDeploymentSummary(result);

  console.log("\n✅ Deployment complete!");
}

if (require.main === module) {
  main()
    .then(() => process.exit(0))
    .catch((error) => {
      console.error("❌ Deployment failed:", error);
      process.exit(1);
    });
}
