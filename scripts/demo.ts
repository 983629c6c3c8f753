/**
 * @file demo.ts
 * @description End-to-end demo of the soulbound badge system.
 *
 * Deploys the system on a local chain, mints the root badge and a derivative,
 * then shows the rejected paths (second badge, transfer) with human-readable
 * output at each step.
 *
 * Usage:
 *   npx tsx scripts/demo.ts
 */

import { loadBadgeConfig } from "../badge.config";
import { Chain, isContractError } from "../chain";
import { silentLogger } from "../utils";
import { deploySystem } from "./deploy";

// ============================================
// Helpers
// ============================================

function hr(label?: string) {
  if (label) {
    console.log(`\n${"=".repeat(60)}`);
    console.log(`  ${label}`);
    console.log(`${"=".repeat(60)}`);
  } else {
    console.log("-".repeat(60));
  }
}

function step(n: number, label: string) {
  console.log(`\n[${"Step " + n}] ${label}`);
  console.log("-".repeat(60));
}

function expectFailure(label: string, call: () => unknown) {
  try {
    call();
    console.log(`  !! ${label} unexpectedly succeeded`);
  } catch (error) {
    if (!isContractError(error)) {
      throw error;
    }
    console.log(`  ${label} rejected: ${error.message}`);
  }
}

// ============================================
// Main
// ============================================

async function main() {
  hr("SOULBOUND BADGE: END-TO-END DEMO");

  const config = loadBadgeConfig();
  const chain = new Chain({ name: config.networkName, chainId: config.chainId, logger: silentLogger });
  const [deployer, alice, bob, carol] = chain.getSigners(4);
  if (deployer === undefined || alice === undefined || bob === undefined || carol === undefined) {
    throw new Error("not enough signers");
  }
  console.log(`Network:  ${chain.name} (chainId ${chain.chainId})`);
  console.log(`Admin:    ${deployer}`);
  console.log(`Alice:    ${alice}`);
  console.log(`Bob:      ${bob}`);

  // ------------------------------------------------------------------
  // Step 1: Deploy
  // ------------------------------------------------------------------
  step(1, "Deploy contracts");
  const { badge, licensingModule } = deploySystem(
    { ...config, rootRecipient: undefined },
    { chain, deployer, logger: silentLogger }
  );
  console.log(`  SoulboundBadge: ${badge.address}`);
  console.log(`  ${badge.name()} (${badge.symbol()}), default terms #${badge.defaultLicenseTermsId}`);

  // ------------------------------------------------------------------
  // Step 2: Derivative before root
  // ------------------------------------------------------------------
  step(2, "Mint before a root exists");
  expectFailure("mint(alice)", () => badge.connect(deployer).mint(alice));

  // ------------------------------------------------------------------
  // Step 3: Root
  // ------------------------------------------------------------------
  step(3, "Mint the root badge to Alice");
  const root = badge.connect(deployer).mintRoot(alice);
  console.log(`  token #${root.tokenId} -> ${badge.ownerOf(root.tokenId)}`);
  console.log(`  root ip: ${root.ipId}`);
  for (const terms of licensingModule.getAttachedLicenseTerms(root.ipId)) {
    console.log(`  terms:   ${terms.licenseTemplate} #${terms.licenseTermsId}`);
  }
  expectFailure("second mintRoot(bob)", () => badge.connect(deployer).mintRoot(bob));

  // ------------------------------------------------------------------
  // Step 4: Derivative
  // ------------------------------------------------------------------
  step(4, "Mint a derivative badge to Bob");
  const derivative = badge.connect(deployer).mint(bob);
  console.log(`  token #${derivative.tokenId} -> ${badge.ownerOf(derivative.tokenId)}`);
  console.log(`  ip:      ${derivative.ipId}`);
  console.log(`  parents: ${licensingModule.getParentIps(derivative.ipId).join(", ")}`);
  expectFailure("second mint(bob)", () => badge.connect(deployer).mint(bob));

  // ------------------------------------------------------------------
  // Step 5: Locked transfers
  // ------------------------------------------------------------------
  step(5, "Try to move badges");
  expectFailure("transferFrom(alice, carol, 0)", () =>
    badge.connect(alice).transferFrom(alice, carol, root.tokenId)
  );
  expectFailure("approve(carol, 1)", () => badge.connect(bob).approve(carol, derivative.tokenId));
  console.log(`  locked(0) = ${badge.locked(root.tokenId)}, owner still ${badge.ownerOf(root.tokenId)}`);

  // ------------------------------------------------------------------
  // Step 6: Shared metadata
  // ------------------------------------------------------------------
  step(6, "Update the shared token URI");
  badge.connect(deployer).setTokenURI("ipfs://QmUpdatedBadgeMetadata");
  console.log(`  tokenURI(0)  = ${badge.tokenURI(0n)}`);
  console.log(`  tokenURI(99) = ${badge.tokenURI(99n)}`);

  hr("DEMO COMPLETE");
}

main()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error("❌ Demo failed:", error);
    process.exit(1);
  });
