/**
 * @file IP id derivation
 * @description Deterministic IP account address for a (chain, token contract, token id) triple
 */

import { AbiCoder, dataSlice, getAddress, keccak256 } from "ethers";

/**
 * Derive the IP account address bound to a token.
 * Same inputs always give the same id, so a token can be registered once.
 */
export function deriveIpId(chainId: bigint, tokenContract: string, tokenId: bigint): string {
  const encoded = AbiCoder.defaultAbiCoder().encode(
    ["string", "uint256", "address", "uint256"],
    ["ip-account", chainId, tokenContract, tokenId]
  );
  return getAddress(dataSlice(keccak256(encoded), 12));
}
