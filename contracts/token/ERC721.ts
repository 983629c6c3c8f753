/**
 * @file ERC721
 * @description Generic non-fungible token ownership ledger
 */

import { getAddress } from "ethers";
import { Contract } from "../../chain/Contract";
import { ContractError } from "../../chain/errors";
import { Ownable } from "../access/Ownable";
import { Constants, InterfaceIds, isZeroAddress } from "../../types";

// ============================================
// Errors
// ============================================

export class ERC721InvalidOwner extends ContractError {
  constructor(owner: string) {
    super("ERC721InvalidOwner", [owner]);
  }
}

export class ERC721NonexistentToken extends ContractError {
  constructor(tokenId: bigint) {
    super("ERC721NonexistentToken", [tokenId]);
  }
}

export class ERC721IncorrectOwner extends ContractError {
  constructor(sender: string, tokenId: bigint, owner: string) {
    super("ERC721IncorrectOwner", [sender, tokenId, owner]);
  }
}

export class ERC721InvalidSender extends ContractError {
  constructor(sender: string) {
    super("ERC721InvalidSender", [sender]);
  }
}

export class ERC721InvalidReceiver extends ContractError {
  constructor(receiver: string) {
    super("ERC721InvalidReceiver", [receiver]);
  }
}

export class ERC721InsufficientApproval extends ContractError {
  constructor(operator: string, tokenId: bigint) {
    super("ERC721InsufficientApproval", [operator, tokenId]);
  }
}

export class ERC721InvalidApprover extends ContractError {
  constructor(approver: string) {
    super("ERC721InvalidApprover", [approver]);
  }
}

export class ERC721InvalidOperator extends ContractError {
  constructor(operator: string) {
    super("ERC721InvalidOperator", [operator]);
  }
}

// ============================================
// Events
// ============================================

export type TransferEvent = {
  from: string;
  to: string;
  tokenId: bigint;
};

export type ApprovalEvent = {
  owner: string;
  approved: string;
  tokenId: bigint;
};

export type ApprovalForAllEvent = {
  owner: string;
  operator: string;
  approved: boolean;
};

// ============================================
// Receiver hook
// ============================================

/** `bytes4(keccak256("onERC721Received(address,address,uint256,bytes)"))` */
export const ERC721_RECEIVED = "0x150b7a02";

export interface IERC721Receiver {
  onERC721Received(operator: string, from: string, tokenId: bigint, data: string): string;
}

export function isERC721Receiver(value: unknown): value is IERC721Receiver {
  return (
    typeof value === "object" &&
    value !== null &&
    "onERC721Received" in value &&
    typeof value.onERC721Received === "function"
  );
}

// ============================================
// Ledger
// ============================================

type ERC721Storage = {
  name: string;
  symbol: string;
  owners: Map<bigint, string>;
  balances: Map<string, bigint>;
  tokenApprovals: Map<bigint, string>;
  operatorApprovals: Map<string, Set<string>>;
};

export abstract class ERC721 extends Ownable {
  private readonly $erc721 = this.storage<ERC721Storage>("soulbound-badge.storage.ERC721", {
    name: "",
    symbol: "",
    owners: new Map(),
    balances: new Map(),
    tokenApprovals: new Map(),
    operatorApprovals: new Map(),
  });

  protected initERC721(name: string, symbol: string): void {
    this.onlyInitializing();
    const $ = this.$erc721.read();
    $.name = name;
    $.symbol = symbol;
  }

  // ------------------------------------------
  // Reads
  // ------------------------------------------

  name(): string {
    return this.$erc721.read().name;
  }

  symbol(): string {
    return this.$erc721.read().symbol;
  }

  balanceOf(owner: string): bigint {
    if (isZeroAddress(owner)) {
      throw new ERC721InvalidOwner(Constants.ZERO_ADDRESS);
    }
    return this.$erc721.read().balances.get(getAddress(owner)) ?? 0n;
  }

  ownerOf(tokenId: bigint): string {
    return this.requireOwned(tokenId);
  }

  getApproved(tokenId: bigint): string {
    this.requireOwned(tokenId);
    return this.$erc721.read().tokenApprovals.get(tokenId) ?? Constants.ZERO_ADDRESS;
  }

  isApprovedForAll(owner: string, operator: string): boolean {
    return (
      this.$erc721.read().operatorApprovals.get(getAddress(owner))?.has(getAddress(operator)) ??
      false
    );
  }

  tokenURI(tokenId: bigint): string {
    this.requireOwned(tokenId);
    return "";
  }

  supportsInterface(interfaceId: string): boolean {
    const id = interfaceId.toLowerCase();
    return (
      id === InterfaceIds.ERC165 || id === InterfaceIds.ERC721 || id === InterfaceIds.ERC721_METADATA
    );
  }

  // ------------------------------------------
  // Public transfer surface
  // ------------------------------------------

  approve(to: string, tokenId: bigint): void {
    this.transaction("approve", () => this.approveInternal(to, tokenId, this.msgSender));
  }

  setApprovalForAll(operator: string, approved: boolean): void {
    this.transaction("setApprovalForAll", () =>
      this.setApprovalForAllInternal(this.msgSender, operator, approved)
    );
  }

  transferFrom(from: string, to: string, tokenId: bigint): void {
    this.transaction("transferFrom", () => this.transferFromInternal(from, to, tokenId));
  }

  safeTransferFrom(from: string, to: string, tokenId: bigint, data = "0x"): void {
    this.transaction("safeTransferFrom", () => {
      this.transferFromInternal(from, to, tokenId);
      this.checkOnERC721Received(from, to, tokenId, data);
    });
  }

  // ------------------------------------------
  // Internal primitives
  // ------------------------------------------

  protected ownerOfUnchecked(tokenId: bigint): string {
    return this.$erc721.read().owners.get(tokenId) ?? Constants.ZERO_ADDRESS;
  }

  protected requireOwned(tokenId: bigint): string {
    const owner = this.ownerOfUnchecked(tokenId);
    if (isZeroAddress(owner)) {
      throw new ERC721NonexistentToken(tokenId);
    }
    return owner;
  }

  /**
   * Move, mint or burn `tokenId`, checking `auth` against the current
   * owner unless it is the zero address. Returns the previous owner.
   */
  protected update(to: string, tokenId: bigint, auth: string): string {
    const $ = this.$erc721.read();
    const from = this.ownerOfUnchecked(tokenId);

    if (!isZeroAddress(auth)) {
      this.checkAuthorized(from, auth, tokenId);
    }

    if (!isZeroAddress(from)) {
      $.tokenApprovals.delete(tokenId);
      $.balances.set(from, ($.balances.get(from) ?? 0n) - 1n);
    }

    const receiver = getAddress(to);
    if (!isZeroAddress(receiver)) {
      $.balances.set(receiver, ($.balances.get(receiver) ?? 0n) + 1n);
      $.owners.set(tokenId, receiver);
    } else {
      $.owners.delete(tokenId);
    }

    this.emit<TransferEvent>("Transfer", { from, to: receiver, tokenId });
    return from;
  }

  protected mintToken(to: string, tokenId: bigint): void {
    if (isZeroAddress(to)) {
      throw new ERC721InvalidReceiver(Constants.ZERO_ADDRESS);
    }
    const previousOwner = this.update(to, tokenId, Constants.ZERO_ADDRESS);
    if (!isZeroAddress(previousOwner)) {
      throw new ERC721InvalidSender(Constants.ZERO_ADDRESS);
    }
  }

  /**
   * Ledger transfer primitive. Performs no approval check.
   */
  protected transferToken(from: string, to: string, tokenId: bigint): void {
    if (isZeroAddress(to)) {
      throw new ERC721InvalidReceiver(Constants.ZERO_ADDRESS);
    }
    const previousOwner = this.update(to, tokenId, Constants.ZERO_ADDRESS);
    if (isZeroAddress(previousOwner)) {
      throw new ERC721NonexistentToken(tokenId);
    }
    if (previousOwner !== getAddress(from)) {
      throw new ERC721IncorrectOwner(getAddress(from), tokenId, previousOwner);
    }
  }

  private transferFromInternal(from: string, to: string, tokenId: bigint): void {
    if (isZeroAddress(to)) {
      throw new ERC721InvalidReceiver(Constants.ZERO_ADDRESS);
    }
    const previousOwner = this.update(to, tokenId, this.msgSender);
    if (previousOwner !== getAddress(from)) {
      throw new ERC721IncorrectOwner(getAddress(from), tokenId, previousOwner);
    }
  }

  private checkAuthorized(owner: string, spender: string, tokenId: bigint): void {
    const authorized =
      !isZeroAddress(spender) &&
      (owner === spender ||
        this.isApprovedForAll(owner, spender) ||
        this.$erc721.read().tokenApprovals.get(tokenId) === spender);
    if (!authorized) {
      if (isZeroAddress(owner)) {
        throw new ERC721NonexistentToken(tokenId);
      }
      throw new ERC721InsufficientApproval(spender, tokenId);
    }
  }

  private approveInternal(to: string, tokenId: bigint, auth: string): void {
    const owner = this.requireOwned(tokenId);
    if (owner !== auth && !this.isApprovedForAll(owner, auth)) {
      throw new ERC721InvalidApprover(auth);
    }
    const approved = getAddress(to);
    this.$erc721.read().tokenApprovals.set(tokenId, approved);
    this.emit<ApprovalEvent>("Approval", { owner, approved, tokenId });
  }

  private setApprovalForAllInternal(owner: string, operator: string, approved: boolean): void {
    if (isZeroAddress(operator)) {
      throw new ERC721InvalidOperator(Constants.ZERO_ADDRESS);
    }
    const operators = this.$erc721.read().operatorApprovals;
    const granted = operators.get(owner) ?? new Set<string>();
    const checksummed = getAddress(operator);
    if (approved) {
      granted.add(checksummed);
    } else {
      granted.delete(checksummed);
    }
    operators.set(owner, granted);
    this.emit<ApprovalForAllEvent>("ApprovalForAll", { owner, operator: checksummed, approved });
  }

  /**
   * Contract recipients must implement the receiver hook and answer with its selector
   */
  private checkOnERC721Received(from: string, to: string, tokenId: bigint, data: string): void {
    if (!this.chain.isContract(to)) {
      return;
    }
    const receiver = this.chain.getContract(to);
    if (!(receiver instanceof Contract) || !isERC721Receiver(receiver)) {
      throw new ERC721InvalidReceiver(getAddress(to));
    }
    const retval = receiver
      .connect(this.address)
      .onERC721Received(this.msgSender, getAddress(from), tokenId, data);
    if (retval !== ERC721_RECEIVED) {
      throw new ERC721InvalidReceiver(getAddress(to));
    }
  }
}
