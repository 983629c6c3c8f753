/**
 * @file Ownable
 * @description Single-administrator access control
 */

import { getAddress } from "ethers";
import { ContractError } from "../../chain/errors";
import { Initializable } from "../proxy/Initializable";
import { Constants, isZeroAddress } from "../../types";

export class OwnableUnauthorizedAccount extends ContractError {
  constructor(account: string) {
    super("OwnableUnauthorizedAccount", [account]);
  }
}

export class OwnableInvalidOwner extends ContractError {
  constructor(owner: string) {
    super("OwnableInvalidOwner", [owner]);
  }
}

export type OwnershipTransferredEvent = {
  previousOwner: string;
  newOwner: string;
};

export abstract class Ownable extends Initializable {
  private readonly $ownable = this.storage<{ owner: string }>("soulbound-badge.storage.Ownable", {
    owner: Constants.ZERO_ADDRESS,
  });

  protected initOwnable(initialOwner: string): void {
    this.onlyInitializing();
    if (isZeroAddress(initialOwner)) {
      throw new OwnableInvalidOwner(Constants.ZERO_ADDRESS);
    }
    this.setOwner(initialOwner);
  }

  owner(): string {
    return this.$ownable.read().owner;
  }

  /**
   * The one capability check consulted by every owner-gated entry point
   */
  protected checkOwner(): void {
    if (this.owner() !== this.msgSender) {
      throw new OwnableUnauthorizedAccount(this.msgSender);
    }
  }

  transferOwnership(newOwner: string): void {
    this.transaction("transferOwnership", () => {
      this.checkOwner();
      if (isZeroAddress(newOwner)) {
        throw new OwnableInvalidOwner(Constants.ZERO_ADDRESS);
      }
      this.setOwner(newOwner);
    });
  }

  renounceOwnership(): void {
    this.transaction("renounceOwnership", () => {
      this.checkOwner();
      this.setOwner(Constants.ZERO_ADDRESS);
    });
  }

  private setOwner(newOwner: string): void {
    const $ = this.$ownable.read();
    const previousOwner = $.owner;
    $.owner = getAddress(newOwner);
    this.emit<OwnershipTransferredEvent>("OwnershipTransferred", {
      previousOwner,
      newOwner: $.owner,
    });
  }
}
