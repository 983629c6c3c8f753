/**
 * @file MockERC721
 * @description Plain transferable collection over the shared ledger, used to test the ledger on its own
 */

import { type Chain } from "../../chain/Chain";
import { Contract } from "../../chain/Contract";
import { ERC721, ERC721_RECEIVED, type IERC721Receiver } from "../token/ERC721";

export class MockERC721 extends ERC721 {
  static deploy(chain: Chain, deployer: string): MockERC721 {
    return chain.deploy(deployer, (address) => new MockERC721(chain, address, deployer));
  }

  initialize(name: string, symbol: string, owner: string): void {
    this.transaction("initialize", () =>
      this.initializer(() => {
        this.initERC721(name, symbol);
        this.initOwnable(owner);
      })
    );
  }

  mint(to: string, tokenId: bigint): void {
    this.transaction("mint", () => {
      this.checkOwner();
      this.mintToken(to, tokenId);
    });
  }
}

export type ReceivedEvent = {
  operator: string;
  from: string;
  tokenId: bigint;
  data: string;
};

/**
 * Receiver answering with a configurable value
 */
export class MockERC721Receiver extends Contract implements IERC721Receiver {
  private readonly $receiver = this.storage<{ retval: string }>(
    "soulbound-badge.storage.MockERC721Receiver",
    { retval: ERC721_RECEIVED }
  );

  static deploy(chain: Chain, deployer: string, retval: string = ERC721_RECEIVED): MockERC721Receiver {
    return chain.deploy(deployer, (address) => {
      const receiver = new MockERC721Receiver(chain, address, deployer);
      receiver.$receiver.read().retval = retval;
      return receiver;
    });
  }

  onERC721Received(operator: string, from: string, tokenId: bigint, data: string): string {
    return this.transaction("onERC721Received", () => {
      this.emit<ReceivedEvent>("Received", { operator, from, tokenId, data });
      return this.$receiver.read().retval;
    });
  }
}

/**
 * Contract with no receiver hook
 */
export class MockNonReceiver extends Contract {
  static deploy(chain: Chain, deployer: string): MockNonReceiver {
    return chain.deploy(deployer, (address) => new MockNonReceiver(chain, address, deployer));
  }
}
