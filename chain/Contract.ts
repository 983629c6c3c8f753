/**
 * @file Contract base
 * @description Common plumbing for contracts hosted on a Chain
 */

import { getAddress } from "ethers";
import { type Chain } from "./Chain";
import { UnsupportedInterface } from "./errors";
import { NamespacedStorage } from "./storage";

/**
 * Base for every contract on the runtime.
 *
 * State lives exclusively in `NamespacedStorage` records bound to the
 * chain, so that `connect()` views share it with the deployed instance and
 * rollback covers it.
 */
export abstract class Contract {
  readonly address: string;
  protected readonly chain: Chain;
  private readonly runner: string;

  protected constructor(chain: Chain, address: string, deployer: string) {
    this.chain = chain;
    this.address = getAddress(address);
    this.runner = getAddress(deployer);
    chain.register(this);
  }

  /**
   * View of this contract whose calls are sent by `account`
   */
  connect(account: string): this {
    const bound: this = Object.create(this);
    Object.defineProperty(bound, "runner", { value: getAddress(account) });
    return bound;
  }

  /** Caller of the current entry point */
  protected get msgSender(): string {
    return this.runner;
  }

  protected storage<T>(namespace: string, initial: T): NamespacedStorage<T> {
    return this.chain.bindStorage(this.address, new NamespacedStorage(namespace, initial));
  }

  /**
   * Run a state-changing entry point as (part of) a transaction
   */
  protected transaction<R>(method: string, body: () => R): R {
    return this.chain.transact({ from: this.msgSender, to: this.address, method }, body);
  }

  /**
   * Resolve another contract as `T`, connected so that its msgSender is this contract
   */
  protected at<T>(address: string, guard: (value: unknown) => value is T): T {
    const target = this.chain.getContract(address);
    if (!(target instanceof Contract) || !guard(target)) {
      throw new UnsupportedInterface(target.address);
    }
    return target.connect(this.address);
  }

  protected emit<A extends Record<string, unknown>>(eventName: string, args: A): void {
    this.chain.emit(this.address, eventName, args);
  }
}
