import type { BigNumberish } from "ethers";
import { BigNumber } from "ethers";

import type { AddressLike } from "./accounts";
import { toAddress } from "./accounts";
import { requires, revert } from "./errors";
import type { LedgerContract } from "./ledger";
import { Ledger } from "./ledger";

export type CallOverrides = {
  value?: BigNumberish;
};

/**
 * Base class of every contract on the ledger. Public methods are the contract's external functions; call them
 * through {@link Contract.connect} so they run as a call from a sender, with its value and rollback.
 */
export abstract class Contract implements LedgerContract {
  readonly address: string;
  private entered = false;

  constructor(readonly ledger: Ledger, deployer: AddressLike) {
    this.address = ledger.register(this, deployer);
  }

  /**
   * Returns a view of this contract whose methods execute as calls from `signer`, the way an ethers contract
   * connected to a signer sends transactions.
   */
  connect(signer: AddressLike, overrides: CallOverrides = {}): this {
    const sender = toAddress(signer);
    const value = BigNumber.from(overrides.value ?? 0);
    const ledger = this.ledger;
    return new Proxy(this, {
      get(target, property) {
        const member: unknown = Reflect.get(target, property, target);
        if (typeof member !== "function") {
          return member;
        }
        if (property === "connect") {
          return (...args: unknown[]): unknown => Reflect.apply(member, target, args);
        }
        return (...args: unknown[]): unknown =>
          ledger.execute(sender, target.address, value, () => Reflect.apply(member, target, args));
      },
    });
  }

  /** Plain value transfers to a contract land here; contracts that accept them override it. */
  receive(): void {
    revert("function selector was not recognized and there's no fallback function");
  }

  balance(): BigNumber {
    return this.ledger.getBalance(this.address);
  }

  protected get msgSender(): string {
    return this.ledger.frame(this.address).sender;
  }

  protected get msgValue(): BigNumber {
    return this.ledger.frame(this.address).value;
  }

  protected get blockTimestamp(): number {
    return this.ledger.timestamp;
  }

  protected emit(event: string, ...args: unknown[]): void {
    this.ledger.emit(this.address, event, args);
  }

  /** Calls another contract with this contract as `msg.sender`. */
  protected external<T extends LedgerContract>(contract: T, overrides: CallOverrides = {}): T {
    return contract.connect(this.address, overrides);
  }

  protected sendValue(to: string, amount: BigNumber): boolean {
    return this.ledger.sendValue(this.address, to, amount);
  }

  protected nonReentrant<R>(body: () => R): R {
    requires(!this.entered, "ReentrancyGuard: reentrant call");
    this.entered = true;
    try {
      return body();
    } finally {
      this.entered = false;
    }
  }
}
