import type { AddressLike } from "../../chain/accounts";
import { AddressZero, toAddress } from "../../chain/accounts";
import { Contract } from "../../chain/contract";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import { Slot } from "../../chain/storage";

export abstract class Ownable extends Contract {
  private readonly ownerSlot: Slot<string>;

  constructor(ledger: Ledger, deployer: AddressLike, initialOwner: AddressLike = deployer) {
    super(ledger, deployer);
    this.ownerSlot = new Slot(ledger, AddressZero);
    this.setOwner(toAddress(initialOwner));
  }

  owner(): string {
    return this.ownerSlot.get();
  }

  transferOwnership(newOwner: string): void {
    this.onlyOwner();
    requires(newOwner !== AddressZero, "Ownable: new owner is the zero address");
    this.setOwner(toAddress(newOwner));
  }

  renounceOwnership(): void {
    this.onlyOwner();
    this.setOwner(AddressZero);
  }

  protected onlyOwner(): void {
    requires(this.msgSender === this.owner(), "Ownable: caller is not the owner");
  }

  private setOwner(newOwner: string): void {
    const previousOwner = this.ownerSlot.get();
    this.ownerSlot.set(newOwner);
    this.emit("OwnershipTransferred", previousOwner, newOwner);
  }
}
