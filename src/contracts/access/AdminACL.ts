import type { AddressLike } from "../../chain/accounts";
import { AddressZero, toAddress } from "../../chain/accounts";
import { Contract } from "../../chain/contract";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import { Slot } from "../../chain/storage";
import type { IAdminACL } from "../interfaces/IAdminACL";
import { isOwnable } from "../interfaces/IAdminACL";

/**
 * Admin ACL with a single super admin that is allowed to call every admin-gated function. Contracts owned by
 * the ACL are administered through {@link AdminACL.transferOwnershipOn} and {@link AdminACL.renounceOwnershipOn}.
 */
export class AdminACL extends Contract implements IAdminACL {
  private readonly superAdminSlot: Slot<string>;

  constructor(ledger: Ledger, deployer: AddressLike) {
    super(ledger, deployer);
    this.superAdminSlot = new Slot(ledger, toAddress(deployer));
    this.emit("SuperAdminTransferred", AddressZero, this.superAdminSlot.get());
  }

  superAdmin(): string {
    return this.superAdminSlot.get();
  }

  allowed(sender: string, contract: string, selector: string): boolean {
    return sender === this.superAdminSlot.get();
  }

  changeSuperAdmin(newSuperAdmin: string): void {
    this.onlySuperAdmin();
    const previousSuperAdmin = this.superAdminSlot.get();
    this.superAdminSlot.set(toAddress(newSuperAdmin));
    this.emit("SuperAdminTransferred", previousSuperAdmin, this.superAdminSlot.get());
  }

  transferOwnershipOn(contract: string, newAdminACL: string): void {
    this.onlySuperAdmin();
    this.external(this.ledger.resolve(contract, isOwnable)).transferOwnership(newAdminACL);
  }

  renounceOwnershipOn(contract: string): void {
    this.onlySuperAdmin();
    this.external(this.ledger.resolve(contract, isOwnable)).renounceOwnership();
  }

  private onlySuperAdmin(): void {
    requires(this.msgSender === this.superAdminSlot.get(), "Only superAdmin");
  }
}
