import type { LedgerContract } from "../../chain/ledger";
import { hasMethods } from "./guards";

export interface IAdminACL extends LedgerContract {
  superAdmin(): string;
  allowed(sender: string, contract: string, selector: string): boolean;
  transferOwnershipOn(contract: string, newAdminACL: string): void;
  renounceOwnershipOn(contract: string): void;
}

export function isAdminACL(contract: LedgerContract): contract is IAdminACL {
  return hasMethods(contract, ["superAdmin", "allowed", "transferOwnershipOn", "renounceOwnershipOn"]);
}

export interface IOwnable extends LedgerContract {
  owner(): string;
  transferOwnership(newOwner: string): void;
  renounceOwnership(): void;
}

export function isOwnable(contract: LedgerContract): contract is IOwnable {
  return hasMethods(contract, ["owner", "transferOwnership", "renounceOwnership"]);
}
