import type { LedgerContract } from "../../chain/ledger";
import { hasMethods } from "./guards";

/**
 * Wallet delegation registry. A token-level check also honors contract-wide and wallet-wide delegations, and a
 * contract-level check honors wallet-wide ones.
 */
export interface IDelegationRegistry extends LedgerContract {
  checkDelegateForContract(delegate: string, vault: string, contract: string): boolean;
  checkDelegateForToken(delegate: string, vault: string, contract: string, tokenId: number): boolean;
}

export function isDelegationRegistry(contract: LedgerContract): contract is IDelegationRegistry {
  return hasMethods(contract, ["checkDelegateForContract", "checkDelegateForToken"]);
}
