import { BigNumber } from "ethers";

import type { LedgerContract } from "../../chain/ledger";
import { hasMethods } from "./guards";

export type PriceInfo = {
  isConfigured: boolean;
  tokenPriceInWei: BigNumber;
  currencySymbol: string;
  currencyAddress: string;
};

export interface IMinter extends LedgerContract {
  minterType(): string;
  minterVersion(): string;
  minterFilterAddress(): string;
  getPriceInfo(projectId: number, coreContract: string): PriceInfo;
  projectMaxInvocations(projectId: number, coreContract: string): number;
  projectMaxHasBeenInvoked(projectId: number, coreContract: string): boolean;
}

export function isMinter(contract: LedgerContract): contract is IMinter {
  return hasMethods(contract, ["minterType", "minterVersion", "getPriceInfo"]);
}

export interface IMinterFilter extends LedgerContract {
  minterFilterType(): string;
  mint(to: string, projectId: number, coreContract: string, sender: string): number;
  getMinterForProject(projectId: number, coreContract: string): string;
  isRegisteredCoreContract(coreContract: string): boolean;
  adminACLAllowed(sender: string, contract: string, selector: string): boolean;
}

export function isMinterFilter(contract: LedgerContract): contract is IMinterFilter {
  return hasMethods(contract, ["minterFilterType", "mint", "getMinterForProject", "adminACLAllowed"]);
}
