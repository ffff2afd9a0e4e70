import { BigNumber } from "ethers";

import type { LedgerContract } from "../../chain/ledger";
import { hasMethods } from "./guards";

export interface IERC20 extends LedgerContract {
  symbol(): string;
  balanceOf(account: string): BigNumber;
  allowance(owner: string, spender: string): BigNumber;
  transferFrom(from: string, to: string, amount: BigNumber): boolean;
}

export function isERC20(contract: LedgerContract): contract is IERC20 {
  return hasMethods(contract, ["balanceOf", "allowance", "transferFrom"]);
}
