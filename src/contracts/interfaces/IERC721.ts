import type { LedgerContract } from "../../chain/ledger";
import { hasMethods } from "./guards";

export interface IERC721 extends LedgerContract {
  ownerOf(tokenId: number): string;
}

export function isERC721(contract: LedgerContract): contract is IERC721 {
  return hasMethods(contract, ["ownerOf"]);
}
