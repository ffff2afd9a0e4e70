import { utils } from "ethers";

import type { AddressLike } from "../../chain/accounts";
import { Contract } from "../../chain/contract";
import type { LedgerContract } from "../../chain/ledger";
import { Ledger } from "../../chain/ledger";
import { hasMethods } from "../interfaces/guards";
import type { IRandomizer } from "../interfaces/IRandomizer";

export interface ITokenHashSeedReceiver extends LedgerContract {
  setTokenHashSeed(tokenId: number, hashSeed: string): void;
}

export function isTokenHashSeedReceiver(contract: LedgerContract): contract is ITokenHashSeedReceiver {
  return hasMethods(contract, ["setTokenHashSeed"]);
}

/** 12-byte seed derived from the core, the token and the current timestamp. Not a source of real randomness. */
export function pseudorandomHashSeed(coreContract: string, tokenId: number, timestamp: number): string {
  const digest = utils.solidityKeccak256(["address", "uint256", "uint256"], [coreContract, tokenId, timestamp]);
  return utils.hexDataSlice(digest, 0, 12);
}

/** Randomizer shared by any number of cores; the calling core receives the seed back. */
export class BasicRandomizer extends Contract implements IRandomizer {
  constructor(ledger: Ledger, deployer: AddressLike) {
    super(ledger, deployer);
  }

  assignTokenHash(tokenId: number): void {
    const core = this.ledger.resolve(this.msgSender, isTokenHashSeedReceiver);
    this.external(core).setTokenHashSeed(tokenId, pseudorandomHashSeed(core.address, tokenId, this.blockTimestamp));
  }
}
