import type { LedgerContract } from "../../chain/ledger";
import { hasMethods } from "./guards";

export interface IRandomizer extends LedgerContract {
  assignTokenHash(tokenId: number): void;
}

export function isRandomizer(contract: LedgerContract): contract is IRandomizer {
  return hasMethods(contract, ["assignTokenHash"]);
}

export interface IPolyptychRandomizer extends IRandomizer {
  hashSeedSetterContract(): string;
  setPolyptychHashSeed(tokenId: number, hashSeed: string): void;
}

export function isPolyptychRandomizer(contract: LedgerContract): contract is IPolyptychRandomizer {
  return hasMethods(contract, ["assignTokenHash", "hashSeedSetterContract", "setPolyptychHashSeed"]);
}
