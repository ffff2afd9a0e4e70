import { BigNumber } from "ethers";

import type { LedgerContract } from "../../chain/ledger";
import { hasMethods } from "./guards";

export const ONE_MILLION = 1_000_000;

export type ProjectStateData = {
  invocations: number;
  maxInvocations: number;
  active: boolean;
  paused: boolean;
  completedTimestamp: number;
};

/** What minters and the minter filter need from a core token contract. */
export interface ICoreContract extends LedgerContract {
  coreType(): string;
  coreVersion(): string;
  startingProjectId(): number;
  nextProjectId(): number;
  projectIdToArtistAddress(projectId: number): string;
  projectStateData(projectId: number): ProjectStateData;
  adminACLAllowed(sender: string, contract: string, selector: string): boolean;
  mint(to: string, projectId: number, sender: string): number;
  /** ABI-encoded revenue splits: 6 words on flagship cores, 8 on engine cores. */
  getPrimaryRevenueSplits(projectId: number, price: BigNumber): string;
  ownerOf(tokenId: number): string;
  tokenIdToHashSeed(tokenId: number): string;
  randomizerContract(): string;
}

export function isCoreContract(contract: LedgerContract): contract is ICoreContract {
  return hasMethods(contract, [
    "projectIdToArtistAddress",
    "projectStateData",
    "adminACLAllowed",
    "mint",
    "getPrimaryRevenueSplits",
    "randomizerContract",
  ]);
}

export function tokenIdToProjectId(tokenId: number): number {
  return Math.floor(tokenId / ONE_MILLION);
}

export function tokenIdToInvocation(tokenId: number): number {
  return tokenId % ONE_MILLION;
}
