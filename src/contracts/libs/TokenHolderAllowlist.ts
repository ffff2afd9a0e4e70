import { AddressZero, toAddress } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import type { Journal } from "../../chain/storage";
import { EnumerableSet } from "../../chain/storage";
import { tokenIdToProjectId } from "../interfaces/ICoreContract";
import type { IDelegationRegistry } from "../interfaces/IDelegationRegistry";
import type { IERC721 } from "../interfaces/IERC721";
import { projectKey } from "./ProjectKey";

export const TokenHolderErrors = {
  arraysLengthMismatch: "Holder arrays must be equal length",
  onlyRegisteredNFTs: "Only registered core contract NFTs",
  onlyAllowlistedNFTs: "Only allowlisted NFTs",
  onlyOwnerOfNFT: "Only owner of NFT",
  mustClaimNFTOwnership: "Must claim NFT ownership",
  invalidDelegateVaultPairing: "Invalid delegate-vault pairing",
};

export type HolderAllowlistEntry = {
  ownedNFTAddress: string;
  ownedNFTProjectId: number;
};

const entryKey = ({ ownedNFTAddress, ownedNFTProjectId }: HolderAllowlistEntry): string =>
  `${toAddress(ownedNFTAddress)}:${ownedNFTProjectId}`;

function zip(ownedNFTAddresses: string[], ownedNFTProjectIds: number[]): HolderAllowlistEntry[] {
  requires(ownedNFTAddresses.length === ownedNFTProjectIds.length, TokenHolderErrors.arraysLengthMismatch);
  return ownedNFTAddresses.map((ownedNFTAddress, index) => ({
    ownedNFTAddress: toAddress(ownedNFTAddress),
    ownedNFTProjectId: ownedNFTProjectIds[index],
  }));
}

/**
 * Per project, the set of (NFT contract, NFT project) pairs whose holders may purchase. Holding a token is
 * checked on every purchase and is not used up by it.
 */
export class TokenHolderAllowlist {
  private readonly allowlists = new Map<string, EnumerableSet<HolderAllowlistEntry>>();

  constructor(private readonly journal: Journal) {}

  allowHoldersOfProjects(
    projectId: number,
    coreContract: string,
    ownedNFTAddresses: string[],
    ownedNFTProjectIds: number[],
  ): void {
    const allowlist = this.allowlist(projectId, coreContract);
    zip(ownedNFTAddresses, ownedNFTProjectIds).forEach(entry => allowlist.add(entry));
  }

  removeHoldersOfProjects(
    projectId: number,
    coreContract: string,
    ownedNFTAddresses: string[],
    ownedNFTProjectIds: number[],
  ): void {
    const allowlist = this.allowlist(projectId, coreContract);
    zip(ownedNFTAddresses, ownedNFTProjectIds).forEach(entry => allowlist.remove(entry));
  }

  isAllowlistedNFT(projectId: number, coreContract: string, ownedNFTAddress: string, ownedNFTTokenId: number): boolean {
    return this.allowlist(projectId, coreContract).contains({
      ownedNFTAddress: toAddress(ownedNFTAddress),
      ownedNFTProjectId: tokenIdToProjectId(ownedNFTTokenId),
    });
  }

  allowlistedHolders(projectId: number, coreContract: string): HolderAllowlistEntry[] {
    return this.allowlist(projectId, coreContract).values();
  }

  private allowlist(projectId: number, coreContract: string): EnumerableSet<HolderAllowlistEntry> {
    const key = projectKey({ projectId, coreContract });
    let allowlist = this.allowlists.get(key);
    if (!allowlist) {
      allowlist = new EnumerableSet(this.journal, entryKey);
      this.allowlists.set(key, allowlist);
    }
    return allowlist;
  }
}

/**
 * The account whose NFT ownership qualifies a purchase: the purchaser, or the vault the purchaser is a
 * delegate of for that token.
 */
export function resolveNFTOwnershipPrincipal(params: {
  purchaser: string;
  vault: string;
  ownedNFTAddress: string;
  ownedNFTTokenId: number;
  delegationRegistry: IDelegationRegistry;
}): string {
  if (params.vault === AddressZero) {
    return params.purchaser;
  }
  requires(
    params.delegationRegistry.checkDelegateForToken(
      params.purchaser,
      params.vault,
      params.ownedNFTAddress,
      params.ownedNFTTokenId,
    ),
    TokenHolderErrors.invalidDelegateVaultPairing,
  );
  return params.vault;
}

export function validateNFTOwnership(ownedNFT: IERC721, ownedNFTTokenId: number, targetOwner: string): void {
  requires(ownedNFT.ownerOf(ownedNFTTokenId) === targetOwner, TokenHolderErrors.onlyOwnerOfNFT);
}
