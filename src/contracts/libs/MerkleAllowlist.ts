import { BigNumber, constants, utils } from "ethers";

import { toAddress } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import type { Journal, KeyOf } from "../../chain/storage";
import { Mapping } from "../../chain/storage";
import type { ProjectKey } from "./ProjectKey";
import { projectKey } from "./ProjectKey";

export const MerkleErrors = {
  rootRequired: "Root must be provided",
  invalidProof: "Invalid Merkle proof",
  invalidMaxInvocationsPerAddress: "Invalid max invocations",
  maxInvocationsPerAddressReached: "Maximum number of invocations per address reached",
  invalidDelegateVaultPairing: "Invalid delegate-vault pairing",
};

export const DEFAULT_MAX_INVOCATIONS_PER_ADDRESS = 1;

export type MerkleProjectConfig = {
  merkleRoot: string;
  useMaxInvocationsPerAddressOverride: boolean;
  /** Zero lifts the per-address limit. */
  maxInvocationsPerAddressOverride: number;
};

export type RemainingInvocations = {
  projectLimitsMintInvocationsPerAddress: boolean;
  mintInvocationsRemaining: number;
};

type PurchaserKey = ProjectKey & { purchaser: string };

const purchaserKey: KeyOf<PurchaserKey> = key => `${projectKey(key)}:${toAddress(key.purchaser)}`;

const UNCONFIGURED: MerkleProjectConfig = {
  merkleRoot: constants.HashZero,
  useMaxInvocationsPerAddressOverride: false,
  maxInvocationsPerAddressOverride: 0,
};

/** The leaf an address takes in a project's allowlist tree. */
export function hashAddress(address: string): string {
  return utils.solidityKeccak256(["address"], [toAddress(address)]);
}

/** Walks a proof for a tree built with sorted pairs: each parent hashes the lower child first. */
export function verifyMerkleProof(proof: string[], root: string, leaf: string): boolean {
  const computed = proof.reduce((node, sibling) => {
    const pair = BigNumber.from(node).lte(sibling) ? [node, sibling] : [sibling, node];
    return utils.keccak256(utils.concat(pair));
  }, leaf);
  return BigNumber.from(computed).eq(root);
}

/**
 * Per project, a Merkle root of allowlisted addresses and how many tokens each of them may mint. Mints are
 * counted against the allowlisted address, not the recipient of the token.
 */
export class MerkleAllowlist {
  private readonly configs: Mapping<ProjectKey, MerkleProjectConfig>;
  private readonly userMintInvocations: Mapping<PurchaserKey, number>;

  constructor(journal: Journal) {
    this.configs = new Mapping(journal, projectKey);
    this.userMintInvocations = new Mapping(journal, purchaserKey);
  }

  getConfig(projectId: number, coreContract: string): MerkleProjectConfig {
    return this.configs.get({ projectId, coreContract }) ?? UNCONFIGURED;
  }

  updateMerkleRoot(projectId: number, coreContract: string, root: string): string {
    requires(utils.isHexString(root, 32) && !BigNumber.from(root).isZero(), MerkleErrors.rootRequired);
    const merkleRoot = utils.hexlify(root);
    this.configs.set({ projectId, coreContract }, { ...this.getConfig(projectId, coreContract), merkleRoot });
    return merkleRoot;
  }

  setProjectInvocationsPerAddress(projectId: number, coreContract: string, maxInvocationsPerAddress: number): void {
    requires(
      Number.isInteger(maxInvocationsPerAddress) && maxInvocationsPerAddress >= 0,
      MerkleErrors.invalidMaxInvocationsPerAddress,
    );
    this.configs.set(
      { projectId, coreContract },
      {
        ...this.getConfig(projectId, coreContract),
        useMaxInvocationsPerAddressOverride: true,
        maxInvocationsPerAddressOverride: maxInvocationsPerAddress,
      },
    );
  }

  projectMaxInvocationsPerAddress(projectId: number, coreContract: string): number {
    const config = this.getConfig(projectId, coreContract);
    return config.useMaxInvocationsPerAddressOverride
      ? config.maxInvocationsPerAddressOverride
      : DEFAULT_MAX_INVOCATIONS_PER_ADDRESS;
  }

  projectUserMintInvocations(projectId: number, coreContract: string, purchaser: string): number {
    return this.userMintInvocations.get({ projectId, coreContract, purchaser }) ?? 0;
  }

  projectRemainingInvocationsForAddress(
    projectId: number,
    coreContract: string,
    address: string,
  ): RemainingInvocations {
    const limit = this.projectMaxInvocationsPerAddress(projectId, coreContract);
    if (limit === 0) {
      return { projectLimitsMintInvocationsPerAddress: false, mintInvocationsRemaining: 0 };
    }
    const used = this.projectUserMintInvocations(projectId, coreContract, address);
    return { projectLimitsMintInvocationsPerAddress: true, mintInvocationsRemaining: Math.max(limit - used, 0) };
  }

  verifyAddress(projectId: number, coreContract: string, proof: string[], address: string): boolean {
    const { merkleRoot } = this.getConfig(projectId, coreContract);
    if (BigNumber.from(merkleRoot).isZero()) {
      return false;
    }
    return verifyMerkleProof(proof, merkleRoot, hashAddress(address));
  }

  /** Counts a mint against `purchaser`, refusing it once their limit is used up. */
  recordMint(projectId: number, coreContract: string, purchaser: string): void {
    const limit = this.projectMaxInvocationsPerAddress(projectId, coreContract);
    const used = this.projectUserMintInvocations(projectId, coreContract, purchaser);
    requires(limit === 0 || used < limit, MerkleErrors.maxInvocationsPerAddressReached);
    this.userMintInvocations.set({ projectId, coreContract, purchaser }, used + 1);
  }
}
