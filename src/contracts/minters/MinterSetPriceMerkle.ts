import type { BigNumberish } from "ethers";
import { BigNumber } from "ethers";

import type { AddressLike } from "../../chain/accounts";
import { AddressZero, toAddress } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import { isDelegationRegistry } from "../interfaces/IDelegationRegistry";
import type { PriceInfo } from "../interfaces/IMinter";
import type { RemainingInvocations } from "../libs/MerkleAllowlist";
import { MerkleAllowlist, MerkleErrors } from "../libs/MerkleAllowlist";
import { SetPriceConfig } from "../libs/SetPriceConfig";
import { MinterBase, MinterErrors } from "./MinterBase";

/**
 * Fixed price per token in ETH, open to addresses in the project's Merkle allowlist, or to wallets they have
 * delegated this minter to. Each allowlisted address may mint a limited number of tokens.
 */
export class MinterSetPriceMerkle extends MinterBase {
  private readonly prices: SetPriceConfig;
  private readonly merkle: MerkleAllowlist;
  private readonly delegationRegistry: string;

  constructor(ledger: Ledger, deployer: AddressLike, minterFilter: string, delegationRegistry: string) {
    super(ledger, deployer, minterFilter);
    this.prices = new SetPriceConfig(ledger);
    this.merkle = new MerkleAllowlist(ledger);
    this.delegationRegistry = toAddress(delegationRegistry);
  }

  minterType(): string {
    return "MinterSetPriceMerkle";
  }

  delegationRegistryAddress(): string {
    return this.delegationRegistry;
  }

  updatePricePerTokenInWei(projectId: number, coreContract: string, pricePerTokenInWei: BigNumberish): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    const price = BigNumber.from(pricePerTokenInWei);
    this.prices.updatePricePerTokenInWei(projectId, core.address, price);
    this.emit("PricePerTokenInWeiUpdated", projectId, core.address, price);
    this.syncMaxInvocationsIfUnconfigured(projectId, core);
  }

  updateMerkleRoot(projectId: number, coreContract: string, root: string): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    const merkleRoot = this.merkle.updateMerkleRoot(projectId, core.address, root);
    this.emit("MerkleRootUpdated", projectId, core.address, merkleRoot);
  }

  setProjectInvocationsPerAddress(projectId: number, coreContract: string, maxInvocationsPerAddress: number): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    this.merkle.setProjectInvocationsPerAddress(projectId, core.address, maxInvocationsPerAddress);
    this.emit("ProjectInvocationsPerAddressUpdated", projectId, core.address, maxInvocationsPerAddress);
  }

  projectMerkleRoot(projectId: number, coreContract: string): string {
    return this.merkle.getConfig(projectId, coreContract).merkleRoot;
  }

  projectMaxInvocationsPerAddress(projectId: number, coreContract: string): number {
    return this.merkle.projectMaxInvocationsPerAddress(projectId, coreContract);
  }

  projectUserMintInvocations(projectId: number, coreContract: string, purchaser: string): number {
    return this.merkle.projectUserMintInvocations(projectId, coreContract, purchaser);
  }

  projectRemainingInvocationsForAddress(
    projectId: number,
    coreContract: string,
    address: string,
  ): RemainingInvocations {
    return this.merkle.projectRemainingInvocationsForAddress(projectId, coreContract, address);
  }

  verifyAddress(projectId: number, coreContract: string, proof: string[], address: string): boolean {
    return this.merkle.verifyAddress(projectId, coreContract, proof, address);
  }

  purchase(projectId: number, coreContract: string, proof: string[]): number {
    return this.purchaseTo(this.msgSender, projectId, coreContract, proof);
  }

  /** With a `vault`, the purchaser buys on behalf of that allowlisted wallet, which must have delegated to them. */
  purchaseTo(
    to: string,
    projectId: number,
    coreContract: string,
    proof: string[],
    vault: string = AddressZero,
  ): number {
    return this.nonReentrant(() => {
      const core = this.core(coreContract);
      this.maxInvocations.preMintChecks(projectId, core.address);
      const pricePerTokenInWei = this.prices.getPriceOrRevert(projectId, core.address);
      requires(this.msgValue.gte(pricePerTokenInWei), MinterErrors.minValueToMint);

      const allowlisted = this.allowlistedPurchaser(toAddress(vault));
      requires(this.merkle.verifyAddress(projectId, core.address, proof, allowlisted), MerkleErrors.invalidProof);
      this.merkle.recordMint(projectId, core.address, allowlisted);

      const tokenId = this.mintToken(to, projectId, core, allowlisted);

      this.funds.splitFundsETH({
        projectId,
        pricePerTokenInWei,
        core,
        payer: this.msgSender,
        valueSent: this.msgValue,
      });
      return tokenId;
    });
  }

  getPriceInfo(projectId: number, coreContract: string): PriceInfo {
    const { priceIsConfigured, pricePerTokenInWei } = this.prices.getConfig(projectId, coreContract);
    return {
      isConfigured: priceIsConfigured,
      tokenPriceInWei: pricePerTokenInWei,
      currencySymbol: "ETH",
      currencyAddress: AddressZero,
    };
  }

  private allowlistedPurchaser(vault: string): string {
    if (vault === AddressZero) {
      return this.msgSender;
    }
    const registry = this.ledger.resolve(this.delegationRegistry, isDelegationRegistry);
    requires(
      registry.checkDelegateForContract(this.msgSender, vault, this.address),
      MerkleErrors.invalidDelegateVaultPairing,
    );
    return vault;
  }
}
