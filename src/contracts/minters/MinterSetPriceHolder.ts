import type { BigNumberish } from "ethers";
import { BigNumber } from "ethers";

import type { AddressLike } from "../../chain/accounts";
import { AddressZero, toAddress } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import type { ICoreContract } from "../interfaces/ICoreContract";
import { isDelegationRegistry } from "../interfaces/IDelegationRegistry";
import { isERC721 } from "../interfaces/IERC721";
import type { PriceInfo } from "../interfaces/IMinter";
import { SetPriceConfig } from "../libs/SetPriceConfig";
import type { HolderAllowlistEntry } from "../libs/TokenHolderAllowlist";
import {
  TokenHolderAllowlist,
  TokenHolderErrors,
  resolveNFTOwnershipPrincipal,
  validateNFTOwnership,
} from "../libs/TokenHolderAllowlist";
import { MinterBase, MinterErrors } from "./MinterBase";

export type HolderPurchase = {
  to: string;
  projectId: number;
  core: ICoreContract;
  ownedNFTAddress: string;
  ownedNFTTokenId: number;
  /** Account whose ownership of the NFT qualifies the purchase. */
  principal: string;
};

/** Fixed price per token in ETH, open only to holders of allowlisted NFTs or their delegates. */
export class MinterSetPriceHolder extends MinterBase {
  protected readonly prices: SetPriceConfig;
  protected readonly holders: TokenHolderAllowlist;
  private readonly delegationRegistry: string;

  constructor(ledger: Ledger, deployer: AddressLike, minterFilter: string, delegationRegistry: string) {
    super(ledger, deployer, minterFilter);
    this.prices = new SetPriceConfig(ledger);
    this.holders = new TokenHolderAllowlist(ledger);
    this.delegationRegistry = toAddress(delegationRegistry);
  }

  minterType(): string {
    return "MinterSetPriceHolder";
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

  allowHoldersOfProjects(
    projectId: number,
    coreContract: string,
    ownedNFTAddresses: string[],
    ownedNFTProjectIds: number[],
  ): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    this.allowHolders(projectId, core, ownedNFTAddresses, ownedNFTProjectIds);
  }

  removeHoldersOfProjects(
    projectId: number,
    coreContract: string,
    ownedNFTAddresses: string[],
    ownedNFTProjectIds: number[],
  ): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    this.removeHolders(projectId, core, ownedNFTAddresses, ownedNFTProjectIds);
  }

  /** Adds, then removes; a pair present in both lists ends up removed. */
  allowAndRemoveHoldersOfProjects(
    projectId: number,
    coreContract: string,
    ownedNFTAddressesAdd: string[],
    ownedNFTProjectIdsAdd: number[],
    ownedNFTAddressesRemove: string[],
    ownedNFTProjectIdsRemove: number[],
  ): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    this.allowHolders(projectId, core, ownedNFTAddressesAdd, ownedNFTProjectIdsAdd);
    this.removeHolders(projectId, core, ownedNFTAddressesRemove, ownedNFTProjectIdsRemove);
  }

  isAllowlistedNFT(projectId: number, coreContract: string, ownedNFTAddress: string, ownedNFTTokenId: number): boolean {
    return this.holders.isAllowlistedNFT(projectId, coreContract, ownedNFTAddress, ownedNFTTokenId);
  }

  allowlistedHoldersOfProject(projectId: number, coreContract: string): HolderAllowlistEntry[] {
    return this.holders.allowlistedHolders(projectId, coreContract);
  }

  purchase(projectId: number, coreContract: string, ownedNFTAddress?: string, ownedNFTTokenId?: number): number {
    return this.purchaseTo(this.msgSender, projectId, coreContract, ownedNFTAddress, ownedNFTTokenId);
  }

  purchaseTo(
    to: string,
    projectId: number,
    coreContract: string,
    ownedNFTAddress?: string,
    ownedNFTTokenId?: number,
    vault: string = AddressZero,
  ): number {
    return this.nonReentrant(() => {
      requires(
        ownedNFTAddress !== undefined && ownedNFTTokenId !== undefined,
        TokenHolderErrors.mustClaimNFTOwnership,
      );
      const ownedNFTContract = toAddress(ownedNFTAddress);
      const core = this.core(coreContract);
      this.maxInvocations.preMintChecks(projectId, core.address);
      const pricePerTokenInWei = this.prices.getPriceOrRevert(projectId, core.address);
      requires(this.msgValue.gte(pricePerTokenInWei), MinterErrors.minValueToMint);
      requires(
        this.holders.isAllowlistedNFT(projectId, core.address, ownedNFTContract, ownedNFTTokenId),
        TokenHolderErrors.onlyAllowlistedNFTs,
      );
      const principal = resolveNFTOwnershipPrincipal({
        purchaser: this.msgSender,
        vault: toAddress(vault),
        ownedNFTAddress: ownedNFTContract,
        ownedNFTTokenId,
        delegationRegistry: this.ledger.resolve(this.delegationRegistry, isDelegationRegistry),
      });
      const purchase = { to, projectId, core, ownedNFTAddress: ownedNFTContract, ownedNFTTokenId, principal };

      const verifyMint = this.prepareMint(purchase);
      const tokenId = this.mintToken(to, projectId, core, principal);
      verifyMint(tokenId);

      const ownedNFT = this.external(this.ledger.resolve(ownedNFTContract, isERC721));
      validateNFTOwnership(ownedNFT, ownedNFTTokenId, principal);

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

  /**
   * Runs after the eligibility checks and before the mint. The returned callback runs on the minted token id,
   * before ownership is checked and funds are split.
   */
  protected prepareMint(_purchase: HolderPurchase): (tokenId: number) => void {
    return () => undefined;
  }

  private allowHolders(
    projectId: number,
    core: ICoreContract,
    ownedNFTAddresses: string[],
    ownedNFTProjectIds: number[],
  ): void {
    const minterFilter = this.minterFilter();
    const addresses = ownedNFTAddresses.map(address => toAddress(address));
    addresses.forEach(address =>
      requires(minterFilter.isRegisteredCoreContract(address), TokenHolderErrors.onlyRegisteredNFTs),
    );
    this.holders.allowHoldersOfProjects(projectId, core.address, addresses, ownedNFTProjectIds);
    this.emit("AllowedHoldersOfProjects", projectId, core.address, addresses, ownedNFTProjectIds);
  }

  private removeHolders(
    projectId: number,
    core: ICoreContract,
    ownedNFTAddresses: string[],
    ownedNFTProjectIds: number[],
  ): void {
    const addresses = ownedNFTAddresses.map(address => toAddress(address));
    this.holders.removeHoldersOfProjects(projectId, core.address, addresses, ownedNFTProjectIds);
    this.emit("RemovedHoldersOfProjects", projectId, core.address, addresses, ownedNFTProjectIds);
  }
}
