import type { BigNumberish } from "ethers";
import { BigNumber, constants } from "ethers";

import type { AddressLike } from "../../chain/accounts";
import { AddressZero, toAddress } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import { isERC20 } from "../interfaces/IERC20";
import type { PriceInfo } from "../interfaces/IMinter";
import { SplitFundsErrors } from "../libs/FundsSplitter";
import { SetPriceConfig } from "../libs/SetPriceConfig";
import { MinterBase } from "./MinterBase";

export const MinterSetPriceERC20Errors = {
  noETHWithERC20: "ERC20: No ETH when using ERC20",
  currencyMismatch: "Currency addresses must match",
  maxPriceBelowPrice: "Only max price gte token price",
};

export const UNCONFIGURED_CURRENCY_SYMBOL = "UNCONFIG";

/** Fixed price per token, paid in a per-project ERC20 token pulled from the purchaser. */
export class MinterSetPriceERC20 extends MinterBase {
  private readonly prices: SetPriceConfig;

  constructor(ledger: Ledger, deployer: AddressLike, minterFilter: string) {
    super(ledger, deployer, minterFilter);
    this.prices = new SetPriceConfig(ledger);
  }

  minterType(): string {
    return "MinterSetPriceERC20";
  }

  updatePricePerTokenInWei(projectId: number, coreContract: string, pricePerTokenInWei: BigNumberish): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    const price = BigNumber.from(pricePerTokenInWei);
    this.prices.updatePricePerTokenInWei(projectId, core.address, price);
    this.emit("PricePerTokenInWeiUpdated", projectId, core.address, price);
    this.syncMaxInvocationsIfUnconfigured(projectId, core);
  }

  updateProjectCurrencyInfo(
    projectId: number,
    coreContract: string,
    currencySymbol: string,
    currencyAddress: string,
  ): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    requires(currencyAddress !== AddressZero, SplitFundsErrors.onlyERC20);
    this.funds.updateProjectCurrencyInfo(projectId, core.address, {
      currencyAddress: toAddress(currencyAddress),
      currencySymbol,
    });
    this.emit("ProjectCurrencyInfoUpdated", projectId, core.address, toAddress(currencyAddress), currencySymbol);
  }

  purchase(projectId: number, coreContract: string, maxPricePerToken: BigNumberish, currencyAddress: string): number {
    return this.purchaseTo(this.msgSender, projectId, coreContract, maxPricePerToken, currencyAddress);
  }

  purchaseTo(
    to: string,
    projectId: number,
    coreContract: string,
    maxPricePerToken: BigNumberish,
    currencyAddress: string,
  ): number {
    return this.nonReentrant(() => {
      const core = this.core(coreContract);
      this.maxInvocations.preMintChecks(projectId, core.address);
      const pricePerTokenInWei = this.prices.getPriceOrRevert(projectId, core.address);
      const currency = this.funds.getCurrencyInfo(projectId, core.address);
      requires(currency !== undefined, SplitFundsErrors.erc20NotConfigured);
      requires(this.msgValue.isZero(), MinterSetPriceERC20Errors.noETHWithERC20);
      requires(toAddress(currencyAddress) === currency.currencyAddress, MinterSetPriceERC20Errors.currencyMismatch);
      requires(BigNumber.from(maxPricePerToken).gte(pricePerTokenInWei), MinterSetPriceERC20Errors.maxPriceBelowPrice);
      this.funds.validateERC20Approvals(projectId, core.address, this.msgSender, pricePerTokenInWei);

      const tokenId = this.mintToken(to, projectId, core, this.msgSender);

      this.funds.splitFundsERC20({ projectId, pricePerTokenInWei, core, payer: this.msgSender });
      return tokenId;
    });
  }

  getPriceInfo(projectId: number, coreContract: string): PriceInfo {
    const { priceIsConfigured, pricePerTokenInWei } = this.prices.getConfig(projectId, coreContract);
    const currency = this.funds.getCurrencyInfo(projectId, coreContract);
    return {
      isConfigured: priceIsConfigured && currency !== undefined,
      tokenPriceInWei: pricePerTokenInWei,
      currencySymbol: currency?.currencySymbol ?? UNCONFIGURED_CURRENCY_SYMBOL,
      currencyAddress: currency?.currencyAddress ?? AddressZero,
    };
  }

  getYourBalanceOfProjectERC20(projectId: number, coreContract: string): BigNumber {
    const currency = this.funds.getCurrencyInfo(projectId, coreContract);
    if (currency === undefined) {
      return constants.Zero;
    }
    return this.ledger.resolve(currency.currencyAddress, isERC20).balanceOf(this.msgSender);
  }

  checkYourAllowanceOfProjectERC20(projectId: number, coreContract: string): BigNumber {
    const currency = this.funds.getCurrencyInfo(projectId, coreContract);
    if (currency === undefined) {
      return constants.Zero;
    }
    return this.ledger.resolve(currency.currencyAddress, isERC20).allowance(this.msgSender, this.address);
  }
}
