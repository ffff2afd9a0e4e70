import type { BigNumberish } from "ethers";
import { BigNumber, constants } from "ethers";

import type { AddressLike } from "../../chain/accounts";
import { AddressZero } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import { getConfig } from "../../config";
import type { PriceInfo } from "../interfaces/IMinter";
import type { ExponentialAuctionParameters, PriceDecayHalfLifeRange } from "../libs/DutchAuctionExponential";
import { DutchAuctionExponential } from "../libs/DutchAuctionExponential";
import { MinterBase, MinterErrors } from "./MinterBase";

/** Dutch auction whose premium over the base price halves every half-life, paid in ETH. */
export class MinterDAExponential extends MinterBase {
  private readonly auctions: DutchAuctionExponential;

  constructor(ledger: Ledger, deployer: AddressLike, minterFilter: string) {
    super(ledger, deployer, minterFilter);
    const { minimumPriceDecayHalfLifeSeconds, maximumPriceDecayHalfLifeSeconds } = getConfig().auctions;
    this.auctions = new DutchAuctionExponential(ledger, {
      minimumPriceDecayHalfLifeSeconds,
      maximumPriceDecayHalfLifeSeconds,
    });
  }

  minterType(): string {
    return "MinterDAExponential";
  }

  allowablePriceDecayHalfLifeRangeSeconds(): PriceDecayHalfLifeRange {
    return this.auctions.allowablePriceDecayHalfLifeRangeSeconds();
  }

  setAllowablePriceDecayHalfLifeRangeSeconds(
    minimumPriceDecayHalfLifeSeconds: number,
    maximumPriceDecayHalfLifeSeconds: number,
  ): void {
    this.onlyMinterFilterAdminACL("setAllowablePriceDecayHalfLifeRangeSeconds(uint256,uint256)");
    this.auctions.setAllowablePriceDecayHalfLifeRangeSeconds({
      minimumPriceDecayHalfLifeSeconds,
      maximumPriceDecayHalfLifeSeconds,
    });
    this.emit("AuctionHalfLifeRangeSecondsUpdated", minimumPriceDecayHalfLifeSeconds, maximumPriceDecayHalfLifeSeconds);
  }

  projectAuctionParameters(projectId: number, coreContract: string): ExponentialAuctionParameters {
    return (
      this.auctions.getAuction(projectId, coreContract) ?? {
        timestampStart: 0,
        priceDecayHalfLifeSeconds: 0,
        startPrice: constants.Zero,
        basePrice: constants.Zero,
      }
    );
  }

  setAuctionDetails(
    projectId: number,
    coreContract: string,
    auctionTimestampStart: number,
    priceDecayHalfLifeSeconds: number,
    startPrice: BigNumberish,
    basePrice: BigNumberish,
  ): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    const auction = {
      timestampStart: auctionTimestampStart,
      priceDecayHalfLifeSeconds,
      startPrice: BigNumber.from(startPrice),
      basePrice: BigNumber.from(basePrice),
    };
    this.auctions.setAuctionDetails(projectId, core.address, auction, {
      timestamp: this.blockTimestamp,
      maxHasBeenInvoked: this.maxInvocations.projectMaxHasBeenInvoked(projectId, core.address),
    });
    this.emit(
      "SetAuctionDetailsExp",
      projectId,
      core.address,
      auction.timestampStart,
      auction.priceDecayHalfLifeSeconds,
      auction.startPrice,
      auction.basePrice,
    );
    this.syncMaxInvocationsIfUnconfigured(projectId, core);
  }

  resetAuctionDetails(projectId: number, coreContract: string): void {
    const core = this.core(coreContract);
    this.onlyCoreAdminACL(core, "resetAuctionDetails(uint256,address)");
    this.auctions.resetAuctionDetails(projectId, core.address);
    this.emit("ResetAuctionDetails", projectId, core.address);
  }

  purchase(projectId: number, coreContract: string): number {
    return this.purchaseTo(this.msgSender, projectId, coreContract);
  }

  purchaseTo(to: string, projectId: number, coreContract: string): number {
    return this.nonReentrant(() => {
      const core = this.core(coreContract);
      this.maxInvocations.preMintChecks(projectId, core.address);
      const pricePerTokenInWei = this.auctions.getPrice(projectId, core.address, this.blockTimestamp);
      requires(this.msgValue.gte(pricePerTokenInWei), MinterErrors.minValueToMint);

      const tokenId = this.mintToken(to, projectId, core, this.msgSender);

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
    const price = this.auctions.getPriceInfo(projectId, coreContract, this.blockTimestamp);
    return {
      isConfigured: price !== undefined,
      tokenPriceInWei: price ?? constants.Zero,
      currencySymbol: "ETH",
      currencyAddress: AddressZero,
    };
  }
}
