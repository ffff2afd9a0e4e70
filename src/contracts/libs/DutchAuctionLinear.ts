import { BigNumber } from "ethers";

import { requires } from "../../chain/errors";
import type { Journal } from "../../chain/storage";
import { Mapping, Slot } from "../../chain/storage";
import { DutchAuctionErrors, requireNotMidAuction } from "./DutchAuction";
import type { ProjectKey } from "./ProjectKey";
import { projectKey } from "./ProjectKey";

export const DutchAuctionLinearErrors = {
  ...DutchAuctionErrors,
  endAfterStart: "Auction end must be greater than auction start",
  auctionTooShort: "Auction length must be at least minimumAuctionLengthSeconds",
};

export type LinearAuctionParameters = {
  timestampStart: number;
  timestampEnd: number;
  startPrice: BigNumber;
  basePrice: BigNumber;
};

/** Price falls in a straight line from `startPrice` at the start to `basePrice` at the end, then stays there. */
export function linearAuctionPrice(auction: LinearAuctionParameters, timestamp: number): BigNumber {
  requires(timestamp >= auction.timestampStart, DutchAuctionErrors.auctionNotStarted);
  if (timestamp >= auction.timestampEnd) {
    return auction.basePrice;
  }
  const elapsed = timestamp - auction.timestampStart;
  const duration = auction.timestampEnd - auction.timestampStart;
  return auction.startPrice.sub(auction.startPrice.sub(auction.basePrice).mul(elapsed).div(duration));
}

export class DutchAuctionLinear {
  private readonly auctions: Mapping<ProjectKey, LinearAuctionParameters>;
  private readonly minimumAuctionLength: Slot<number>;

  constructor(journal: Journal, minimumAuctionLengthSeconds: number) {
    this.auctions = new Mapping(journal, projectKey);
    this.minimumAuctionLength = new Slot(journal, minimumAuctionLengthSeconds);
  }

  minimumAuctionLengthSeconds(): number {
    return this.minimumAuctionLength.get();
  }

  setMinimumAuctionLengthSeconds(seconds: number): void {
    this.minimumAuctionLength.set(seconds);
  }

  getAuction(projectId: number, coreContract: string): LinearAuctionParameters | undefined {
    return this.auctions.get({ projectId, coreContract });
  }

  isLive(projectId: number, coreContract: string, timestamp: number): boolean {
    const auction = this.getAuction(projectId, coreContract);
    return auction !== undefined && timestamp >= auction.timestampStart && timestamp < auction.timestampEnd;
  }

  setAuctionDetails(
    projectId: number,
    coreContract: string,
    auction: LinearAuctionParameters,
    context: { timestamp: number; maxHasBeenInvoked: boolean },
  ): void {
    requireNotMidAuction(this.isLive(projectId, coreContract, context.timestamp), context.maxHasBeenInvoked);
    requires(auction.timestampStart > context.timestamp, DutchAuctionLinearErrors.onlyFutureAuctions);
    requires(auction.timestampEnd > auction.timestampStart, DutchAuctionLinearErrors.endAfterStart);
    requires(
      auction.timestampEnd - auction.timestampStart >= this.minimumAuctionLength.get(),
      DutchAuctionLinearErrors.auctionTooShort,
    );
    requires(auction.startPrice.gt(auction.basePrice), DutchAuctionLinearErrors.startPriceAboveBasePrice);
    this.auctions.set({ projectId, coreContract }, auction);
  }

  resetAuctionDetails(projectId: number, coreContract: string): void {
    this.auctions.delete({ projectId, coreContract });
  }

  /** Current price for a purchase; fails when unconfigured or not yet started. */
  getPrice(projectId: number, coreContract: string, timestamp: number): BigNumber {
    const auction = this.getAuction(projectId, coreContract);
    requires(auction !== undefined, DutchAuctionLinearErrors.onlyConfiguredAuctions);
    return linearAuctionPrice(auction, timestamp);
  }

  /** Current price for display: the start price before the auction opens, undefined when unconfigured. */
  getPriceInfo(projectId: number, coreContract: string, timestamp: number): BigNumber | undefined {
    const auction = this.getAuction(projectId, coreContract);
    if (auction === undefined) {
      return undefined;
    }
    return timestamp < auction.timestampStart ? auction.startPrice : linearAuctionPrice(auction, timestamp);
  }
}
