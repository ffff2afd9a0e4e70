import { BigNumber } from "ethers";

import { requires } from "../../chain/errors";
import type { Journal } from "../../chain/storage";
import { Mapping, Slot } from "../../chain/storage";
import { DutchAuctionErrors, requireNotMidAuction } from "./DutchAuction";
import type { ProjectKey } from "./ProjectKey";
import { projectKey } from "./ProjectKey";

/** A 256-bit price difference is gone after this many halvings. */
export const MAX_HALF_LIVES = 256;

export const DutchAuctionExponentialErrors = {
  ...DutchAuctionErrors,
  halfLifeOutOfRange: "Price decay half life must fall between min and max allowable values",
  maxHalfLifeAboveMin: "Maximum half life must be greater than minimum",
  zeroHalfLife: "Half life of zero not allowed",
};

export type ExponentialAuctionParameters = {
  timestampStart: number;
  priceDecayHalfLifeSeconds: number;
  startPrice: BigNumber;
  basePrice: BigNumber;
};

export type PriceDecayHalfLifeRange = {
  minimumPriceDecayHalfLifeSeconds: number;
  maximumPriceDecayHalfLifeSeconds: number;
};

/**
 * The amount above `basePrice` halves every half-life: a right shift per completed half-life, then a linear
 * step across the current one.
 */
export function exponentialAuctionPrice(auction: ExponentialAuctionParameters, timestamp: number): BigNumber {
  requires(timestamp >= auction.timestampStart, DutchAuctionErrors.auctionNotStarted);
  const elapsed = timestamp - auction.timestampStart;
  const halfLife = auction.priceDecayHalfLifeSeconds;
  const completedHalfLives = Math.floor(elapsed / halfLife);
  if (completedHalfLives >= MAX_HALF_LIVES) {
    return auction.basePrice;
  }
  let decayed = auction.startPrice.sub(auction.basePrice).shr(completedHalfLives);
  decayed = decayed.sub(decayed.mul(elapsed % halfLife).div(halfLife).div(2));
  return auction.basePrice.add(decayed);
}

export class DutchAuctionExponential {
  private readonly auctions: Mapping<ProjectKey, ExponentialAuctionParameters>;
  private readonly halfLifeRange: Slot<PriceDecayHalfLifeRange>;

  constructor(journal: Journal, halfLifeRange: PriceDecayHalfLifeRange) {
    this.auctions = new Mapping(journal, projectKey);
    this.halfLifeRange = new Slot(journal, halfLifeRange);
  }

  allowablePriceDecayHalfLifeRangeSeconds(): PriceDecayHalfLifeRange {
    return this.halfLifeRange.get();
  }

  setAllowablePriceDecayHalfLifeRangeSeconds(range: PriceDecayHalfLifeRange): void {
    requires(
      range.maximumPriceDecayHalfLifeSeconds > range.minimumPriceDecayHalfLifeSeconds,
      DutchAuctionExponentialErrors.maxHalfLifeAboveMin,
    );
    requires(range.minimumPriceDecayHalfLifeSeconds > 0, DutchAuctionExponentialErrors.zeroHalfLife);
    this.halfLifeRange.set(range);
  }

  getAuction(projectId: number, coreContract: string): ExponentialAuctionParameters | undefined {
    return this.auctions.get({ projectId, coreContract });
  }

  /** Started and still above its base price. */
  isLive(projectId: number, coreContract: string, timestamp: number): boolean {
    const auction = this.getAuction(projectId, coreContract);
    return (
      auction !== undefined &&
      timestamp >= auction.timestampStart &&
      exponentialAuctionPrice(auction, timestamp).gt(auction.basePrice)
    );
  }

  setAuctionDetails(
    projectId: number,
    coreContract: string,
    auction: ExponentialAuctionParameters,
    context: { timestamp: number; maxHasBeenInvoked: boolean },
  ): void {
    requireNotMidAuction(this.isLive(projectId, coreContract, context.timestamp), context.maxHasBeenInvoked);
    requires(auction.timestampStart > context.timestamp, DutchAuctionExponentialErrors.onlyFutureAuctions);
    requires(auction.startPrice.gt(auction.basePrice), DutchAuctionExponentialErrors.startPriceAboveBasePrice);
    const range = this.halfLifeRange.get();
    requires(
      auction.priceDecayHalfLifeSeconds >= range.minimumPriceDecayHalfLifeSeconds &&
        auction.priceDecayHalfLifeSeconds <= range.maximumPriceDecayHalfLifeSeconds,
      DutchAuctionExponentialErrors.halfLifeOutOfRange,
    );
    this.auctions.set({ projectId, coreContract }, auction);
  }

  resetAuctionDetails(projectId: number, coreContract: string): void {
    this.auctions.delete({ projectId, coreContract });
  }

  getPrice(projectId: number, coreContract: string, timestamp: number): BigNumber {
    const auction = this.getAuction(projectId, coreContract);
    requires(auction !== undefined, DutchAuctionExponentialErrors.onlyConfiguredAuctions);
    return exponentialAuctionPrice(auction, timestamp);
  }

  getPriceInfo(projectId: number, coreContract: string, timestamp: number): BigNumber | undefined {
    const auction = this.getAuction(projectId, coreContract);
    if (auction === undefined) {
      return undefined;
    }
    return timestamp < auction.timestampStart ? auction.startPrice : exponentialAuctionPrice(auction, timestamp);
  }
}
