import { requires } from "../../chain/errors";

export const DutchAuctionErrors = {
  onlyConfiguredAuctions: "Only configured auctions",
  auctionNotStarted: "Auction not yet started",
  noModificationsMidAuction: "No modifications mid-auction",
  onlyFutureAuctions: "Only future auctions",
  startPriceAboveBasePrice: "Auction start price must be greater than base price",
};

/**
 * Auction parameters may not change while an auction is live: started, not yet at its base price and with
 * tokens still available.
 */
export function requireNotMidAuction(auctionIsLive: boolean, maxHasBeenInvoked: boolean): void {
  requires(!auctionIsLive || maxHasBeenInvoked, DutchAuctionErrors.noModificationsMidAuction);
}
