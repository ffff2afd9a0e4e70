import { BigNumber, constants, utils } from "ethers";

import { revert, requires } from "../../chain/errors";

export const ABI_WORD_BYTES = 32;
export const FLAGSHIP_REVENUE_SPLIT_WORDS = 6;
export const ENGINE_REVENUE_SPLIT_WORDS = 8;

export const RevenueSplitErrors = {
  unexpectedLength: "Unexpected revenue split bytes",
};

export type RevenueShares = {
  renderProviderAddress: string;
  renderProviderPercentage: number;
  platformProviderAddress: string;
  platformProviderPercentage: number;
  artistAddress: string;
  additionalPayeeAddress: string;
  additionalPayeePercentage: number;
};

export type RevenueSplits = {
  renderProviderRevenue: BigNumber;
  renderProviderAddress: string;
  platformProviderRevenue: BigNumber;
  platformProviderAddress: string;
  artistRevenue: BigNumber;
  artistAddress: string;
  additionalPayeeRevenue: BigNumber;
  additionalPayeeAddress: string;
};

const FLAGSHIP_TYPES = ["uint256", "address", "uint256", "address", "uint256", "address"];
const ENGINE_TYPES = ["uint256", "address", "uint256", "address", "uint256", "address", "uint256", "address"];

/**
 * Provider fees come off the full price, the additional payee takes a share of what is left and the artist
 * receives the remainder, so integer rounding always favors the artist.
 */
export function calculateRevenueSplits(price: BigNumber, shares: RevenueShares): RevenueSplits {
  const renderProviderRevenue = price.mul(shares.renderProviderPercentage).div(100);
  const platformProviderRevenue = price.mul(shares.platformProviderPercentage).div(100);
  const remaining = price.sub(renderProviderRevenue).sub(platformProviderRevenue);
  const additionalPayeeRevenue = remaining.mul(shares.additionalPayeePercentage).div(100);
  return {
    renderProviderRevenue,
    renderProviderAddress: shares.renderProviderAddress,
    platformProviderRevenue,
    platformProviderAddress: shares.platformProviderAddress,
    artistRevenue: remaining.sub(additionalPayeeRevenue),
    artistAddress: shares.artistAddress,
    additionalPayeeRevenue,
    additionalPayeeAddress: shares.additionalPayeeAddress,
  };
}

export function totalRevenue(splits: RevenueSplits): BigNumber {
  return splits.renderProviderRevenue
    .add(splits.platformProviderRevenue)
    .add(splits.additionalPayeeRevenue)
    .add(splits.artistRevenue);
}

export function encodeRevenueSplits(splits: RevenueSplits, isEngine: boolean): string {
  const coder = utils.defaultAbiCoder;
  if (isEngine) {
    return coder.encode(ENGINE_TYPES, [
      splits.renderProviderRevenue,
      splits.renderProviderAddress,
      splits.platformProviderRevenue,
      splits.platformProviderAddress,
      splits.artistRevenue,
      splits.artistAddress,
      splits.additionalPayeeRevenue,
      splits.additionalPayeeAddress,
    ]);
  }
  return coder.encode(FLAGSHIP_TYPES, [
    splits.renderProviderRevenue,
    splits.renderProviderAddress,
    splits.artistRevenue,
    splits.artistAddress,
    splits.additionalPayeeRevenue,
    splits.additionalPayeeAddress,
  ]);
}

/** Classifies a raw revenue split return value by its length. */
export function isEngineRevenueSplitData(data: string): boolean {
  const length = utils.hexDataLength(data);
  if (length === ENGINE_REVENUE_SPLIT_WORDS * ABI_WORD_BYTES) {
    return true;
  }
  if (length === FLAGSHIP_REVENUE_SPLIT_WORDS * ABI_WORD_BYTES) {
    return false;
  }
  return revert(RevenueSplitErrors.unexpectedLength);
}

export function decodeRevenueSplits(data: string, isEngine: boolean): RevenueSplits {
  const words = isEngine ? ENGINE_REVENUE_SPLIT_WORDS : FLAGSHIP_REVENUE_SPLIT_WORDS;
  requires(utils.hexDataLength(data) === words * ABI_WORD_BYTES, RevenueSplitErrors.unexpectedLength);
  if (isEngine) {
    const decoded = utils.defaultAbiCoder.decode(ENGINE_TYPES, data);
    return {
      renderProviderRevenue: BigNumber.from(decoded[0]),
      renderProviderAddress: utils.getAddress(decoded[1]),
      platformProviderRevenue: BigNumber.from(decoded[2]),
      platformProviderAddress: utils.getAddress(decoded[3]),
      artistRevenue: BigNumber.from(decoded[4]),
      artistAddress: utils.getAddress(decoded[5]),
      additionalPayeeRevenue: BigNumber.from(decoded[6]),
      additionalPayeeAddress: utils.getAddress(decoded[7]),
    };
  }
  const decoded = utils.defaultAbiCoder.decode(FLAGSHIP_TYPES, data);
  return {
    renderProviderRevenue: BigNumber.from(decoded[0]),
    renderProviderAddress: utils.getAddress(decoded[1]),
    platformProviderRevenue: constants.Zero,
    platformProviderAddress: constants.AddressZero,
    artistRevenue: BigNumber.from(decoded[2]),
    artistAddress: utils.getAddress(decoded[3]),
    additionalPayeeRevenue: BigNumber.from(decoded[4]),
    additionalPayeeAddress: utils.getAddress(decoded[5]),
  };
}
