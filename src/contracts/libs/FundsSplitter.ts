import { BigNumber, constants } from "ethers";

import { AddressZero } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import { Mapping } from "../../chain/storage";
import type { ICoreContract } from "../interfaces/ICoreContract";
import type { IERC20 } from "../interfaces/IERC20";
import { isERC20 } from "../interfaces/IERC20";
import { EngineDetectionCache } from "./EngineDetectionCache";
import type { ProjectKey } from "./ProjectKey";
import { projectKey } from "./ProjectKey";
import type { RevenueSplits } from "./RevenueSplits";
import { decodeRevenueSplits, totalRevenue } from "./RevenueSplits";

export const SplitFundsErrors = {
  refundFailed: "Refund failed",
  renderProviderPaymentFailed: "Render Provider payment failed",
  platformProviderPaymentFailed: "Platform Provider payment failed",
  additionalPayeePaymentFailed: "Additional Payee payment failed",
  artistPaymentFailed: "Artist payment failed",
  revenueSplitsMismatch: "Revenue splits must sum to price",
  onlyERC20: "null address, only ERC20",
  onlyNonNullSymbol: "only non-null symbol",
  erc20NotConfigured: "ERC20: payment not configured",
  erc20TransferFailed: "ERC20 transfer failed",
  insufficientAllowance: "Insufficient ERC20 allowance",
  insufficientBalance: "Insufficient ERC20 balance",
};

export type SplitFundsResult = {
  refund: BigNumber;
  renderProvider: BigNumber;
  platformProvider: BigNumber;
  additionalPayee: BigNumber;
  artist: BigNumber;
};

export type ProjectCurrency = {
  currencyAddress: string;
  currencySymbol: string;
};

const NOTHING_PAID: SplitFundsResult = {
  refund: constants.Zero,
  renderProvider: constants.Zero,
  platformProvider: constants.Zero,
  additionalPayee: constants.Zero,
  artist: constants.Zero,
};

function toResult(splits: RevenueSplits): SplitFundsResult {
  return {
    refund: constants.Zero,
    renderProvider: splits.renderProviderRevenue,
    platformProvider: splits.platformProviderRevenue,
    additionalPayee: splits.additionalPayeeRevenue,
    artist: splits.artistRevenue,
  };
}

type Leg = {
  to: string;
  amount: BigNumber;
  failure: string;
};

function legs(splits: RevenueSplits): Leg[] {
  return [
    {
      to: splits.renderProviderAddress,
      amount: splits.renderProviderRevenue,
      failure: SplitFundsErrors.renderProviderPaymentFailed,
    },
    {
      to: splits.platformProviderAddress,
      amount: splits.platformProviderRevenue,
      failure: SplitFundsErrors.platformProviderPaymentFailed,
    },
    {
      to: splits.additionalPayeeAddress,
      amount: splits.additionalPayeeRevenue,
      failure: SplitFundsErrors.additionalPayeePaymentFailed,
    },
    { to: splits.artistAddress, amount: splits.artistRevenue, failure: SplitFundsErrors.artistPaymentFailed },
  ];
}

/**
 * Pays out a sale from a minter: the refund first, then providers, the additional payee and the artist.
 * Every non-zero payment must succeed.
 */
export class FundsSplitter {
  private readonly currencies: Mapping<ProjectKey, ProjectCurrency>;

  constructor(
    private readonly ledger: Ledger,
    private readonly minterAddress: string,
    readonly engineDetection: EngineDetectionCache,
  ) {
    this.currencies = new Mapping(ledger, projectKey);
  }

  splitFundsETH(params: {
    projectId: number;
    pricePerTokenInWei: BigNumber;
    core: ICoreContract;
    payer: string;
    valueSent: BigNumber;
  }): SplitFundsResult {
    const refund = params.valueSent.sub(params.pricePerTokenInWei);
    if (refund.gt(0)) {
      requires(this.ledger.sendValue(this.minterAddress, params.payer, refund), SplitFundsErrors.refundFailed);
    }
    if (params.pricePerTokenInWei.isZero()) {
      return { ...NOTHING_PAID, refund };
    }
    const splits = this.revenueSplits(params.projectId, params.pricePerTokenInWei, params.core);
    for (const { to, amount, failure } of legs(splits)) {
      if (amount.gt(0)) {
        requires(this.ledger.sendValue(this.minterAddress, to, amount), failure);
      }
    }
    return { ...toResult(splits), refund };
  }

  splitFundsERC20(params: {
    projectId: number;
    pricePerTokenInWei: BigNumber;
    core: ICoreContract;
    payer: string;
  }): SplitFundsResult {
    if (params.pricePerTokenInWei.isZero()) {
      return NOTHING_PAID;
    }
    const token = this.currencyToken(params.projectId, params.core.address);
    const splits = this.revenueSplits(params.projectId, params.pricePerTokenInWei, params.core);
    for (const { to, amount } of legs(splits)) {
      if (amount.gt(0)) {
        requires(
          token.connect(this.minterAddress).transferFrom(params.payer, to, amount),
          SplitFundsErrors.erc20TransferFailed,
        );
      }
    }
    return toResult(splits);
  }

  getCurrencyInfo(projectId: number, coreContract: string): ProjectCurrency | undefined {
    return this.currencies.get({ projectId, coreContract });
  }

  updateProjectCurrencyInfo(projectId: number, coreContract: string, currency: ProjectCurrency): void {
    requires(currency.currencyAddress !== AddressZero, SplitFundsErrors.onlyERC20);
    requires(currency.currencySymbol.length > 0, SplitFundsErrors.onlyNonNullSymbol);
    this.currencies.set({ projectId, coreContract }, currency);
  }

  /** Checks the payer can cover `amount` in the project's currency before anything is minted. */
  validateERC20Approvals(projectId: number, coreContract: string, payer: string, amount: BigNumber): void {
    const token = this.currencyToken(projectId, coreContract);
    requires(token.allowance(payer, this.minterAddress).gte(amount), SplitFundsErrors.insufficientAllowance);
    requires(token.balanceOf(payer).gte(amount), SplitFundsErrors.insufficientBalance);
  }

  private currencyToken(projectId: number, coreContract: string): IERC20 {
    const currency = this.getCurrencyInfo(projectId, coreContract);
    requires(currency !== undefined, SplitFundsErrors.erc20NotConfigured);
    return this.ledger.resolve(currency.currencyAddress, isERC20);
  }

  private revenueSplits(projectId: number, price: BigNumber, core: ICoreContract): RevenueSplits {
    const isEngine = this.engineDetection.isEngine(core);
    const splits = decodeRevenueSplits(core.getPrimaryRevenueSplits(projectId, price), isEngine);
    requires(totalRevenue(splits).eq(price), SplitFundsErrors.revenueSplitsMismatch);
    return splits;
  }
}
