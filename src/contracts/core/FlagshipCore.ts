import type { AddressLike } from "../../chain/accounts";
import { AddressZero, toAddress } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import type { RevenueShares } from "../libs/RevenueSplits";
import type { CoreDeployOptions } from "./GenerativeCore";
import { CoreErrors, GenerativeCore } from "./GenerativeCore";

/** Flagship core: a single render provider takes a percentage of primary sales. */
export class FlagshipCore extends GenerativeCore {
  protected readonly isEngine = false;

  constructor(ledger: Ledger, deployer: AddressLike, options: CoreDeployOptions) {
    super(ledger, deployer, options);
  }

  coreType(): string {
    return "FlagshipCore";
  }

  renderProviderPrimarySalesAddress(): string {
    return this.renderProviderAddress.get();
  }

  renderProviderPrimarySalesPercentage(): number {
    return this.renderProviderPercentage.get();
  }

  updateProviderSalesAddress(renderProviderPrimarySalesAddress: string): void {
    this.onlyAdminACL("updateProviderSalesAddress(address)");
    requires(renderProviderPrimarySalesAddress !== AddressZero, CoreErrors.zeroAddress);
    this.renderProviderAddress.set(toAddress(renderProviderPrimarySalesAddress));
    this.emit("PlatformUpdated", "providerPrimarySalesAddresses");
  }

  updateProviderPrimarySalesPercentage(renderProviderPrimarySalesPercentage: number): void {
    this.onlyAdminACL("updateProviderPrimarySalesPercentage(uint256)");
    requires(
      Number.isInteger(renderProviderPrimarySalesPercentage) &&
        renderProviderPrimarySalesPercentage >= 0 &&
        renderProviderPrimarySalesPercentage <= 100,
      CoreErrors.maxOfOneHundredPercent,
    );
    this.renderProviderPercentage.set(renderProviderPrimarySalesPercentage);
    this.emit("PlatformUpdated", "providerPrimaryPercentages");
  }

  protected revenueShares(
    artistAddress: string,
    additionalPayee: string,
    additionalPayeePercentage: number,
  ): RevenueShares {
    return {
      renderProviderAddress: this.renderProviderAddress.get(),
      renderProviderPercentage: this.renderProviderPercentage.get(),
      platformProviderAddress: AddressZero,
      platformProviderPercentage: 0,
      artistAddress,
      additionalPayeeAddress: additionalPayee,
      additionalPayeePercentage,
    };
  }
}
