import type { AddressLike } from "../../chain/accounts";
import { AddressZero, toAddress } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import { Slot } from "../../chain/storage";
import type { RevenueShares } from "../libs/RevenueSplits";
import type { CoreDeployOptions } from "./GenerativeCore";
import { CoreErrors, GenerativeCore } from "./GenerativeCore";

export const DEFAULT_PLATFORM_PROVIDER_PERCENTAGE = 10;

export type EngineCoreDeployOptions = CoreDeployOptions & {
  platformProviderAddress: string;
};

/** Engine core: both a render provider and a platform provider take a percentage of primary sales. */
export class EngineCore extends GenerativeCore {
  protected readonly isEngine = true;

  private readonly platformProviderAddress: Slot<string>;
  private readonly platformProviderPercentage: Slot<number>;

  constructor(ledger: Ledger, deployer: AddressLike, options: EngineCoreDeployOptions) {
    super(ledger, deployer, options);
    this.platformProviderAddress = new Slot(ledger, toAddress(options.platformProviderAddress));
    this.platformProviderPercentage = new Slot(ledger, DEFAULT_PLATFORM_PROVIDER_PERCENTAGE);
  }

  coreType(): string {
    return "EngineCore";
  }

  renderProviderPrimarySalesAddress(): string {
    return this.renderProviderAddress.get();
  }

  platformProviderPrimarySalesAddress(): string {
    return this.platformProviderAddress.get();
  }

  updateProviderSalesAddresses(
    renderProviderPrimarySalesAddress: string,
    platformProviderPrimarySalesAddress: string,
  ): void {
    this.onlyAdminACL("updateProviderSalesAddresses(address,address)");
    requires(
      renderProviderPrimarySalesAddress !== AddressZero && platformProviderPrimarySalesAddress !== AddressZero,
      CoreErrors.zeroAddress,
    );
    this.renderProviderAddress.set(toAddress(renderProviderPrimarySalesAddress));
    this.platformProviderAddress.set(toAddress(platformProviderPrimarySalesAddress));
    this.emit("PlatformUpdated", "providerPrimarySalesAddresses");
  }

  updateProviderPrimarySalesPercentages(
    renderProviderPrimarySalesPercentage: number,
    platformProviderPrimarySalesPercentage: number,
  ): void {
    this.onlyAdminACL("updateProviderPrimarySalesPercentages(uint256,uint256)");
    requires(
      [renderProviderPrimarySalesPercentage, platformProviderPrimarySalesPercentage].every(
        percentage => Number.isInteger(percentage) && percentage >= 0,
      ) && renderProviderPrimarySalesPercentage + platformProviderPrimarySalesPercentage <= 100,
      CoreErrors.maxOfOneHundredPercent,
    );
    this.renderProviderPercentage.set(renderProviderPrimarySalesPercentage);
    this.platformProviderPercentage.set(platformProviderPrimarySalesPercentage);
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
      platformProviderAddress: this.platformProviderAddress.get(),
      platformProviderPercentage: this.platformProviderPercentage.get(),
      artistAddress,
      additionalPayeeAddress: additionalPayee,
      additionalPayeePercentage,
    };
  }
}
