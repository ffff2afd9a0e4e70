import type { BigNumberish } from "ethers";
import { BigNumber } from "ethers";

import type { AddressLike } from "../../chain/accounts";
import { AddressZero } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import type { PriceInfo } from "../interfaces/IMinter";
import { SetPriceConfig } from "../libs/SetPriceConfig";
import { MinterBase, MinterErrors } from "./MinterBase";

/** Fixed price per token, paid in ETH. */
export class MinterSetPrice extends MinterBase {
  protected readonly prices: SetPriceConfig;

  constructor(ledger: Ledger, deployer: AddressLike, minterFilter: string) {
    super(ledger, deployer, minterFilter);
    this.prices = new SetPriceConfig(ledger);
  }

  minterType(): string {
    return "MinterSetPrice";
  }

  updatePricePerTokenInWei(projectId: number, coreContract: string, pricePerTokenInWei: BigNumberish): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    const price = BigNumber.from(pricePerTokenInWei);
    this.prices.updatePricePerTokenInWei(projectId, core.address, price);
    this.emit("PricePerTokenInWeiUpdated", projectId, core.address, price);
    this.syncMaxInvocationsIfUnconfigured(projectId, core);
  }

  purchase(projectId: number, coreContract: string): number {
    return this.purchaseTo(this.msgSender, projectId, coreContract);
  }

  purchaseTo(to: string, projectId: number, coreContract: string): number {
    return this.nonReentrant(() => {
      const core = this.core(coreContract);
      this.maxInvocations.preMintChecks(projectId, core.address);
      const pricePerTokenInWei = this.prices.getPriceOrRevert(projectId, core.address);
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
    const { priceIsConfigured, pricePerTokenInWei } = this.prices.getConfig(projectId, coreContract);
    return {
      isConfigured: priceIsConfigured,
      tokenPriceInWei: pricePerTokenInWei,
      currencySymbol: "ETH",
      currencyAddress: AddressZero,
    };
  }
}
