import { BigNumber, constants } from "ethers";

import { requires } from "../../chain/errors";
import type { Journal } from "../../chain/storage";
import { Mapping } from "../../chain/storage";
import type { ProjectKey } from "./ProjectKey";
import { projectKey } from "./ProjectKey";

export const SetPriceErrors = {
  priceNotConfigured: "Price not configured",
};

export type SetPriceProjectConfig = {
  pricePerTokenInWei: BigNumber;
  priceIsConfigured: boolean;
};

const UNCONFIGURED: SetPriceProjectConfig = { pricePerTokenInWei: constants.Zero, priceIsConfigured: false };

export class SetPriceConfig {
  private readonly configs: Mapping<ProjectKey, SetPriceProjectConfig>;

  constructor(journal: Journal) {
    this.configs = new Mapping(journal, projectKey);
  }

  getConfig(projectId: number, coreContract: string): SetPriceProjectConfig {
    return this.configs.get({ projectId, coreContract }) ?? UNCONFIGURED;
  }

  updatePricePerTokenInWei(projectId: number, coreContract: string, pricePerTokenInWei: BigNumber): void {
    this.configs.set({ projectId, coreContract }, { pricePerTokenInWei, priceIsConfigured: true });
  }

  getPriceOrRevert(projectId: number, coreContract: string): BigNumber {
    const config = this.getConfig(projectId, coreContract);
    requires(config.priceIsConfigured, SetPriceErrors.priceNotConfigured);
    return config.pricePerTokenInWei;
  }
}
