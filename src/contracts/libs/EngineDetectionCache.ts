import { constants } from "ethers";

import type { Journal } from "../../chain/storage";
import { Mapping, addressKey } from "../../chain/storage";
import type { ICoreContract } from "../interfaces/ICoreContract";
import { isEngineRevenueSplitData } from "./RevenueSplits";

export type EngineCache = {
  isCached: boolean;
  isEngine: boolean;
};

/** Remembers, per core contract, whether it is an engine core. A cached answer is never revisited. */
export class EngineDetectionCache {
  private readonly cache: Mapping<string, EngineCache>;

  constructor(journal: Journal) {
    this.cache = new Mapping(journal, addressKey);
  }

  getCache(coreContract: string): EngineCache {
    return this.cache.get(coreContract) ?? { isCached: false, isEngine: false };
  }

  isEngine(core: ICoreContract): boolean {
    const cached = this.cache.get(core.address);
    if (cached) {
      return cached.isEngine;
    }
    const isEngine = EngineDetectionCache.detect(core);
    this.cache.set(core.address, { isCached: true, isEngine });
    return isEngine;
  }

  /** Same answer as {@link EngineDetectionCache.isEngine}, without populating the cache. */
  isEngineView(core: ICoreContract): boolean {
    return this.cache.get(core.address)?.isEngine ?? EngineDetectionCache.detect(core);
  }

  private static detect(core: ICoreContract): boolean {
    return isEngineRevenueSplitData(core.getPrimaryRevenueSplits(0, constants.Zero));
  }
}
