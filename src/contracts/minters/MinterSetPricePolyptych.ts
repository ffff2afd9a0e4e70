import type { AddressLike } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import { ZERO_HASH_SEED } from "../core/GenerativeCore";
import { ONE_MILLION, isCoreContract } from "../interfaces/ICoreContract";
import { isPolyptychRandomizer } from "../interfaces/IRandomizer";
import { PolyptychErrors, PolyptychPanels } from "../libs/PolyptychPanels";
import type { HolderPurchase } from "./MinterSetPriceHolder";
import { MinterSetPriceHolder } from "./MinterSetPriceHolder";

/**
 * Holder-gated minter for polyptych projects: each new token copies the hash seed of the owned token that
 * qualified the purchase, once per panel.
 */
export class MinterSetPricePolyptych extends MinterSetPriceHolder {
  private readonly panels: PolyptychPanels;

  constructor(ledger: Ledger, deployer: AddressLike, minterFilter: string, delegationRegistry: string) {
    super(ledger, deployer, minterFilter, delegationRegistry);
    this.panels = new PolyptychPanels(ledger);
  }

  override minterType(): string {
    return "MinterSetPricePolyptych";
  }

  getPolyptychPanelId(projectId: number, coreContract: string): number {
    return this.panels.getPolyptychPanelId(projectId, coreContract);
  }

  getPolyptychPanelHashSeedIsMinted(
    projectId: number,
    coreContract: string,
    panelId: number,
    hashSeed: string,
  ): boolean {
    return this.panels.getPolyptychPanelHashSeedIsMinted(projectId, coreContract, panelId, hashSeed);
  }

  incrementPolyptychProjectPanelId(projectId: number, coreContract: string): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    const panelId = this.panels.incrementPolyptychProjectPanelId(projectId, core.address);
    this.emit("PolyptychPanelIdUpdated", projectId, core.address, panelId);
  }

  protected override prepareMint(purchase: HolderPurchase): (tokenId: number) => void {
    const { projectId, core } = purchase;
    const ownedCore = this.ledger.resolve(purchase.ownedNFTAddress, isCoreContract);
    const hashSeed = ownedCore.tokenIdToHashSeed(purchase.ownedNFTTokenId);
    requires(hashSeed !== ZERO_HASH_SEED, PolyptychErrors.zeroHashSeed);
    this.panels.markPanelMinted(projectId, core.address, hashSeed);

    const nextTokenId = projectId * ONE_MILLION + core.projectStateData(projectId).invocations;
    const randomizer = this.ledger.resolve(core.randomizerContract(), isPolyptychRandomizer);
    this.external(randomizer).setPolyptychHashSeed(nextTokenId, hashSeed);

    return tokenId => {
      requires(core.tokenIdToHashSeed(tokenId) === hashSeed, PolyptychErrors.unexpectedHashSeed);
    };
  }
}
