import { requires } from "../../chain/errors";
import type { Journal, KeyOf } from "../../chain/storage";
import { Mapping } from "../../chain/storage";
import type { ProjectKey } from "./ProjectKey";
import { projectKey } from "./ProjectKey";

export const PolyptychErrors = {
  panelAlreadyMinted: "Panel already minted",
  unexpectedHashSeed: "Unexpected token hash seed",
  zeroHashSeed: "Only non-zero hash seeds",
};

type PanelHashSeed = ProjectKey & {
  panelId: number;
  hashSeed: string;
};

const panelHashSeedKey: KeyOf<PanelHashSeed> = panel => `${projectKey(panel)}:${panel.panelId}:${panel.hashSeed}`;

/**
 * Polyptych projects are minted in panels. Each owned token's hash seed can produce one token per panel; the
 * artist moves the project to its next panel.
 */
export class PolyptychPanels {
  private readonly panelIds: Mapping<ProjectKey, number>;
  private readonly mintedHashSeeds: Mapping<PanelHashSeed, boolean>;

  constructor(journal: Journal) {
    this.panelIds = new Mapping(journal, projectKey);
    this.mintedHashSeeds = new Mapping(journal, panelHashSeedKey);
  }

  getPolyptychPanelId(projectId: number, coreContract: string): number {
    return this.panelIds.get({ projectId, coreContract }) ?? 0;
  }

  incrementPolyptychProjectPanelId(projectId: number, coreContract: string): number {
    const panelId = this.getPolyptychPanelId(projectId, coreContract) + 1;
    this.panelIds.set({ projectId, coreContract }, panelId);
    return panelId;
  }

  getPolyptychPanelHashSeedIsMinted(
    projectId: number,
    coreContract: string,
    panelId: number,
    hashSeed: string,
  ): boolean {
    return this.mintedHashSeeds.get({ projectId, coreContract, panelId, hashSeed }) ?? false;
  }

  /** Records that the current panel has been minted from `hashSeed`. */
  markPanelMinted(projectId: number, coreContract: string, hashSeed: string): void {
    const panel = { projectId, coreContract, panelId: this.getPolyptychPanelId(projectId, coreContract), hashSeed };
    requires(!this.mintedHashSeeds.get(panel), PolyptychErrors.panelAlreadyMinted);
    this.mintedHashSeeds.set(panel, true);
  }
}
