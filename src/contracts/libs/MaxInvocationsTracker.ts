import { requires } from "../../chain/errors";
import type { Journal } from "../../chain/storage";
import { Mapping } from "../../chain/storage";
import type { ICoreContract } from "../interfaces/ICoreContract";
import { tokenIdToInvocation, tokenIdToProjectId } from "../interfaces/ICoreContract";
import type { ProjectKey } from "./ProjectKey";
import { projectKey } from "./ProjectKey";

export const MaxInvocationsErrors = {
  maxInvocationsReached: "Max invocations reached",
  unexpectedTokenProject: "Unexpected token project",
  unexpectedTokenInvocation: "Unexpected token invocation",
  aboveCoreMaxInvocations: "Only max invocations lte core max invocations",
  belowCoreInvocations: "Only max invocations gte core invocations",
};

export type MaxInvocationsProjectConfig = {
  maxHasBeenInvoked: boolean;
  /** Zero until synced or limited; with `maxHasBeenInvoked` false it imposes no local limit. */
  maxInvocations: number;
};

const UNCONFIGURED: MaxInvocationsProjectConfig = { maxHasBeenInvoked: false, maxInvocations: 0 };

/**
 * Local copy of each project's max invocations, so purchases can stop at the limit without reading the core
 * first. The core stays authoritative: the copy can only be lowered below it, and every mint is checked
 * against the core's counters afterwards.
 */
export class MaxInvocationsTracker {
  private readonly configs: Mapping<ProjectKey, MaxInvocationsProjectConfig>;

  constructor(journal: Journal) {
    this.configs = new Mapping(journal, projectKey);
  }

  getConfig(projectId: number, coreContract: string): MaxInvocationsProjectConfig {
    return this.configs.get({ projectId, coreContract }) ?? UNCONFIGURED;
  }

  projectMaxHasBeenInvoked(projectId: number, coreContract: string): boolean {
    return this.getConfig(projectId, coreContract).maxHasBeenInvoked;
  }

  projectMaxInvocations(projectId: number, coreContract: string): number {
    return this.getConfig(projectId, coreContract).maxInvocations;
  }

  isUnconfigured(projectId: number, coreContract: string): boolean {
    const config = this.getConfig(projectId, coreContract);
    return config.maxInvocations === 0 && !config.maxHasBeenInvoked;
  }

  /** Copies the core's max invocations. Clears the reached flag when the core has room, never sets it. */
  syncProjectMaxInvocationsToCore(projectId: number, core: ICoreContract): MaxInvocationsProjectConfig {
    const { invocations, maxInvocations } = core.projectStateData(projectId);
    const previous = this.getConfig(projectId, core.address);
    const config = {
      maxInvocations,
      maxHasBeenInvoked: invocations < maxInvocations ? false : previous.maxHasBeenInvoked,
    };
    this.configs.set({ projectId, coreContract: core.address }, config);
    return config;
  }

  /** Syncs projects that were never synced or limited. Returns whether a sync happened. */
  syncIfUnconfigured(projectId: number, core: ICoreContract): boolean {
    if (!this.isUnconfigured(projectId, core.address)) {
      return false;
    }
    this.syncProjectMaxInvocationsToCore(projectId, core);
    return true;
  }

  manuallyLimitProjectMaxInvocations(
    projectId: number,
    core: ICoreContract,
    maxInvocations: number,
  ): MaxInvocationsProjectConfig {
    const state = core.projectStateData(projectId);
    requires(maxInvocations <= state.maxInvocations, MaxInvocationsErrors.aboveCoreMaxInvocations);
    requires(maxInvocations >= state.invocations, MaxInvocationsErrors.belowCoreInvocations);
    const config = { maxInvocations, maxHasBeenInvoked: maxInvocations === state.invocations };
    this.configs.set({ projectId, coreContract: core.address }, config);
    return config;
  }

  preMintChecks(projectId: number, coreContract: string): void {
    requires(!this.projectMaxHasBeenInvoked(projectId, coreContract), MaxInvocationsErrors.maxInvocationsReached);
  }

  /**
   * Checks a freshly minted token against the core's counters and records when the local limit has been
   * reached. Call after the mint, before paying out.
   */
  validatePurchaseEffectsInvocations(tokenId: number, core: ICoreContract): void {
    const projectId = tokenIdToProjectId(tokenId);
    const invocation = tokenIdToInvocation(tokenId);
    const { invocations } = core.projectStateData(projectId);
    requires(invocation + 1 === invocations, MaxInvocationsErrors.unexpectedTokenInvocation);

    const config = this.getConfig(projectId, core.address);
    if (config.maxInvocations === 0) {
      return;
    }
    requires(invocation < config.maxInvocations, MaxInvocationsErrors.maxInvocationsReached);
    if (invocation === config.maxInvocations - 1) {
      this.configs.set({ projectId, coreContract: core.address }, { ...config, maxHasBeenInvoked: true });
    }
  }

  /** Rejects tokens minted for a different project than the one purchased. */
  static validateTokenProject(tokenId: number, projectId: number): void {
    requires(tokenIdToProjectId(tokenId) === projectId, MaxInvocationsErrors.unexpectedTokenProject);
  }
}
