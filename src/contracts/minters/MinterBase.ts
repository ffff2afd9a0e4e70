import type { AddressLike } from "../../chain/accounts";
import { selector, toAddress } from "../../chain/accounts";
import { Contract } from "../../chain/contract";
import { Ledger } from "../../chain/ledger";
import type { ICoreContract } from "../interfaces/ICoreContract";
import { isCoreContract } from "../interfaces/ICoreContract";
import type { IMinter, IMinterFilter, PriceInfo } from "../interfaces/IMinter";
import { isMinterFilter } from "../interfaces/IMinter";
import * as Auth from "../libs/Auth";
import { EngineDetectionCache } from "../libs/EngineDetectionCache";
import { FundsSplitter } from "../libs/FundsSplitter";
import type { MaxInvocationsProjectConfig } from "../libs/MaxInvocationsTracker";
import { MaxInvocationsTracker } from "../libs/MaxInvocationsTracker";

export const MINTER_VERSION = "v1.0.0";

export const MinterErrors = {
  minValueToMint: "Min value to mint req.",
};

/**
 * Shared surface of every minter: max invocations tracking, engine detection, funds splitting and the
 * authorization helpers. Subclasses supply pricing and the purchase entry points.
 */
export abstract class MinterBase extends Contract implements IMinter {
  private readonly filterAddress: string;
  protected readonly maxInvocations: MaxInvocationsTracker;
  protected readonly funds: FundsSplitter;

  constructor(ledger: Ledger, deployer: AddressLike, minterFilter: string) {
    super(ledger, deployer);
    this.filterAddress = toAddress(minterFilter);
    this.maxInvocations = new MaxInvocationsTracker(ledger);
    this.funds = new FundsSplitter(ledger, this.address, new EngineDetectionCache(ledger));
  }

  abstract minterType(): string;

  abstract getPriceInfo(projectId: number, coreContract: string): PriceInfo;

  minterVersion(): string {
    return MINTER_VERSION;
  }

  minterFilterAddress(): string {
    return this.filterAddress;
  }

  isEngineView(coreContract: string): boolean {
    return this.funds.engineDetection.isEngineView(this.core(coreContract));
  }

  maxInvocationsProjectConfig(projectId: number, coreContract: string): MaxInvocationsProjectConfig {
    return this.maxInvocations.getConfig(projectId, coreContract);
  }

  projectMaxInvocations(projectId: number, coreContract: string): number {
    return this.maxInvocations.projectMaxInvocations(projectId, coreContract);
  }

  projectMaxHasBeenInvoked(projectId: number, coreContract: string): boolean {
    return this.maxInvocations.projectMaxHasBeenInvoked(projectId, coreContract);
  }

  syncProjectMaxInvocationsToCore(projectId: number, coreContract: string): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    const { maxInvocations } = this.maxInvocations.syncProjectMaxInvocationsToCore(projectId, core);
    this.emit("ProjectMaxInvocationsLimitUpdated", projectId, core.address, maxInvocations);
  }

  manuallyLimitProjectMaxInvocations(projectId: number, coreContract: string, maxInvocations: number): void {
    const core = this.core(coreContract);
    this.onlyArtist(projectId, core);
    this.maxInvocations.manuallyLimitProjectMaxInvocations(projectId, core, maxInvocations);
    this.emit("ProjectMaxInvocationsLimitUpdated", projectId, core.address, maxInvocations);
  }

  protected core(coreContract: string): ICoreContract {
    return this.ledger.resolve(toAddress(coreContract), isCoreContract);
  }

  protected minterFilter(): IMinterFilter {
    return this.ledger.resolve(this.filterAddress, isMinterFilter);
  }

  protected onlyArtist(projectId: number, core: ICoreContract): void {
    Auth.onlyArtist(this.msgSender, projectId, core);
  }

  protected onlyCoreAdminACL(core: ICoreContract, signature: string): void {
    Auth.onlyCoreAdminACL(this.msgSender, core, this.address, selector(signature));
  }

  protected onlyMinterFilterAdminACL(signature: string): void {
    Auth.onlyMinterFilterAdminACL(this.msgSender, this.minterFilter(), this.address, selector(signature));
  }

  /** Picks up the core's limit the first time a project is configured on this minter. */
  protected syncMaxInvocationsIfUnconfigured(projectId: number, core: ICoreContract): void {
    if (this.maxInvocations.syncIfUnconfigured(projectId, core)) {
      this.emit(
        "ProjectMaxInvocationsLimitUpdated",
        projectId,
        core.address,
        this.maxInvocations.projectMaxInvocations(projectId, core.address),
      );
    }
  }

  /** Mints through the minter filter and checks the result against the core's counters. */
  protected mintToken(to: string, projectId: number, core: ICoreContract, sender: string): number {
    const tokenId = this.external(this.minterFilter()).mint(toAddress(to), projectId, core.address, sender);
    MaxInvocationsTracker.validateTokenProject(tokenId, projectId);
    this.maxInvocations.validatePurchaseEffectsInvocations(tokenId, core);
    return tokenId;
  }
}
