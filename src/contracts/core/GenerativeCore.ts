import { BigNumber, utils } from "ethers";

import type { AddressLike } from "../../chain/accounts";
import { AddressZero, selector, toAddress } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import { Mapping, Slot, numberKey } from "../../chain/storage";
import { Ownable } from "../access/Ownable";
import { isAdminACL } from "../interfaces/IAdminACL";
import type { ICoreContract, ProjectStateData } from "../interfaces/ICoreContract";
import { ONE_MILLION } from "../interfaces/ICoreContract";
import { isRandomizer } from "../interfaces/IRandomizer";
import type { RevenueShares } from "../libs/RevenueSplits";
import { calculateRevenueSplits, encodeRevenueSplits } from "../libs/RevenueSplits";

export const CORE_VERSION = "v1.0.0";
export const DEFAULT_MAX_INVOCATIONS = ONE_MILLION;
export const DEFAULT_RENDER_PROVIDER_PERCENTAGE = 10;
export const ZERO_HASH_SEED = utils.hexZeroPad("0x", 12);

export const CoreErrors = {
  onlyAdminACL: "Only Admin ACL allowed",
  onlyArtist: "Only artist",
  invalidProjectId: "Project ID does not exist",
  onlyMinterContract: "Must mint from minter contract",
  exceedsMaxInvocations: "Must not exceed max invocations",
  projectInactive: "Project must exist and be active",
  purchasesPaused: "Purchases are paused.",
  onlyMaxInvocationsDecrease: "Only maxInvocations decrease",
  onlyGteInvocations: "Only gte invocations",
  maxOfOneHundredPercent: "Max of 100%",
  onlyRandomizer: "Only randomizer may set",
  invalidTokenId: "ERC721: invalid token ID",
  hashSeedAlreadySet: "Token hash seed already set",
  zeroHashSeed: "No zero hash seed",
  zeroAddress: "Must input non-zero address",
};

type Project = {
  name: string;
  artist: string;
  invocations: number;
  maxInvocations: number;
  active: boolean;
  paused: boolean;
  completedTimestamp: number;
  additionalPayee: string;
  additionalPayeePercentage: number;
};

export type CoreDeployOptions = {
  name: string;
  symbol: string;
  adminACL: string;
  randomizer: string;
  renderProviderAddress: string;
  startingProjectId?: number;
};

/**
 * Generative-art ERC-721 core: projects, per-project invocation counters, minting through one minter contract
 * and hash seeds from a randomizer. Token ids are `projectId * 1_000_000 + invocation`.
 */
export abstract class GenerativeCore extends Ownable implements ICoreContract {
  private readonly tokenName: string;
  private readonly tokenSymbol: string;
  private readonly firstProjectId: number;

  private readonly projects: Mapping<number, Project>;
  private readonly nextProjectIdSlot: Slot<number>;
  private readonly minterContractSlot: Slot<string>;
  private readonly randomizerSlot: Slot<string>;
  private readonly tokenOwners: Mapping<number, string>;
  private readonly hashSeeds: Mapping<number, string>;

  protected readonly renderProviderAddress: Slot<string>;
  protected readonly renderProviderPercentage: Slot<number>;

  constructor(ledger: Ledger, deployer: AddressLike, options: CoreDeployOptions) {
    super(ledger, deployer, options.adminACL);
    this.tokenName = options.name;
    this.tokenSymbol = options.symbol;
    this.firstProjectId = options.startingProjectId ?? 0;
    this.projects = new Mapping(ledger, numberKey);
    this.nextProjectIdSlot = new Slot(ledger, this.firstProjectId);
    this.minterContractSlot = new Slot(ledger, AddressZero);
    this.randomizerSlot = new Slot(ledger, toAddress(options.randomizer));
    this.tokenOwners = new Mapping(ledger, numberKey);
    this.hashSeeds = new Mapping(ledger, numberKey);
    this.renderProviderAddress = new Slot(ledger, toAddress(options.renderProviderAddress));
    this.renderProviderPercentage = new Slot(ledger, DEFAULT_RENDER_PROVIDER_PERCENTAGE);
  }

  abstract coreType(): string;

  protected abstract revenueShares(
    artistAddress: string,
    additionalPayee: string,
    additionalPayeePercentage: number,
  ): RevenueShares;

  protected abstract readonly isEngine: boolean;

  coreVersion(): string {
    return CORE_VERSION;
  }

  name(): string {
    return this.tokenName;
  }

  symbol(): string {
    return this.tokenSymbol;
  }

  startingProjectId(): number {
    return this.firstProjectId;
  }

  nextProjectId(): number {
    return this.nextProjectIdSlot.get();
  }

  minterContract(): string {
    return this.minterContractSlot.get();
  }

  randomizerContract(): string {
    return this.randomizerSlot.get();
  }

  adminACLAllowed(sender: string, contract: string, functionSelector: string): boolean {
    return this.ledger.resolve(this.owner(), isAdminACL).allowed(sender, contract, functionSelector);
  }

  addProject(projectName: string, artistAddress: string): number {
    this.onlyAdminACL("addProject(string,address)");
    requires(artistAddress !== AddressZero, CoreErrors.zeroAddress);
    const projectId = this.nextProjectIdSlot.get();
    this.projects.set(projectId, {
      name: projectName,
      artist: toAddress(artistAddress),
      invocations: 0,
      maxInvocations: DEFAULT_MAX_INVOCATIONS,
      active: false,
      paused: true,
      completedTimestamp: 0,
      additionalPayee: AddressZero,
      additionalPayeePercentage: 0,
    });
    this.nextProjectIdSlot.set(projectId + 1);
    this.emit("ProjectUpdated", projectId, "created");
    return projectId;
  }

  projectDetails(projectId: number): { projectName: string; artist: string } {
    const project = this.project(projectId);
    return { projectName: project.name, artist: project.artist };
  }

  projectIdToArtistAddress(projectId: number): string {
    return this.projects.get(projectId)?.artist ?? AddressZero;
  }

  projectStateData(projectId: number): ProjectStateData {
    const project = this.projects.get(projectId);
    return {
      invocations: project?.invocations ?? 0,
      maxInvocations: project?.maxInvocations ?? 0,
      active: project?.active ?? false,
      paused: project?.paused ?? false,
      completedTimestamp: project?.completedTimestamp ?? 0,
    };
  }

  projectIdToAdditionalPayeePrimarySales(projectId: number): { additionalPayee: string; percentage: number } {
    const project = this.project(projectId);
    return { additionalPayee: project.additionalPayee, percentage: project.additionalPayeePercentage };
  }

  toggleProjectIsActive(projectId: number): void {
    this.onlyAdminACL("toggleProjectIsActive(uint256)");
    const project = this.project(projectId);
    this.projects.set(projectId, { ...project, active: !project.active });
    this.emit("ProjectUpdated", projectId, "active");
  }

  toggleProjectIsPaused(projectId: number): void {
    const project = this.onlyArtist(projectId);
    this.projects.set(projectId, { ...project, paused: !project.paused });
    this.emit("ProjectUpdated", projectId, "paused");
  }

  updateProjectArtistAddress(projectId: number, artistAddress: string): void {
    this.onlyAdminACL("updateProjectArtistAddress(uint256,address)");
    requires(artistAddress !== AddressZero, CoreErrors.zeroAddress);
    const project = this.project(projectId);
    this.projects.set(projectId, { ...project, artist: toAddress(artistAddress) });
    this.emit("ProjectUpdated", projectId, "artistAddress");
  }

  updateProjectMaxInvocations(projectId: number, maxInvocations: number): void {
    const project = this.onlyArtist(projectId);
    requires(maxInvocations < project.maxInvocations, CoreErrors.onlyMaxInvocationsDecrease);
    requires(maxInvocations >= project.invocations, CoreErrors.onlyGteInvocations);
    this.projects.set(projectId, {
      ...project,
      maxInvocations,
      completedTimestamp:
        maxInvocations === project.invocations && project.completedTimestamp === 0
          ? this.blockTimestamp
          : project.completedTimestamp,
    });
    this.emit("ProjectUpdated", projectId, "maxInvocations");
  }

  updateProjectAdditionalPayeeInfo(projectId: number, additionalPayee: string, percentage: number): void {
    const project = this.onlyArtist(projectId);
    requires(Number.isInteger(percentage) && percentage >= 0 && percentage <= 100, CoreErrors.maxOfOneHundredPercent);
    this.projects.set(projectId, {
      ...project,
      additionalPayee: toAddress(additionalPayee),
      additionalPayeePercentage: percentage,
    });
    this.emit("ProjectUpdated", projectId, "additionalPayee");
  }

  updateMinterContract(minterContract: string): void {
    this.onlyAdminACL("updateMinterContract(address)");
    requires(minterContract !== AddressZero, CoreErrors.zeroAddress);
    this.minterContractSlot.set(toAddress(minterContract));
    this.emit("MinterUpdated", this.minterContractSlot.get());
  }

  updateRandomizerAddress(randomizer: string): void {
    this.onlyAdminACL("updateRandomizerAddress(address)");
    requires(randomizer !== AddressZero, CoreErrors.zeroAddress);
    this.randomizerSlot.set(toAddress(randomizer));
    this.emit("PlatformUpdated", "randomizerAddress");
  }

  mint(to: string, projectId: number, sender: string): number {
    requires(this.msgSender === this.minterContractSlot.get(), CoreErrors.onlyMinterContract);
    const project = this.project(projectId);
    requires(project.invocations < project.maxInvocations, CoreErrors.exceedsMaxInvocations);
    requires(project.active || sender === project.artist, CoreErrors.projectInactive);
    requires(!project.paused || sender === project.artist, CoreErrors.purchasesPaused);

    const tokenId = projectId * ONE_MILLION + project.invocations;
    const invocations = project.invocations + 1;
    this.projects.set(projectId, {
      ...project,
      invocations,
      completedTimestamp: invocations === project.maxInvocations ? this.blockTimestamp : project.completedTimestamp,
    });
    this.tokenOwners.set(tokenId, toAddress(to));
    this.emit("Transfer", AddressZero, toAddress(to), tokenId);

    this.external(this.ledger.resolve(this.randomizerSlot.get(), isRandomizer)).assignTokenHash(tokenId);
    return tokenId;
  }

  setTokenHashSeed(tokenId: number, hashSeed: string): void {
    requires(this.msgSender === this.randomizerSlot.get(), CoreErrors.onlyRandomizer);
    requires(this.tokenOwners.has(tokenId), CoreErrors.invalidTokenId);
    requires(!this.hashSeeds.has(tokenId), CoreErrors.hashSeedAlreadySet);
    requires(hashSeed !== ZERO_HASH_SEED, CoreErrors.zeroHashSeed);
    this.hashSeeds.set(tokenId, utils.hexlify(hashSeed));
  }

  tokenIdToHashSeed(tokenId: number): string {
    return this.hashSeeds.get(tokenId) ?? ZERO_HASH_SEED;
  }

  ownerOf(tokenId: number): string {
    const owner = this.tokenOwners.get(tokenId);
    requires(owner !== undefined, CoreErrors.invalidTokenId);
    return owner;
  }

  getPrimaryRevenueSplits(projectId: number, price: BigNumber): string {
    const project = this.projects.get(projectId);
    const shares = this.revenueShares(
      project?.artist ?? AddressZero,
      project?.additionalPayee ?? AddressZero,
      project?.additionalPayeePercentage ?? 0,
    );
    return encodeRevenueSplits(calculateRevenueSplits(price, shares), this.isEngine);
  }

  protected onlyAdminACL(signature: string): void {
    requires(this.adminACLAllowed(this.msgSender, this.address, selector(signature)), CoreErrors.onlyAdminACL);
  }

  private onlyArtist(projectId: number): Project {
    const project = this.project(projectId);
    requires(this.msgSender === project.artist, CoreErrors.onlyArtist);
    return project;
  }

  private project(projectId: number): Project {
    const project = this.projects.get(projectId);
    requires(project !== undefined, CoreErrors.invalidProjectId);
    return project;
  }
}
