import type { AddressLike } from "../../chain/accounts";
import { AddressZero, selector, toAddress } from "../../chain/accounts";
import { requires, revert } from "../../chain/errors";
import type { LedgerContract } from "../../chain/ledger";
import { Ledger } from "../../chain/ledger";
import { EnumerableMap, EnumerableSet, Mapping, Slot, addressKey, numberKey } from "../../chain/storage";
import { Ownable } from "../access/Ownable";
import { CoreRegistry } from "../core/CoreRegistry";
import { isAdminACL } from "../interfaces/IAdminACL";
import type { ICoreContract } from "../interfaces/ICoreContract";
import { isCoreContract } from "../interfaces/ICoreContract";
import type { IMinterFilter } from "../interfaces/IMinter";
import { isMinter } from "../interfaces/IMinter";

export const MINTER_FILTER_VERSION = "v1.0.0";

export const MinterFilterErrors = {
  onlyAdminACL: "Only Admin ACL allowed",
  onlyCoreAdminACL: "Only Core AdminACL allowed",
  onlyArtistOrCoreAdminACL: "Only Artist or Core Admin ACL",
  onlyRegisteredCore: "Only registered core contract",
  onlyApprovedMinters: "Only approved minters",
  onlyValidProjectId: "Only valid project ID",
  minterAlreadyApproved: "Minter already approved",
  onlyPreviouslyApproved: "Only previously approved minter",
  noMinterAssigned: "No minter assigned",
  onlyAssignedMinter: "Only assigned minter",
  cannotRenounce: "Cannot renounce ownership",
  zeroAddress: "Must input non-zero address",
};

export type MinterWithType = {
  minterAddress: string;
  minterType: string;
};

export type ProjectAndMinterInfo = MinterWithType & {
  projectId: number;
};

function isCoreRegistry(contract: LedgerContract): contract is CoreRegistry {
  return contract instanceof CoreRegistry;
}

/**
 * Registry of which minter may mint each project of each registered core contract. It is the core contracts'
 * only minter, so every mint goes through {@link MinterFilter.mint}.
 */
export class MinterFilter extends Ownable implements IMinterFilter {
  private readonly coreRegistrySlot: Slot<string>;
  private readonly globallyApprovedMinters: EnumerableSet<string>;
  private readonly contractApprovedMinters = new Map<string, EnumerableSet<string>>();
  private readonly projectMinters = new Map<string, EnumerableMap<number, string>>();
  private readonly numProjectsUsingMinter: Mapping<string, number>;

  constructor(ledger: Ledger, deployer: AddressLike, adminACL: string, coreRegistry: string) {
    super(ledger, deployer, adminACL);
    this.coreRegistrySlot = new Slot(ledger, toAddress(coreRegistry));
    this.globallyApprovedMinters = new EnumerableSet(ledger, addressKey);
    this.numProjectsUsingMinter = new Mapping(ledger, addressKey);
  }

  minterFilterType(): string {
    return "MinterFilter";
  }

  minterFilterVersion(): string {
    return MINTER_FILTER_VERSION;
  }

  override renounceOwnership(): void {
    revert(MinterFilterErrors.cannotRenounce);
  }

  adminACLAllowed(sender: string, contract: string, functionSelector: string): boolean {
    return this.ledger.resolve(this.owner(), isAdminACL).allowed(sender, contract, functionSelector);
  }

  coreRegistry(): string {
    return this.coreRegistrySlot.get();
  }

  updateCoreRegistry(coreRegistry: string): void {
    this.onlyAdminACL("updateCoreRegistry(address)");
    requires(coreRegistry !== AddressZero, MinterFilterErrors.zeroAddress);
    this.coreRegistrySlot.set(toAddress(coreRegistry));
    this.emit("CoreRegistryUpdated", this.coreRegistrySlot.get());
  }

  isRegisteredCoreContract(coreContract: string): boolean {
    return this.ledger.resolve(this.coreRegistrySlot.get(), isCoreRegistry).isRegisteredContract(coreContract);
  }

  approveMinterGlobally(minterAddress: string): void {
    this.onlyAdminACL("approveMinterGlobally(address)");
    const minter = toAddress(minterAddress);
    const minterType = this.ledger.resolve(minter, isMinter).minterType();
    requires(this.globallyApprovedMinters.add(minter), MinterFilterErrors.minterAlreadyApproved);
    this.emit("MinterApprovedGlobally", minter, minterType);
  }

  revokeMinterGlobally(minterAddress: string): void {
    this.onlyAdminACL("revokeMinterGlobally(address)");
    const minter = toAddress(minterAddress);
    requires(this.globallyApprovedMinters.remove(minter), MinterFilterErrors.onlyPreviouslyApproved);
    this.emit("MinterRevokedGlobally", minter);
  }

  approveMinterForContract(coreContractAddress: string, minterAddress: string): void {
    const coreContract = toAddress(coreContractAddress);
    const minter = toAddress(minterAddress);
    this.onlyRegisteredCoreAdminACL(coreContract, "approveMinterForContract(address,address)");
    const minterType = this.ledger.resolve(minter, isMinter).minterType();
    requires(this.contractApproved(coreContract).add(minter), MinterFilterErrors.minterAlreadyApproved);
    this.emit("MinterApprovedForContract", coreContract, minter, minterType);
  }

  revokeMinterForContract(coreContractAddress: string, minterAddress: string): void {
    const coreContract = toAddress(coreContractAddress);
    const minter = toAddress(minterAddress);
    this.onlyRegisteredCoreAdminACL(coreContract, "revokeMinterForContract(address,address)");
    requires(this.contractApproved(coreContract).remove(minter), MinterFilterErrors.onlyPreviouslyApproved);
    this.emit("MinterRevokedForContract", coreContract, minter);
  }

  setMinterForProject(projectId: number, coreContractAddress: string, minterAddress: string): void {
    const coreContract = toAddress(coreContractAddress);
    const minter = toAddress(minterAddress);
    requires(this.isRegisteredCoreContract(coreContract), MinterFilterErrors.onlyRegisteredCore);
    const core = this.ledger.resolve(coreContract, isCoreContract);
    requires(
      this.msgSender === core.projectIdToArtistAddress(projectId) ||
        core.adminACLAllowed(this.msgSender, this.address, selector("setMinterForProject(uint256,address,address)")),
      MinterFilterErrors.onlyArtistOrCoreAdminACL,
    );
    requires(this.isApprovedMinterForContract(coreContract, minter), MinterFilterErrors.onlyApprovedMinters);
    requires(
      projectId >= core.startingProjectId() && projectId < core.nextProjectId(),
      MinterFilterErrors.onlyValidProjectId,
    );

    const assignments = this.assignments(coreContract);
    const previousMinter = assignments.tryGet(projectId);
    if (previousMinter !== undefined) {
      this.numProjectsUsingMinter.set(previousMinter, this.getNumProjectsUsingMinter(previousMinter) - 1);
    }
    assignments.set(projectId, minter);
    this.numProjectsUsingMinter.set(minter, this.getNumProjectsUsingMinter(minter) + 1);
    const { minterType } = this.withType(minter);
    this.emit("ProjectMinterRegistered", projectId, coreContract, minter, minterType);
  }

  removeMinterForProject(projectId: number, coreContractAddress: string): void {
    const coreContract = toAddress(coreContractAddress);
    this.onlyCoreAdminACL(this.core(coreContract), "removeMinterForProject(uint256,address)");
    this.removeAssignment(projectId, coreContract);
  }

  removeMintersForProjectsOnContract(projectIds: number[], coreContractAddress: string): void {
    const coreContract = toAddress(coreContractAddress);
    this.onlyCoreAdminACL(this.core(coreContract), "removeMintersForProjectsOnContract(uint256[],address)");
    projectIds.forEach(projectId => this.removeAssignment(projectId, coreContract));
  }

  mint(to: string, projectId: number, coreContract: string, sender: string): number {
    const minter = this.projectMinters.get(toAddress(coreContract))?.tryGet(projectId);
    requires(minter !== undefined, MinterFilterErrors.noMinterAssigned);
    requires(this.msgSender === minter, MinterFilterErrors.onlyAssignedMinter);
    return this.external(this.core(coreContract)).mint(to, projectId, sender);
  }

  getMinterForProject(projectId: number, coreContract: string): string {
    const minter = this.projectMinters.get(toAddress(coreContract))?.tryGet(projectId);
    requires(minter !== undefined, MinterFilterErrors.noMinterAssigned);
    return minter;
  }

  projectHasMinter(projectId: number, coreContract: string): boolean {
    return this.projectMinters.get(toAddress(coreContract))?.contains(projectId) ?? false;
  }

  getNumProjectsUsingMinter(minter: string): number {
    return this.numProjectsUsingMinter.get(toAddress(minter)) ?? 0;
  }

  isGloballyApprovedMinter(minter: string): boolean {
    return this.globallyApprovedMinters.contains(toAddress(minter));
  }

  isApprovedMinterForContract(coreContract: string, minter: string): boolean {
    return (
      this.isGloballyApprovedMinter(minter) ||
      (this.contractApprovedMinters.get(toAddress(coreContract))?.contains(toAddress(minter)) ?? false)
    );
  }

  getAllGloballyApprovedMinters(): MinterWithType[] {
    return this.globallyApprovedMinters.values().map(minter => this.withType(minter));
  }

  getAllContractApprovedMinters(coreContract: string): MinterWithType[] {
    return this.contractApproved(coreContract)
      .values()
      .map(minter => this.withType(minter));
  }

  getNumProjectsOnContractWithMinters(coreContract: string): number {
    return this.projectMinters.get(toAddress(coreContract))?.length ?? 0;
  }

  getProjectAndMinterInfoOnContractAt(coreContract: string, index: number): ProjectAndMinterInfo {
    const [projectId, minter] = this.assignments(coreContract).at(index);
    return { projectId, ...this.withType(minter) };
  }

  private removeAssignment(projectId: number, coreContract: string): void {
    const assignments = this.assignments(coreContract);
    const minter = assignments.tryGet(projectId);
    requires(minter !== undefined, MinterFilterErrors.noMinterAssigned);
    assignments.remove(projectId);
    this.numProjectsUsingMinter.set(minter, this.getNumProjectsUsingMinter(minter) - 1);
    this.emit("ProjectMinterRemoved", projectId, coreContract);
  }

  private withType(minter: string): MinterWithType {
    return { minterAddress: minter, minterType: this.ledger.resolve(minter, isMinter).minterType() };
  }

  private core(coreContract: string): ICoreContract {
    return this.ledger.resolve(coreContract, isCoreContract);
  }

  private contractApproved(coreContractAddress: string): EnumerableSet<string> {
    const coreContract = toAddress(coreContractAddress);
    let minters = this.contractApprovedMinters.get(coreContract);
    if (!minters) {
      minters = new EnumerableSet(this.ledger, addressKey);
      this.contractApprovedMinters.set(coreContract, minters);
    }
    return minters;
  }

  private assignments(coreContractAddress: string): EnumerableMap<number, string> {
    const coreContract = toAddress(coreContractAddress);
    let assignments = this.projectMinters.get(coreContract);
    if (!assignments) {
      assignments = new EnumerableMap(this.ledger, numberKey);
      this.projectMinters.set(coreContract, assignments);
    }
    return assignments;
  }

  private onlyAdminACL(signature: string): void {
    requires(
      this.adminACLAllowed(this.msgSender, this.address, selector(signature)),
      MinterFilterErrors.onlyAdminACL,
    );
  }

  private onlyCoreAdminACL(core: ICoreContract, signature: string): void {
    requires(
      core.adminACLAllowed(this.msgSender, this.address, selector(signature)),
      MinterFilterErrors.onlyCoreAdminACL,
    );
  }

  private onlyRegisteredCoreAdminACL(coreContract: string, signature: string): void {
    requires(this.isRegisteredCoreContract(coreContract), MinterFilterErrors.onlyRegisteredCore);
    this.onlyCoreAdminACL(this.core(coreContract), signature);
  }
}
