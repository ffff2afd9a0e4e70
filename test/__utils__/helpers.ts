import type { AddressLike, Signer } from "../../src";
import {
  AdminACL,
  BasicRandomizer,
  CoreRegistry,
  EngineCore,
  FlagshipCore,
  GenerativeCore,
  Ledger,
  MinterBase,
  MinterFilter,
} from "../../src";
import "./matchers";

export type SystemOptions = {
  engine?: boolean;
  genesisTimestamp?: number;
};

export type System = {
  ledger: Ledger;
  deployer: Signer;
  artist: Signer;
  buyer: Signer;
  renderProvider: Signer;
  platformProvider: Signer;
  additionalPayee: Signer;
  others: Signer[];
  adminACL: AdminACL;
  coreRegistry: CoreRegistry;
  randomizer: BasicRandomizer;
  minterFilter: MinterFilter;
  core: GenerativeCore;
  projectZero: number;
};

export type CoreOptions = {
  engine?: boolean;
  name?: string;
  startingProjectId?: number;
};

type CoreDependency =
  | "ledger"
  | "deployer"
  | "adminACL"
  | "coreRegistry"
  | "randomizer"
  | "renderProvider"
  | "platformProvider"
  | "minterFilter";

/**
 * Deploys a core owned by the system's admin ACL, registers it and points it at the minter filter.
 */
export function deployCore(
  system: Pick<System, CoreDependency>,
  options: CoreOptions = {},
): GenerativeCore {
  const { ledger, deployer } = system;
  const deployOptions = {
    name: options.name ?? "Generative Art",
    symbol: "GEN",
    adminACL: system.adminACL.address,
    randomizer: system.randomizer.address,
    renderProviderAddress: system.renderProvider.address,
    startingProjectId: options.startingProjectId,
  };
  const core = options.engine
    ? new EngineCore(ledger, deployer, { ...deployOptions, platformProviderAddress: system.platformProvider.address })
    : new FlagshipCore(ledger, deployer, deployOptions);
  system.coreRegistry.connect(deployer).registerContract(core.address, core.coreVersion(), core.coreType());
  core.connect(deployer).updateMinterContract(system.minterFilter.address);
  return core;
}

/** Adds a project and opens it for purchases: active and unpaused. */
export function addActiveProject(
  core: GenerativeCore,
  admin: AddressLike,
  artist: Signer,
  name = "Generative Project",
): number {
  const projectId = core.connect(admin).addProject(name, artist.address);
  core.connect(admin).toggleProjectIsActive(projectId);
  core.connect(artist).toggleProjectIsPaused(projectId);
  return projectId;
}

export function setupSystem(options: SystemOptions = {}): System {
  const ledger = new Ledger({ genesisTimestamp: options.genesisTimestamp });
  const [deployer, artist, buyer, renderProvider, platformProvider, additionalPayee, ...others] = ledger.getSigners();

  const adminACL = new AdminACL(ledger, deployer);
  const coreRegistry = new CoreRegistry(ledger, deployer);
  const randomizer = new BasicRandomizer(ledger, deployer);
  const minterFilter = new MinterFilter(ledger, deployer, adminACL.address, coreRegistry.address);
  const contracts = {
    ledger,
    deployer,
    adminACL,
    coreRegistry,
    randomizer,
    renderProvider,
    platformProvider,
    minterFilter,
  };
  const core = deployCore(contracts, { engine: options.engine });
  const projectZero = addActiveProject(core, deployer, artist);

  return { ...contracts, artist, buyer, additionalPayee, others, core, projectZero };
}

/** Approves `minter` globally and assigns it to a project of the system's core. */
export function assignMinter<M extends MinterBase>(
  system: System,
  minter: M,
  projectId = system.projectZero,
  core: GenerativeCore = system.core,
): M {
  const { minterFilter, deployer } = system;
  if (!minterFilter.isGloballyApprovedMinter(minter.address)) {
    minterFilter.connect(deployer).approveMinterGlobally(minter.address);
  }
  minterFilter.connect(deployer).setMinterForProject(projectId, core.address, minter.address);
  return minter;
}
