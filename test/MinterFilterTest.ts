import { expect } from "chai";

import type { Signer } from "../src";
import { AddressZero, CoreRegistry, GenerativeCore, MinterDALinear, MinterFilter, MinterSetPrice } from "../src";
import { Errors, ONE_ETH } from "./__utils__/data";
import type { System } from "./__utils__/helpers";
import { addActiveProject, deployCore, setupSystem } from "./__utils__/helpers";

describe("Minter Filter", () => {
  let system: System;
  let deployer: Signer, artist: Signer, buyer: Signer;
  let minterFilter: MinterFilter;
  let core: GenerativeCore;
  let setPrice: MinterSetPrice;
  let linear: MinterDALinear;

  beforeEach(() => {
    system = setupSystem();
    ({ deployer, artist, buyer, minterFilter, core } = system);
    setPrice = new MinterSetPrice(system.ledger, deployer, minterFilter.address);
    linear = new MinterDALinear(system.ledger, deployer, minterFilter.address);
  });

  it("Should identify itself", () => {
    expect(minterFilter.minterFilterType()).to.equal("MinterFilter");
    expect(minterFilter.minterFilterVersion()).to.equal("v1.0.0");
    expect(minterFilter.owner()).to.equal(system.adminACL.address);
    expect(minterFilter.coreRegistry()).to.equal(system.coreRegistry.address);
  });

  describe("Global approvals", function () {
    it("Should only let the admin approve minters", () => {
      expect(() => minterFilter.connect(artist).approveMinterGlobally(setPrice.address)).to.be.revertedWith(
        Errors.OnlyAdminACL,
      );
    });

    it("Should approve and list minters with their type", () => {
      expect(() => minterFilter.connect(deployer).approveMinterGlobally(setPrice.address))
        .to.emit(minterFilter, "MinterApprovedGlobally")
        .withArgs(setPrice.address, "MinterSetPrice");
      minterFilter.connect(deployer).approveMinterGlobally(linear.address);

      expect(minterFilter.isGloballyApprovedMinter(setPrice.address)).to.be.true;
      expect(minterFilter.getAllGloballyApprovedMinters()).to.deep.equal([
        { minterAddress: setPrice.address, minterType: "MinterSetPrice" },
        { minterAddress: linear.address, minterType: "MinterDALinear" },
      ]);
      expect(() => minterFilter.connect(deployer).approveMinterGlobally(setPrice.address)).to.be.revertedWith(
        Errors.MinterAlreadyApproved,
      );
    });

    it("Should only approve contracts that are minters", () => {
      expect(() => minterFilter.connect(deployer).approveMinterGlobally(system.randomizer.address)).to.be.revertedWith(
        Errors.NoFallback,
      );
    });

    it("Should revoke approved minters", () => {
      expect(() => minterFilter.connect(deployer).revokeMinterGlobally(setPrice.address)).to.be.revertedWith(
        Errors.OnlyPreviouslyApproved,
      );
      minterFilter.connect(deployer).approveMinterGlobally(setPrice.address);

      expect(() => minterFilter.connect(deployer).revokeMinterGlobally(setPrice.address))
        .to.emit(minterFilter, "MinterRevokedGlobally")
        .withArgs(setPrice.address);
      expect(minterFilter.isGloballyApprovedMinter(setPrice.address)).to.be.false;
    });
  });

  describe("Contract approvals", function () {
    it("Should only approve minters for registered cores", () => {
      const unregistered = deployCore(system);
      system.coreRegistry.connect(deployer).unregisterContract(unregistered.address);

      expect(() =>
        minterFilter.connect(deployer).approveMinterForContract(unregistered.address, setPrice.address),
      ).to.be.revertedWith(Errors.OnlyRegisteredCore);
    });

    it("Should only let the core admin approve minters for its contract", () => {
      expect(() =>
        minterFilter.connect(artist).approveMinterForContract(core.address, setPrice.address),
      ).to.be.revertedWith(Errors.OnlyCoreAdminACL);
    });

    it("Should approve minters for one contract only", () => {
      const other = deployCore(system);

      expect(() => minterFilter.connect(deployer).approveMinterForContract(core.address, setPrice.address))
        .to.emit(minterFilter, "MinterApprovedForContract")
        .withArgs(core.address, setPrice.address, "MinterSetPrice");

      expect(minterFilter.isApprovedMinterForContract(core.address, setPrice.address)).to.be.true;
      expect(minterFilter.isApprovedMinterForContract(other.address, setPrice.address)).to.be.false;
      expect(minterFilter.getAllContractApprovedMinters(core.address)).to.deep.equal([
        { minterAddress: setPrice.address, minterType: "MinterSetPrice" },
      ]);
      expect(() =>
        minterFilter.connect(deployer).approveMinterForContract(core.address, setPrice.address),
      ).to.be.revertedWith(Errors.MinterAlreadyApproved);

      expect(() => minterFilter.connect(deployer).revokeMinterForContract(core.address, setPrice.address))
        .to.emit(minterFilter, "MinterRevokedForContract")
        .withArgs(core.address, setPrice.address);
      expect(minterFilter.getAllContractApprovedMinters(core.address)).to.deep.equal([]);
    });
  });

  describe("Project assignment", function () {
    beforeEach(() => {
      minterFilter.connect(deployer).approveMinterGlobally(setPrice.address);
    });

    it("Should let the artist assign an approved minter", () => {
      expect(() => minterFilter.connect(artist).setMinterForProject(system.projectZero, core.address, setPrice.address))
        .to.emit(minterFilter, "ProjectMinterRegistered")
        .withArgs(system.projectZero, core.address, setPrice.address, "MinterSetPrice");

      expect(minterFilter.getMinterForProject(system.projectZero, core.address)).to.equal(setPrice.address);
      expect(minterFilter.projectHasMinter(system.projectZero, core.address)).to.be.true;
      expect(minterFilter.getNumProjectsUsingMinter(setPrice.address)).to.equal(1);
      expect(minterFilter.getNumProjectsOnContractWithMinters(core.address)).to.equal(1);
      expect(minterFilter.getProjectAndMinterInfoOnContractAt(core.address, 0)).to.deep.equal({
        projectId: system.projectZero,
        minterAddress: setPrice.address,
        minterType: "MinterSetPrice",
      });
    });

    it("Should accept and report assignments under any address casing", () => {
      const lowercaseCore = core.address.toLowerCase();

      expect(() =>
        minterFilter
          .connect(artist)
          .setMinterForProject(system.projectZero, lowercaseCore, setPrice.address.toLowerCase()),
      )
        .to.emit(minterFilter, "ProjectMinterRegistered")
        .withArgs(system.projectZero, core.address, setPrice.address, "MinterSetPrice");

      expect(minterFilter.getMinterForProject(system.projectZero, lowercaseCore)).to.equal(setPrice.address);
      expect(minterFilter.projectHasMinter(system.projectZero, lowercaseCore)).to.be.true;
      expect(minterFilter.getNumProjectsOnContractWithMinters(lowercaseCore)).to.equal(1);
      expect(minterFilter.getNumProjectsUsingMinter(setPrice.address.toLowerCase())).to.equal(1);
      expect(minterFilter.isApprovedMinterForContract(lowercaseCore, setPrice.address.toLowerCase())).to.be.true;

      setPrice.connect(artist).updatePricePerTokenInWei(system.projectZero, lowercaseCore, ONE_ETH);
      const tokenId = setPrice.connect(buyer, { value: ONE_ETH }).purchase(system.projectZero, lowercaseCore);
      expect(core.ownerOf(tokenId)).to.equal(buyer.address);
    });

    it("Should check assignments in order", () => {
      const unregistered = deployCore(system);
      system.coreRegistry.connect(deployer).unregisterContract(unregistered.address);

      expect(() =>
        minterFilter.connect(artist).setMinterForProject(0, unregistered.address, setPrice.address),
      ).to.be.revertedWith(Errors.OnlyRegisteredCore);
      expect(() =>
        minterFilter.connect(buyer).setMinterForProject(system.projectZero, core.address, setPrice.address),
      ).to.be.revertedWith(Errors.OnlyArtistOrCoreAdminACL);
      expect(() =>
        minterFilter.connect(artist).setMinterForProject(system.projectZero, core.address, linear.address),
      ).to.be.revertedWith(Errors.OnlyApprovedMinters);
      expect(() =>
        minterFilter.connect(deployer).setMinterForProject(7, core.address, setPrice.address),
      ).to.be.revertedWith(Errors.OnlyValidProjectId);
    });

    it("Should move the project count when a project changes minter", () => {
      minterFilter.connect(deployer).approveMinterGlobally(linear.address);
      minterFilter.connect(artist).setMinterForProject(system.projectZero, core.address, setPrice.address);
      minterFilter.connect(artist).setMinterForProject(system.projectZero, core.address, linear.address);

      expect(minterFilter.getNumProjectsUsingMinter(setPrice.address)).to.equal(0);
      expect(minterFilter.getNumProjectsUsingMinter(linear.address)).to.equal(1);
      expect(minterFilter.getNumProjectsOnContractWithMinters(core.address)).to.equal(1);
    });

    it("Should keep assignments apart per core contract", () => {
      const other = deployCore(system, { startingProjectId: 3 });
      const otherProject = addActiveProject(other, deployer, artist);
      minterFilter.connect(artist).setMinterForProject(otherProject, other.address, setPrice.address);

      expect(otherProject).to.equal(3);
      expect(minterFilter.projectHasMinter(otherProject, other.address)).to.be.true;
      expect(minterFilter.projectHasMinter(otherProject, core.address)).to.be.false;
      expect(() => minterFilter.getMinterForProject(system.projectZero, core.address)).to.be.revertedWith(
        Errors.NoMinterAssigned,
      );
    });

    it("Should let only the core admin remove assignments", () => {
      minterFilter.connect(artist).setMinterForProject(system.projectZero, core.address, setPrice.address);

      expect(() => minterFilter.connect(artist).removeMinterForProject(system.projectZero, core.address)).to.be
        .revertedWith(Errors.OnlyCoreAdminACL);
      expect(() => minterFilter.connect(deployer).removeMinterForProject(system.projectZero, core.address))
        .to.emit(minterFilter, "ProjectMinterRemoved")
        .withArgs(system.projectZero, core.address);

      expect(minterFilter.projectHasMinter(system.projectZero, core.address)).to.be.false;
      expect(minterFilter.getNumProjectsUsingMinter(setPrice.address)).to.equal(0);
      expect(() => minterFilter.connect(deployer).removeMinterForProject(system.projectZero, core.address)).to.be
        .revertedWith(Errors.NoMinterAssigned);
    });

    it("Should remove assignments in bulk", () => {
      const second = addActiveProject(core, deployer, artist);
      minterFilter.connect(artist).setMinterForProject(system.projectZero, core.address, setPrice.address);
      minterFilter.connect(artist).setMinterForProject(second, core.address, setPrice.address);

      minterFilter.connect(deployer).removeMintersForProjectsOnContract([system.projectZero, second], core.address);

      expect(minterFilter.getNumProjectsOnContractWithMinters(core.address)).to.equal(0);
      expect(minterFilter.getNumProjectsUsingMinter(setPrice.address)).to.equal(0);
    });
  });

  describe("Minting", function () {
    it("Should only mint from the assigned minter", () => {
      expect(() =>
        minterFilter.connect(buyer).mint(buyer.address, system.projectZero, core.address, buyer.address),
      ).to.be.revertedWith(Errors.NoMinterAssigned);

      minterFilter.connect(deployer).approveMinterGlobally(setPrice.address);
      minterFilter.connect(artist).setMinterForProject(system.projectZero, core.address, setPrice.address);
      expect(() =>
        minterFilter.connect(buyer).mint(buyer.address, system.projectZero, core.address, buyer.address),
      ).to.be.revertedWith(Errors.OnlyAssignedMinter);
    });
  });

  describe("Administration", function () {
    it("Should refuse to renounce ownership", () => {
      expect(() => minterFilter.connect(system.adminACL.address).renounceOwnership()).to.be.revertedWith(
        Errors.CannotRenounce,
      );
    });

    it("Should let the admin point at a new core registry", () => {
      const registry = new CoreRegistry(system.ledger, deployer);

      expect(() => minterFilter.connect(artist).updateCoreRegistry(registry.address)).to.be.revertedWith(
        Errors.OnlyAdminACL,
      );
      expect(() => minterFilter.connect(deployer).updateCoreRegistry(AddressZero)).to.be.revertedWith(
        Errors.ZeroAddress,
      );
      expect(() => minterFilter.connect(deployer).updateCoreRegistry(registry.address))
        .to.emit(minterFilter, "CoreRegistryUpdated")
        .withArgs(registry.address);
      expect(minterFilter.isRegisteredCoreContract(core.address)).to.be.false;
    });
  });
});
