import { parseEther } from "@ethersproject/units";
import { expect } from "chai";
import { constants, utils } from "ethers";

import type { Signer } from "../src";
import {
  AddressZero,
  EngineCore,
  GenerativeCore,
  MinterSetPrice,
  ZERO_HASH_SEED,
  decodeRevenueSplits,
  isEngineRevenueSplitData,
} from "../src";
import { Errors, ONE_ETH } from "./__utils__/data";
import type { System } from "./__utils__/helpers";
import { assignMinter, deployCore, setupSystem } from "./__utils__/helpers";

describe("Generative Core", () => {
  let system: System;
  let deployer: Signer, artist: Signer, buyer: Signer, additionalPayee: Signer;
  let core: GenerativeCore;

  beforeEach(() => {
    system = setupSystem();
    ({ deployer, artist, buyer, additionalPayee, core } = system);
  });

  describe("Projects", function () {
    it("Should create projects inactive and paused", () => {
      const projectId = core.connect(deployer).addProject("Fresh", artist.address);

      expect(projectId).to.equal(1);
      expect(core.nextProjectId()).to.equal(2);
      expect(core.projectDetails(projectId)).to.deep.equal({ projectName: "Fresh", artist: artist.address });
      expect(core.projectStateData(projectId)).to.deep.equal({
        invocations: 0,
        maxInvocations: 1_000_000,
        active: false,
        paused: true,
        completedTimestamp: 0,
      });
    });

    it("Should report empty state for projects that don't exist", () => {
      expect(core.projectIdToArtistAddress(99)).to.equal(AddressZero);
      expect(core.projectStateData(99)).to.deep.equal({
        invocations: 0,
        maxInvocations: 0,
        active: false,
        paused: false,
        completedTimestamp: 0,
      });
      expect(() => core.projectDetails(99)).to.be.revertedWith("Project ID does not exist");
    });

    it("Should only let the artist pause and limit a project", () => {
      expect(() => core.connect(buyer).toggleProjectIsPaused(system.projectZero)).to.be.revertedWith(
        Errors.OnlyArtistCore,
      );
      expect(() => core.connect(artist).updateProjectMaxInvocations(system.projectZero, 1_000_000)).to.be.revertedWith(
        "Only maxInvocations decrease",
      );

      core.connect(artist).updateProjectMaxInvocations(system.projectZero, 10);
      expect(core.projectStateData(system.projectZero).maxInvocations).to.equal(10);
    });

    it("Should cap the additional payee percentage", () => {
      expect(() =>
        core.connect(artist).updateProjectAdditionalPayeeInfo(system.projectZero, additionalPayee.address, 101),
      ).to.be.revertedWith("Max of 100%");

      core.connect(artist).updateProjectAdditionalPayeeInfo(system.projectZero, additionalPayee.address, 25);
      expect(core.projectIdToAdditionalPayeePrimarySales(system.projectZero)).to.deep.equal({
        additionalPayee: additionalPayee.address,
        percentage: 25,
      });
    });
  });

  describe("Minting", function () {
    let minter: MinterSetPrice;

    beforeEach(() => {
      minter = assignMinter(system, new MinterSetPrice(system.ledger, deployer, system.minterFilter.address));
      minter.connect(artist).updatePricePerTokenInWei(system.projectZero, core.address, ONE_ETH);
    });

    it("Should only mint through the minter filter", () => {
      expect(() => core.connect(buyer).mint(buyer.address, system.projectZero, buyer.address)).to.be.revertedWith(
        Errors.MustMintFromMinter,
      );
    });

    it("Should number tokens by project and invocation and assign a hash seed", () => {
      expect(() => minter.connect(buyer, { value: ONE_ETH }).purchase(system.projectZero, core.address))
        .to.emit(core, "Transfer")
        .withArgs(AddressZero, buyer.address, 0);

      expect(core.ownerOf(0)).to.equal(buyer.address);
      expect(core.tokenIdToHashSeed(0)).to.not.equal(ZERO_HASH_SEED);
      expect(utils.hexDataLength(core.tokenIdToHashSeed(0))).to.equal(12);
      expect(core.projectStateData(system.projectZero).invocations).to.equal(1);
      expect(() => core.ownerOf(1)).to.be.revertedWith("ERC721: invalid token ID");
    });

    it("Should let only the artist mint an inactive or paused project", () => {
      const projectId = core.connect(deployer).addProject("Preview", artist.address);
      assignMinter(system, minter, projectId);
      minter.connect(artist).updatePricePerTokenInWei(projectId, core.address, 0);

      expect(() => minter.connect(buyer).purchase(projectId, core.address)).to.be.revertedWith(Errors.ProjectInactive);
      expect(minter.connect(artist).purchase(projectId, core.address)).to.equal(1_000_000);

      core.connect(deployer).toggleProjectIsActive(projectId);
      expect(() => minter.connect(buyer).purchase(projectId, core.address)).to.be.revertedWith(Errors.PurchasesPaused);
    });

    it("Should record when a project completes", () => {
      system.ledger.setNextBlockTimestamp(system.ledger.timestamp + 60);
      core.connect(artist).updateProjectMaxInvocations(system.projectZero, 1);
      minter.connect(artist).syncProjectMaxInvocationsToCore(system.projectZero, core.address);

      minter.connect(buyer, { value: ONE_ETH }).purchase(system.projectZero, core.address);

      expect(core.projectStateData(system.projectZero).completedTimestamp).to.equal(system.ledger.timestamp);
    });

    it("Should only accept hash seeds from the randomizer", () => {
      minter.connect(buyer, { value: ONE_ETH }).purchase(system.projectZero, core.address);

      expect(() => core.connect(deployer).setTokenHashSeed(0, "0x0102030405060708090a0b0c")).to.be.revertedWith(
        "Only randomizer may set",
      );
    });
  });

  describe("Revenue splits", function () {
    it("Should encode six words on flagship cores", () => {
      core.connect(artist).updateProjectAdditionalPayeeInfo(system.projectZero, additionalPayee.address, 20);
      const data = core.getPrimaryRevenueSplits(system.projectZero, ONE_ETH);

      expect(utils.hexDataLength(data)).to.equal(192);
      expect(isEngineRevenueSplitData(data)).to.be.false;
      const splits = decodeRevenueSplits(data, false);
      expect(splits.renderProviderRevenue.toString()).to.equal(parseEther("0.1").toString());
      expect(splits.additionalPayeeRevenue.toString()).to.equal(parseEther("0.18").toString());
      expect(splits.artistRevenue.toString()).to.equal(parseEther("0.72").toString());
      expect(splits.artistAddress).to.equal(artist.address);
    });

    it("Should encode eight words on engine cores", () => {
      const engine = deployCore(system, { engine: true });
      const projectId = engine.connect(deployer).addProject("Engine", artist.address);
      const data = engine.getPrimaryRevenueSplits(projectId, ONE_ETH);

      expect(utils.hexDataLength(data)).to.equal(256);
      expect(isEngineRevenueSplitData(data)).to.be.true;
      const splits = decodeRevenueSplits(data, true);
      expect(splits.platformProviderRevenue.toString()).to.equal(parseEther("0.1").toString());
      expect(splits.platformProviderAddress).to.equal(system.platformProvider.address);
      expect(splits.artistRevenue.toString()).to.equal(parseEther("0.8").toString());
    });

    it("Should keep provider percentages at or below 100 in total", () => {
      const engine = deployCore(system, { engine: true });
      if (!(engine instanceof EngineCore)) {
        throw new Error("expected an engine core");
      }

      expect(() => engine.connect(deployer).updateProviderPrimarySalesPercentages(60, 41)).to.be.revertedWith(
        "Max of 100%",
      );
      engine.connect(deployer).updateProviderPrimarySalesPercentages(60, 40);
      const splits = decodeRevenueSplits(engine.getPrimaryRevenueSplits(0, ONE_ETH), true);
      expect(splits.artistRevenue.isZero()).to.be.true;
    });

    it("Should pay nothing on a zero price", () => {
      const splits = decodeRevenueSplits(core.getPrimaryRevenueSplits(system.projectZero, constants.Zero), false);

      expect(splits.renderProviderRevenue.isZero()).to.be.true;
      expect(splits.artistRevenue.isZero()).to.be.true;
    });
  });
});
