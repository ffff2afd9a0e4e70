import type { AddressLike } from "../../chain/accounts";
import { AddressZero, selector, toAddress } from "../../chain/accounts";
import { Contract } from "../../chain/contract";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import { Mapping, Slot, numberKey } from "../../chain/storage";
import { isCoreContract, tokenIdToProjectId } from "../interfaces/ICoreContract";
import type { IPolyptychRandomizer } from "../interfaces/IRandomizer";
import { isTokenHashSeedReceiver, pseudorandomHashSeed } from "./BasicRandomizer";
import { ZERO_HASH_SEED } from "./GenerativeCore";

export const PolyptychRandomizerErrors = {
  onlyCore: "Only core may call",
  onlyCoreAdminACL: "Only Core AdminACL allowed",
  onlyHashSeedSetter: "Only hashSeedSetterContract",
  seedNotAssigned: "Hash seed not preassigned",
};

/**
 * Randomizer bound to one core. Projects toggled to use assigned seeds take the seed that the hash seed setter
 * (a polyptych minter) stored for the token before minting; other projects get pseudorandom seeds.
 */
export class PolyptychRandomizer extends Contract implements IPolyptychRandomizer {
  private readonly coreContract: string;
  private readonly hashSeedSetter: Slot<string>;
  private readonly projectUsesAssignedSeeds: Mapping<number, boolean>;
  private readonly preassignedHashSeeds: Mapping<number, string>;

  constructor(ledger: Ledger, deployer: AddressLike, coreContract: string) {
    super(ledger, deployer);
    this.coreContract = toAddress(coreContract);
    this.hashSeedSetter = new Slot(ledger, AddressZero);
    this.projectUsesAssignedSeeds = new Mapping(ledger, numberKey);
    this.preassignedHashSeeds = new Mapping(ledger, numberKey);
  }

  coreContractAddress(): string {
    return this.coreContract;
  }

  hashSeedSetterContract(): string {
    return this.hashSeedSetter.get();
  }

  projectUsesHashSeedSetter(projectId: number): boolean {
    return this.projectUsesAssignedSeeds.get(projectId) ?? false;
  }

  setHashSeedSetterContract(hashSeedSetter: string): void {
    this.onlyCoreAdminACL("setHashSeedSetterContract(address)");
    this.hashSeedSetter.set(toAddress(hashSeedSetter));
    this.emit("HashSeedSetterUpdated", this.hashSeedSetter.get());
  }

  toggleProjectUseAssignedHashSeed(projectId: number): void {
    this.onlyCoreAdminACL("toggleProjectUseAssignedHashSeed(uint256)");
    const usesAssignedSeeds = !this.projectUsesHashSeedSetter(projectId);
    this.projectUsesAssignedSeeds.set(projectId, usesAssignedSeeds);
    this.emit("ProjectUsesHashSeedSetter", projectId, usesAssignedSeeds);
  }

  setPolyptychHashSeed(tokenId: number, hashSeed: string): void {
    requires(this.msgSender === this.hashSeedSetter.get(), PolyptychRandomizerErrors.onlyHashSeedSetter);
    this.preassignedHashSeeds.set(tokenId, hashSeed);
  }

  assignTokenHash(tokenId: number): void {
    requires(this.msgSender === this.coreContract, PolyptychRandomizerErrors.onlyCore);
    let hashSeed: string;
    if (this.projectUsesHashSeedSetter(tokenIdToProjectId(tokenId))) {
      const preassigned = this.preassignedHashSeeds.get(tokenId);
      requires(preassigned !== undefined && preassigned !== ZERO_HASH_SEED, PolyptychRandomizerErrors.seedNotAssigned);
      hashSeed = preassigned;
    } else {
      hashSeed = pseudorandomHashSeed(this.coreContract, tokenId, this.blockTimestamp);
    }
    const core = this.ledger.resolve(this.coreContract, isTokenHashSeedReceiver);
    this.external(core).setTokenHashSeed(tokenId, hashSeed);
  }

  private onlyCoreAdminACL(signature: string): void {
    const core = this.ledger.resolve(this.coreContract, isCoreContract);
    requires(
      core.adminACLAllowed(this.msgSender, this.address, selector(signature)),
      PolyptychRandomizerErrors.onlyCoreAdminACL,
    );
  }
}
