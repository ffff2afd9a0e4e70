import type { AddressLike } from "../../chain/accounts";
import { toAddress } from "../../chain/accounts";
import { requires } from "../../chain/errors";
import { Ledger } from "../../chain/ledger";
import { EnumerableSet, Mapping, addressKey } from "../../chain/storage";
import { Ownable } from "../access/Ownable";

export type ContractVersionAndType = {
  coreVersion: string;
  coreType: string;
};

/** Registry of core contracts the minter filter will serve. */
export class CoreRegistry extends Ownable {
  private readonly registered: EnumerableSet<string>;
  private readonly versionsAndTypes: Mapping<string, ContractVersionAndType>;

  constructor(ledger: Ledger, deployer: AddressLike) {
    super(ledger, deployer);
    this.registered = new EnumerableSet(ledger, addressKey);
    this.versionsAndTypes = new Mapping(ledger, addressKey);
  }

  registerContract(contractAddress: string, coreVersion: string, coreType: string): void {
    this.onlyOwner();
    this.register(toAddress(contractAddress), coreVersion, coreType);
  }

  registerContracts(contractAddresses: string[], coreVersions: string[], coreTypes: string[]): void {
    this.onlyOwner();
    requires(
      contractAddresses.length === coreVersions.length && contractAddresses.length === coreTypes.length,
      "Mismatched array lengths",
    );
    contractAddresses.forEach((contractAddress, index) =>
      this.register(toAddress(contractAddress), coreVersions[index], coreTypes[index]),
    );
  }

  unregisterContract(contractAddress: string): void {
    this.onlyOwner();
    this.unregister(toAddress(contractAddress));
  }

  unregisterContracts(contractAddresses: string[]): void {
    this.onlyOwner();
    contractAddresses.forEach(contractAddress => this.unregister(toAddress(contractAddress)));
  }

  isRegisteredContract(contractAddress: string): boolean {
    return this.registered.contains(toAddress(contractAddress));
  }

  getNumRegisteredContracts(): number {
    return this.registered.length;
  }

  getRegisteredContractAt(index: number): string {
    return this.registered.at(index);
  }

  getContractVersionAndType(contractAddress: string): ContractVersionAndType {
    const info = this.versionsAndTypes.get(contractAddress);
    requires(info !== undefined, "Core not registered");
    return info;
  }

  private register(contractAddress: string, coreVersion: string, coreType: string): void {
    requires(this.registered.add(contractAddress), "Only unregistered contracts");
    this.versionsAndTypes.set(contractAddress, { coreVersion, coreType });
    this.emit("ContractRegistered", contractAddress, coreVersion, coreType);
  }

  private unregister(contractAddress: string): void {
    requires(this.registered.remove(contractAddress), "Only registered contracts");
    this.versionsAndTypes.delete(contractAddress);
    this.emit("ContractUnregistered", contractAddress);
  }
}
