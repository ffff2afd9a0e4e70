import { parseEther } from "@ethersproject/units";
import { expect } from "chai";
import { BigNumber, constants } from "ethers";

import type { AddressLike, LedgerContract, Signer } from "../src";
import {
  Contract,
  EnumerableMap,
  EnumerableSet,
  Ledger,
  Mapping,
  isRevert,
  isMinter,
  numberKey,
  revert,
  stringKey,
} from "../src";
import { Errors } from "./__utils__/data";
import "./__utils__/matchers";
import { RevertingReceiver } from "./__utils__/mocks";

class Vault extends Contract {
  private readonly deposits: Mapping<string, BigNumber>;

  constructor(ledger: Ledger, deployer: AddressLike) {
    super(ledger, deployer);
    this.deposits = new Mapping(ledger, stringKey);
  }

  depositOf(account: string): BigNumber {
    return this.deposits.get(account) ?? constants.Zero;
  }

  deposit(): void {
    this.deposits.set(this.msgSender, this.depositOf(this.msgSender).add(this.msgValue));
    this.emit("Deposited", this.msgSender, this.msgValue);
  }

  depositAndFail(): void {
    this.deposit();
    revert("Vault: failed after deposit");
  }

  forwardAndRecover(to: string): void {
    const target = this.ledger.resolve(to, isVault);
    try {
      this.external(target, { value: this.msgValue }).depositAndFail();
    } catch (error) {
      if (!isRevert(error)) {
        throw error;
      }
      this.emit("ForwardFailed", error.reason);
    }
  }

  override receive(): void {
    this.emit("Received", this.msgSender, this.msgValue);
  }
}

function isVault(contract: LedgerContract): contract is Vault {
  return contract instanceof Vault;
}

describe("Ledger", () => {
  let ledger: Ledger;
  let deployer: Signer, buyer: Signer;
  let vault: Vault;

  beforeEach(() => {
    ledger = new Ledger({ genesisTimestamp: 1000 });
    [deployer, buyer] = ledger.getSigners();
    vault = new Vault(ledger, deployer);
  });

  describe("Accounts", function () {
    it("Should fund the configured number of signers", () => {
      expect(ledger.getSigners()).to.have.length(10);
      expect(ledger.getBalance(buyer).toString()).to.equal(parseEther("10000").toString());
    });

    it("Should derive the same signer addresses on every ledger", () => {
      expect(new Ledger().getSigners()[1].address).to.equal(buyer.address);
    });

    it("Should deploy contracts at distinct addresses", () => {
      const second = new Vault(ledger, deployer);
      expect(second.address).to.not.equal(vault.address);
      expect(ledger.isContract(second.address)).to.be.true;
      expect(ledger.isContract(buyer.address)).to.be.false;
    });

    it("Should reject invalid addresses", () => {
      expect(() => ledger.getBalance("0x1234")).to.throw("invalid address");
    });
  });

  describe("Transactions", function () {
    it("Should move value and record a receipt", () => {
      expect(() => vault.connect(buyer, { value: parseEther("1") }).deposit())
        .to.emit(vault, "Deposited")
        .withArgs(buyer.address, parseEther("1"));

      expect(ledger.getBalance(buyer).toString()).to.equal(parseEther("9999").toString());
      expect(vault.balance().toString()).to.equal(parseEther("1").toString());
      expect(vault.depositOf(buyer.address).toString()).to.equal(parseEther("1").toString());
      expect(ledger.lastReceipt.from).to.equal(buyer.address);
      expect(ledger.lastReceipt.to).to.equal(vault.address);
      expect(ledger.lastReceipt.timestamp).to.equal(1000);
    });

    it("Should roll back storage, balances and logs on revert", () => {
      const transactionCount = ledger.transactionCount;

      expect(() => vault.connect(buyer, { value: parseEther("1") }).depositAndFail()).to.be.revertedWith(
        "Vault: failed after deposit",
      );

      expect(ledger.transactionCount).to.equal(transactionCount);
      expect(ledger.getBalance(buyer).toString()).to.equal(parseEther("10000").toString());
      expect(vault.balance().isZero()).to.be.true;
      expect(vault.depositOf(buyer.address).isZero()).to.be.true;
      expect(ledger.getLogs({ address: vault.address, event: "Deposited" })).to.have.length(0);
    });

    it("Should undo only the failed inner call when the caller recovers", () => {
      const other = new Vault(ledger, deployer);

      expect(() => vault.connect(buyer, { value: parseEther("1") }).forwardAndRecover(other.address))
        .to.emit(vault, "ForwardFailed")
        .withArgs("Vault: failed after deposit");

      expect(vault.balance().toString()).to.equal(parseEther("1").toString());
      expect(other.balance().isZero()).to.be.true;
      expect(other.depositOf(vault.address).isZero()).to.be.true;
      expect(ledger.lastReceipt.logs.map(log => log.event)).to.deep.equal(["ForwardFailed"]);
    });

    it("Should reject value the sender doesn't have", () => {
      const empty = ledger.createAccount("empty");

      expect(() => vault.connect(empty, { value: 1 }).deposit()).to.be.revertedWith(Errors.InsufficientFunds);
    });

    it("Should run the receive hook of contracts on plain transfers", () => {
      expect(() => ledger.sendTransaction(buyer, { to: vault.address, value: 5 }))
        .to.emit(vault, "Received")
        .withArgs(buyer.address, 5);
    });

    it("Should report failed value transfers to contracts without a receive hook", () => {
      const receiver = new RevertingReceiver(ledger, deployer);

      expect(() => ledger.sendTransaction(buyer, { to: receiver.address, value: 5 })).to.be.revertedWith(
        Errors.NoFallback,
      );
      expect(ledger.sendValue(buyer.address, receiver.address, BigNumber.from(5))).to.be.false;
      expect(receiver.balance().isZero()).to.be.true;
    });

    it("Should refuse to read the caller outside of a call", () => {
      expect(() => vault.deposit()).to.throw("no call is executing on this contract");
    });

    it("Should only resolve deployed contracts with the expected interface", () => {
      expect(() => ledger.resolve(buyer.address, isMinter)).to.be.revertedWith(
        "function call to a non-contract account",
      );
      expect(() => ledger.resolve(vault.address, isMinter)).to.be.revertedWith(Errors.NoFallback);
      expect(ledger.resolve(vault.address, isVault)).to.equal(vault);
    });

    it("Should filter committed logs by address and event", () => {
      const other = new Vault(ledger, deployer);
      vault.connect(buyer, { value: 1 }).deposit();
      other.connect(buyer, { value: 2 }).deposit();

      const logs = ledger.getLogs({ event: "Deposited" });
      expect(logs.map(log => log.address)).to.deep.equal([vault.address, other.address]);
      expect(ledger.getLogs({ address: other.address })).to.have.length(1);
    });
  });

  describe("Time", function () {
    it("Should only move forward", () => {
      expect(ledger.increaseTime(100)).to.equal(1100);
      ledger.setNextBlockTimestamp(1500);
      expect(ledger.timestamp).to.equal(1500);
      expect(() => ledger.increaseTime(-1)).to.throw("time can only move forward");
      expect(() => ledger.setNextBlockTimestamp(1499)).to.throw("timestamp must not be before the current timestamp");
    });
  });

  describe("Storage", function () {
    it("Should move the last element into a removed slot", () => {
      const set = new EnumerableSet<string>(ledger, stringKey);
      ["a", "b", "c"].forEach(value => set.add(value));

      expect(set.add("a")).to.be.false;
      expect(set.remove("a")).to.be.true;
      expect(set.values()).to.deep.equal(["c", "b"]);
      expect(set.contains("a")).to.be.false;
      expect(() => set.at(2)).to.be.revertedWith("EnumerableSet: index out of bounds");
    });

    it("Should report whether a map key is new", () => {
      const map = new EnumerableMap<number, string>(ledger, numberKey);

      expect(map.set(7, "seven")).to.be.true;
      expect(map.set(7, "siete")).to.be.false;
      expect(map.at(0)).to.deep.equal([7, "siete"]);
      expect(map.remove(7)).to.be.true;
      expect(map.tryGet(7)).to.be.undefined;
      expect(() => map.get(7)).to.be.revertedWith("EnumerableMap: nonexistent key");
    });
  });
});
