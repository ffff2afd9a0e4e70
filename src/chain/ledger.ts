import type { BigNumberish } from "ethers";
import { BigNumber } from "ethers";

import { getConfig } from "../config";
import { Logger, logger } from "../logger";
import type { AddressLike, Signer } from "./accounts";
import { accountAddressFor, contractAddressFor, toAddress } from "./accounts";
import { isRevert, requires } from "./errors";
import type { Journal } from "./storage";

export interface LedgerContract {
  readonly address: string;
  connect(signer: AddressLike, overrides?: { value?: BigNumberish }): this;
  receive(): void;
}

export type EventLog = {
  address: string;
  event: string;
  args: unknown[];
  timestamp: number;
};

export type TransactionReceipt = {
  transactionIndex: number;
  from: string;
  to: string;
  value: BigNumber;
  timestamp: number;
  logs: EventLog[];
};

export type LedgerOptions = {
  genesisTimestamp?: number;
  signerCount?: number;
  signerBalance?: BigNumberish;
};

type CallFrame = {
  sender: string;
  target: string;
  value: BigNumber;
};

/**
 * In-process chain state: balances, deployed contracts, a clock and the call stack of the transaction in
 * progress. Contract storage registers undo entries here, so a revert anywhere in a call rolls back every
 * write made since that call began.
 */
export class Ledger implements Journal {
  private now: number;
  private readonly signerCount: number;
  private readonly signerBalance: BigNumber;
  private signers: Signer[] | undefined;

  private readonly balances = new Map<string, BigNumber>();
  private readonly nonces = new Map<string, number>();
  private readonly contracts = new Map<string, LedgerContract>();

  private readonly frames: CallFrame[] = [];
  private undoLog: Array<() => void> = [];
  private pendingLogs: EventLog[] = [];
  private readonly receipts: TransactionReceipt[] = [];
  private readonly history: EventLog[] = [];

  constructor(options: LedgerOptions = {}) {
    const defaults = getConfig().ledger;
    this.now = options.genesisTimestamp ?? defaults.genesisTimestamp;
    this.signerCount = options.signerCount ?? defaults.signerCount;
    this.signerBalance = BigNumber.from(options.signerBalance ?? defaults.signerBalance);
  }

  get timestamp(): number {
    return this.now;
  }

  increaseTime(seconds: number): number {
    if (!Number.isInteger(seconds) || seconds < 0) {
      logger.throwArgumentError("time can only move forward", "seconds", seconds);
    }
    this.now += seconds;
    return this.now;
  }

  setNextBlockTimestamp(timestamp: number): void {
    if (!Number.isInteger(timestamp) || timestamp < this.now) {
      logger.throwArgumentError("timestamp must not be before the current timestamp", "timestamp", timestamp);
    }
    this.now = timestamp;
  }

  getSigners(): Signer[] {
    if (!this.signers) {
      this.signers = Array.from({ length: this.signerCount }, (_, index) =>
        this.createAccount(`signer:${index}`, this.signerBalance),
      );
    }
    return this.signers;
  }

  createAccount(label: string, balance: BigNumberish = 0): Signer {
    const address = accountAddressFor(label);
    this.setBalance(address, balance);
    return { address };
  }

  getBalance(account: AddressLike): BigNumber {
    return this.balances.get(toAddress(account)) ?? BigNumber.from(0);
  }

  setBalance(account: AddressLike, amount: BigNumberish): void {
    this.writeBalance(toAddress(account), BigNumber.from(amount));
  }

  register(contract: LedgerContract, deployer: AddressLike): string {
    const from = toAddress(deployer);
    const nonce = this.nonces.get(from) ?? 0;
    this.nonces.set(from, nonce + 1);
    const address = contractAddressFor(from, nonce);
    this.contracts.set(address, contract);
    logger.debug(`deployed ${contract.constructor.name} at ${address}`);
    return address;
  }

  isContract(address: string): boolean {
    return this.contracts.has(toAddress(address));
  }

  /** Looks up a deployed contract and checks it exposes the interface the caller is about to use. */
  resolve<T extends LedgerContract>(address: string, guard: (contract: LedgerContract) => contract is T): T {
    const contract = this.contracts.get(toAddress(address));
    requires(contract !== undefined, "function call to a non-contract account");
    requires(guard(contract), "function selector was not recognized and there's no fallback function");
    return contract;
  }

  get inTransaction(): boolean {
    return this.frames.length > 0;
  }

  /** The call currently executing on `target`. */
  frame(target: string): Readonly<CallFrame> {
    const frame = this.frames[this.frames.length - 1];
    if (frame === undefined || frame.target !== target) {
      return logger.throwError("no call is executing on this contract", Logger.errors.UNSUPPORTED_OPERATION, {
        operation: "frame",
        target,
      });
    }
    return frame;
  }

  recordUndo(undo: () => void): void {
    if (this.inTransaction) {
      this.undoLog.push(undo);
    }
  }

  emit(address: string, event: string, args: unknown[]): void {
    const log = { address, event, args, timestamp: this.now };
    if (this.inTransaction) {
      this.pendingLogs.push(log);
    } else {
      this.history.push(log);
    }
  }

  /**
   * Runs `body` as a call from `sender` to `target`, moving `value` first. The outermost call is a
   * transaction: it produces a receipt when it succeeds. A throwing call undoes its own writes and logs and
   * rethrows.
   */
  execute<R>(sender: AddressLike, target: string, value: BigNumberish, body: () => R): R {
    const from = toAddress(sender);
    const amount = BigNumber.from(value);
    const outermost = !this.inTransaction;
    const undoMark = this.undoLog.length;
    const logMark = this.pendingLogs.length;

    this.frames.push({ sender: from, target, value: amount });
    try {
      if (!amount.isZero()) {
        this.transfer(from, target, amount);
      }
      const result = body();
      if (outermost) {
        this.commit(from, target, amount);
      }
      return result;
    } catch (error) {
      this.rollback(undoMark, logMark);
      if (outermost && isRevert(error)) {
        logger.debug(`transaction from ${from} to ${target} reverted: ${error.reason}`);
      }
      throw error;
    } finally {
      this.frames.pop();
    }
  }

  /**
   * Low-level value call. Contract recipients run their `receive` hook. A revert in the recipient is undone
   * and reported as `false`; any other error propagates.
   */
  sendValue(from: string, to: string, amount: BigNumber): boolean {
    try {
      this.execute(from, to, amount, () => this.contracts.get(to)?.receive());
      return true;
    } catch (error) {
      if (!isRevert(error)) {
        throw error;
      }
      logger.debug(`value transfer of ${amount.toString()} wei from ${from} to ${to} failed: ${error.reason}`);
      return false;
    }
  }

  sendTransaction(sender: AddressLike, transaction: { to: string; value: BigNumberish }): void {
    const to = toAddress(transaction.to);
    this.execute(sender, to, transaction.value, () => this.contracts.get(to)?.receive());
  }

  get transactionCount(): number {
    return this.receipts.length;
  }

  get lastReceipt(): TransactionReceipt {
    const receipt = this.receipts[this.receipts.length - 1];
    if (receipt === undefined) {
      return logger.throwError("no transactions have been executed", Logger.errors.UNSUPPORTED_OPERATION, {
        operation: "lastReceipt",
      });
    }
    return receipt;
  }

  getLogs(filter: { address?: string; event?: string } = {}): EventLog[] {
    return this.history.filter(
      log =>
        (filter.address === undefined || log.address === filter.address) &&
        (filter.event === undefined || log.event === filter.event),
    );
  }

  private transfer(from: string, to: string, amount: BigNumber): void {
    const balance = this.getBalance(from);
    requires(balance.gte(amount), "sender doesn't have enough funds to send tx");
    this.writeBalance(from, balance.sub(amount));
    this.writeBalance(to, this.getBalance(to).add(amount));
  }

  private writeBalance(address: string, amount: BigNumber): void {
    const previous = this.balances.get(address);
    this.recordUndo(() => {
      if (previous) {
        this.balances.set(address, previous);
      } else {
        this.balances.delete(address);
      }
    });
    this.balances.set(address, amount);
  }

  private commit(from: string, to: string, value: BigNumber): void {
    const receipt: TransactionReceipt = {
      transactionIndex: this.receipts.length,
      from,
      to,
      value,
      timestamp: this.now,
      logs: this.pendingLogs,
    };
    this.receipts.push(receipt);
    this.history.push(...this.pendingLogs);
    this.pendingLogs = [];
    this.undoLog = [];
    logger.debug(`transaction ${receipt.transactionIndex} from ${from} to ${to} emitted ${receipt.logs.length} logs`);
  }

  private rollback(undoMark: number, logMark: number): void {
    const undone = this.undoLog.splice(undoMark);
    for (let index = undone.length - 1; index >= 0; index--) {
      undone[index]();
    }
    this.pendingLogs.splice(logMark);
  }
}
