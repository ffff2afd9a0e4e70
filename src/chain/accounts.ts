import type { BigNumberish } from "ethers";
import { constants, utils } from "ethers";

import { logger } from "../logger";

export const AddressZero = constants.AddressZero;

export interface Signer {
  readonly address: string;
}

export type AddressLike = Signer | string;

export function toAddress(account: AddressLike): string {
  const address = typeof account === "string" ? account : account.address;
  if (!utils.isAddress(address)) {
    return logger.throwArgumentError("invalid address", "account", address);
  }
  return utils.getAddress(address);
}

export function isZeroAddress(address: string): boolean {
  return address === AddressZero;
}

export function accountAddressFor(label: string): string {
  return utils.getAddress(utils.hexDataSlice(utils.id(`account:${label}`), 12));
}

export function contractAddressFor(deployer: string, nonce: BigNumberish): string {
  return utils.getContractAddress({ from: deployer, nonce });
}

/** 4-byte function selector, as passed to admin ACL checks. */
export function selector(signature: string): string {
  return utils.hexDataSlice(utils.id(signature), 0, 4);
}
