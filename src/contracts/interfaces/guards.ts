import type { LedgerContract } from "../../chain/ledger";

/** Interface detection by method presence, standing in for ERC-165 checks. */
export function hasMethods(contract: LedgerContract, methods: readonly string[]): boolean {
  return methods.every(method => typeof Reflect.get(contract, method) === "function");
}
