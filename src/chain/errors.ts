import { Logger } from "../logger";

/**
 * A failed contract call. Carries the same `code` and `reason` fields ethers v5 reports for reverted calls.
 */
export class Revert extends Error {
  readonly code = Logger.errors.CALL_EXCEPTION;

  constructor(readonly reason: string) {
    super(`execution reverted: "${reason}"`);
    this.name = "Revert";
  }
}

export function revert(reason: string): never {
  throw new Revert(reason);
}

export function requires(condition: unknown, reason: string): asserts condition {
  if (!condition) {
    throw new Revert(reason);
  }
}

export function isRevert(error: unknown): error is Revert {
  return error instanceof Revert;
}
