import { parseEther } from "@ethersproject/units";
import { config as loadDotenv } from "dotenv";
import { BigNumber } from "ethers";
import * as v from "valibot";

import type { LogLevelName } from "./logger";
import { LOG_LEVEL_NAMES, Logger, logger, setLogLevel } from "./logger";

const integerVariable = (fallback: number, minimum = 0) =>
  v.optional(
    v.pipe(
      v.string(),
      v.trim(),
      v.digits("must be a whole number"),
      v.transform(Number),
      v.minValue(minimum, `must be at least ${minimum}`),
    ),
    String(fallback),
  );

const EnvSchema = v.pipe(
  v.object({
    LOG_LEVEL: v.optional(v.picklist(LOG_LEVEL_NAMES, "must be one of DEBUG, INFO, WARNING, ERROR, OFF"), "WARNING"),
    LEDGER_GENESIS_TIMESTAMP: integerVariable(1_700_000_000),
    LEDGER_SIGNER_COUNT: integerVariable(10, 1),
    LEDGER_SIGNER_BALANCE_ETH: v.optional(
      v.pipe(v.string(), v.trim(), v.decimal("must be a decimal ether amount")),
      "10000",
    ),
    MINTER_MIN_AUCTION_LENGTH_SECONDS: integerVariable(600),
    MINTER_MIN_PRICE_DECAY_HALF_LIFE_SECONDS: integerVariable(45, 1),
    MINTER_MAX_PRICE_DECAY_HALF_LIFE_SECONDS: integerVariable(3600, 1),
  }),
  v.check(
    env => env.MINTER_MAX_PRICE_DECAY_HALF_LIFE_SECONDS > env.MINTER_MIN_PRICE_DECAY_HALF_LIFE_SECONDS,
    "MINTER_MAX_PRICE_DECAY_HALF_LIFE_SECONDS must be greater than MINTER_MIN_PRICE_DECAY_HALF_LIFE_SECONDS",
  ),
);

export type MinterSuiteConfig = {
  logLevel: LogLevelName;
  ledger: {
    genesisTimestamp: number;
    signerCount: number;
    signerBalance: BigNumber;
  };
  auctions: {
    minimumAuctionLengthSeconds: number;
    minimumPriceDecayHalfLifeSeconds: number;
    maximumPriceDecayHalfLifeSeconds: number;
  };
};

/**
 * Validates an environment map and builds the configuration from it. Does not read `process.env` or `.env`
 * on its own; see {@link getConfig}.
 */
export function loadConfig(env: Record<string, string | undefined>): MinterSuiteConfig {
  const result = v.safeParse(EnvSchema, env);
  if (!result.success) {
    const problems = result.issues.map(issue => `${v.getDotPath(issue) ?? "environment"}: ${issue.message}`);
    return logger.throwError(`invalid configuration (${problems.join("; ")})`, Logger.errors.INVALID_ARGUMENT, {
      argument: "env",
      problems,
    });
  }
  const parsed = result.output;
  return {
    logLevel: parsed.LOG_LEVEL,
    ledger: {
      genesisTimestamp: parsed.LEDGER_GENESIS_TIMESTAMP,
      signerCount: parsed.LEDGER_SIGNER_COUNT,
      signerBalance: parseEther(parsed.LEDGER_SIGNER_BALANCE_ETH),
    },
    auctions: {
      minimumAuctionLengthSeconds: parsed.MINTER_MIN_AUCTION_LENGTH_SECONDS,
      minimumPriceDecayHalfLifeSeconds: parsed.MINTER_MIN_PRICE_DECAY_HALF_LIFE_SECONDS,
      maximumPriceDecayHalfLifeSeconds: parsed.MINTER_MAX_PRICE_DECAY_HALF_LIFE_SECONDS,
    },
  };
}

let cached: MinterSuiteConfig | undefined;

export function getConfig(): MinterSuiteConfig {
  if (!cached) {
    loadDotenv();
    cached = loadConfig(process.env);
    setLogLevel(cached.logLevel);
    logger.info(`configuration loaded (log level ${cached.logLevel})`);
  }
  return cached;
}
