import { Logger, LogLevel } from "@ethersproject/logger";

export const version = "generative-minter-suite/1.0.0";

export const logger = new Logger(version);

export type LogLevelName = keyof typeof LogLevel;

export const LOG_LEVEL_NAMES: readonly LogLevelName[] = ["DEBUG", "INFO", "WARNING", "ERROR", "OFF"];

export function setLogLevel(level: LogLevelName): void {
  Logger.setLogLevel(LogLevel[level]);
}

export { Logger };
