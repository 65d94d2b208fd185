import bunyan from "bunyan";
import { mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { getConfigDir, type ConfigData } from "./config/index.js";

const LOG_LEVELS: bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function isLogLevel(value: string): value is bunyan.LogLevelString {
  return LOG_LEVELS.some((level) => level === value);
}

/** Case-insensitive; throws on anything bunyan does not know. */
export function parseLogLevel(raw: string): bunyan.LogLevelString {
  const level = raw.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`Invalid log level "${raw}". Valid levels: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

export function getLogPath(config: Pick<ConfigData, "logFile">): string {
  return config.logFile || join(getConfigDir(), "dropfour.log");
}

/**
 * Create the CLI logger. Records go to a file so they never draw over
 * the terminal UI.
 */
export async function createLogger(
  config: Pick<ConfigData, "logLevel" | "logFile">
): Promise<bunyan> {
  const level = parseLogLevel(config.logLevel);
  const path = getLogPath(config);
  await mkdir(dirname(path), { recursive: true });

  return bunyan.createLogger({
    name: "dropfour",
    streams: [{ level, path }],
  });
}
