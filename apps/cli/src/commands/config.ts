import type { Command } from "commander";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  removeConfigKey,
  getConfigPath,
  getSource,
  CONFIG_KEYS,
  type ConfigData,
} from "../config/index.js";
import { validateConfig } from "../settings.js";

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage game configuration (~/.dropfour/config.json)");

  configCmd.action(async () => {
    await printConfigList();
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isValidKey(key)) {
        reportUnknownKey(key);
        return;
      }

      // Check the value against everything else already in effect
      const candidate: ConfigData = { ...(await resolveConfig()), [key]: value };
      try {
        validateConfig(candidate);
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
        return;
      }

      await updateConfigFile(key, value);
      console.log(`Set ${key} = ${value}`);
    });

  configCmd
    .command("unset <key>")
    .description("Remove a value from the config file")
    .action(async (key: string) => {
      if (!isValidKey(key)) {
        reportUnknownKey(key);
        return;
      }
      const removed = await removeConfigKey(key);
      console.log(removed ? `Removed ${key}` : `${key} is not set in ${getConfigPath()}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isValidKey(key)) {
        reportUnknownKey(key);
        return;
      }
      const resolved = await resolveConfig();
      console.log(resolved[key]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      await printConfigList();
    });
}

async function printConfigList(): Promise<void> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    const value = resolved[key] || "(not set)";
    console.log(`  ${key}: ${value}  (${getSource(key, fileData)})`);
  }
  console.log("");
}

function isValidKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}

function reportUnknownKey(key: string): void {
  console.error(
    `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
  );
  process.exitCode = 1;
}
