import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { CONFIG_KEYS, type ConfigData } from "./defaults.js";

/** ~/.dropfour, or $DROPFOUR_HOME when set */
export function getConfigDir(): string {
  return process.env.DROPFOUR_HOME || join(homedir(), ".dropfour");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isConfigKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}

/** Keep only known keys with string values. */
function pickConfig(parsed: object): Partial<ConfigData> {
  const data: Partial<ConfigData> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isConfigKey(key) && typeof value === "string") {
      data[key] = value;
    }
  }
  return data;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export async function readConfigFile(): Promise<Partial<ConfigData>> {
  const path = getConfigPath();
  try {
    const raw = await readFile(path, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return {};
    }
    return pickConfig(parsed);
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return {};
    }
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${path} is malformed and was ignored. ` +
          `Run "dropfour config set <key> <value>" to recreate it.`,
      );
      return {};
    }
    throw err;
  }
}

export async function writeConfigFile(
  data: Partial<ConfigData>,
): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
): Promise<Partial<ConfigData>> {
  const existing = await readConfigFile();
  existing[key] = value;
  await writeConfigFile(existing);
  return existing;
}

/** Drop a key from the file so lower layers show through again. */
export async function removeConfigKey(
  key: keyof ConfigData,
): Promise<boolean> {
  const existing = await readConfigFile();
  if (existing[key] === undefined) return false;
  delete existing[key];
  await writeConfigFile(existing);
  return true;
}
