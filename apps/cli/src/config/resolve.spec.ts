import { strict as assert } from "assert";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CONFIG_KEYS, DEFAULTS, ENV_MAP } from "./defaults.js";
import { getConfigPath, readConfigFile, removeConfigKey, updateConfigFile } from "./configFile.js";
import { clearCliOverrides, getSource, resolveConfig, setCliOverride } from "./resolve.js";

const ENV_NAMES = ["DROPFOUR_HOME", ...CONFIG_KEYS.map((key) => ENV_MAP[key])];

describe("config resolution", () => {
  let home: string;
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(async () => {
    for (const name of ENV_NAMES) {
      savedEnv[name] = process.env[name];
      delete process.env[name];
    }
    home = await mkdtemp(join(tmpdir(), "dropfour-config-"));
    process.env.DROPFOUR_HOME = home;
    clearCliOverrides();
  });

  afterEach(async () => {
    clearCliOverrides();
    for (const name of ENV_NAMES) {
      const value = savedEnv[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    await rm(home, { recursive: true, force: true });
  });

  it("should use the defaults when nothing is configured", async () => {
    assert.deepEqual(await resolveConfig(), DEFAULTS);
  });

  it("should layer file, environment and CLI values in that order", async () => {
    await updateConfigFile("rows", "8");
    await updateConfigFile("columns", "9");
    await updateConfigFile("playerOneColor", "blue");
    process.env.DROPFOUR_COLUMNS = "10";
    process.env.DROPFOUR_P1_COLOR = "green";
    setCliOverride("playerOneColor", "magenta");

    const resolved = await resolveConfig();

    assert.equal(resolved.rows, "8");
    assert.equal(resolved.columns, "10");
    assert.equal(resolved.playerOneColor, "magenta");
    assert.equal(resolved.playerTwoColor, "black");

    const fileData = await readConfigFile();
    assert.equal(getSource("rows", fileData), "config file");
    assert.equal(getSource("columns", fileData), "env");
    assert.equal(getSource("playerOneColor", fileData), "cli");
    assert.equal(getSource("logLevel", fileData), "default");
  });

  it("should ignore empty values at every layer", async () => {
    await updateConfigFile("rows", "");
    process.env.DROPFOUR_ROWS = "";
    setCliOverride("rows", "");

    assert.equal((await resolveConfig()).rows, "6");
  });

  it("should keep only known string keys from the file", async () => {
    await writeFile(
      getConfigPath(),
      JSON.stringify({ rows: "5", columns: 9, theme: "dark" }),
      "utf-8"
    );
    assert.deepEqual(await readConfigFile(), { rows: "5" });
  });

  it("should warn about and ignore a malformed file", async () => {
    await writeFile(getConfigPath(), "{ not json", "utf-8");
    const warnings: string[] = [];
    const originalError = console.error;
    console.error = (message: string) => {
      warnings.push(message);
    };
    try {
      assert.deepEqual(await readConfigFile(), {});
    } finally {
      console.error = originalError;
    }
    assert.equal(warnings.length, 1);
    assert.ok(warnings[0].startsWith(`Warning: ${getConfigPath()} is malformed`));
  });

  it("should fall back to lower layers after a key is removed", async () => {
    await updateConfigFile("rows", "9");
    await updateConfigFile("columns", "8");

    assert.equal(await removeConfigKey("rows"), true);
    assert.equal(await removeConfigKey("rows"), false);
    assert.deepEqual(await readConfigFile(), { columns: "8" });
    assert.equal((await resolveConfig()).rows, "6");
  });
});
