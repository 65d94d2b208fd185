export { CONFIG_KEYS, DEFAULTS, ENV_MAP } from "./defaults.js";
export type { ConfigData } from "./defaults.js";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  removeConfigKey,
  getConfigDir,
  getConfigPath,
} from "./configFile.js";
export { resolveConfig, setCliOverride, clearCliOverrides, getSource } from "./resolve.js";
export type { ConfigSource } from "./resolve.js";
