export { CONFIG_KEYS, DEFAULTS, ENV_MAP, isConfigKey } from "./defaults.js";
export type { ConfigData } from "./defaults.js";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile.js";
export {
  resolveConfig,
  resolveConfigWithSources,
  setCliOverride,
  clearCliOverrides,
} from "./resolve.js";
export type { ConfigSource } from "./resolve.js";
export { loadSettings } from "./runtime.js";
export {
  OUTPUT_FORMATS,
  InvalidSettingError,
  checkSetting,
  parseSettings,
} from "./settings.js";
export type { CliSettings, OutputFormat, TraceLevel } from "./settings.js";
