import { Command } from "commander";
import {
  CONFIG_KEYS,
  ConfigData,
  ENV_MAP,
  checkSetting,
  getConfigPath,
  isConfigKey,
  resolveConfig,
  resolveConfigWithSources,
  updateConfigFile,
} from "../config/index.js";

function requireKey(key: string): keyof ConfigData {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
  }
  return key;
}

export async function configGet(key: string): Promise<string> {
  const resolved = await resolveConfig();
  return resolved[requireKey(key)];
}

/** Validate and store a value in the config file. */
export async function configSet(key: string, value: string): Promise<string> {
  const configKey = requireKey(key);
  const problem = checkSetting(configKey, value);
  if (problem) throw new Error(problem);
  await updateConfigFile(configKey, value);
  return `Set ${configKey} = ${value}`;
}

export async function configList(): Promise<string> {
  const { config, sources } = await resolveConfigWithSources();
  const lines = [`Config file: ${getConfigPath()}`];
  for (const key of CONFIG_KEYS) {
    const source = sources[key] === "env" ? `env: ${ENV_MAP[key]}` : sources[key];
    lines.push(`  ${key}: ${config[key]}  (${source})`);
  }
  return lines.join("\n");
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.nineset/config.json)");

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      console.log(await configSet(key, value));
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      console.log(await configGet(key));
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      console.log(await configList());
    });

  configCmd
    .command("path")
    .description("Print the config file location")
    .action(() => {
      console.log(getConfigPath());
    });
}
