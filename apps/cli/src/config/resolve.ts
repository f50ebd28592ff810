import { ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS } from "./defaults.js";
import { readConfigFile } from "./configFile.js";

export type ConfigSource = "default" | "file" | "env" | "cli";

const cliOverrides: Partial<ConfigData> = {};

export function setCliOverride<K extends keyof ConfigData>(
  key: K,
  value: ConfigData[K],
): void {
  cliOverrides[key] = value;
}

export function clearCliOverrides(): void {
  for (const key of CONFIG_KEYS) delete cliOverrides[key];
}

/**
 * Merge defaults, the config file, NINESET_* environment variables and
 * command-line overrides, later layers winning. Empty strings are ignored.
 */
export async function resolveConfigWithSources(): Promise<{
  config: ConfigData;
  sources: Record<keyof ConfigData, ConfigSource>;
}> {
  const fileConfig = await readConfigFile();
  const config: ConfigData = { ...DEFAULTS };
  const sources: Record<keyof ConfigData, ConfigSource> = {
    logLevel: "default",
    order: "default",
    solutionLimit: "default",
    shortCircuit: "default",
    trace: "default",
    format: "default",
  };

  for (const key of CONFIG_KEYS) {
    const fileVal = fileConfig[key];
    if (fileVal !== undefined && fileVal !== "") {
      config[key] = fileVal;
      sources[key] = "file";
    }

    const envVal = process.env[ENV_MAP[key]];
    if (envVal !== undefined && envVal !== "") {
      config[key] = envVal;
      sources[key] = "env";
    }

    const cliVal = cliOverrides[key];
    if (cliVal !== undefined && cliVal !== "") {
      config[key] = cliVal;
      sources[key] = "cli";
    }
  }

  return { config, sources };
}

export async function resolveConfig(): Promise<ConfigData> {
  return (await resolveConfigWithSources()).config;
}
