import { CONFIG_KEYS, ENV_MAP } from "./defaults.js";
import { resolveConfigWithSources } from "./resolve.js";
import { CliSettings, InvalidSettingError, checkSetting, parseSettings } from "./settings.js";

/**
 * Resolve every config layer, including the overrides a command has set,
 * and convert the result into settings for a solver run. Each problem
 * names the layer its value came from.
 */
export async function loadSettings(): Promise<CliSettings> {
  const { config, sources } = await resolveConfigWithSources();

  const problems: string[] = [];
  for (const key of CONFIG_KEYS) {
    const problem = checkSetting(key, config[key]);
    if (problem === null) continue;
    const source = sources[key] === "env" ? `env ${ENV_MAP[key]}` : sources[key];
    problems.push(`${problem} (from ${source})`);
  }
  if (problems.length > 0) throw new InvalidSettingError(problems);

  return parseSettings(config);
}
