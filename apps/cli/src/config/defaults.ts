export interface ConfigData {
  /** bunyan level: trace, debug, info, warn, error, fatal */
  logLevel: string;
  /** Search order: depth-first or breadth-first */
  order: string;
  /** Stop after this many solutions ("Infinity" for an exhaustive search) */
  solutionLimit: string;
  /** Skip costlier rules once a cheaper one made progress in a pass */
  shortCircuit: string;
  /** Trace verbosity, 0 (silent) to 4 (every rule call) */
  trace: string;
  /** Output format: pretty, line or json */
  format: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "logLevel",
  "order",
  "solutionLimit",
  "shortCircuit",
  "trace",
  "format",
];

export const DEFAULTS: ConfigData = {
  logLevel: "info",
  order: "depth-first",
  solutionLimit: "2",
  shortCircuit: "true",
  trace: "0",
  format: "pretty",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  logLevel: "NINESET_LOG_LEVEL",
  order: "NINESET_ORDER",
  solutionLimit: "NINESET_SOLUTION_LIMIT",
  shortCircuit: "NINESET_SHORT_CIRCUIT",
  trace: "NINESET_TRACE",
  format: "NINESET_FORMAT",
};

export function isConfigKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}
