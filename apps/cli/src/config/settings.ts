import bunyan from "bunyan";
import { MIN_SOLUTION_LIMIT, SEARCH_ORDERS, SearchOrder } from "@nineset/engine";
import { isLogLevel, LOG_LEVELS } from "../logger.js";
import { CONFIG_KEYS, ConfigData } from "./defaults.js";

export type OutputFormat = "pretty" | "line" | "json";
export const OUTPUT_FORMATS: readonly OutputFormat[] = ["pretty", "line", "json"];

/** 0 silent, 1 states and passes, 2 eliminations, 3 candidate grids, 4 every rule call */
export type TraceLevel = 0 | 1 | 2 | 3 | 4;
const TRACE_LEVELS: readonly TraceLevel[] = [0, 1, 2, 3, 4];

export interface CliSettings {
  logLevel: bunyan.LogLevelString;
  order: SearchOrder;
  solutionLimit: number;
  shortCircuit: boolean;
  trace: TraceLevel;
  format: OutputFormat;
}

export class InvalidSettingError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "InvalidSettingError";
    this.problems = problems;
  }
}

const TRUE_WORDS = ["true", "yes", "on", "1"];
const FALSE_WORDS = ["false", "no", "off", "0"];

function parseOrder(value: string): SearchOrder | undefined {
  return SEARCH_ORDERS.find((order) => order === value);
}

function parseLimit(value: string): number | undefined {
  if (value === "Infinity" || value === "all") return Infinity;
  if (!/^\d+$/.test(value)) return undefined;
  const n = Number(value);
  return n >= MIN_SOLUTION_LIMIT ? n : undefined;
}

function parseBoolean(value: string): boolean | undefined {
  const word = value.toLowerCase();
  if (TRUE_WORDS.includes(word)) return true;
  if (FALSE_WORDS.includes(word)) return false;
  return undefined;
}

function parseTrace(value: string): TraceLevel | undefined {
  return TRACE_LEVELS.find((level) => String(level) === value);
}

function parseFormat(value: string): OutputFormat | undefined {
  return OUTPUT_FORMATS.find((format) => format === value);
}

/** Returns a message describing what is wrong with `value`, or null. */
export function checkSetting(key: keyof ConfigData, value: string): string | null {
  switch (key) {
    case "logLevel":
      return isLogLevel(value)
        ? null
        : `logLevel must be one of ${LOG_LEVELS.join(", ")}, got "${value}"`;
    case "order":
      return parseOrder(value) !== undefined
        ? null
        : `order must be one of ${SEARCH_ORDERS.join(", ")}, got "${value}"`;
    case "solutionLimit":
      return parseLimit(value) !== undefined
        ? null
        : `solutionLimit must be an integer of at least ${MIN_SOLUTION_LIMIT} or "Infinity", got "${value}"`;
    case "shortCircuit":
      return parseBoolean(value) !== undefined
        ? null
        : `shortCircuit must be true or false, got "${value}"`;
    case "trace":
      return parseTrace(value) !== undefined
        ? null
        : `trace must be an integer from 0 to 4, got "${value}"`;
    case "format":
      return parseFormat(value) !== undefined
        ? null
        : `format must be one of ${OUTPUT_FORMATS.join(", ")}, got "${value}"`;
  }
}

/** Convert resolved config strings into typed settings. */
export function parseSettings(config: ConfigData): CliSettings {
  const problems = CONFIG_KEYS.map((key) => checkSetting(key, config[key])).filter(
    (problem): problem is string => problem !== null,
  );

  const logLevel = config.logLevel;
  const order = parseOrder(config.order);
  const solutionLimit = parseLimit(config.solutionLimit);
  const shortCircuit = parseBoolean(config.shortCircuit);
  const trace = parseTrace(config.trace);
  const format = parseFormat(config.format);

  if (
    problems.length > 0 ||
    !isLogLevel(logLevel) ||
    order === undefined ||
    solutionLimit === undefined ||
    shortCircuit === undefined ||
    trace === undefined ||
    format === undefined
  ) {
    throw new InvalidSettingError(problems);
  }

  return { logLevel, order, solutionLimit, shortCircuit, trace, format };
}
