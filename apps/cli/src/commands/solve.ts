import bunyan from "bunyan";
import { Command } from "commander";
import {
  PuzzleGrid,
  SearchStats,
  SolveResult,
  SolveResultKind,
  formatPuzzleString,
  renderGrid,
} from "@nineset/core";
import { solve } from "@nineset/engine";
import {
  CliSettings,
  OutputFormat,
  loadSettings,
  setCliOverride,
} from "../config/index.js";
import { readPuzzle } from "../input.js";
import { createLogger } from "../logger.js";
import { LogObserver } from "../observers/LogObserver.js";

/** Malformed input exits with 1 from the command boundary. */
export const EXIT_CODES: Record<SolveResultKind, number> = {
  unique: 0,
  none: 2,
  multiple: 3,
};

export interface SolveRun {
  result: SolveResult;
  exitCode: number;
  output: string;
}

interface SolveCommandOptions {
  file?: string;
  order?: string;
  limit?: string;
  shortCircuit: boolean;
  trace?: string;
  format?: string;
}

function formatStats(stats: SearchStats): string {
  return (
    `states=${stats.statesExplored} branches=${stats.branches} ` +
    `contradictions=${stats.contradictions} passes=${stats.propagationPasses}`
  );
}

export function formatResult(result: SolveResult, format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(result);
  }

  if (format === "line") {
    switch (result.kind) {
      case "unique":
        return formatPuzzleString(result.solution);
      case "multiple":
        return result.solutions.map((s) => formatPuzzleString(s)).join("\n");
      case "none":
        return "";
    }
  }

  switch (result.kind) {
    case "unique":
      return ["Unique solution", renderGrid(result.solution), formatStats(result.stats)].join(
        "\n",
      );
    case "multiple":
      return [
        `Multiple solutions (${result.solutions.length} found)`,
        result.solutions.map(renderGrid).join("\n\n"),
        formatStats(result.stats),
      ].join("\n");
    case "none":
      return ["No solution", formatStats(result.stats)].join("\n");
  }
}

/** Trace output is logged at debug, so tracing lowers the threshold to it. */
export function loggerLevel(settings: CliSettings): number {
  const level = bunyan.resolveLevel(settings.logLevel);
  return settings.trace > 0 ? Math.min(level, bunyan.DEBUG) : level;
}

export function runSolve(puzzle: PuzzleGrid, settings: CliSettings, log: bunyan): SolveRun {
  const observer = settings.trace > 0 ? new LogObserver(log, settings.trace) : undefined;

  const result = solve(puzzle, {
    order: settings.order,
    solutionLimit: settings.solutionLimit,
    shortCircuit: settings.shortCircuit,
    observer,
  });
  log.debug({ result: result.kind, ...result.stats }, "Solve finished");

  return {
    result,
    exitCode: EXIT_CODES[result.kind],
    output: formatResult(result, settings.format),
  };
}

export function registerSolveCommand(program: Command): void {
  program
    .command("solve")
    .description("Solve a puzzle and report whether its solution is unique")
    .argument("[puzzle]", "81 cells: 1-9 for givens, . or 0 for blanks (default: stdin)")
    .option("-f, --file <path>", "Read the puzzle from a text or .json file")
    .option("--order <order>", "Search order: depth-first or breadth-first")
    .option("--limit <n>", "Stop after n solutions (Infinity for all)")
    .option("--no-short-circuit", "Run every rule in every propagation pass")
    .option("--trace <level>", "Trace solver events to stderr (0-4)")
    .option("--format <format>", "Output format: pretty, line or json")
    .action(async (puzzle: string | undefined, opts: SolveCommandOptions) => {
      if (opts.order) setCliOverride("order", opts.order);
      if (opts.limit) setCliOverride("solutionLimit", opts.limit);
      if (!opts.shortCircuit) setCliOverride("shortCircuit", "false");
      if (opts.trace) setCliOverride("trace", opts.trace);
      if (opts.format) setCliOverride("format", opts.format);

      const settings = await loadSettings();
      const grid = await readPuzzle({ puzzle, file: opts.file });
      const log = createLogger(loggerLevel(settings));

      const run = runSolve(grid, settings, log);
      if (run.output) console.log(run.output);
      process.exitCode = run.exitCode;
    });
}
