import { strict as assert } from "assert";
import bunyan from "bunyan";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { PuzzleGrid, formatPuzzleString, parsePuzzleString } from "@nineset/core";
import { CliSettings, DEFAULTS, parseSettings } from "../config/index.js";
import { createLogger } from "../logger.js";
import { runCheck } from "./check.js";
import { configGet, configList, configSet } from "./config.js";
import { formatResult, loggerLevel, runSolve } from "./solve.js";

const SOLVED =
  "214879356673125948859463127786392514345618792192547863427931685938256471561784239";
const ONE_BLANK = SOLVED.slice(0, 40) + "." + SOLVED.slice(41);
const NEEDS_SEARCH =
  "..4....5...3....48....63........2..4..5....9.19...7.6...7.3...59....6...5..7..2..";

function repeatedFive(): PuzzleGrid {
  return parsePuzzleString("5.......5" + ".".repeat(72));
}

function settings(overrides: Partial<CliSettings> = {}): CliSettings {
  return { ...parseSettings(DEFAULTS), ...overrides };
}

function quietLogger(): bunyan {
  const sink = new Writable({ objectMode: true, write: (_record, _encoding, done) => done() });
  return createLogger("fatal", [{ type: "raw", stream: sink }]);
}

describe("solve command", () => {
  it("prints a unique solution as a boxed grid", () => {
    const run = runSolve(parsePuzzleString(ONE_BLANK), settings(), quietLogger());
    const lines = run.output.split("\n");

    assert.equal(run.exitCode, 0);
    assert.equal(lines.length, 15);
    assert.equal(lines[0], "Unique solution");
    assert.equal(lines[1], "+-------+-------+-------+");
    assert.equal(lines[2], "| 2 1 4 | 8 7 9 | 3 5 6 |");
    assert.equal(lines[14], "states=1 branches=0 contradictions=0 passes=2");
  });

  it("exits with 2 when there is no solution", () => {
    const run = runSolve(repeatedFive(), settings(), quietLogger());
    assert.equal(run.exitCode, 2);
    assert.equal(run.result.kind, "none");
    assert.equal(run.output, "No solution\nstates=1 branches=0 contradictions=1 passes=1");
  });

  it("exits with 3 and lists each solution for an ambiguous puzzle", () => {
    const empty = parsePuzzleString(".".repeat(81));
    const run = runSolve(empty, settings({ format: "line" }), quietLogger());
    const lines = run.output.split("\n");

    assert.equal(run.exitCode, 3);
    assert.equal(lines.length, 2);
    assert.equal(
      lines[0],
      "123456789456789123789123456214365897365897214897214365531642978642978531978531642",
    );
    assert.notEqual(lines[1], lines[0]);
  });

  it("passes search settings to the solver", () => {
    const run = runSolve(
      parsePuzzleString(NEEDS_SEARCH),
      settings({ order: "breadth-first", solutionLimit: Infinity, shortCircuit: false, format: "line" }),
      quietLogger(),
    );
    assert.equal(run.exitCode, 0);
    assert.equal(run.output, SOLVED);
  });

  it("formats results as JSON", () => {
    const run = runSolve(parsePuzzleString(ONE_BLANK), settings({ format: "json" }), quietLogger());
    assert.deepEqual(JSON.parse(run.output), {
      kind: "unique",
      solution: parsePuzzleString(SOLVED),
      stats: { statesExplored: 1, branches: 0, propagationPasses: 2, contradictions: 0 },
    });
  });

  it("prints nothing in line format when there is no solution", () => {
    const run = runSolve(repeatedFive(), settings(), quietLogger());
    assert.equal(formatResult(run.result, "line"), "");
  });

  it("lowers the log level to debug while tracing", () => {
    assert.equal(loggerLevel(settings({ logLevel: "warn" })), bunyan.WARN);
    assert.equal(loggerLevel(settings({ logLevel: "warn", trace: 2 })), bunyan.DEBUG);
    assert.equal(loggerLevel(settings({ logLevel: "trace", trace: 2 })), bunyan.TRACE);
  });

  it("keeps the givens in the printed solution", () => {
    const run = runSolve(parsePuzzleString(NEEDS_SEARCH), settings({ format: "line" }), quietLogger());
    const solution = run.output;
    [...NEEDS_SEARCH].forEach((ch, i) => {
      if (ch !== ".") assert.equal(solution[i], ch);
    });
    assert.equal(formatPuzzleString(parsePuzzleString(solution)), SOLVED);
  });
});

describe("check command", () => {
  it("lists conflicting givens", () => {
    const run = runCheck(repeatedFive());
    assert.equal(run.exitCode, 2);
    assert.equal(run.output, "Givens: 2\nConflicts: 1\n  5 repeated in row 0: r0c0, r0c8");
  });

  it("accepts a consistent puzzle", () => {
    const run = runCheck(parsePuzzleString(NEEDS_SEARCH));
    assert.equal(run.exitCode, 0);
    assert.equal(run.output, "Givens: 23\nNo conflicts");
  });

  it("recognises a complete grid", () => {
    assert.equal(runCheck(parsePuzzleString(SOLVED)).output, "Givens: 81\nComplete and valid");
  });
});

describe("config command", () => {
  let home: string;
  let savedHome: string | undefined;
  let savedTrace: string | undefined;

  beforeEach(() => {
    savedHome = process.env.NINESET_HOME;
    savedTrace = process.env.NINESET_TRACE;
    home = mkdtempSync(join(tmpdir(), "nineset-cmd-"));
    process.env.NINESET_HOME = home;
    delete process.env.NINESET_TRACE;
  });

  afterEach(() => {
    if (savedHome === undefined) delete process.env.NINESET_HOME;
    else process.env.NINESET_HOME = savedHome;
    if (savedTrace === undefined) delete process.env.NINESET_TRACE;
    else process.env.NINESET_TRACE = savedTrace;
    rmSync(home, { recursive: true, force: true });
  });

  it("sets and gets a value", async () => {
    assert.equal(await configSet("format", "json"), "Set format = json");
    assert.equal(await configGet("format"), "json");
  });

  it("rejects unknown keys and invalid values", async () => {
    await assert.rejects(configGet("colour"), {
      message:
        'Unknown config key: "colour". Valid keys: logLevel, order, solutionLimit, shortCircuit, trace, format',
    });
    await assert.rejects(configSet("order", "sideways"), {
      message: 'order must be one of depth-first, breadth-first, got "sideways"',
    });
  });

  it("lists values with their sources", async () => {
    await configSet("format", "line");
    process.env.NINESET_TRACE = "2";

    const lines = (await configList()).split("\n");
    assert.equal(lines[0], `Config file: ${join(home, "config.json")}`);
    assert.equal(lines[1], "  logLevel: info  (default)");
    assert.equal(lines[5], "  trace: 2  (env: NINESET_TRACE)");
    assert.equal(lines[6], "  format: line  (file)");
  });
});
