import { strict as assert } from "assert";
import {
  ALL_DIGITS,
  digitBit,
  digitsOf,
  isSingle,
  isSubsetOf,
  maskOf,
  popcount,
  singleDigit,
} from "./libs/Candidates";
import { formatPuzzleString, parsePuzzleJson, parsePuzzleString } from "./libs/Encoding";
import { renderCandidates, renderCounts, renderGrid, renderSimpleGrid } from "./libs/formatGrid";
import {
  MalformedInputError,
  findConflicts,
  isSolvedGrid,
  validatePuzzle,
} from "./validation";

const SOLVED =
  "214879356673125948859463127786392514345618792192547863427931685938256471561784239";

function emptyGrid(): number[][] {
  return Array.from({ length: 9 }, () => Array(9).fill(0));
}

describe("Candidates", () => {
  it("maps digits to bits", () => {
    assert.equal(digitBit(1), 1);
    assert.equal(digitBit(9), 256);
    assert.equal(ALL_DIGITS, maskOf([1, 2, 3, 4, 5, 6, 7, 8, 9]));
  });

  it("counts and lists digits", () => {
    assert.equal(popcount(ALL_DIGITS), 9);
    assert.equal(popcount(0), 0);
    assert.deepEqual(digitsOf(maskOf([9, 1, 4])), [1, 4, 9]);
  });

  it("reads single digits", () => {
    assert.equal(singleDigit(digitBit(7)), 7);
    assert.equal(singleDigit(maskOf([1, 2])), 0);
    assert.equal(singleDigit(0), 0);
    assert.equal(isSingle(0), false);
  });

  it("compares sets", () => {
    assert.equal(isSubsetOf(maskOf([2, 3]), maskOf([1, 2, 3])), true);
    assert.equal(isSubsetOf(maskOf([2, 4]), maskOf([1, 2, 3])), false);
    assert.equal(isSubsetOf(0, 0), true);
  });
});

describe("validatePuzzle", () => {
  it("returns a copy of a well-formed grid", () => {
    const grid = emptyGrid();
    grid[3][4] = 7;
    const copy = validatePuzzle(grid);
    assert.deepEqual(copy, grid);
    assert.notEqual(copy, grid);
    assert.notEqual(copy[3], grid[3]);
  });

  it("rejects a non-array", () => {
    assert.throws(
      () => validatePuzzle("123"),
      (err: unknown) =>
        err instanceof MalformedInputError &&
        err.problems.length === 1 &&
        err.problems[0] === "puzzle is not an array of rows"
    );
  });

  it("lists every problem found", () => {
    const grid: unknown[][] = emptyGrid().slice(0, 8);
    grid[0][0] = 10;
    grid[2][5] = "4";
    grid[7] = [0, 0, 0];

    try {
      validatePuzzle(grid);
      assert.fail("expected validatePuzzle to throw");
    } catch (err) {
      if (!(err instanceof MalformedInputError)) throw err;
      assert.equal(err.name, "MalformedInputError");
      assert.deepEqual(err.problems, [
        "expected 9 rows, got 8",
        "invalid value 10 at row 0, column 0",
        'invalid value "4" at row 2, column 5',
        "row 7 has 3 cells, expected 9",
      ]);
    }
  });

  it("rejects fractional and negative values", () => {
    const grid: number[][] = emptyGrid();
    grid[1][1] = 1.5;
    grid[2][2] = -1;
    assert.throws(
      () => validatePuzzle(grid),
      (err: unknown) =>
        err instanceof MalformedInputError &&
        err.problems.length === 2 &&
        err.problems[0] === "invalid value 1.5 at row 1, column 1" &&
        err.problems[1] === "invalid value -1 at row 2, column 2"
    );
  });
});

describe("findConflicts", () => {
  it("reports a digit given twice in a row", () => {
    const grid = emptyGrid();
    grid[0][0] = 5;
    grid[0][8] = 5;
    assert.deepEqual(findConflicts(grid), [
      {
        digit: 5,
        unit: "row",
        unitIndex: 0,
        cells: [
          [0, 0],
          [0, 8],
        ],
      },
    ]);
  });

  it("reports box clashes and ignores blanks", () => {
    const grid = emptyGrid();
    grid[3][3] = 2;
    grid[5][5] = 2;
    const conflicts = findConflicts(grid);
    assert.equal(conflicts.length, 1);
    assert.equal(conflicts[0].unit, "box");
    assert.equal(conflicts[0].unitIndex, 4);
  });

  it("finds nothing in a solved grid", () => {
    assert.deepEqual(findConflicts(parsePuzzleString(SOLVED)), []);
  });
});

describe("isSolvedGrid", () => {
  it("accepts a valid solution", () => {
    assert.equal(isSolvedGrid(parsePuzzleString(SOLVED)), true);
  });

  it("rejects blanks and swapped digits", () => {
    const grid = parsePuzzleString(SOLVED);
    grid[0][0] = 0;
    assert.equal(isSolvedGrid(grid), false);

    const swapped = parsePuzzleString(SOLVED);
    [swapped[0][0], swapped[0][1]] = [swapped[0][1], swapped[0][0]];
    assert.equal(isSolvedGrid(swapped), false);
  });
});

describe("Encoding", () => {
  it("parses dots and zeros as blanks", () => {
    const grid = parsePuzzleString("1.3" + "0".repeat(78));
    assert.deepEqual(grid[0], [1, 0, 3, 0, 0, 0, 0, 0, 0]);
    assert.equal(grid.length, 9);
  });

  it("ignores whitespace and box separators", () => {
    const text = formatPuzzleString(parsePuzzleString(SOLVED))
      .match(/.{9}/g)
      ?.map((row) => `${row.slice(0, 3)} | ${row.slice(3, 6)} | ${row.slice(6)}`)
      .join("\n------+-------+------\n");
    assert.equal(formatPuzzleString(parsePuzzleString(text ?? "")), SOLVED);
  });

  it("rejects unknown characters and wrong lengths", () => {
    assert.throws(() => parsePuzzleString("x".repeat(81)), MalformedInputError);
    assert.throws(
      () => parsePuzzleString("1".repeat(80)),
      (err: unknown) =>
        err instanceof MalformedInputError && err.problems[0] === "expected 81 cells, got 80"
    );
  });

  it("formats blanks with the chosen character", () => {
    const grid = emptyGrid();
    grid[0][2] = 8;
    assert.equal(formatPuzzleString(grid).slice(0, 4), "..8.");
    assert.equal(formatPuzzleString(grid, "0").slice(0, 4), "0080");
  });

  it("parses JSON grids", () => {
    const grid = emptyGrid();
    grid[8][8] = 9;
    assert.deepEqual(parsePuzzleJson(JSON.stringify(grid)), grid);
    assert.throws(() => parsePuzzleJson("[[1,2"), MalformedInputError);
    assert.throws(() => parsePuzzleJson("{}"), MalformedInputError);
  });
});

describe("formatGrid", () => {
  it("renders a grid with box borders", () => {
    const lines = renderGrid(parsePuzzleString(SOLVED)).split("\n");
    assert.equal(lines.length, 13);
    assert.equal(lines[0], "+-------+-------+-------+");
    assert.equal(lines[1], "| 2 1 4 | 8 7 9 | 3 5 6 |");
    assert.equal(lines[4], "+-------+-------+-------+");
  });

  it("draws blanks as dots", () => {
    const lines = renderGrid(emptyGrid()).split("\n");
    assert.equal(lines[1], "| . . . | . . . | . . . |");
  });

  it("renders solved, open and dead cells", () => {
    const cells = new Array<number>(81).fill(ALL_DIGITS);
    cells[0] = digitBit(5);
    cells[1] = 0;
    const lines = renderSimpleGrid(cells).split("\n");
    assert.equal(lines[0], "5 X ? ? ? ? ? ? ?");
    assert.equal(lines.length, 9);
    assert.equal(renderCounts(cells).split("\n")[0], "1 0 9 9 9 9 9 9 9");
  });

  it("lines up candidate columns", () => {
    const cells = Array.from({ length: 81 }, (_, i) => digitBit((i % 9) + 1));
    const lines = renderCandidates(cells).split("\n");
    assert.equal(lines.length, 11);
    assert.equal(lines[0], "1 2 3 | 4 5 6 | 7 8 9");
    assert.equal(lines[3], "------+-------+------");
  });
});
