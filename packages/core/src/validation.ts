import { GRID_SIZE, PuzzleGrid } from "./types/puzzle";

/**
 * Raised when a puzzle is not 9 rows of 9 integers in the range 0-9.
 * `problems` lists every defect found, not only the first.
 */
export class MalformedInputError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Malformed puzzle: ${problems.join("; ")}`);
    this.name = "MalformedInputError";
    this.problems = problems;
  }
}

/** A given digit that appears twice in the same row, column or box. */
export interface Conflict {
  digit: number;
  unit: "row" | "column" | "box";
  /** Index of the row, column or box (0-8) */
  unitIndex: number;
  cells: [row: number, col: number][];
}

/**
 * Check the structure of a puzzle and return a copy of it. Throws
 * MalformedInputError when the shape or any value is wrong.
 */
export function validatePuzzle(input: unknown): PuzzleGrid {
  const problems: string[] = [];

  if (!Array.isArray(input)) {
    throw new MalformedInputError(["puzzle is not an array of rows"]);
  }
  if (input.length !== GRID_SIZE) {
    problems.push(`expected ${GRID_SIZE} rows, got ${input.length}`);
  }

  const grid: PuzzleGrid = [];
  input.forEach((row: unknown, r) => {
    if (!Array.isArray(row)) {
      problems.push(`row ${r} is not an array`);
      return;
    }
    if (row.length !== GRID_SIZE) {
      problems.push(`row ${r} has ${row.length} cells, expected ${GRID_SIZE}`);
    }
    const values: number[] = [];
    row.forEach((value: unknown, c) => {
      if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > 9) {
        problems.push(`invalid value ${JSON.stringify(value)} at row ${r}, column ${c}`);
        return;
      }
      values.push(value);
    });
    grid.push(values);
  });

  if (problems.length > 0) {
    throw new MalformedInputError(problems);
  }
  return grid;
}

function unitCells(unit: Conflict["unit"], index: number): [number, number][] {
  const cells: [number, number][] = [];
  for (let i = 0; i < GRID_SIZE; i++) {
    if (unit === "row") cells.push([index, i]);
    else if (unit === "column") cells.push([i, index]);
    else {
      const br = Math.floor(index / 3) * 3;
      const bc = (index % 3) * 3;
      cells.push([br + Math.floor(i / 3), bc + (i % 3)]);
    }
  }
  return cells;
}

const UNITS: Conflict["unit"][] = ["row", "column", "box"];

/**
 * List the given digits that clash within a row, column or box. A grid with
 * conflicts is still structurally valid; solving it reports no solution.
 */
export function findConflicts(grid: PuzzleGrid): Conflict[] {
  const conflicts: Conflict[] = [];
  for (const unit of UNITS) {
    for (let index = 0; index < GRID_SIZE; index++) {
      const seen = new Map<number, [number, number][]>();
      for (const [r, c] of unitCells(unit, index)) {
        const digit = grid[r][c];
        if (digit === 0) continue;
        const cells = seen.get(digit) ?? [];
        cells.push([r, c]);
        seen.set(digit, cells);
      }
      for (const [digit, cells] of seen) {
        if (cells.length > 1) {
          conflicts.push({ digit, unit, unitIndex: index, cells });
        }
      }
    }
  }
  return conflicts;
}

/** Check if the grid is completely and correctly solved */
export function isSolvedGrid(grid: PuzzleGrid): boolean {
  for (const unit of UNITS) {
    for (let index = 0; index < GRID_SIZE; index++) {
      const digits = new Set<number>();
      for (const [r, c] of unitCells(unit, index)) {
        const digit = grid[r][c];
        if (digit < 1 || digit > 9) return false;
        digits.add(digit);
      }
      if (digits.size !== GRID_SIZE) return false;
    }
  }
  return true;
}
