import { CELL_COUNT, GRID_SIZE, PuzzleGrid } from "../types/puzzle";
import { MalformedInputError, validatePuzzle } from "../validation";

// Layout characters allowed between cells, e.g. "53..7.... | 6..195..."
const SEPARATORS = /[\s|+\-]/;

/**
 * Parse an 81-character puzzle string. Digits 1-9 are givens; "0" and "."
 * are blanks. Whitespace and the box-drawing characters | - + are ignored.
 */
export function parsePuzzleString(text: string): PuzzleGrid {
  const values: number[] = [];
  const problems: string[] = [];

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (SEPARATORS.test(ch)) continue;
    if (ch === ".") {
      values.push(0);
    } else if (ch >= "0" && ch <= "9") {
      values.push(Number(ch));
    } else {
      problems.push(`unexpected character ${JSON.stringify(ch)} at offset ${i}`);
    }
  }

  if (problems.length === 0 && values.length !== CELL_COUNT) {
    problems.push(`expected ${CELL_COUNT} cells, got ${values.length}`);
  }
  if (problems.length > 0) {
    throw new MalformedInputError(problems);
  }

  const grid: PuzzleGrid = [];
  for (let r = 0; r < GRID_SIZE; r++) {
    grid.push(values.slice(r * GRID_SIZE, (r + 1) * GRID_SIZE));
  }
  return grid;
}

/**
 * Encode a grid as 81 characters, row-major. Blanks are written as `blank`
 * ("." by default).
 */
export function formatPuzzleString(grid: PuzzleGrid, blank: "." | "0" = "."): string {
  return grid.map((row) => row.map((v) => (v === 0 ? blank : String(v))).join("")).join("");
}

/** Parse a JSON 9x9 array of numbers and validate it. */
export function parsePuzzleJson(text: string): PuzzleGrid {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new MalformedInputError([`invalid JSON: ${err.message}`]);
    }
    throw err;
  }
  return validatePuzzle(parsed);
}
