import { CandidateMask, digitsOf, popcount, singleDigit } from "./Candidates";
import { GRID_SIZE, PuzzleGrid } from "../types/puzzle";

const BORDER = "+-------+-------+-------+";

/** Render a 9x9 digit grid with box borders. Blanks are drawn as ".". */
export function renderGrid(grid: PuzzleGrid): string {
  const lines: string[] = [BORDER];
  for (let r = 0; r < GRID_SIZE; r++) {
    if (r > 0 && r % 3 === 0) lines.push(BORDER);
    let row = "|";
    for (let c = 0; c < GRID_SIZE; c++) {
      if (c > 0 && c % 3 === 0) row += " |";
      const val = grid[r][c];
      row += val === 0 ? " ." : ` ${val}`;
    }
    lines.push(row + " |");
  }
  lines.push(BORDER);
  return lines.join("\n");
}

function cellRows<T>(cells: ArrayLike<CandidateMask>, map: (mask: CandidateMask) => T): T[][] {
  const rows: T[][] = [];
  for (let r = 0; r < GRID_SIZE; r++) {
    const row: T[] = [];
    for (let c = 0; c < GRID_SIZE; c++) row.push(map(cells[r * GRID_SIZE + c]));
    rows.push(row);
  }
  return rows;
}

/**
 * One character per cell: the digit when solved, "?" while open, "X" once
 * the cell has no candidates left.
 */
export function renderSimpleGrid(cells: ArrayLike<CandidateMask>): string {
  return cellRows(cells, (mask) => {
    if (mask === 0) return "X";
    const digit = singleDigit(mask);
    return digit === 0 ? "?" : String(digit);
  })
    .map((row) => row.join(" "))
    .join("\n");
}

/** Every cell's candidate digits, padded so columns line up. */
export function renderCandidates(cells: ArrayLike<CandidateMask>): string {
  const rows = cellRows(cells, (mask) => digitsOf(mask).join("") || "-");
  const width = Math.max(...rows.flat().map((s) => s.length));
  const lines: string[] = [];
  rows.forEach((row, r) => {
    if (r > 0 && r % 3 === 0) {
      lines.push(Array.from({ length: 3 }, () => "-".repeat((width + 1) * 3 - 1)).join("-+-"));
    }
    const boxes: string[] = [];
    for (let b = 0; b < 3; b++) {
      boxes.push(row.slice(b * 3, b * 3 + 3).map((s) => s.padEnd(width)).join(" "));
    }
    lines.push(boxes.join(" | "));
  });
  return lines.join("\n");
}

/** Candidate count per cell */
export function renderCounts(cells: ArrayLike<CandidateMask>): string {
  return cellRows(cells, popcount)
    .map((row) => row.join(" "))
    .join("\n");
}
