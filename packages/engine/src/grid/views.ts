import { GRID_SIZE } from "@nineset/core";

export type GroupKind = "row" | "column" | "box";

/** A row, column or box: the indices of its nine cells, in order. */
export interface Group {
  readonly kind: GroupKind;
  /** Row, column or box number (0-8) */
  readonly index: number;
  readonly cells: readonly number[];
}

/**
 * The intersection of one box with one row or column. `lineSisters` are the
 * other six cells of the row/column, `squareSisters` the other six of the box.
 */
export interface Triplet {
  readonly cells: readonly number[];
  readonly lineSisters: readonly number[];
  readonly squareSisters: readonly number[];
}

export interface GridViews {
  /** All 27 groups: rows 0-8, columns 9-17, boxes 18-26 */
  readonly groups: readonly Group[];
  readonly rows: readonly Group[];
  readonly columns: readonly Group[];
  readonly boxes: readonly Group[];
  /** 27 row triplets followed by 27 column triplets */
  readonly triplets: readonly Triplet[];
}

export function cellIndex(row: number, col: number): number {
  return row * GRID_SIZE + col;
}

export function boxIndex(row: number, col: number): number {
  return Math.floor(row / 3) * 3 + Math.floor(col / 3);
}

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

function buildViews(): GridViews {
  const rows: Group[] = range(9).map((r) => ({
    kind: "row" as const,
    index: r,
    cells: range(9).map((c) => cellIndex(r, c)),
  }));

  const columns: Group[] = range(9).map((c) => ({
    kind: "column" as const,
    index: c,
    cells: range(9).map((r) => cellIndex(r, c)),
  }));

  const boxes: Group[] = range(9).map((b) => {
    const br = Math.floor(b / 3) * 3;
    const bc = (b % 3) * 3;
    return {
      kind: "box" as const,
      index: b,
      cells: range(9).map((i) => cellIndex(br + Math.floor(i / 3), bc + (i % 3))),
    };
  });

  const triplets: Triplet[] = [];
  for (const line of [...rows, ...columns]) {
    for (let t = 0; t < 9; t += 3) {
      const cells = line.cells.slice(t, t + 3);
      const box = boxes[line.kind === "row" ? boxIndex(line.index, t) : boxIndex(t, line.index)];
      triplets.push({
        cells,
        lineSisters: line.cells.filter((i) => !cells.includes(i)),
        squareSisters: box.cells.filter((i) => !cells.includes(i)),
      });
    }
  }

  return {
    groups: [...rows, ...columns, ...boxes],
    rows,
    columns,
    boxes,
    triplets,
  };
}

/** Index views over the 81 cells. Built once and shared by every game state. */
export const GRID_VIEWS: GridViews = buildViews();
