/** A 9x9 Sudoku grid. 0 = blank, 1-9 = digit. */
export type PuzzleGrid = number[][];

export const GRID_SIZE = 9;
export const CELL_COUNT = 81;

/** Counters collected while searching, reported with every result. */
export interface SearchStats {
  /** Game states popped from the search queue and propagated */
  statesExplored: number;
  /** Child states created by hypothesizing a digit */
  branches: number;
  /** Rule passes run across all propagations */
  propagationPasses: number;
  /** States discarded because a cell ran out of candidates */
  contradictions: number;
}

export interface UniqueSolution {
  kind: "unique";
  solution: PuzzleGrid;
  stats: SearchStats;
}

export interface NoSolution {
  kind: "none";
  stats: SearchStats;
}

export interface MultipleSolutions {
  kind: "multiple";
  /** Solutions found before the search stopped (at least two) */
  solutions: PuzzleGrid[];
  stats: SearchStats;
}

export type SolveResult = UniqueSolution | NoSolution | MultipleSolutions;

export type SolveResultKind = SolveResult["kind"];
