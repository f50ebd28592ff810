import {
  ALL_DIGITS,
  CELL_COUNT,
  CandidateMask,
  GRID_SIZE,
  PuzzleGrid,
  digitBit,
  isSingle,
  popcount,
  singleDigit,
} from "@nineset/core";

/** The read side of a game state, handed to observers. */
export interface ReadonlyGameState {
  readonly cells: ArrayLike<CandidateMask>;
  get(index: number): CandidateMask;
  totalCandidates(): number;
  hasContradiction(): boolean;
  isSolved(): boolean;
  firstOpenCell(): number;
  toGrid(): PuzzleGrid;
}

/**
 * The 81 candidate sets of one search branch, stored as one flat array.
 * Rows, columns, boxes and triplets are index lists over this array (see
 * GRID_VIEWS), so a change made through one view is seen by all of them.
 *
 * Candidate sets only ever shrink: restrict() and eliminate() clear bits and
 * never set them.
 */
export class GameState implements ReadonlyGameState {
  readonly cells: Uint16Array;

  private constructor(cells: Uint16Array) {
    this.cells = cells;
  }

  /** A state where every cell still admits 1-9 */
  static empty(): GameState {
    return new GameState(new Uint16Array(CELL_COUNT).fill(ALL_DIGITS));
  }

  /** Givens become single-digit sets, blanks (0) admit every digit. */
  static fromPuzzle(grid: PuzzleGrid): GameState {
    const state = GameState.empty();
    for (let r = 0; r < GRID_SIZE; r++) {
      for (let c = 0; c < GRID_SIZE; c++) {
        const value = grid[r][c];
        if (value !== 0) state.cells[r * GRID_SIZE + c] = digitBit(value);
      }
    }
    return state;
  }

  /** Independent copy: changes to either state never reach the other. */
  clone(): GameState {
    return new GameState(this.cells.slice());
  }

  get(index: number): CandidateMask {
    return this.cells[index];
  }

  /** Keep only the digits in `mask`. Returns the number of candidates removed. */
  restrict(index: number, mask: CandidateMask): number {
    const before = this.cells[index];
    const after = before & mask;
    this.cells[index] = after;
    return popcount(before) - popcount(after);
  }

  /** Remove the digits in `mask`. Returns the number of candidates removed. */
  eliminate(index: number, mask: CandidateMask): number {
    return this.restrict(index, ~mask & ALL_DIGITS);
  }

  totalCandidates(): number {
    let total = 0;
    for (const mask of this.cells) total += popcount(mask);
    return total;
  }

  hasContradiction(): boolean {
    return this.cells.includes(0);
  }

  isSolved(): boolean {
    return this.cells.every(isSingle);
  }

  /** Row-major index of the first cell with more than one candidate, or -1. */
  firstOpenCell(): number {
    return this.cells.findIndex((mask) => popcount(mask) > 1);
  }

  /** Solved digits as a 9x9 grid; open and dead cells read as 0. */
  toGrid(): PuzzleGrid {
    const grid: PuzzleGrid = [];
    for (let r = 0; r < GRID_SIZE; r++) {
      grid.push(Array.from(this.cells.subarray(r * GRID_SIZE, (r + 1) * GRID_SIZE), singleDigit));
    }
    return grid;
  }
}
