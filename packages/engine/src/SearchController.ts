import { PuzzleGrid, SearchStats, digitBit, digitsOf } from "@nineset/core";
import { GameState } from "./grid/GameState";
import { ISolverObserver } from "./interfaces/ISolverObserver";
import { Propagator } from "./Propagator";

/**
 * "breadth-first" pops the oldest queued state (a FIFO queue);
 * "depth-first" pops the newest. Both visit the same search tree.
 */
export type SearchOrder = "depth-first" | "breadth-first";

export const SEARCH_ORDERS: readonly SearchOrder[] = ["depth-first", "breadth-first"];

export interface SearchControllerOptions {
  propagator: Propagator;
  order?: SearchOrder;
  /**
   * Stop once this many solutions are found. Defaults to 2, the fewest that
   * prove a puzzle ambiguous; a lower limit could not tell a unique puzzle
   * from an ambiguous one. Infinity explores the whole tree.
   */
  solutionLimit?: number;
  observer?: ISolverObserver;
}

export interface SearchOutcome {
  solutions: PuzzleGrid[];
  stats: SearchStats;
  /** False when the search stopped at the solution limit with states left */
  exhausted: boolean;
}

interface Frame {
  state: GameState;
  depth: number;
}

export const DEFAULT_SOLUTION_LIMIT = 2;
export const MIN_SOLUTION_LIMIT = 2;

/**
 * Explores hypotheses when deduction stalls. Each queued state is propagated;
 * solved states are recorded, dead ones dropped, and open ones split into
 * one clone per candidate of their first open cell (row-major), each clone
 * with that cell fixed to one digit.
 */
export class SearchController {
  private readonly propagator: Propagator;
  private readonly order: SearchOrder;
  private readonly solutionLimit: number;
  private readonly observer?: ISolverObserver;

  constructor(opts: SearchControllerOptions) {
    const limit = opts.solutionLimit ?? DEFAULT_SOLUTION_LIMIT;
    if (Number.isNaN(limit) || limit < MIN_SOLUTION_LIMIT) {
      throw new RangeError(`solutionLimit must be at least ${MIN_SOLUTION_LIMIT}, got ${limit}`);
    }
    this.propagator = opts.propagator;
    this.order = opts.order ?? "depth-first";
    this.solutionLimit = limit;
    this.observer = opts.observer;
  }

  run(initial: GameState): SearchOutcome {
    const stats: SearchStats = {
      statesExplored: 0,
      branches: 0,
      propagationPasses: 0,
      contradictions: 0,
    };
    const solutions: PuzzleGrid[] = [];
    const frontier: Frame[] = [{ state: initial, depth: 0 }];

    while (frontier.length > 0) {
      if (solutions.length >= this.solutionLimit) {
        return { solutions, stats, exhausted: false };
      }

      const frame = this.order === "breadth-first" ? frontier.shift() : frontier.pop();
      if (!frame) break;
      const { state, depth } = frame;

      stats.statesExplored++;
      this.observer?.onStateStart?.(depth, frontier.length, state);

      const report = this.propagator.propagate(state);
      stats.propagationPasses += report.passes;
      this.observer?.onStateResolved?.(report.status, state);

      if (report.status === "solved") {
        const solution = state.toGrid();
        solutions.push(solution);
        this.observer?.onSolution?.(solution, solutions.length);
        continue;
      }
      if (report.status === "contradiction") {
        stats.contradictions++;
        continue;
      }

      const target = state.firstOpenCell();
      const digits = digitsOf(state.get(target));
      const children = digits.map((digit) => {
        const child = state.clone();
        child.restrict(target, digitBit(digit));
        return { state: child, depth: depth + 1 };
      });
      stats.branches += children.length;

      // Depth-first pops from the end, so push the highest digit first
      if (this.order === "depth-first") children.reverse();
      frontier.push(...children);
      this.observer?.onBranch?.(target, digits, frontier.length, state);
    }

    return { solutions, stats, exhausted: true };
  }
}
