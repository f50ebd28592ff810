import { PuzzleGrid, SolveResult, validatePuzzle } from "@nineset/core";
import { GameState } from "./grid/GameState";
import { ISolverObserver } from "./interfaces/ISolverObserver";
import { Propagator } from "./Propagator";
import { RuleRegistry } from "./RuleRegistry";
import { SearchController, SearchOrder } from "./SearchController";

export interface SolveOptions {
  observer?: ISolverObserver;
  order?: SearchOrder;
  solutionLimit?: number;
  shortCircuit?: boolean;
  registry?: RuleRegistry;
}

/**
 * Solve a 9x9 puzzle (0 = blank). Throws MalformedInputError for a grid of the
 * wrong shape or with values outside 0-9; every other outcome is a result.
 */
export function solve(puzzle: PuzzleGrid, options: SolveOptions = {}): SolveResult {
  const grid = validatePuzzle(puzzle);

  const propagator = new Propagator({
    registry: options.registry,
    shortCircuit: options.shortCircuit,
    observer: options.observer,
  });
  const search = new SearchController({
    propagator,
    order: options.order,
    solutionLimit: options.solutionLimit,
    observer: options.observer,
  });

  const { solutions, stats } = search.run(GameState.fromPuzzle(grid));

  if (solutions.length === 0) {
    return { kind: "none", stats };
  }
  if (solutions.length === 1) {
    return { kind: "unique", solution: solutions[0], stats };
  }
  return { kind: "multiple", solutions, stats };
}
