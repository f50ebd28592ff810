import { PuzzleGrid } from "@nineset/core";
import { ReadonlyGameState } from "../grid/GameState";
import { IDeductionRule } from "./IDeductionRule";

export type PropagationStatus = "solved" | "contradiction" | "in-progress";

/**
 * Optional hooks called while solving, for tracing and logging. Observers
 * receive read-only views of the state and must not keep them past the call.
 */
export interface ISolverObserver {
  // Search controller
  onStateStart?(depth: number, queued: number, state: ReadonlyGameState): void;
  onStateResolved?(status: PropagationStatus, state: ReadonlyGameState): void;
  /** `state` is the parent, before any child fixes the cell */
  onBranch?(cellIndex: number, digits: number[], queued: number, state: ReadonlyGameState): void;
  onSolution?(solution: PuzzleGrid, found: number): void;

  // Propagator
  onPassStart?(pass: number, state: ReadonlyGameState): void;
  onRuleApplied?(rule: IDeductionRule, removed: number, state: ReadonlyGameState): void;
  onPassEnd?(pass: number, removed: number, state: ReadonlyGameState): void;
}
